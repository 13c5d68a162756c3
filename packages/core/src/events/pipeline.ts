import type { Context } from "../context/context";
import { type CoreLogger, defaultLogger } from "../logger";
import { toError } from "../result/errors";

// ---------------------------------------------------------------------------
// Event Pipeline: kind-keyed lifecycle hooks
// ---------------------------------------------------------------------------

/** The lifecycle points a dispatcher and server publish. */
export type EventKind =
	| "before-request"
	| "after-request"
	| "on-error"
	| "server-start"
	| "server-stop"
	| "ws-connect"
	| "ws-disconnect"
	| "ws-message"
	| "sse-connect"
	| "sse-disconnect";

/** Payload of `server-start` and `server-stop`. */
export interface ServerEvent {
	address: string;
	port: number;
}

/** Payload of the WebSocket and SSE connection events. */
export interface ConnectionEvent {
	clientId: string;
	transport: "ws" | "sse";
	/** Rooms the client belongs to at the time of the event. */
	rooms: string[];
	/** Message payload for `ws-message`. */
	data?: unknown;
}

/** Payload type for every {@link EventKind}. */
export interface LifecycleEventMap {
	"before-request": Context;
	"after-request": Context;
	"on-error": Context;
	"server-start": ServerEvent;
	"server-stop": ServerEvent;
	"ws-connect": ConnectionEvent;
	"ws-disconnect": ConnectionEvent;
	"ws-message": ConnectionEvent;
	"sse-connect": ConnectionEvent;
	"sse-disconnect": ConnectionEvent;
}

export type EventHandler<T> = (payload: T) => void | Promise<void>;

/** Receives failures of handlers run through {@link EventPipeline.emitAsync}. */
export type AsyncErrorReporter = (error: Error, kind: string) => void;

export interface EventPipelineConfig {
	logger?: CoreLogger;
	onAsyncError?: AsyncErrorReporter;
}

type HandlerTable<TMap> = { [K in keyof TMap]?: ReadonlyArray<EventHandler<TMap[K]>> };

/**
 * Ordered handler lists keyed by event kind.
 *
 * Registration replaces the list for a kind instead of mutating it, so an
 * emission always runs against the snapshot it started with.
 */
export class EventPipeline<TMap extends object> {
	private handlers: HandlerTable<TMap> = {};
	private readonly onAsyncError: AsyncErrorReporter;

	constructor(config: EventPipelineConfig = {}) {
		const logger = config.logger ?? defaultLogger;
		this.onAsyncError =
			config.onAsyncError ??
			((error, kind) => {
				logger("error", "async event handler failed", { kind, error: error.message });
			});
	}

	/** Append a handler for `kind`. */
	on<K extends keyof TMap>(kind: K, handler: EventHandler<TMap[K]>): this {
		const existing = this.handlers[kind] ?? [];
		this.handlers[kind] = [...existing, handler];
		return this;
	}

	/** Remove every handler for `kind`. */
	off<K extends keyof TMap>(kind: K): this {
		delete this.handlers[kind];
		return this;
	}

	clear(): void {
		this.handlers = {};
	}

	hasHandlers<K extends keyof TMap>(kind: K): boolean {
		return this.count(kind) > 0;
	}

	count<K extends keyof TMap>(kind: K): number {
		return this.handlers[kind]?.length ?? 0;
	}

	/**
	 * Run the handlers for `kind` one after another on the caller's path.
	 * The first failure stops the run and rejects.
	 */
	async emit<K extends keyof TMap>(kind: K, payload: TMap[K]): Promise<void> {
		const snapshot = this.handlers[kind];
		if (!snapshot) return;
		for (const handler of snapshot) {
			await handler(payload);
		}
	}

	/**
	 * Schedule each handler for `kind` on its own microtask and return at
	 * once. Failures go to the async error reporter.
	 */
	emitAsync<K extends keyof TMap>(kind: K, payload: TMap[K]): void {
		const snapshot = this.handlers[kind];
		if (!snapshot) return;
		for (const handler of snapshot) {
			void Promise.resolve()
				.then(() => handler(payload))
				.catch((err: unknown) => this.onAsyncError(toError(err), String(kind)));
		}
	}
}

/** The dispatcher's pipeline, with a named shortcut per lifecycle kind. */
export class LifecyclePipeline extends EventPipeline<LifecycleEventMap> {
	beforeRequest(handler: EventHandler<Context>): this {
		return this.on("before-request", handler);
	}

	afterRequest(handler: EventHandler<Context>): this {
		return this.on("after-request", handler);
	}

	onError(handler: EventHandler<Context>): this {
		return this.on("on-error", handler);
	}

	onServerStart(handler: EventHandler<ServerEvent>): this {
		return this.on("server-start", handler);
	}

	onServerStop(handler: EventHandler<ServerEvent>): this {
		return this.on("server-stop", handler);
	}

	onWsConnect(handler: EventHandler<ConnectionEvent>): this {
		return this.on("ws-connect", handler);
	}

	onWsDisconnect(handler: EventHandler<ConnectionEvent>): this {
		return this.on("ws-disconnect", handler);
	}

	onWsMessage(handler: EventHandler<ConnectionEvent>): this {
		return this.on("ws-message", handler);
	}

	onSseConnect(handler: EventHandler<ConnectionEvent>): this {
		return this.on("sse-connect", handler);
	}

	onSseDisconnect(handler: EventHandler<ConnectionEvent>): this {
		return this.on("sse-disconnect", handler);
	}
}
