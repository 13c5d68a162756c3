// ---------------------------------------------------------------------------
// SSE Hub: Server-Sent Events over hijacked responses
// ---------------------------------------------------------------------------

import { randomUUID } from "node:crypto";
import type { ServerResponse } from "node:http";
import type { Context, Handler } from "@switchyard/core";
import { BroadcastHub, type HubOptions, type PushClient, type PushMessage } from "./broadcast-hub";
import { roomsFromQuery } from "./ws-hub";

/** Configuration for {@link SseHub}. */
export interface SseHubOptions extends HubOptions {
	/** Interval between keep-alive comments (default: 15s). */
	keepAliveMs?: number;
	/** Reconnection delay advertised to the browser via `retry:`. */
	retryMs?: number;
	/** Derive the client ID from the request (default: random UUID). */
	clientId?: (ctx: Context) => string;
}

const DEFAULT_KEEP_ALIVE_MS = 15_000;

/**
 * Render one event in the `text/event-stream` format. String data is
 * sent as-is, one `data:` line per line; anything else as JSON.
 */
export function formatSseEvent(message: PushMessage): string {
	let frame = "";
	if (message.id !== undefined) frame += `id: ${message.id}\n`;
	if (message.event !== undefined) frame += `event: ${message.event}\n`;
	const payload = typeof message.data === "string" ? message.data : JSON.stringify(message.data);
	for (const line of payload.split("\n")) {
		frame += `data: ${line}\n`;
	}
	return `${frame}\n`;
}

/** A connected SSE client writing to its hijacked response. */
export class SseClient implements PushClient {
	private keepAlive: ReturnType<typeof setInterval> | null = null;

	constructor(
		readonly id: string,
		readonly res: ServerResponse,
	) {}

	get isOpen(): boolean {
		return !this.res.writableEnded && !this.res.destroyed;
	}

	send(message: PushMessage): void {
		this.res.write(formatSseEvent(message));
	}

	/** Write a comment line, ignored by the browser. */
	comment(text: string): void {
		this.res.write(`: ${text}\n\n`);
	}

	startKeepAlive(intervalMs: number): void {
		this.keepAlive = setInterval(() => {
			if (this.isOpen) this.comment("keep-alive");
		}, intervalMs);
		this.keepAlive.unref();
	}

	close(): void {
		if (this.keepAlive) {
			clearInterval(this.keepAlive);
			this.keepAlive = null;
		}
		if (!this.res.writableEnded) this.res.end();
	}
}

/**
 * Server-Sent Events clients grouped into rooms.
 *
 * Mount {@link handler} on a GET route. The handler hijacks the response,
 * so the stream outlives the request's pooled context.
 *
 * @example
 * ```ts
 * const events = server.sse({ keepAliveMs: 10_000 });
 * server.get("/events", events.handler());
 * events.broadcastToRoom("prices", { event: "tick", data: { symbol: "ACME", price: 42 } });
 * ```
 */
export class SseHub extends BroadcastHub<SseClient> {
	protected readonly transport = "sse" as const;
	private readonly keepAliveMs: number;
	private readonly retryMs: number | undefined;
	private readonly clientIdFn: ((ctx: Context) => string) | undefined;

	constructor(options: SseHubOptions = {}) {
		super(options);
		this.keepAliveMs = options.keepAliveMs ?? DEFAULT_KEEP_ALIVE_MS;
		this.retryMs = options.retryMs;
		this.clientIdFn = options.clientId;
	}

	/** Route handler that turns the request into an event stream. */
	handler(): Handler {
		return (ctx) => {
			if (this.isFull()) {
				ctx.sendError(503, "Too many event stream connections");
				return;
			}

			const id = this.clientIdFn?.(ctx) ?? randomUUID();
			const rooms = roomsFromQuery(ctx.target.query);
			const headers = ctx.toResponse().headers;
			const { res } = ctx.hijack();

			res.writeHead(200, {
				...headers,
				"content-type": "text/event-stream",
				"cache-control": "no-cache",
				connection: "keep-alive",
				"x-accel-buffering": "no",
			});
			if (this.retryMs !== undefined) res.write(`retry: ${this.retryMs}\n\n`);
			else res.write(": connected\n\n");

			const client = new SseClient(id, res);
			this.register(client, rooms);
			client.startKeepAlive(this.keepAliveMs);

			res.on("close", () => {
				client.close();
				this.unregister(client);
			});
		};
	}
}
