import type { Context } from "../context/context";
import { ContextPool } from "../context/pool";
import type { NativeHandles, RequestDescriptor, ResponseDescriptor } from "../context/types";
import { LifecyclePipeline } from "../events/pipeline";
import { type CoreLogger, defaultLogger } from "../logger";
import { compose, type Handler, type Middleware } from "../middleware/compose";
import { HttpError, toError } from "../result/errors";
import { RouteGroup } from "../routing/group";
import { HTTP_METHODS, type Route, RouteHandle, type RouteRegistrar } from "../routing/route";
import { type Resolution, RouteTable } from "../routing/route-table";

// ---------------------------------------------------------------------------
// Dispatcher: route resolution, chain assembly and context lifecycle
// ---------------------------------------------------------------------------

export interface DispatcherConfig {
	/** Maximum idle contexts kept for reuse (default: 1024). */
	poolSize?: number;
	logger?: CoreLogger;
}

const defaultNotFound: Handler = (ctx) => ctx.sendError(404, "Not Found");
const defaultMethodNotAllowed: Handler = (ctx) => ctx.sendError(405, "Method Not Allowed");

/**
 * Turns request descriptors into response descriptors.
 *
 * Each request gets a pooled {@link Context}. Global middleware wraps the
 * route's own middleware, which wraps the handler. Unmatched requests run
 * the not-found or method-not-allowed fallback inside the same global
 * middleware.
 *
 * @example
 * ```ts
 * const app = new Dispatcher();
 * app.use(requestId());
 * app.get("/users/:id", (ctx) => ctx.json(200, { id: ctx.param("id") }));
 * const res = await app.handle({ method: "GET", url: "/users/42" });
 * ```
 */
export class Dispatcher implements RouteRegistrar {
	readonly events: LifecyclePipeline;
	readonly pool: ContextPool;
	private readonly table = new RouteTable();
	private readonly logger: CoreLogger;
	private middlewares: readonly Middleware[] = [];
	private notFoundHandler: Handler = defaultNotFound;
	private methodNotAllowedHandler: Handler = defaultMethodNotAllowed;

	constructor(config: DispatcherConfig = {}) {
		this.logger = config.logger ?? defaultLogger;
		this.pool = new ContextPool({ maxSize: config.poolSize, logger: this.logger });
		this.events = new LifecyclePipeline({ logger: this.logger });
	}

	// -----------------------------------------------------------------------
	// Registration
	// -----------------------------------------------------------------------

	/** Append global middleware. Applies to every request from now on. */
	use(...middlewares: Middleware[]): this {
		this.middlewares = [...this.middlewares, ...middlewares];
		return this;
	}

	/** Replace the handler for paths no route matches. */
	notFound(handler: Handler): this {
		this.notFoundHandler = handler;
		return this;
	}

	/** Replace the handler for paths that exist under other methods only. */
	methodNotAllowed(handler: Handler): this {
		this.methodNotAllowedHandler = handler;
		return this;
	}

	/**
	 * Register a route.
	 *
	 * @throws InvalidPatternError when `path` is not a legal pattern.
	 */
	register(method: string, path: string, handler: Handler, ...middlewares: Middleware[]): RouteHandle {
		return new RouteHandle(this.table.add(method, path, handler, middlewares));
	}

	get(path: string, handler: Handler, ...middlewares: Middleware[]): RouteHandle {
		return this.register("GET", path, handler, ...middlewares);
	}

	post(path: string, handler: Handler, ...middlewares: Middleware[]): RouteHandle {
		return this.register("POST", path, handler, ...middlewares);
	}

	put(path: string, handler: Handler, ...middlewares: Middleware[]): RouteHandle {
		return this.register("PUT", path, handler, ...middlewares);
	}

	delete(path: string, handler: Handler, ...middlewares: Middleware[]): RouteHandle {
		return this.register("DELETE", path, handler, ...middlewares);
	}

	patch(path: string, handler: Handler, ...middlewares: Middleware[]): RouteHandle {
		return this.register("PATCH", path, handler, ...middlewares);
	}

	options(path: string, handler: Handler, ...middlewares: Middleware[]): RouteHandle {
		return this.register("OPTIONS", path, handler, ...middlewares);
	}

	head(path: string, handler: Handler, ...middlewares: Middleware[]): RouteHandle {
		return this.register("HEAD", path, handler, ...middlewares);
	}

	/** Register `handler` under every method in {@link HTTP_METHODS}. */
	any(path: string, handler: Handler, ...middlewares: Middleware[]): RouteHandle[] {
		return HTTP_METHODS.map((method) => this.register(method, path, handler, ...middlewares));
	}

	group(prefix: string, ...middlewares: Middleware[]): RouteGroup {
		return new RouteGroup(
			(method, path, handler, mws) => new RouteHandle(this.table.add(method, path, handler, mws)),
			prefix,
			middlewares,
		);
	}

	/** Every registered route, in registration order. */
	routes(): readonly Route[] {
		return this.table.list();
	}

	// -----------------------------------------------------------------------
	// Dispatch
	// -----------------------------------------------------------------------

	/**
	 * Dispatch one request.
	 *
	 * Never rejects because of a handler: faults become error responses.
	 * The context is released before the returned promise settles.
	 */
	async handle(request: RequestDescriptor, handles?: NativeHandles): Promise<ResponseDescriptor> {
		const ctx = this.pool.acquire(request, handles);
		try {
			try {
				await this.events.emit("before-request", ctx);
				const resolution = this.table.resolve(ctx.method, ctx.path);
				await this.buildChain(ctx, resolution)(ctx);
			} catch (err) {
				await this.handleFault(ctx, toError(err));
			}

			try {
				await this.events.emit("after-request", ctx);
			} catch (err) {
				this.logger("error", "after-request handler failed", { error: toError(err).message });
			}

			return ctx.toResponse();
		} finally {
			this.pool.release(ctx);
		}
	}

	private buildChain(ctx: Context, resolution: Resolution): Handler {
		const globals = this.middlewares;

		switch (resolution.kind) {
			case "matched": {
				const { route, params } = resolution;
				ctx.setParams(params);
				return compose(globals, compose(route.middlewares, route.handler));
			}
			case "method-mismatch":
				ctx.setHeader("Allow", resolution.allowed.join(", "));
				return compose(globals, this.methodNotAllowedHandler);
			case "not-found":
				return compose(globals, this.notFoundHandler);
		}
	}

	private async handleFault(ctx: Context, err: Error): Promise<void> {
		ctx.recordFault(err);
		const { method, url } = ctx.request;
		const clientError = err instanceof HttpError && err.status < 500;
		this.logger(clientError ? "warn" : "error", "request failed", {
			method,
			url,
			error: err.message,
		});

		try {
			await this.events.emit("on-error", ctx);
		} catch (hookErr) {
			this.logger("error", "on-error handler failed", { error: toError(hookErr).message });
		}

		if (ctx.written) return;
		if (err instanceof HttpError) {
			ctx.sendError(err.status, err.message);
		} else {
			ctx.sendError(500, err.message);
		}
	}
}
