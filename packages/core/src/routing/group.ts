import type { Handler, Middleware } from "../middleware/compose";
import { HTTP_METHODS, type RouteHandle, type RouteRegistrar } from "./route";

/** Registers a fully-prefixed route with its full middleware list. */
export type RegisterFn = (
	method: string,
	path: string,
	handler: Handler,
	middlewares: readonly Middleware[],
) => RouteHandle;

/**
 * Routes sharing a path prefix and middleware.
 *
 * Group middleware runs outside the route's own middleware. Nested
 * groups concatenate prefixes and inherit the parent's middleware as it
 * stood when the child was created.
 *
 * @example
 * ```ts
 * const api = dispatcher.group("/api", requireAuth);
 * api.get("/users/:id", showUser); // GET /api/users/:id
 * ```
 */
export class RouteGroup implements RouteRegistrar {
	private readonly middlewares: Middleware[];

	constructor(
		private readonly registerFn: RegisterFn,
		readonly prefix: string,
		middlewares: readonly Middleware[] = [],
	) {
		this.middlewares = [...middlewares];
	}

	/** Add middleware applied to routes registered on this group from now on. */
	use(...middlewares: Middleware[]): this {
		this.middlewares.push(...middlewares);
		return this;
	}

	group(prefix: string, ...middlewares: Middleware[]): RouteGroup {
		return new RouteGroup(this.registerFn, this.prefix + prefix, [
			...this.middlewares,
			...middlewares,
		]);
	}

	register(method: string, path: string, handler: Handler, ...middlewares: Middleware[]): RouteHandle {
		return this.registerFn(method, this.prefix + path, handler, [
			...this.middlewares,
			...middlewares,
		]);
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

	any(path: string, handler: Handler, ...middlewares: Middleware[]): RouteHandle[] {
		return HTTP_METHODS.map((method) => this.register(method, path, handler, ...middlewares));
	}
}
