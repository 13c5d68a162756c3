import type { Handler, Middleware } from "../middleware/compose";
import type { ParsedPattern } from "../pattern/pattern";

/** Standard methods registered by `any()`. */
export const HTTP_METHODS = ["GET", "POST", "PUT", "DELETE", "PATCH", "OPTIONS", "HEAD"] as const;

/** One of {@link HTTP_METHODS}. */
export type HttpMethod = (typeof HTTP_METHODS)[number];

/** Documentation annotations. Never consulted by dispatch. */
export interface RouteMeta {
	name?: string;
	description?: string;
	tags: string[];
}

/** A registered (method, pattern) pair bound to its handler and middleware. */
export interface Route {
	readonly method: string;
	readonly pattern: ParsedPattern;
	readonly handler: Handler;
	readonly middlewares: readonly Middleware[];
	readonly meta: RouteMeta;
}

/**
 * Returned from route registration. Only the documentation metadata can
 * be changed through it.
 */
export class RouteHandle {
	constructor(readonly route: Route) {}

	get method(): string {
		return this.route.method;
	}

	get path(): string {
		return this.route.pattern.raw;
	}

	name(name: string): this {
		this.route.meta.name = name;
		return this;
	}

	describe(description: string): this {
		this.route.meta.description = description;
		return this;
	}

	tag(...tags: string[]): this {
		this.route.meta.tags.push(...tags);
		return this;
	}
}

/** Anything routes can be registered on: the dispatcher or a group. */
export interface RouteRegistrar {
	register(method: string, path: string, handler: Handler, ...middlewares: Middleware[]): RouteHandle;
	get(path: string, handler: Handler, ...middlewares: Middleware[]): RouteHandle;
	post(path: string, handler: Handler, ...middlewares: Middleware[]): RouteHandle;
	put(path: string, handler: Handler, ...middlewares: Middleware[]): RouteHandle;
	delete(path: string, handler: Handler, ...middlewares: Middleware[]): RouteHandle;
	patch(path: string, handler: Handler, ...middlewares: Middleware[]): RouteHandle;
	options(path: string, handler: Handler, ...middlewares: Middleware[]): RouteHandle;
	head(path: string, handler: Handler, ...middlewares: Middleware[]): RouteHandle;
	any(path: string, handler: Handler, ...middlewares: Middleware[]): RouteHandle[];
}
