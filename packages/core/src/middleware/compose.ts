// ---------------------------------------------------------------------------
// Middleware composition
// ---------------------------------------------------------------------------

import type { Context } from "../context/context";

/** Terminal request handler. Throwing (or rejecting) reports a handler fault. */
export type Handler = (ctx: Context) => void | Promise<void>;

/**
 * A middleware function. Call `next()` to continue the chain; returning
 * without calling it short-circuits everything downstream.
 */
export type Middleware = (ctx: Context, next: () => Promise<void>) => Promise<void>;

/**
 * Wrap `handler` in `middlewares`, innermost last.
 *
 * `compose([a, b], h)` runs `a` → `b` → `h` → `b` → `a`: the first
 * middleware is outermost and observes the request before, and the
 * response after, every later one.
 */
export function compose(middlewares: readonly Middleware[], handler: Handler): Handler {
	return middlewares.reduceRight<Handler>(
		(next, mw) => (ctx) =>
			mw(ctx, async () => {
				await next(ctx);
			}),
		handler,
	);
}

/** Fold several middlewares into one that runs them in order. */
export function chain(...middlewares: Middleware[]): Middleware {
	return (ctx, next) =>
		Promise.resolve(compose(middlewares, () => next())(ctx));
}

/** Apply `middleware` only to requests for which `predicate` holds. */
export function when(predicate: (ctx: Context) => boolean, middleware: Middleware): Middleware {
	return (ctx, next) => (predicate(ctx) ? middleware(ctx, next) : next());
}
