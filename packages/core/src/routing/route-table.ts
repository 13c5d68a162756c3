// ---------------------------------------------------------------------------
// Route Table: ordered registration, first-match resolution
// ---------------------------------------------------------------------------

import type { Handler, Middleware } from "../middleware/compose";
import { matchPattern, parsePattern } from "../pattern/pattern";
import type { Route } from "./route";

/** Outcome of {@link RouteTable.resolve}. */
export type Resolution =
	| { kind: "matched"; route: Route; params: Record<string, string> }
	| { kind: "method-mismatch"; allowed: string[] }
	| { kind: "not-found" };

/**
 * Routes in registration order.
 *
 * Resolution is a linear scan: the first route whose method and pattern
 * both match wins, with no specificity ranking between literal and
 * parameterised segments. The route list is replaced on every `add`, so a
 * scan in progress always works on a complete snapshot.
 */
export class RouteTable {
	private routes: readonly Route[] = [];

	get size(): number {
		return this.routes.length;
	}

	/**
	 * Register a route.
	 *
	 * @throws InvalidPatternError when `path` is not a legal pattern.
	 */
	add(method: string, path: string, handler: Handler, middlewares: readonly Middleware[]): Route {
		const route: Route = {
			method: method.toUpperCase(),
			pattern: parsePattern(path),
			handler,
			middlewares: [...middlewares],
			meta: { tags: [] },
		};
		this.routes = [...this.routes, route];
		return route;
	}

	/** Snapshot of every registered route, in registration order. */
	list(): readonly Route[] {
		return this.routes;
	}

	resolve(method: string, path: string): Resolution {
		const routes = this.routes;
		const wanted = method.toUpperCase();

		for (const route of routes) {
			if (route.method !== wanted) continue;
			const result = matchPattern(route.pattern, path);
			if (result.matched) {
				return { kind: "matched", route, params: result.params };
			}
		}

		// Second scan: does the path exist under another method?
		const allowed: string[] = [];
		for (const route of routes) {
			if (allowed.includes(route.method)) continue;
			if (matchPattern(route.pattern, path).matched) {
				allowed.push(route.method);
			}
		}

		return allowed.length > 0 ? { kind: "method-mismatch", allowed } : { kind: "not-found" };
	}
}
