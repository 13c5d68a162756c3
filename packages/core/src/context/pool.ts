import { type CoreLogger, defaultLogger } from "../logger";
import { ContextReleasedError } from "../result/errors";
import { Context, ContextState } from "./context";
import type { NativeHandles, RequestDescriptor } from "./types";

/** Configuration for {@link ContextPool}. */
export interface ContextPoolConfig {
	/** Maximum number of idle states kept on the free list (default: 1024). */
	maxSize?: number;
	/** Receives failures of deferred request work. */
	logger?: CoreLogger;
}

const DEFAULT_MAX_POOL_SIZE = 1024;

/**
 * Free-list pool of per-request state.
 *
 * `acquire` resets a state synchronously and hands out a fresh
 * {@link Context} lease for it. `release` revokes the lease at once; the
 * state itself goes back on the free list only after every promise
 * registered through {@link Context.defer} has settled, so abandoned
 * work can never observe the next request's data.
 */
export class ContextPool {
	private readonly free: ContextState[] = [];
	private readonly leased = new Map<Context, ContextState>();
	private readonly maxSize: number;
	private readonly logger: CoreLogger;
	private draining = 0;

	constructor(config: ContextPoolConfig = {}) {
		this.maxSize = config.maxSize ?? DEFAULT_MAX_POOL_SIZE;
		this.logger = config.logger ?? defaultLogger;
	}

	/** Number of idle states on the free list. */
	get idle(): number {
		return this.free.length;
	}

	/** Number of contexts currently leased. */
	get inUse(): number {
		return this.leased.size;
	}

	/** Number of released states still waiting on deferred work. */
	get pending(): number {
		return this.draining;
	}

	acquire(request: RequestDescriptor, handles?: NativeHandles): Context {
		const state = this.free.pop() ?? new ContextState(this.logger);
		state.reset(request, handles);
		const ctx = new Context(state, state.generation);
		this.leased.set(ctx, state);
		return ctx;
	}

	/**
	 * Return a context to the pool. The lease is consumed: a second
	 * release, or any later use of `ctx`, throws {@link ContextReleasedError}.
	 */
	release(ctx: Context): void {
		const state = this.leased.get(ctx);
		if (!state) {
			throw new ContextReleasedError("Context is not leased from this pool");
		}
		ctx.abort(new ContextReleasedError("Request completed"));
		this.leased.delete(ctx);
		state.generation++;

		if (state.deferred.size === 0) {
			this.recycle(state);
			return;
		}

		this.draining++;
		void Promise.allSettled([...state.deferred]).then(() => {
			this.draining--;
			this.recycle(state);
		});
	}

	private recycle(state: ContextState): void {
		state.scrub();
		if (this.free.length < this.maxSize) {
			this.free.push(state);
		}
	}
}
