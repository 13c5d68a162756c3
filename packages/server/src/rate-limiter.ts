// ---------------------------------------------------------------------------
// Per-Client Rate Limiter: fixed-window counter
// ---------------------------------------------------------------------------

import type { Context, Middleware } from "@switchyard/core";

/** Configuration for the per-client rate limiter. */
export interface RateLimiterConfig {
	/** Maximum requests per window (default: 100). */
	maxRequests?: number;
	/** Window size in milliseconds (default: 60_000). */
	windowMs?: number;
	/** Clock, overridable for testing. */
	now?: () => number;
}

interface ClientWindow {
	count: number;
	windowStart: number;
}

const DEFAULT_MAX_REQUESTS = 100;
const DEFAULT_WINDOW_MS = 60_000;
const CLEANUP_INTERVAL_MS = 60_000;

/**
 * Fixed-window per-key rate limiter.
 *
 * Stale entries are removed by a periodic, unref'd cleanup timer.
 */
export class RateLimiter {
	readonly maxRequests: number;
	private readonly windowMs: number;
	private readonly now: () => number;
	private readonly clients = new Map<string, ClientWindow>();
	private cleanupTimer: ReturnType<typeof setInterval> | null = null;

	constructor(config: RateLimiterConfig = {}) {
		this.maxRequests = config.maxRequests ?? DEFAULT_MAX_REQUESTS;
		this.windowMs = config.windowMs ?? DEFAULT_WINDOW_MS;
		this.now = config.now ?? (() => Date.now());

		this.cleanupTimer = setInterval(() => this.cleanup(), CLEANUP_INTERVAL_MS);
		this.cleanupTimer.unref();
	}

	/**
	 * Attempt to consume one request for `key`.
	 *
	 * @returns `true` if the request is allowed, `false` if rate-limited.
	 */
	tryConsume(key: string): boolean {
		const now = this.now();
		const entry = this.clients.get(key);

		if (!entry || now - entry.windowStart >= this.windowMs) {
			this.clients.set(key, { count: 1, windowStart: now });
			return true;
		}

		if (entry.count >= this.maxRequests) {
			return false;
		}

		entry.count++;
		return true;
	}

	/** Requests left for `key` in its current window. */
	remaining(key: string): number {
		const entry = this.clients.get(key);
		if (!entry || this.now() - entry.windowStart >= this.windowMs) return this.maxRequests;
		return Math.max(0, this.maxRequests - entry.count);
	}

	/** Seconds until the window for `key` resets. Used for `Retry-After`. */
	retryAfterSeconds(key: string): number {
		const entry = this.clients.get(key);
		if (!entry) return 0;
		const elapsed = this.now() - entry.windowStart;
		const remaining = Math.max(0, this.windowMs - elapsed);
		return Math.ceil(remaining / 1000);
	}

	reset(): void {
		this.clients.clear();
	}

	/** Stop the periodic cleanup timer. */
	dispose(): void {
		if (this.cleanupTimer) {
			clearInterval(this.cleanupTimer);
			this.cleanupTimer = null;
		}
		this.clients.clear();
	}

	private cleanup(): void {
		const now = this.now();
		for (const [key, entry] of this.clients) {
			if (now - entry.windowStart >= this.windowMs) {
				this.clients.delete(key);
			}
		}
	}
}

// ---------------------------------------------------------------------------
// Middleware
// ---------------------------------------------------------------------------

export interface RateLimitOptions extends RateLimiterConfig {
	/** Share a limiter between several middleware instances. */
	limiter?: RateLimiter;
	/** Identify the caller (default: client IP). */
	keyFn?: (ctx: Context) => string;
	/** Bypass limiting for matching requests. */
	skip?: (ctx: Context) => boolean;
}

/**
 * Reject callers that exceed their window with 429 and `Retry-After`.
 * Allowed responses carry `X-RateLimit-Limit` and `X-RateLimit-Remaining`.
 */
export function rateLimit(options: RateLimitOptions = {}): Middleware {
	const limiter = options.limiter ?? new RateLimiter(options);
	const keyFn = options.keyFn ?? ((ctx: Context) => ctx.clientIp() || "unknown");

	return async (ctx, next) => {
		if (options.skip?.(ctx)) {
			await next();
			return;
		}

		const key = keyFn(ctx);
		if (!limiter.tryConsume(key)) {
			ctx.setHeader("Retry-After", String(limiter.retryAfterSeconds(key)));
			ctx.sendError(429, "Too many requests");
			return;
		}

		ctx.setHeader("X-RateLimit-Limit", String(limiter.maxRequests));
		ctx.setHeader("X-RateLimit-Remaining", String(limiter.remaining(key)));
		await next();
	};
}
