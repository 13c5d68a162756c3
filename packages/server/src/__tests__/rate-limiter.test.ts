import type { Handler } from "@switchyard/core";
import { describe, expect, it } from "vitest";
import { RateLimiter, rateLimit } from "../rate-limiter";
import { parseBody, runThrough } from "./helpers/dispatch";

function manualClock(start = 1_000_000) {
	let now = start;
	return {
		now: () => now,
		advance: (ms: number) => {
			now += ms;
		},
	};
}

// ---------------------------------------------------------------------------
// RateLimiter class
// ---------------------------------------------------------------------------

describe("RateLimiter", () => {
	it("rejects requests exceeding the limit", () => {
		const limiter = new RateLimiter({ maxRequests: 2, windowMs: 60_000 });

		expect(limiter.tryConsume("client-a")).toBe(true);
		expect(limiter.tryConsume("client-a")).toBe(true);
		expect(limiter.tryConsume("client-a")).toBe(false);

		limiter.dispose();
	});

	it("tracks clients independently", () => {
		const limiter = new RateLimiter({ maxRequests: 1, windowMs: 60_000 });

		expect(limiter.tryConsume("client-a")).toBe(true);
		expect(limiter.tryConsume("client-a")).toBe(false);
		expect(limiter.tryConsume("client-b")).toBe(true);

		limiter.dispose();
	});

	it("opens a new window after windowMs", () => {
		const clock = manualClock();
		const limiter = new RateLimiter({ maxRequests: 1, windowMs: 1000, now: clock.now });

		expect(limiter.tryConsume("client-a")).toBe(true);
		expect(limiter.tryConsume("client-a")).toBe(false);

		clock.advance(1000);

		expect(limiter.tryConsume("client-a")).toBe(true);
		limiter.dispose();
	});

	it("reports seconds until the window resets", () => {
		const clock = manualClock();
		const limiter = new RateLimiter({ maxRequests: 1, windowMs: 10_000, now: clock.now });
		limiter.tryConsume("client-a");

		expect(limiter.retryAfterSeconds("client-a")).toBe(10);
		clock.advance(4_500);
		expect(limiter.retryAfterSeconds("client-a")).toBe(6);
		expect(limiter.retryAfterSeconds("unknown")).toBe(0);

		limiter.dispose();
	});

	it("reports remaining requests", () => {
		const limiter = new RateLimiter({ maxRequests: 3, windowMs: 60_000 });
		expect(limiter.remaining("client-a")).toBe(3);
		limiter.tryConsume("client-a");
		expect(limiter.remaining("client-a")).toBe(2);
		limiter.dispose();
	});

	it("reset() clears all tracked clients", () => {
		const limiter = new RateLimiter({ maxRequests: 1, windowMs: 60_000 });

		limiter.tryConsume("client-a");
		expect(limiter.tryConsume("client-a")).toBe(false);

		limiter.reset();
		expect(limiter.tryConsume("client-a")).toBe(true);

		limiter.dispose();
	});
});

// ---------------------------------------------------------------------------
// rateLimit middleware
// ---------------------------------------------------------------------------

describe("rateLimit", () => {
	it("answers 429 with Retry-After once the window is spent", async () => {
		const clock = manualClock();
		const limiter = new RateLimiter({ maxRequests: 1, windowMs: 30_000, now: clock.now });
		const mw = rateLimit({ limiter });
		const handler = () => {};
		const request = { remoteAddress: "10.1.1.1" };

		const first = await runThrough([mw], (ctx) => ctx.text(200, "ok"), request);
		const second = await runThrough([mw], handler, request);

		expect(first.status).toBe(200);
		expect(first.headers["x-ratelimit-limit"]).toBe("1");
		expect(first.headers["x-ratelimit-remaining"]).toBe("0");
		expect(second.status).toBe(429);
		expect(second.headers["retry-after"]).toBe("30");
		expect(parseBody(second)).toEqual({ error: "Too many requests" });

		limiter.dispose();
	});

	it("keys callers with a custom key function", async () => {
		const limiter = new RateLimiter({ maxRequests: 1, windowMs: 60_000 });
		const mw = rateLimit({ limiter, keyFn: (ctx) => ctx.header("x-api-key") ?? "anon" });
		const ok: Handler = (ctx) => ctx.text(200, "ok");

		await runThrough([mw], ok, { headers: { "x-api-key": "a" } });
		const other = await runThrough([mw], ok, { headers: { "x-api-key": "b" } });

		expect(other.status).toBe(200);
		limiter.dispose();
	});

	it("skips limiting when the skip predicate holds", async () => {
		const limiter = new RateLimiter({ maxRequests: 1, windowMs: 60_000 });
		const mw = rateLimit({ limiter, skip: (ctx) => ctx.path === "/health" });

		await runThrough([mw], (ctx) => ctx.text(200, "ok"), { url: "/health" });
		const res = await runThrough([mw], (ctx) => ctx.text(200, "ok"), { url: "/health" });

		expect(res.status).toBe(200);
		limiter.dispose();
	});
});
