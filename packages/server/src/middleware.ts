// ---------------------------------------------------------------------------
// Standalone middleware factories
// ---------------------------------------------------------------------------

import { randomUUID } from "node:crypto";
import { type Context, type Handler, HttpError, type Middleware, toError } from "@switchyard/core";
import { type Logger, levelForStatus } from "./logger";
import type { MetricsRegistry } from "./metrics";

// ---------------------------------------------------------------------------
// Recovery
// ---------------------------------------------------------------------------

export interface RecoveryOptions {
	/** Receives the fault with its stack. */
	logger?: Logger;
	/** Replace the default 500 response. */
	onPanic?: (ctx: Context, err: Error) => void | Promise<void>;
	/** Answer with an HTML page showing the stack. */
	devMode?: boolean;
}

/**
 * Safety net for faults escaping downstream links.
 *
 * Logs the fault with its stack and answers 500 (or hands the request to
 * `onPanic`), then rethrows so the dispatcher records the fault and emits
 * `on-error`. An {@link HttpError} passes through untouched: the
 * dispatcher answers it with its own status.
 */
export function recovery(options: RecoveryOptions = {}): Middleware {
	return async (ctx, next) => {
		try {
			await next();
		} catch (thrown) {
			if (thrown instanceof HttpError) throw thrown;

			const err = toError(thrown);
			options.logger?.error("recovered from handler fault", {
				method: ctx.method,
				path: ctx.path,
				error: err.message,
				stack: err.stack,
			});

			if (options.onPanic) {
				await options.onPanic(ctx, err);
			} else if (!ctx.written) {
				if (options.devMode) {
					ctx.html(500, renderDevErrorPage(err));
				} else {
					ctx.sendError(500, "Internal Server Error");
				}
			}
			throw err;
		}
	};
}

function escapeHtml(text: string): string {
	return text
		.replace(/&/g, "&amp;")
		.replace(/</g, "&lt;")
		.replace(/>/g, "&gt;")
		.replace(/"/g, "&quot;");
}

function renderDevErrorPage(err: Error): string {
	const stack = (err.stack ?? "")
		.split("\n")
		.slice(1)
		.map((line) => `<div class="frame">${escapeHtml(line.trim())}</div>`)
		.join("\n");
	return `<!DOCTYPE html>
<html>
<head>
<title>500 Internal Server Error</title>
<style>
body { font-family: monospace; background: #1a1a2e; color: #eee; padding: 40px; }
h1 { color: #e94560; }
.message { border-left: 4px solid #e94560; padding: 12px 20px; margin-bottom: 24px; }
.frame { padding: 2px 0; color: #aab; }
</style>
</head>
<body>
<h1>Internal Server Error</h1>
<div class="message">${escapeHtml(err.message)}</div>
${stack}
</body>
</html>`;
}

// ---------------------------------------------------------------------------
// Timeout
// ---------------------------------------------------------------------------

/**
 * Race the downstream chain against a deadline.
 *
 * On expiry the context's signal is aborted, a 504 is written if nothing
 * else was, and the abandoned chain is handed to `ctx.defer` so the
 * context is not recycled until it settles.
 */
export function timeout(ms: number): Middleware {
	return async (ctx, next) => {
		let timer: ReturnType<typeof setTimeout> | undefined;
		const finished = next().then(() => "done" as const);
		const expired = new Promise<"timeout">((resolve) => {
			timer = setTimeout(() => resolve("timeout"), ms);
		});

		try {
			const outcome = await Promise.race([finished, expired]);
			if (outcome === "done") return;

			ctx.abort(new HttpError(504, "Request timeout"));
			ctx.defer(finished);
			if (!ctx.written) ctx.sendError(504, "Request timeout");
		} finally {
			clearTimeout(timer);
		}
	};
}

// ---------------------------------------------------------------------------
// Request ID
// ---------------------------------------------------------------------------

const REQUEST_ID_PATTERN = /^[\w.-]{1,128}$/;

/**
 * Reuse a well-formed incoming `X-Request-ID` or generate one. The ID is
 * echoed in the response and stored under `requestId`.
 */
export function requestId(generate: () => string = randomUUID): Middleware {
	return async (ctx, next) => {
		const incoming = ctx.header("x-request-id");
		const id = incoming && REQUEST_ID_PATTERN.test(incoming) ? incoming : generate();
		ctx.set("requestId", id);
		ctx.setHeader("X-Request-ID", id);
		await next();
	};
}

// ---------------------------------------------------------------------------
// Request logging
// ---------------------------------------------------------------------------

export interface RequestLoggerOptions {
	/** Paths that are never logged. */
	skipPaths?: string[];
}

const DEFAULT_SKIP_PATHS = ["/health", "/healthz", "/ping"];

/** One structured line per request, at the level {@link levelForStatus} picks. */
export function requestLogger(logger: Logger, options: RequestLoggerOptions = {}): Middleware {
	const skip = new Set(options.skipPaths ?? DEFAULT_SKIP_PATHS);

	return async (ctx, next) => {
		if (skip.has(ctx.path)) {
			await next();
			return;
		}

		const start = performance.now();
		let status: number | undefined;
		try {
			await next();
		} catch (err) {
			status = err instanceof HttpError ? err.status : 500;
			throw err;
		} finally {
			const finalStatus = status ?? ctx.statusCode;
			const id = ctx.getString("requestId");
			const entry = {
				method: ctx.method,
				path: ctx.path,
				status: finalStatus,
				durationMs: Math.round(performance.now() - start),
				...(id.ok ? { requestId: id.value } : {}),
			};
			logger.log(levelForStatus(finalStatus), "request completed", entry);
		}
	};
}

// ---------------------------------------------------------------------------
// Security headers
// ---------------------------------------------------------------------------

/** Standard security headers applied to every response. */
export const SECURITY_HEADERS: Readonly<Record<string, string>> = {
	"X-Content-Type-Options": "nosniff",
	"X-Frame-Options": "DENY",
	"X-XSS-Protection": "1; mode=block",
	"Referrer-Policy": "strict-origin-when-cross-origin",
	"Content-Security-Policy": "default-src 'self'",
};

/** Set {@link SECURITY_HEADERS}, with `overrides` replacing individual values. */
export function secureHeaders(overrides: Record<string, string> = {}): Middleware {
	const headers = { ...SECURITY_HEADERS, ...overrides };
	return async (ctx, next) => {
		for (const [name, value] of Object.entries(headers)) {
			ctx.setHeader(name, value);
		}
		await next();
	};
}

// ---------------------------------------------------------------------------
// Metrics
// ---------------------------------------------------------------------------

/** Record request totals, durations and in-flight count. */
export function metrics(registry: MetricsRegistry): Middleware {
	return async (ctx, next) => {
		const start = performance.now();
		registry.activeRequests.inc();
		let status: number | undefined;
		try {
			await next();
		} catch (err) {
			status = err instanceof HttpError ? err.status : 500;
			throw err;
		} finally {
			registry.activeRequests.dec();
			const labels = { method: ctx.method, status: String(status ?? ctx.statusCode) };
			registry.requestsTotal.inc(labels);
			registry.requestDuration.observe({ method: ctx.method }, performance.now() - start);
		}
	};
}

/** Serve the registry in the Prometheus text exposition format. */
export function metricsHandler(registry: MetricsRegistry): Handler {
	return (ctx) => ctx.send(200, "text/plain; version=0.0.4; charset=utf-8", registry.expose());
}
