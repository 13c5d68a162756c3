// ---------------------------------------------------------------------------
// CORS Middleware
// ---------------------------------------------------------------------------

import type { Middleware } from "@switchyard/core";

/** Configuration for CORS header generation. */
export interface CorsConfig {
	/** Allowed origins. When empty/omitted, the request origin is reflected. */
	allowedOrigins?: string[];
	/** Methods advertised to preflight requests. */
	allowedMethods?: string[];
	/** Request headers advertised to preflight requests. */
	allowedHeaders?: string[];
	/** Response headers exposed to the browser. */
	exposedHeaders?: string[];
	/** Send `Access-Control-Allow-Credentials: true`. */
	credentials?: boolean;
	/** Preflight cache lifetime in seconds (default 86400). */
	maxAge?: number;
}

const DEFAULT_METHODS = ["GET", "POST", "PUT", "PATCH", "DELETE", "OPTIONS"];
const DEFAULT_HEADERS = ["Authorization", "Content-Type", "X-Request-ID"];
const DEFAULT_MAX_AGE = 86_400;

/**
 * Build CORS response headers for the given origin.
 *
 * When `allowedOrigins` is set, only listed origins receive CORS headers.
 * When omitted, the request origin is reflected (or `*` if no origin header).
 */
export function corsHeaders(
	origin: string | null | undefined,
	config: CorsConfig = {},
): Record<string, string> {
	const { allowedOrigins } = config;
	let allowOrigin = "*";

	if (allowedOrigins && allowedOrigins.length > 0) {
		if (origin && allowedOrigins.includes(origin)) {
			allowOrigin = origin;
		} else {
			return {};
		}
	} else if (origin) {
		allowOrigin = origin;
	}

	const headers: Record<string, string> = {
		"Access-Control-Allow-Origin": allowOrigin,
		"Access-Control-Allow-Methods": (config.allowedMethods ?? DEFAULT_METHODS).join(", "),
		"Access-Control-Allow-Headers": (config.allowedHeaders ?? DEFAULT_HEADERS).join(", "),
		"Access-Control-Max-Age": String(config.maxAge ?? DEFAULT_MAX_AGE),
	};
	if (allowOrigin !== "*") headers.Vary = "Origin";
	if (config.credentials) headers["Access-Control-Allow-Credentials"] = "true";
	if (config.exposedHeaders && config.exposedHeaders.length > 0) {
		headers["Access-Control-Expose-Headers"] = config.exposedHeaders.join(", ");
	}
	return headers;
}

/**
 * Apply CORS headers to every response and answer `OPTIONS` preflight
 * requests with 204 without running anything downstream.
 */
export function cors(config: CorsConfig = {}): Middleware {
	return async (ctx, next) => {
		for (const [name, value] of Object.entries(corsHeaders(ctx.header("origin"), config))) {
			ctx.setHeader(name, value);
		}
		if (ctx.method === "OPTIONS") {
			ctx.noContent();
			return;
		}
		await next();
	};
}
