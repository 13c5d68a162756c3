// ---------------------------------------------------------------------------
// Auth Middleware: Basic, Bearer and API-key authentication
// ---------------------------------------------------------------------------

import { timingSafeEqual } from "node:crypto";
import type { Context, Middleware } from "@switchyard/core";

type Awaitable<T> = T | Promise<T>;

export type BasicValidator = (username: string, password: string, ctx: Context) => Awaitable<boolean>;
export type TokenValidator = (token: string, ctx: Context) => Awaitable<boolean>;

/** Options shared by every auth middleware. */
export interface AuthOptions {
	/** Let matching requests through unauthenticated. */
	skip?: (ctx: Context) => boolean;
	/** Body of the 401 response (default "Unauthorized"). */
	message?: string;
}

const BASE64 = /^[A-Za-z0-9+/]*={0,2}$/;

/**
 * Extract the Bearer token from an Authorization header value.
 * Returns the raw token string, or null if missing/malformed.
 */
export function extractBearerToken(header: string | undefined): string | null {
	if (!header) return null;
	const match = header.match(/^Bearer\s+(\S+)$/i);
	return match?.[1] ?? null;
}

/** Decode `Basic <base64(user:pass)>`, or null when malformed. */
export function parseBasicCredentials(
	header: string | undefined,
): { username: string; password: string } | null {
	if (!header?.startsWith("Basic ")) return null;
	const encoded = header.slice(6).trim();
	if (!BASE64.test(encoded)) return null;
	const decoded = Buffer.from(encoded, "base64").toString("utf-8");
	const sep = decoded.indexOf(":");
	if (sep === -1) return null;
	return { username: decoded.slice(0, sep), password: decoded.slice(sep + 1) };
}

/** Constant-time string comparison. */
export function safeEqual(a: string, b: string): boolean {
	const left = Buffer.from(a);
	const right = Buffer.from(b);
	if (left.length !== right.length) return false;
	return timingSafeEqual(left, right);
}

// ---------------------------------------------------------------------------
// Basic
// ---------------------------------------------------------------------------

/**
 * HTTP Basic authentication. Stores the username under `username`.
 * Failures get 401 with a `WWW-Authenticate` challenge for `realm`.
 */
export function basicAuth(
	validator: BasicValidator,
	realm = "Restricted",
	options: AuthOptions = {},
): Middleware {
	const message = options.message ?? "Unauthorized";
	return async (ctx, next) => {
		if (options.skip?.(ctx)) {
			await next();
			return;
		}

		const credentials = parseBasicCredentials(ctx.header("authorization"));
		if (!credentials || !(await validator(credentials.username, credentials.password, ctx))) {
			ctx.setHeader("WWW-Authenticate", `Basic realm="${realm}"`);
			ctx.sendError(401, message);
			return;
		}

		ctx.set("username", credentials.username);
		await next();
	};
}

/** Validator for {@link basicAuth} backed by a fixed user → password map. */
export function basicAuthUsers(users: Record<string, string>): BasicValidator {
	const table = new Map(Object.entries(users));
	return (username, password) => {
		const expected = table.get(username);
		return expected !== undefined && safeEqual(password, expected);
	};
}

// ---------------------------------------------------------------------------
// Bearer
// ---------------------------------------------------------------------------

/** Bearer token authentication. Stores the token under `token`. */
export function bearerAuth(validator: TokenValidator, options: AuthOptions = {}): Middleware {
	const message = options.message ?? "Invalid or missing token";
	return async (ctx, next) => {
		if (options.skip?.(ctx)) {
			await next();
			return;
		}

		const token = extractBearerToken(ctx.header("authorization"));
		if (!token || !(await validator(token, ctx))) {
			ctx.setHeader("WWW-Authenticate", "Bearer");
			ctx.sendError(401, message);
			return;
		}

		ctx.set("token", token);
		await next();
	};
}

// ---------------------------------------------------------------------------
// API key
// ---------------------------------------------------------------------------

export interface ApiKeyOptions extends AuthOptions {
	/** Header carrying the key (default "X-API-Key"). */
	header?: string;
	/** Query parameter consulted when the header is absent. */
	query?: string;
}

/** API-key authentication. Stores the key under `apiKey`. */
export function apiKeyAuth(validator: TokenValidator, options: ApiKeyOptions = {}): Middleware {
	const header = options.header ?? "X-API-Key";
	const message = options.message ?? "Invalid or missing API key";
	return async (ctx, next) => {
		if (options.skip?.(ctx)) {
			await next();
			return;
		}

		const key = ctx.header(header) ?? (options.query ? ctx.query(options.query) : undefined);
		if (!key || !(await validator(key, ctx))) {
			ctx.sendError(401, message);
			return;
		}

		ctx.set("apiKey", key);
		await next();
	};
}

/** Validator accepting any of a fixed set of keys. */
export function staticApiKey(...keys: string[]): TokenValidator {
	return (candidate) => {
		let matched = false;
		for (const key of keys) {
			if (safeEqual(candidate, key)) matched = true;
		}
		return matched;
	};
}
