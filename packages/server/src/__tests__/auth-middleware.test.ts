import type { Handler } from "@switchyard/core";
import { describe, expect, it } from "vitest";
import {
	apiKeyAuth,
	basicAuth,
	basicAuthUsers,
	bearerAuth,
	extractBearerToken,
	parseBasicCredentials,
	safeEqual,
	staticApiKey,
} from "../auth-middleware";
import { parseBody, runThrough } from "./helpers/dispatch";

const echoStore: Handler = (ctx) =>
	ctx.json(200, {
		username: ctx.get("username") ?? null,
		token: ctx.get("token") ?? null,
		apiKey: ctx.get("apiKey") ?? null,
	});

function basicHeader(username: string, password: string): string {
	return `Basic ${Buffer.from(`${username}:${password}`).toString("base64")}`;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

describe("extractBearerToken", () => {
	it("returns the token from a well-formed header", () => {
		expect(extractBearerToken("Bearer abc.def")).toBe("abc.def");
		expect(extractBearerToken("bearer abc")).toBe("abc");
	});

	it("returns null for missing or malformed headers", () => {
		expect(extractBearerToken(undefined)).toBeNull();
		expect(extractBearerToken("Basic abc")).toBeNull();
		expect(extractBearerToken("Bearer a b")).toBeNull();
	});
});

describe("parseBasicCredentials", () => {
	it("splits on the first colon", () => {
		expect(parseBasicCredentials(basicHeader("alice", "pa:ss"))).toEqual({
			username: "alice",
			password: "pa:ss",
		});
	});

	it("rejects non-base64 and colon-less payloads", () => {
		expect(parseBasicCredentials("Basic !!!")).toBeNull();
		expect(parseBasicCredentials(`Basic ${Buffer.from("nocolon").toString("base64")}`)).toBeNull();
		expect(parseBasicCredentials("Bearer x")).toBeNull();
	});
});

describe("safeEqual", () => {
	it("compares strings of equal and unequal length", () => {
		expect(safeEqual("test-secret", "test-secret")).toBe(true);
		expect(safeEqual("test-secret", "test-secreT")).toBe(false);
		expect(safeEqual("short", "longer")).toBe(false);
	});
});

// ---------------------------------------------------------------------------
// Basic
// ---------------------------------------------------------------------------

describe("basicAuth", () => {
	const guard = basicAuth(basicAuthUsers({ alice: "test-secret" }), "Admin");

	it("stores the username on success", async () => {
		const res = await runThrough([guard], echoStore, {
			headers: { authorization: basicHeader("alice", "test-secret") },
		});

		expect(res.status).toBe(200);
		expect(parseBody(res)).toEqual({ username: "alice", token: null, apiKey: null });
	});

	it("challenges with the realm on bad credentials", async () => {
		const res = await runThrough([guard], echoStore, {
			headers: { authorization: basicHeader("alice", "wrong") },
		});

		expect(res.status).toBe(401);
		expect(res.headers["www-authenticate"]).toBe('Basic realm="Admin"');
		expect(parseBody(res)).toEqual({ error: "Unauthorized" });
	});

	it("challenges when the header is missing", async () => {
		const res = await runThrough([guard], echoStore);
		expect(res.status).toBe(401);
	});

	it("lets skipped requests through", async () => {
		const open = basicAuth(basicAuthUsers({}), "Admin", { skip: (ctx) => ctx.path === "/health" });
		const res = await runThrough([open], echoStore, { url: "/health" });
		expect(res.status).toBe(200);
	});
});

// ---------------------------------------------------------------------------
// Bearer
// ---------------------------------------------------------------------------

describe("bearerAuth", () => {
	const guard = bearerAuth((token) => token === "test-token");

	it("stores the token on success", async () => {
		const res = await runThrough([guard], echoStore, {
			headers: { authorization: "Bearer test-token" },
		});

		expect(res.status).toBe(200);
		expect(parseBody(res)).toEqual({ username: null, token: "test-token", apiKey: null });
	});

	it("rejects an unknown token", async () => {
		const res = await runThrough([guard], echoStore, {
			headers: { authorization: "Bearer other" },
		});

		expect(res.status).toBe(401);
		expect(res.headers["www-authenticate"]).toBe("Bearer");
		expect(parseBody(res)).toEqual({ error: "Invalid or missing token" });
	});

	it("awaits async validators", async () => {
		const asyncGuard = bearerAuth(async (token) => token.startsWith("test-"));
		const res = await runThrough([asyncGuard], echoStore, {
			headers: { authorization: "Bearer test-async" },
		});
		expect(res.status).toBe(200);
	});
});

// ---------------------------------------------------------------------------
// API key
// ---------------------------------------------------------------------------

describe("apiKeyAuth", () => {
	const validator = staticApiKey("test-key-1", "test-key-2");

	it("reads the default header", async () => {
		const res = await runThrough([apiKeyAuth(validator)], echoStore, {
			headers: { "x-api-key": "test-key-2" },
		});

		expect(res.status).toBe(200);
		expect(parseBody(res)).toEqual({ username: null, token: null, apiKey: "test-key-2" });
	});

	it("falls back to the query parameter", async () => {
		const res = await runThrough([apiKeyAuth(validator, { query: "key" })], echoStore, {
			url: "/data?key=test-key-1",
		});

		expect(res.status).toBe(200);
		expect(parseBody(res)).toEqual({ username: null, token: null, apiKey: "test-key-1" });
	});

	it("honours a custom header and message", async () => {
		const guard = apiKeyAuth(validator, { header: "X-Service-Key", message: "No entry" });
		const res = await runThrough([guard], echoStore, {
			headers: { "x-api-key": "test-key-1" },
		});

		expect(res.status).toBe(401);
		expect(parseBody(res)).toEqual({ error: "No entry" });
	});
});
