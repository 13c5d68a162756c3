import { describe, expect, it, vi } from "vitest";
import type { Middleware } from "../../middleware/compose";
import { HttpError } from "../../result/errors";
import { Dispatcher } from "../dispatcher";

function createDispatcher(): Dispatcher {
	return new Dispatcher({ logger: vi.fn() });
}

describe("Dispatcher", () => {
	it("binds path parameters for the handler", async () => {
		const app = createDispatcher();
		app.get("/users/:id", (ctx) => ctx.json(200, { id: ctx.param("id") }));

		const res = await app.handle({ method: "GET", url: "/users/42" });

		expect(res.status).toBe(200);
		expect(res.body).toBe('{"id":"42"}');
		expect(res.headers["content-type"]).toBe("application/json");
	});

	it("runs the first registered handler for a duplicate route", async () => {
		const app = createDispatcher();
		app.get("/a", (ctx) => ctx.text(200, "first"));
		app.get("/a", (ctx) => ctx.text(200, "second"));

		const res = await app.handle({ method: "GET", url: "/a" });

		expect(res.body).toBe("first");
	});

	it("answers 405 with an Allow header when only other methods match", async () => {
		const app = createDispatcher();
		app.get("/items", (ctx) => ctx.json(200, []));

		const res = await app.handle({ method: "DELETE", url: "/items" });

		expect(res.status).toBe(405);
		expect(res.body).toBe('{"error":"Method Not Allowed"}');
		expect(res.headers.allow).toBe("GET");
	});

	it("answers 404 when no route matches", async () => {
		const app = createDispatcher();
		app.get("/items", (ctx) => ctx.json(200, []));

		const res = await app.handle({ method: "GET", url: "/nowhere" });

		expect(res.status).toBe(404);
		expect(res.body).toBe('{"error":"Not Found"}');
	});

	it("uses custom fallback handlers", async () => {
		const app = createDispatcher();
		app.get("/items", (ctx) => ctx.json(200, []));
		app.notFound((ctx) => ctx.text(404, "nothing here"));
		app.methodNotAllowed((ctx) => ctx.text(405, "try GET"));

		const missing = await app.handle({ method: "GET", url: "/nowhere" });
		const wrongMethod = await app.handle({ method: "POST", url: "/items" });

		expect(missing.body).toBe("nothing here");
		expect(wrongMethod.body).toBe("try GET");
	});

	it("wraps unmatched requests in global middleware", async () => {
		const app = createDispatcher();
		app.use(async (ctx, next) => {
			ctx.setHeader("X-Seen", "yes");
			await next();
		});

		const res = await app.handle({ method: "GET", url: "/nowhere" });

		expect(res.status).toBe(404);
		expect(res.headers["x-seen"]).toBe("yes");
	});

	it("runs global middleware outside route middleware", async () => {
		const app = createDispatcher();
		const log: string[] = [];
		const mark =
			(name: string): Middleware =>
			async (_ctx, next) => {
				log.push(`${name}>`);
				await next();
				log.push(`<${name}`);
			};
		app.use(mark("global"));
		app.get("/x", () => {
			log.push("handler");
		}, mark("route"));

		await app.handle({ method: "GET", url: "/x" });

		expect(log).toEqual(["global>", "route>", "handler", "<route", "<global"]);
	});

	it("maps an HttpError to its own status", async () => {
		const app = createDispatcher();
		app.get("/secret", () => {
			throw new HttpError(403, "Forbidden here");
		});

		const res = await app.handle({ method: "GET", url: "/secret" });

		expect(res.status).toBe(403);
		expect(res.body).toBe('{"error":"Forbidden here"}');
	});

	it("maps any other fault to a 500 and emits on-error", async () => {
		const app = createDispatcher();
		const faults: string[] = [];
		app.events.onError((ctx) => {
			faults.push(ctx.fault?.message ?? "none");
		});
		app.get("/boom", async () => {
			throw new Error("kaboom");
		});

		const res = await app.handle({ method: "GET", url: "/boom" });

		expect(res.status).toBe(500);
		expect(res.body).toBe('{"error":"kaboom"}');
		expect(faults).toEqual(["kaboom"]);
	});

	it("keeps a response written before the fault", async () => {
		const app = createDispatcher();
		app.get("/partial", (ctx) => {
			ctx.text(202, "accepted");
			throw new Error("late failure");
		});

		const res = await app.handle({ method: "GET", url: "/partial" });

		expect(res.status).toBe(202);
		expect(res.body).toBe("accepted");
	});

	it("emits before-request and after-request around the chain", async () => {
		const app = createDispatcher();
		const log: string[] = [];
		app.events
			.beforeRequest((ctx) => {
				log.push(`before ${ctx.method} ${ctx.path}`);
			})
			.afterRequest((ctx) => {
				log.push(`after ${ctx.statusCode}`);
			});
		app.get("/ping", (ctx) => {
			log.push("handler");
			ctx.text(200, "pong");
		});

		await app.handle({ method: "GET", url: "/ping" });

		expect(log).toEqual(["before GET /ping", "handler", "after 200"]);
	});

	it("does not leak store entries between sequential requests", async () => {
		const app = createDispatcher();
		app.get("/write", (ctx) => {
			ctx.set("user", "alice");
			ctx.noContent();
		});
		app.get("/read", (ctx) => {
			ctx.json(200, { user: ctx.get("user") ?? null, present: ctx.has("user") });
		});

		await app.handle({ method: "GET", url: "/write" });
		expect(app.pool.idle).toBe(1);
		const res = await app.handle({ method: "GET", url: "/read" });

		expect(res.body).toBe('{"user":null,"present":false}');
		expect(app.pool.idle).toBe(1);
	});

	it("registers group routes with prefix and middleware", async () => {
		const app = createDispatcher();
		const api = app.group("/api", async (ctx, next) => {
			ctx.set("scope", "api");
			await next();
		});
		api.get("/whoami", (ctx) => ctx.text(200, String(ctx.get("scope"))));

		const res = await app.handle({ method: "GET", url: "/api/whoami" });

		expect(res.body).toBe("api");
		expect(app.routes().map((r) => `${r.method} ${r.pattern.raw}`)).toEqual(["GET /api/whoami"]);
	});

	it("registers every standard method with any()", async () => {
		const app = createDispatcher();
		app.any("/echo", (ctx) => ctx.text(200, ctx.method));

		const res = await app.handle({ method: "PATCH", url: "/echo" });

		expect(res.body).toBe("PATCH");
		expect(app.routes()).toHaveLength(7);
	});

	it("ignores leading empty segments in the request path", async () => {
		const app = createDispatcher();
		app.get("/users/:id", (ctx) => ctx.json(200, { user: ctx.param("id") }));
		app.get("/:id", (ctx) => ctx.json(200, { other: ctx.param("id") }));

		const res = await app.handle({ method: "GET", url: "//users/42" });

		expect(res.status).toBe(200);
		expect(res.body).toBe('{"user":"42"}');
	});

	it("routes a bare double slash to the root route", async () => {
		const app = createDispatcher();
		app.get("/", (ctx) => ctx.text(200, "root"));

		const res = await app.handle({ method: "GET", url: "//" });

		expect(res.status).toBe(200);
		expect(res.body).toBe("root");
	});

	it("routes an absolute-form target by its path", async () => {
		const app = createDispatcher();
		app.get("/users/:id", (ctx) => ctx.text(200, `${ctx.param("id")} ${ctx.query("full")}`));

		const res = await app.handle({ method: "GET", url: "http://example.test/users/7?full=1" });

		expect(res.body).toBe("7 1");
	});

	it("logs client errors at warn and server faults at error", async () => {
		const logger = vi.fn();
		const app = new Dispatcher({ logger });
		app.get("/missing", () => {
			throw new HttpError(404, "No such item");
		});
		app.get("/broken", () => {
			throw new Error("disk gone");
		});

		await app.handle({ method: "GET", url: "/missing" });
		await app.handle({ method: "GET", url: "/broken?retry=1" });

		expect(logger.mock.calls).toEqual([
			["warn", "request failed", { method: "GET", url: "/missing", error: "No such item" }],
			["error", "request failed", { method: "GET", url: "/broken?retry=1", error: "disk gone" }],
		]);
	});

	it("keeps independent dispatchers isolated", async () => {
		const a = createDispatcher();
		const b = createDispatcher();
		a.get("/only-a", (ctx) => ctx.text(200, "a"));

		const res = await b.handle({ method: "GET", url: "/only-a" });

		expect(res.status).toBe(404);
		expect(b.events.count("before-request")).toBe(0);
	});
});
