import { request } from "node:http";
import { connect } from "node:net";
import { Dispatcher, HttpError, type ServerEvent } from "@switchyard/core";
import { afterEach, describe, expect, it } from "vitest";
import WebSocket from "ws";
import { Logger } from "../logger";
import { Server, type ServerOptions } from "../server";

function quietLogger(lines: Record<string, unknown>[] = []): Logger {
	return new Logger({ write: (line) => lines.push(JSON.parse(line)) });
}

function sleep(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Write a raw upgrade request and resolve with the first line of the reply. */
function rawUpgrade(port: number, target: string): Promise<string> {
	return new Promise((resolve, reject) => {
		const socket = connect(port, "127.0.0.1", () => {
			socket.write(
				`GET ${target} HTTP/1.1\r\n` +
					"Host: 127.0.0.1\r\n" +
					"Connection: Upgrade\r\n" +
					"Upgrade: websocket\r\n" +
					"Sec-WebSocket-Version: 13\r\n" +
					"Sec-WebSocket-Key: dGVzdC1rZXktMTIzNDU2Nw==\r\n\r\n",
			);
		});
		let reply = "";
		socket.setEncoding("utf-8");
		socket.on("data", (chunk: string) => {
			reply += chunk;
		});
		socket.on("close", () => resolve(reply.split("\r\n")[0] ?? ""));
		socket.on("error", reject);
	});
}

/** Send a raw request with an explicit body and resolve with status and body text. */
function rawPost(url: string, body: string): Promise<{ status: number; body: string }> {
	return new Promise((resolve, reject) => {
		const req = request(url, { method: "POST", headers: { "content-type": "text/plain" } }, (res) => {
			let text = "";
			res.setEncoding("utf-8");
			res.on("data", (chunk: string) => {
				text += chunk;
			});
			res.on("end", () => resolve({ status: res.statusCode ?? 0, body: text }));
		});
		req.on("error", reject);
		req.end(body);
	});
}

describe("Server", () => {
	let server: Server | undefined;

	async function start(options: ServerOptions = {}, setup?: (s: Server) => void): Promise<string> {
		const s = new Server({
			port: 0,
			host: "127.0.0.1",
			shutdownTimeoutMs: 200,
			logger: quietLogger(),
			...options,
		});
		setup?.(s);
		server = s;
		await s.start();
		return `http://127.0.0.1:${s.port}`;
	}

	afterEach(async () => {
		await server?.stop();
		server = undefined;
	});

	it("dispatches to a parameterised route", async () => {
		const base = await start({}, (s) => {
			s.get("/users/:id", (ctx) => ctx.json(200, { id: ctx.param("id") }));
		});

		const res = await fetch(`${base}/users/42`);

		expect(res.status).toBe(200);
		expect(res.headers.get("content-type")).toBe("application/json");
		expect(res.headers.get("content-length")).toBe("11");
		expect(await res.json()).toEqual({ id: "42" });
	});

	it("answers unknown paths with 404 and wrong methods with 405", async () => {
		const base = await start({}, (s) => {
			s.get("/users/:id", (ctx) => ctx.json(200, {}));
		});

		const missing = await fetch(`${base}/nope`);
		expect(missing.status).toBe(404);
		expect(await missing.json()).toEqual({ error: "Not Found" });

		const wrong = await fetch(`${base}/users/1`, { method: "DELETE" });
		expect(wrong.status).toBe(405);
		expect(wrong.headers.get("allow")).toBe("GET");
		expect(await wrong.json()).toEqual({ error: "Method Not Allowed" });
	});

	it("hands the request body and client address to the context", async () => {
		const base = await start({}, (s) => {
			s.post("/echo", (ctx) => ctx.json(201, { body: ctx.bodyJson(), ip: ctx.clientIp() }));
		});

		const res = await fetch(`${base}/echo`, {
			method: "POST",
			headers: { "content-type": "application/json" },
			body: JSON.stringify({ name: "widget" }),
		});

		expect(res.status).toBe(201);
		expect(await res.json()).toEqual({ body: { name: "widget" }, ip: "127.0.0.1" });
	});

	it("rejects bodies over maxBodyBytes with 413", async () => {
		let reached = false;
		const base = await start({ maxBodyBytes: 16 }, (s) => {
			s.post("/upload", (ctx) => {
				reached = true;
				ctx.noContent();
			});
		});

		const res = await rawPost(`${base}/upload`, "x".repeat(64));

		expect(res.status).toBe(413);
		expect(JSON.parse(res.body)).toEqual({ error: "Payload too large" });
		expect(reached).toBe(false);
	});

	it("omits the body of HEAD responses", async () => {
		const base = await start({}, (s) => {
			s.head("/ping", (ctx) => ctx.text(200, "pong"));
		});

		const res = await fetch(`${base}/ping`, { method: "HEAD" });

		expect(res.status).toBe(200);
		expect(res.headers.get("content-length")).toBe("4");
		expect(await res.text()).toBe("");
	});

	it("maps HttpError to its status", async () => {
		const base = await start({}, (s) => {
			s.get("/teapot", () => {
				throw new HttpError(418, "I'm a teapot");
			});
		});

		const res = await fetch(`${base}/teapot`);

		expect(res.status).toBe(418);
		expect(await res.json()).toEqual({ error: "I'm a teapot" });
	});

	it("installs the request timeout", async () => {
		const base = await start({ requestTimeoutMs: 20 }, (s) => {
			s.get("/slow", async (ctx) => {
				await sleep(100);
				if (!ctx.signal.aborted) ctx.text(200, "late");
			});
		});

		const res = await fetch(`${base}/slow`);

		expect(res.status).toBe(504);
		expect(await res.json()).toEqual({ error: "Request timeout" });
	});

	it("emits server-start and server-stop with the bound address", async () => {
		const events: Array<[string, ServerEvent]> = [];
		const lines: Record<string, unknown>[] = [];
		const s = new Server({ port: 0, host: "127.0.0.1", logger: quietLogger(lines) });
		s.events.onServerStart((event) => {
			events.push(["start", event]);
		});
		s.events.onServerStop((event) => {
			events.push(["stop", event]);
		});

		await s.start();
		const port = s.port;
		expect(s.listening).toBe(true);
		await s.stop();

		expect(s.listening).toBe(false);
		expect(port).toBeGreaterThan(0);
		expect(events).toEqual([
			["start", { address: "127.0.0.1", port }],
			["stop", { address: "127.0.0.1", port }],
		]);
		expect(lines.map((l) => l.msg)).toEqual(["server listening", "server stopped"]);
	});

	it("serves routes registered on a supplied dispatcher", async () => {
		const dispatcher = new Dispatcher({ logger: () => undefined });
		dispatcher.get("/from-dispatcher", (ctx) => ctx.text(200, "shared"));
		const s = new Server({ port: 0, host: "127.0.0.1", logger: quietLogger() }, dispatcher);
		server = s;
		await s.start();

		const res = await fetch(`http://127.0.0.1:${s.port}/from-dispatcher`);

		expect(s.dispatcher).toBe(dispatcher);
		expect(await res.text()).toBe("shared");
	});

	it("routes WebSocket upgrades to the hub for the path", async () => {
		const base = await start({}, (s) => {
			s.ws({ path: "/live" });
		});
		const wsBase = base.replace("http", "ws");

		const ws = new WebSocket(`${wsBase}/live?room=lobby`);
		await new Promise<void>((resolve, reject) => {
			ws.on("open", () => resolve());
			ws.on("error", reject);
		});

		const status = await new Promise<number>((resolve) => {
			const other = new WebSocket(`${wsBase}/other`);
			other.on("unexpected-response", (_req, res) => {
				resolve(res.statusCode ?? 0);
				other.terminate();
			});
			other.on("error", () => undefined);
		});

		expect(status).toBe(404);
		expect(server?.metrics.wsConnections.get()).toBe(1);
		ws.terminate();
	});

	it("renders the developer error page when devMode is configured", async () => {
		const lines: Record<string, unknown>[] = [];
		const base = await start({ devMode: true, logger: quietLogger(lines) }, (s) => {
			s.use(s.recovery());
			s.get("/explode", () => {
				throw new Error("gears <stuck>");
			});
		});

		const res = await fetch(`${base}/explode`);
		const page = await res.text();

		expect(res.status).toBe(500);
		expect(res.headers.get("content-type")).toBe("text/html; charset=utf-8");
		expect(page).toContain('<div class="message">gears &lt;stuck&gt;</div>');
		expect(lines.find((line) => line.msg === "recovered from handler fault")?.error).toBe("gears <stuck>");
	});

	it("keeps the JSON error body when devMode is off", async () => {
		const base = await start({}, (s) => {
			s.use(s.recovery());
			s.get("/explode", () => {
				throw new Error("gears stuck");
			});
		});

		const res = await fetch(`${base}/explode`);

		expect(res.status).toBe(500);
		expect(await res.json()).toEqual({ error: "Internal Server Error" });
	});

	it("refuses an upgrade whose target is a bare double slash", async () => {
		await start({}, (s) => {
			s.ws({ path: "/live" });
		});
		const port = server?.port ?? 0;

		expect(await rawUpgrade(port, "//")).toBe("HTTP/1.1 404 Not Found");
		expect(server?.listening).toBe(true);
	});

	it("routes a double-slash request path to the matching route", async () => {
		const base = await start({}, (s) => {
			s.get("/users/:id", (ctx) => ctx.json(200, { id: ctx.param("id") }));
		});
		const { port } = new URL(base);

		const res = await new Promise<{ status: number; body: string }>((resolve, reject) => {
			const req = request({ host: "127.0.0.1", port, path: "//users/42" }, (r) => {
				let text = "";
				r.setEncoding("utf-8");
				r.on("data", (chunk: string) => {
					text += chunk;
				});
				r.on("end", () => resolve({ status: r.statusCode ?? 0, body: text }));
			});
			req.on("error", reject);
			req.end();
		});

		expect(res).toEqual({ status: 200, body: '{"id":"42"}' });
	});
});
