import { createServer, type IncomingMessage, type Server as HttpServer, type ServerResponse } from "node:http";
import type { Duplex } from "node:stream";
import {
	Dispatcher,
	type Handler,
	HttpError,
	type LifecyclePipeline,
	type Middleware,
	type ResponseDescriptor,
	type RouteGroup,
	type RouteHandle,
	type RouteRegistrar,
	toError,
} from "@switchyard/core";
import { resolveServerConfig, type ServerConfig } from "./config";
import { Logger, toCoreLogger } from "./logger";
import { MetricsRegistry } from "./metrics";
import { type RecoveryOptions, recovery, timeout } from "./middleware";
import { SseHub, type SseHubOptions } from "./sse-hub";
import { reject as rejectUpgrade, WebSocketHub, type WebSocketHubOptions } from "./ws-hub";

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

/** Options accepted by {@link Server}: any config field plus collaborators. */
export interface ServerOptions extends Partial<ServerConfig> {
	/** Server logger (default: JSON lines to stdout at `logLevel`). */
	logger?: Logger;
	/** Registry shared with the hubs (default: a fresh registry). */
	metrics?: MetricsRegistry;
}

// ---------------------------------------------------------------------------
// Node HTTP helpers
// ---------------------------------------------------------------------------

/**
 * Read the full request body, rejecting with a 413 `HttpError` once it
 * grows past `limit` bytes. The rest of an oversized body is drained.
 */
function readBody(req: IncomingMessage, limit: number): Promise<Buffer> {
	const declared = Number(req.headers["content-length"]);
	if (Number.isFinite(declared) && declared > limit) {
		req.resume();
		return Promise.reject(new HttpError(413, "Payload too large"));
	}

	return new Promise((resolve, reject) => {
		const chunks: Buffer[] = [];
		let size = 0;
		const onData = (chunk: Buffer) => {
			size += chunk.length;
			if (size > limit) {
				req.off("data", onData);
				req.resume();
				reject(new HttpError(413, "Payload too large"));
				return;
			}
			chunks.push(chunk);
		};
		req.on("data", onData);
		req.on("end", () => resolve(Buffer.concat(chunks)));
		req.on("error", reject);
	});
}

/** Statuses that never carry a body. */
const BODYLESS_STATUS = new Set([204, 304]);

/** Write a response descriptor onto the native response. */
function writeResponse(res: ServerResponse, response: ResponseDescriptor, omitBody: boolean): void {
	const body = response.body ?? "";
	const headers: Record<string, string> = { ...response.headers };
	if (!BODYLESS_STATUS.has(response.status) && headers["content-length"] === undefined) {
		headers["content-length"] = String(Buffer.byteLength(body));
	}
	res.writeHead(response.status, headers);
	if (omitBody || BODYLESS_STATUS.has(response.status)) res.end();
	else res.end(body);
}

// ---------------------------------------------------------------------------
// Server
// ---------------------------------------------------------------------------

/**
 * Binds a {@link Dispatcher} to `node:http`.
 *
 * Route registration is delegated to the dispatcher. When
 * `requestTimeoutMs` is positive a {@link timeout} middleware is installed
 * as the first global middleware.
 *
 * @example
 * ```ts
 * const server = new Server({ port: 8080 });
 * server.use(server.recovery(), requestLogger(server.logger));
 * server.get("/users/:id", (ctx) => ctx.json(200, { id: ctx.param("id") }));
 * await server.start();
 * ```
 */
export class Server implements RouteRegistrar {
	readonly config: ServerConfig;
	readonly dispatcher: Dispatcher;
	readonly logger: Logger;
	readonly metrics: MetricsRegistry;

	private httpServer: HttpServer | null = null;
	private resolvedPort = 0;
	private readonly wsHubs: WebSocketHub[] = [];
	private readonly sseHubs: SseHub[] = [];

	constructor(options: ServerOptions = {}, dispatcher?: Dispatcher) {
		const { logger, metrics, ...partial } = options;
		this.config = resolveServerConfig(partial);
		this.logger = logger ?? new Logger({ level: this.config.logLevel });
		this.metrics = metrics ?? new MetricsRegistry();
		this.dispatcher =
			dispatcher ??
			new Dispatcher({ poolSize: this.config.poolSize, logger: toCoreLogger(this.logger) });

		if (this.config.requestTimeoutMs > 0) {
			this.dispatcher.use(timeout(this.config.requestTimeoutMs));
		}
	}

	// -----------------------------------------------------------------------
	// Registration (delegated)
	// -----------------------------------------------------------------------

	get events(): LifecyclePipeline {
		return this.dispatcher.events;
	}

	use(...middlewares: Middleware[]): this {
		this.dispatcher.use(...middlewares);
		return this;
	}

	notFound(handler: Handler): this {
		this.dispatcher.notFound(handler);
		return this;
	}

	methodNotAllowed(handler: Handler): this {
		this.dispatcher.methodNotAllowed(handler);
		return this;
	}

	group(prefix: string, ...middlewares: Middleware[]): RouteGroup {
		return this.dispatcher.group(prefix, ...middlewares);
	}

	register(method: string, path: string, handler: Handler, ...middlewares: Middleware[]): RouteHandle {
		return this.dispatcher.register(method, path, handler, ...middlewares);
	}

	get(path: string, handler: Handler, ...middlewares: Middleware[]): RouteHandle {
		return this.dispatcher.get(path, handler, ...middlewares);
	}

	post(path: string, handler: Handler, ...middlewares: Middleware[]): RouteHandle {
		return this.dispatcher.post(path, handler, ...middlewares);
	}

	put(path: string, handler: Handler, ...middlewares: Middleware[]): RouteHandle {
		return this.dispatcher.put(path, handler, ...middlewares);
	}

	delete(path: string, handler: Handler, ...middlewares: Middleware[]): RouteHandle {
		return this.dispatcher.delete(path, handler, ...middlewares);
	}

	patch(path: string, handler: Handler, ...middlewares: Middleware[]): RouteHandle {
		return this.dispatcher.patch(path, handler, ...middlewares);
	}

	options(path: string, handler: Handler, ...middlewares: Middleware[]): RouteHandle {
		return this.dispatcher.options(path, handler, ...middlewares);
	}

	head(path: string, handler: Handler, ...middlewares: Middleware[]): RouteHandle {
		return this.dispatcher.head(path, handler, ...middlewares);
	}

	any(path: string, handler: Handler, ...middlewares: Middleware[]): RouteHandle[] {
		return this.dispatcher.any(path, handler, ...middlewares);
	}

	/**
	 * {@link recovery} middleware bound to this server: faults go to
	 * `logger` and the error page follows `config.devMode`.
	 */
	recovery(options: RecoveryOptions = {}): Middleware {
		return recovery({ logger: this.logger, devMode: this.config.devMode, ...options });
	}

	// -----------------------------------------------------------------------
	// Push hubs
	// -----------------------------------------------------------------------

	/**
	 * Create a WebSocket hub. Upgrade requests go to the first hub whose
	 * `path` matches; unmatched upgrades are refused with 404.
	 */
	ws(options: WebSocketHubOptions = {}): WebSocketHub {
		const hub = new WebSocketHub({
			logger: this.logger.child({ component: "ws" }),
			metrics: this.metrics,
			events: this.dispatcher.events,
			...options,
		});
		this.wsHubs.push(hub);
		return hub;
	}

	/** Create an SSE hub. Mount `hub.handler()` on a GET route. */
	sse(options: SseHubOptions = {}): SseHub {
		const hub = new SseHub({
			logger: this.logger.child({ component: "sse" }),
			metrics: this.metrics,
			events: this.dispatcher.events,
			...options,
		});
		this.sseHubs.push(hub);
		return hub;
	}

	// -----------------------------------------------------------------------
	// Lifecycle
	// -----------------------------------------------------------------------

	/** Listener for an existing `http.Server`; `start()` installs it on its own server. */
	readonly requestListener = (req: IncomingMessage, res: ServerResponse): void => {
		void this.handleRequest(req, res);
	};

	/** Route an upgrade request to the first WebSocket hub accepting it. */
	readonly upgradeListener = (req: IncomingMessage, socket: Duplex, head: Buffer): void => {
		const hub = this.wsHubs.find((candidate) => candidate.accepts(req));
		if (hub) hub.upgrade(req, socket, head);
		else rejectUpgrade(socket, "404 Not Found");
	};

	/** Listen, then emit `server-start`. */
	async start(): Promise<void> {
		if (this.httpServer) return;

		const server = createServer(this.requestListener);
		await new Promise<void>((resolve, reject) => {
			server.once("error", reject);
			server.listen(this.config.port, this.config.host, () => {
				server.off("error", reject);
				resolve();
			});
		});

		const addr = server.address();
		if (addr && typeof addr === "object") {
			this.resolvedPort = addr.port;
		}
		this.httpServer = server;
		server.on("upgrade", this.upgradeListener);

		await this.dispatcher.events.emit("server-start", {
			address: this.config.host,
			port: this.port,
		});
		this.logger.info("server listening", { host: this.config.host, port: this.port });
	}

	/**
	 * Emit `server-stop`, disconnect hub clients and close the listener.
	 * Connections still open after `shutdownTimeoutMs` are destroyed.
	 */
	async stop(): Promise<void> {
		const server = this.httpServer;
		if (!server) return;
		this.httpServer = null;

		await this.dispatcher.events.emit("server-stop", {
			address: this.config.host,
			port: this.port,
		});

		for (const hub of this.wsHubs) hub.close();
		for (const hub of this.sseHubs) hub.close();

		const closed = new Promise<void>((resolve, reject) => {
			server.close((err) => (err ? reject(err) : resolve()));
		});
		server.closeIdleConnections();

		const force = setTimeout(() => {
			this.logger.warn("forcing open connections closed", {
				timeoutMs: this.config.shutdownTimeoutMs,
			});
			server.closeAllConnections();
		}, this.config.shutdownTimeoutMs);
		force.unref();

		try {
			await closed;
		} finally {
			clearTimeout(force);
		}
		this.logger.info("server stopped", { port: this.port });
	}

	/** The port the server is listening on (available after start). */
	get port(): number {
		return this.resolvedPort || this.config.port;
	}

	get listening(): boolean {
		return this.httpServer !== null;
	}

	// -----------------------------------------------------------------------
	// Request handling
	// -----------------------------------------------------------------------

	private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
		try {
			const body = await readBody(req, this.config.maxBodyBytes);
			const response = await this.dispatcher.handle(
				{
					method: req.method ?? "GET",
					url: req.url ?? "/",
					headers: req.headers,
					body,
					remoteAddress: req.socket.remoteAddress,
				},
				{ req, res },
			);
			if (response.hijacked) return;
			writeResponse(res, response, req.method === "HEAD");
		} catch (err) {
			const error = toError(err);
			const status = error instanceof HttpError ? error.status : 500;
			if (status >= 500) {
				this.logger.error("request handling failed", {
					method: req.method,
					url: req.url,
					error: error.message,
				});
			}
			if (res.headersSent) {
				res.destroy();
				return;
			}
			const payload = JSON.stringify({ error: error.message });
			res.writeHead(status, {
				"content-type": "application/json",
				"content-length": String(Buffer.byteLength(payload)),
				connection: "close",
			});
			res.end(payload);
		}
	}
}
