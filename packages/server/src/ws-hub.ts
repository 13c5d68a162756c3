// ---------------------------------------------------------------------------
// WebSocket Hub: upgrade, message parsing, room control, broadcast
// ---------------------------------------------------------------------------

import { randomUUID } from "node:crypto";
import type { IncomingMessage } from "node:http";
import type { Duplex } from "node:stream";
import { parseRequestTarget, toError } from "@switchyard/core";
import { type RawData, WebSocket, WebSocketServer } from "ws";
import { BroadcastHub, type HubOptions, type PushClient, type PushMessage } from "./broadcast-hub";

/** Configuration for {@link WebSocketHub}. */
export interface WebSocketHubOptions extends HubOptions {
	/** Only upgrade requests for this path (default: any path). */
	path?: string;
	/** Maximum messages per second per client (default: 50). */
	maxMessagesPerSecond?: number;
	/** Reject the upgrade with 401 unless this resolves true. */
	authenticate?: (req: IncomingMessage) => boolean | Promise<boolean>;
	/** Derive the client ID from the upgrade request (default: random UUID). */
	clientId?: (req: IncomingMessage) => string;
	/** Receives every message that is not a room control message. */
	onMessage?: (client: WsClient, data: unknown, hub: WebSocketHub) => void | Promise<void>;
}

/** Room membership request sent by a client. */
export interface ControlMessage {
	type: "join" | "leave";
	room: string;
}

/** Per-client message rate tracking. */
interface MessageRateEntry {
	count: number;
	windowStart: number;
}

/** A connected WebSocket client. Messages go out as JSON text frames. */
export class WsClient implements PushClient {
	constructor(
		readonly id: string,
		readonly socket: WebSocket,
	) {}

	get isOpen(): boolean {
		return this.socket.readyState === WebSocket.OPEN;
	}

	send(message: PushMessage): void {
		this.socket.send(JSON.stringify(message));
	}

	close(code = 1001, reason = "Server shutting down"): void {
		this.socket.close(code, reason);
	}
}

/** Narrow a parsed frame to a {@link ControlMessage}. */
export function isControlMessage(value: unknown): value is ControlMessage {
	return (
		typeof value === "object" &&
		value !== null &&
		"type" in value &&
		"room" in value &&
		(value.type === "join" || value.type === "leave") &&
		typeof value.room === "string" &&
		value.room !== ""
	);
}

/** Rooms named by `?room=a&room=b` or `?room=a,b`. */
export function roomsFromQuery(query: URLSearchParams): string[] {
	return query
		.getAll("room")
		.flatMap((value) => value.split(","))
		.map((room) => room.trim())
		.filter((room) => room !== "");
}

function toText(data: RawData): string {
	if (Array.isArray(data)) return Buffer.concat(data).toString("utf-8");
	if (Buffer.isBuffer(data)) return data.toString("utf-8");
	return Buffer.from(data).toString("utf-8");
}

function parseFrame(text: string): unknown {
	try {
		return JSON.parse(text);
	} catch {
		return text;
	}
}

/**
 * WebSocket connections multiplexed over rooms.
 *
 * Runs `ws` in `noServer` mode behind an HTTP server's `upgrade` event.
 * Clients join the rooms in the `room` query parameter on connect and
 * can send `{"type":"join"|"leave","room":"..."}` frames afterwards.
 * Every other frame is parsed as JSON when possible and passed to
 * `onMessage`.
 */
export class WebSocketHub extends BroadcastHub<WsClient> {
	protected readonly transport = "ws" as const;
	private readonly wss = new WebSocketServer({ noServer: true });
	private readonly options: WebSocketHubOptions;
	private readonly maxMessagesPerSecond: number;
	private readonly messageRates = new Map<WsClient, MessageRateEntry>();

	constructor(options: WebSocketHubOptions = {}) {
		super(options);
		this.options = options;
		this.maxMessagesPerSecond = options.maxMessagesPerSecond ?? 50;
	}

	/** Whether an upgrade request targets this hub's path. */
	accepts(req: IncomingMessage): boolean {
		if (this.options.path === undefined) return true;
		return parseRequestTarget(req.url ?? "/").path === this.options.path;
	}

	/** Complete (or refuse) an upgrade request already routed to this hub. */
	upgrade(req: IncomingMessage, socket: Duplex, head: Buffer): void {
		this.handleUpgrade(req, socket, head).catch((err: unknown) => {
			this.logger?.error("websocket upgrade failed", { error: toError(err).message });
			socket.destroy();
		});
	}

	/** Close all connections and shut down the WebSocket server. */
	override close(): void {
		super.close();
		this.messageRates.clear();
		this.wss.close();
	}

	// -----------------------------------------------------------------------
	// Upgrade handling
	// -----------------------------------------------------------------------

	private async handleUpgrade(req: IncomingMessage, socket: Duplex, head: Buffer): Promise<void> {
		const { query } = parseRequestTarget(req.url ?? "/");

		if (this.isFull()) {
			reject(socket, "503 Service Unavailable");
			return;
		}

		if (this.options.authenticate && !(await this.options.authenticate(req))) {
			reject(socket, "401 Unauthorized");
			return;
		}

		this.wss.handleUpgrade(req, socket, head, (ws) => {
			const client = new WsClient(this.options.clientId?.(req) ?? randomUUID(), ws);
			this.register(client, roomsFromQuery(query));

			ws.on("message", (data: RawData) => {
				if (!this.checkMessageRate(client)) {
					client.close(1008, "Rate limit exceeded");
					return;
				}
				this.handleMessage(client, toText(data));
			});

			ws.on("close", () => {
				this.messageRates.delete(client);
				this.unregister(client);
			});

			ws.on("error", (err: Error) => {
				this.logger?.warn("websocket error", { clientId: client.id, error: err.message });
				this.messageRates.delete(client);
				this.unregister(client);
			});
		});
	}

	// -----------------------------------------------------------------------
	// Message handling
	// -----------------------------------------------------------------------

	private handleMessage(client: WsClient, text: string): void {
		const data = parseFrame(text);

		if (isControlMessage(data)) {
			if (data.type === "join") this.rooms.join(client.id, data.room);
			else this.rooms.leave(client.id, data.room);
			return;
		}

		this.emit("ws-message", this.connectionEvent(client.id, data));

		const { onMessage } = this.options;
		if (!onMessage) return;
		void Promise.resolve()
			.then(() => onMessage(client, data, this))
			.catch((err: unknown) => {
				this.logger?.error("websocket message handler failed", {
					clientId: client.id,
					error: toError(err).message,
				});
			});
	}

	/**
	 * Check and increment the message rate for a client.
	 * @returns `true` if the message is allowed, `false` if rate-limited.
	 */
	private checkMessageRate(client: WsClient): boolean {
		const now = Date.now();
		const entry = this.messageRates.get(client);

		if (!entry || now - entry.windowStart >= 1000) {
			this.messageRates.set(client, { count: 1, windowStart: now });
			return true;
		}

		if (entry.count >= this.maxMessagesPerSecond) {
			return false;
		}

		entry.count++;
		return true;
	}
}

/** Refuse an upgrade with a bare HTTP status line. */
export function reject(socket: Duplex, status: string): void {
	socket.once("finish", () => socket.destroy());
	socket.end(`HTTP/1.1 ${status}\r\nConnection: close\r\n\r\n`);
}
