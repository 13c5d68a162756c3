// ---------------------------------------------------------------------------
// Broadcast Hub: client registry and room-scoped delivery
// ---------------------------------------------------------------------------

import { type ConnectionEvent, type LifecyclePipeline, RoomHub, toError } from "@switchyard/core";
import type { Logger } from "./logger";
import type { MetricsRegistry } from "./metrics";

/** A message pushed to connected clients. */
export interface PushMessage {
	/** Event name; SSE uses it as the `event:` field. */
	event?: string;
	data: unknown;
	/** SSE event ID. */
	id?: string;
}

/** A connected push client, independent of transport. */
export interface PushClient {
	readonly id: string;
	readonly isOpen: boolean;
	send(message: PushMessage): void;
	close(): void;
}

/** Collaborators shared by every hub. */
export interface HubOptions {
	logger?: Logger;
	metrics?: MetricsRegistry;
	/** Receives the connection lifecycle events. */
	events?: LifecyclePipeline;
	/** Maximum concurrent clients (default: 1000). */
	maxConnections?: number;
}

const DEFAULT_MAX_CONNECTIONS = 1000;

/**
 * Registry of connected clients plus the room membership they share.
 *
 * Room broadcasts snapshot the member list before delivering, so a client
 * that disconnects mid-broadcast is skipped rather than written to. A
 * failed send is logged and counted and never changes membership.
 */
export abstract class BroadcastHub<TClient extends PushClient> {
	readonly rooms = new RoomHub();
	protected readonly clients = new Map<string, TClient>();
	protected readonly logger: Logger | undefined;
	protected readonly metrics: MetricsRegistry | undefined;
	protected readonly events: LifecyclePipeline | undefined;
	protected readonly maxConnections: number;
	protected abstract readonly transport: ConnectionEvent["transport"];

	constructor(options: HubOptions = {}) {
		this.logger = options.logger;
		this.metrics = options.metrics;
		this.events = options.events;
		this.maxConnections = options.maxConnections ?? DEFAULT_MAX_CONNECTIONS;
	}

	/** The current number of connected clients. */
	get connectionCount(): number {
		return this.clients.size;
	}

	client(id: string): TClient | undefined {
		return this.clients.get(id);
	}

	clientIds(): string[] {
		return [...this.clients.keys()];
	}

	/** Add a connected client to `room`. Returns false for an unknown client. */
	join(clientId: string, room: string): boolean {
		if (!this.clients.has(clientId)) return false;
		this.rooms.join(clientId, room);
		return true;
	}

	leave(clientId: string, room: string): void {
		this.rooms.leave(clientId, room);
	}

	/** Deliver to one client. Returns whether the send succeeded. */
	sendTo(clientId: string, message: PushMessage): boolean {
		const client = this.clients.get(clientId);
		return client ? this.deliver(client, message) : false;
	}

	/** Deliver to every client except `excludeId`. Returns the number reached. */
	broadcast(message: PushMessage, excludeId?: string): number {
		let delivered = 0;
		for (const client of [...this.clients.values()]) {
			if (client.id === excludeId) continue;
			if (this.deliver(client, message)) delivered++;
		}
		return delivered;
	}

	/** Deliver to every member of `room` except `excludeId`. Returns the number reached. */
	broadcastToRoom(room: string, message: PushMessage, excludeId?: string): number {
		let delivered = 0;
		for (const id of this.rooms.members(room)) {
			if (id === excludeId) continue;
			const client = this.clients.get(id);
			if (!client) continue;
			if (this.deliver(client, message)) delivered++;
		}
		return delivered;
	}

	/** Disconnect every client and forget all rooms. */
	close(): void {
		for (const client of [...this.clients.values()]) {
			this.disconnect(client);
		}
	}

	// -----------------------------------------------------------------------
	// Subclass hooks
	// -----------------------------------------------------------------------

	protected isFull(): boolean {
		return this.clients.size >= this.maxConnections;
	}

	/** Track a newly connected client and put it in its initial rooms. */
	protected register(client: TClient, rooms: readonly string[]): void {
		const previous = this.clients.get(client.id);
		if (previous) this.disconnect(previous);

		this.clients.set(client.id, client);
		for (const room of rooms) {
			this.rooms.join(client.id, room);
		}
		this.gauge()?.inc();
		this.emit(`${this.transport}-connect`, this.connectionEvent(client.id));
		this.logger?.debug("client connected", { clientId: client.id, rooms: [...rooms] });
	}

	/** Forget a client that has gone away. Safe to call more than once. */
	protected unregister(client: TClient): void {
		if (this.clients.get(client.id) !== client) return;
		const event = this.connectionEvent(client.id);
		this.clients.delete(client.id);
		this.rooms.leaveAll(client.id);
		this.gauge()?.dec();
		this.emit(`${this.transport}-disconnect`, event);
		this.logger?.debug("client disconnected", { clientId: client.id });
	}

	protected connectionEvent(clientId: string, data?: unknown): ConnectionEvent {
		const event: ConnectionEvent = {
			clientId,
			transport: this.transport,
			rooms: this.rooms.roomsOf(clientId),
		};
		if (data !== undefined) event.data = data;
		return event;
	}

	protected emit(
		kind: "ws-connect" | "ws-disconnect" | "ws-message" | "sse-connect" | "sse-disconnect",
		event: ConnectionEvent,
	): void {
		this.events?.emitAsync(kind, event);
	}

	// -----------------------------------------------------------------------
	// Internal
	// -----------------------------------------------------------------------

	private disconnect(client: TClient): void {
		try {
			client.close();
		} catch (err) {
			this.logger?.warn("client close failed", {
				clientId: client.id,
				error: toError(err).message,
			});
		}
		this.unregister(client);
	}

	private deliver(client: TClient, message: PushMessage): boolean {
		if (!client.isOpen) return false;
		try {
			client.send(message);
			this.metrics?.broadcastsTotal.inc({ transport: this.transport });
			return true;
		} catch (err) {
			this.metrics?.broadcastFailures.inc({ transport: this.transport });
			this.logger?.warn("push delivery failed", {
				clientId: client.id,
				transport: this.transport,
				error: toError(err).message,
			});
			return false;
		}
	}

	private gauge() {
		return this.transport === "ws" ? this.metrics?.wsConnections : this.metrics?.sseConnections;
	}
}
