// ---------------------------------------------------------------------------
// Room Hub: room membership shared by the connection hubs
// ---------------------------------------------------------------------------

/**
 * In-memory room membership, indexed both ways.
 *
 * Every operation completes synchronously, so a reader always observes a
 * state that actually existed. Rooms are created on first join and
 * deleted when their last member leaves. Nothing expires on its own.
 */
export class RoomHub {
	private readonly roomMembers = new Map<string, Set<string>>();
	private readonly clientRooms = new Map<string, Set<string>>();

	/** Add `clientId` to `room`. Joining twice is a no-op. */
	join(clientId: string, room: string): void {
		let members = this.roomMembers.get(room);
		if (!members) {
			members = new Set();
			this.roomMembers.set(room, members);
		}
		members.add(clientId);

		let rooms = this.clientRooms.get(clientId);
		if (!rooms) {
			rooms = new Set();
			this.clientRooms.set(clientId, rooms);
		}
		rooms.add(room);
	}

	/** Remove `clientId` from `room`. Leaving a room you are not in is a no-op. */
	leave(clientId: string, room: string): void {
		const members = this.roomMembers.get(room);
		if (members) {
			members.delete(clientId);
			if (members.size === 0) this.roomMembers.delete(room);
		}

		const rooms = this.clientRooms.get(clientId);
		if (rooms) {
			rooms.delete(room);
			if (rooms.size === 0) this.clientRooms.delete(clientId);
		}
	}

	/** Remove `clientId` from every room. Returns the rooms it left. */
	leaveAll(clientId: string): string[] {
		const rooms = [...(this.clientRooms.get(clientId) ?? [])];
		for (const room of rooms) {
			this.leave(clientId, room);
		}
		return rooms;
	}

	/** Snapshot of the members of `room`. */
	members(room: string): string[] {
		return [...(this.roomMembers.get(room) ?? [])];
	}

	count(room: string): number {
		return this.roomMembers.get(room)?.size ?? 0;
	}

	has(clientId: string, room: string): boolean {
		return this.roomMembers.get(room)?.has(clientId) ?? false;
	}

	/** Names of every non-empty room. */
	rooms(): string[] {
		return [...this.roomMembers.keys()];
	}

	roomsOf(clientId: string): string[] {
		return [...(this.clientRooms.get(clientId) ?? [])];
	}
}
