import type { IncomingMessage, ServerResponse } from "node:http";

/** Header map as supplied by the network layer. Names are matched case-insensitively. */
export type HeaderMap = Record<string, string | string[] | undefined>;

/** Transport-independent description of an incoming request. */
export interface RequestDescriptor {
	method: string;
	/** Path with optional query string (`/users/42?full=1`), or an absolute URL. */
	url: string;
	headers?: HeaderMap;
	body?: string | Uint8Array;
	remoteAddress?: string;
}

/** What the dispatcher hands back to the network layer. */
export interface ResponseDescriptor {
	status: number;
	/** Lower-cased header names. */
	headers: Record<string, string>;
	body: string | Uint8Array | null;
	/**
	 * True when a handler took over the native response (SSE, streaming).
	 * The network layer must not write anything for a hijacked response.
	 */
	hijacked: boolean;
}

/** Native request/response objects, present when the Node adapter serves the request. */
export interface NativeHandles {
	readonly req: IncomingMessage;
	readonly res: ServerResponse;
}
