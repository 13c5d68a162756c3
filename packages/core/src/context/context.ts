import type { CoreLogger } from "../logger";
import {
	ContextReleasedError,
	HttpError,
	ResponseAlreadyWrittenError,
	StoreLookupError,
	toError,
} from "../result/errors";
import { Err, Ok, type Result } from "../result/result";
import { parseRequestTarget, type RequestTarget } from "./target";
import type { NativeHandles, RequestDescriptor, ResponseDescriptor } from "./types";

// ---------------------------------------------------------------------------
// Pooled state
// ---------------------------------------------------------------------------

const EMPTY_REQUEST: RequestDescriptor = { method: "GET", url: "/" };

/**
 * Per-request storage recycled by {@link ContextPool}.
 *
 * Application code never sees this object. It reaches it through a
 * {@link Context} lease, which stops working once the lease is released.
 */
export class ContextState {
	generation = 0;
	request: RequestDescriptor = EMPTY_REQUEST;
	handles: NativeHandles | undefined = undefined;
	target: RequestTarget | undefined = undefined;
	params: Record<string, string> = {};
	status = 200;
	written = false;
	hijacked = false;
	body: string | Uint8Array | null = null;
	fault: Error | undefined = undefined;
	readonly requestHeaders = new Map<string, string>();
	readonly responseHeaders = new Map<string, string>();
	readonly store = new Map<string, unknown>();
	readonly deferred = new Set<Promise<void>>();

	constructor(readonly logger: CoreLogger) {}

	/** Prepare for a new occupant. Runs synchronously at acquisition. */
	reset(request: RequestDescriptor, handles: NativeHandles | undefined): void {
		this.request = request;
		this.handles = handles;
		this.target = undefined;
		this.params = {};
		this.status = 200;
		this.written = false;
		this.hijacked = false;
		this.body = null;
		this.fault = undefined;
		this.store.clear();
		this.responseHeaders.clear();
		this.deferred.clear();
		this.requestHeaders.clear();
		for (const [name, value] of Object.entries(request.headers ?? {})) {
			if (value === undefined) continue;
			this.requestHeaders.set(name.toLowerCase(), Array.isArray(value) ? value.join(", ") : value);
		}
	}

	/** Drop references held for the previous occupant before going back on the free list. */
	scrub(): void {
		this.reset(EMPTY_REQUEST, undefined);
	}
}

// ---------------------------------------------------------------------------
// Context: the lease handed to middleware and handlers
// ---------------------------------------------------------------------------

const textDecoder = new TextDecoder();

/**
 * Mutable per-request context passed through the middleware chain.
 *
 * A `Context` is a lease on pooled {@link ContextState}. When the pool
 * releases it, the generation it was issued for no longer matches and
 * every accessor throws {@link ContextReleasedError}. `signal` stays
 * readable so abandoned work can observe the abort.
 *
 * @example
 * ```ts
 * dispatcher.get("/users/:id", (ctx) => {
 *   ctx.json(200, { id: ctx.param("id") });
 * });
 * ```
 */
export class Context {
	/** Aborted when the chain is abandoned (timeout) or the request completes. */
	readonly signal: AbortSignal;
	private readonly controller = new AbortController();

	constructor(
		private readonly lease: ContextState,
		private readonly generation: number,
	) {
		this.signal = this.controller.signal;
	}

	/** Whether this lease is still owned by an in-flight request. */
	get isActive(): boolean {
		return this.lease.generation === this.generation;
	}

	private live(): ContextState {
		if (this.lease.generation !== this.generation) {
			throw new ContextReleasedError();
		}
		return this.lease;
	}

	// -----------------------------------------------------------------------
	// Request
	// -----------------------------------------------------------------------

	get request(): RequestDescriptor {
		return this.live().request;
	}

	/** Native request/response objects when served by the Node adapter. */
	get handles(): NativeHandles | undefined {
		return this.live().handles;
	}

	get method(): string {
		return this.live().request.method.toUpperCase();
	}

	/** Path and query of the request target, parsed on first use. */
	get target(): RequestTarget {
		const state = this.live();
		if (!state.target) {
			state.target = parseRequestTarget(state.request.url);
		}
		return state.target;
	}

	/** Decoded request path. */
	get path(): string {
		const raw = this.target.path;
		try {
			return decodeURIComponent(raw);
		} catch {
			return raw;
		}
	}

	get params(): Readonly<Record<string, string>> {
		return this.live().params;
	}

	/** Bind the parameters captured by route resolution. */
	setParams(params: Record<string, string>): void {
		this.live().params = params;
	}

	param(name: string): string | undefined {
		return this.live().params[name];
	}

	/** Path parameter parsed as an integer, `undefined` when absent or not an integer. */
	paramInt(name: string): number | undefined {
		return parseInteger(this.param(name));
	}

	query(name: string): string | undefined {
		return this.target.query.get(name) ?? undefined;
	}

	queryInt(name: string): number | undefined {
		return parseInteger(this.query(name));
	}

	queryBool(name: string): boolean {
		const value = this.query(name)?.toLowerCase();
		return value === "true" || value === "1" || value === "yes";
	}

	header(name: string): string | undefined {
		return this.live().requestHeaders.get(name.toLowerCase());
	}

	/**
	 * Client address: first `X-Forwarded-For` entry, then `X-Real-IP`,
	 * then the socket address.
	 */
	clientIp(): string {
		const forwarded = this.header("x-forwarded-for");
		if (forwarded) return forwarded.split(",")[0]?.trim() ?? forwarded;
		return this.header("x-real-ip") ?? this.live().request.remoteAddress ?? "";
	}

	bodyBytes(): Uint8Array {
		const { body } = this.live().request;
		if (body === undefined) return new Uint8Array(0);
		return typeof body === "string" ? new TextEncoder().encode(body) : body;
	}

	bodyText(): string {
		const { body } = this.live().request;
		if (body === undefined) return "";
		return typeof body === "string" ? body : textDecoder.decode(body);
	}

	/**
	 * Parse the request body as JSON.
	 *
	 * @throws HttpError 400 when the body is not valid JSON.
	 */
	bodyJson(): unknown {
		try {
			return JSON.parse(this.bodyText());
		} catch (err) {
			throw new HttpError(400, "Invalid JSON body", toError(err));
		}
	}

	// -----------------------------------------------------------------------
	// Cancellation and background work
	// -----------------------------------------------------------------------

	/** Abort `signal`. Handlers observing it should stop work. */
	abort(reason?: unknown): void {
		if (!this.signal.aborted) this.controller.abort(reason);
	}

	/**
	 * Tie background work to this request. The pooled state is not
	 * recycled until `work` settles; a rejection is logged.
	 */
	defer(work: Promise<unknown>): void {
		const state = this.live();
		const tracked = work.then(
			() => undefined,
			(err: unknown) => {
				state.logger("warn", "deferred request work failed", {
					error: toError(err).message,
				});
			},
		);
		state.deferred.add(tracked);
		void tracked.finally(() => state.deferred.delete(tracked));
	}

	// -----------------------------------------------------------------------
	// Response
	// -----------------------------------------------------------------------

	/** True once a response has been committed (or the response was hijacked). */
	get written(): boolean {
		return this.live().written;
	}

	get hijacked(): boolean {
		return this.live().hijacked;
	}

	get statusCode(): number {
		return this.live().status;
	}

	/** Set the status used when nothing else is written. */
	status(code: number): this {
		this.live().status = code;
		return this;
	}

	setHeader(name: string, value: string): this {
		this.live().responseHeaders.set(name.toLowerCase(), value);
		return this;
	}

	responseHeader(name: string): string | undefined {
		return this.live().responseHeaders.get(name.toLowerCase());
	}

	json(status: number, body: unknown): void {
		this.commit(status, "application/json", JSON.stringify(body));
	}

	text(status: number, body: string): void {
		this.commit(status, "text/plain; charset=utf-8", body);
	}

	html(status: number, body: string): void {
		this.commit(status, "text/html; charset=utf-8", body);
	}

	send(status: number, contentType: string, body: string | Uint8Array): void {
		this.commit(status, contentType, body);
	}

	noContent(): void {
		this.commit(204, undefined, null);
	}

	redirect(status: number, location: string): void {
		this.setHeader("Location", location);
		this.commit(status, undefined, null);
	}

	/** Send `{ error: message }` with the given status. */
	sendError(status: number, message: string): void {
		this.json(status, { error: message });
	}

	badRequest(message: string): void {
		this.sendError(400, message);
	}

	unauthorized(message: string): void {
		this.sendError(401, message);
	}

	forbidden(message: string): void {
		this.sendError(403, message);
	}

	notFound(message: string): void {
		this.sendError(404, message);
	}

	internalServerError(message: string): void {
		this.sendError(500, message);
	}

	/**
	 * Take over the native response. The dispatcher and the network layer
	 * write nothing afterwards.
	 */
	hijack(): NativeHandles {
		const state = this.live();
		if (state.written) throw new ResponseAlreadyWrittenError();
		if (!state.handles) {
			throw new HttpError(500, "Response cannot be hijacked without native handles");
		}
		state.written = true;
		state.hijacked = true;
		return state.handles;
	}

	private commit(
		status: number,
		contentType: string | undefined,
		body: string | Uint8Array | null,
	): void {
		const state = this.live();
		if (state.written) throw new ResponseAlreadyWrittenError();
		if (contentType) state.responseHeaders.set("content-type", contentType);
		state.status = status;
		state.body = body;
		state.written = true;
	}

	/** Snapshot of the response as it stands. */
	toResponse(): ResponseDescriptor {
		const state = this.live();
		return {
			status: state.status,
			headers: Object.fromEntries(state.responseHeaders),
			body: state.body,
			hijacked: state.hijacked,
		};
	}

	// -----------------------------------------------------------------------
	// Fault recorded by the dispatcher
	// -----------------------------------------------------------------------

	get fault(): Error | undefined {
		return this.live().fault;
	}

	recordFault(err: Error): void {
		this.live().fault = err;
	}

	// -----------------------------------------------------------------------
	// Request-scoped store
	// -----------------------------------------------------------------------

	set(key: string, value: unknown): this {
		this.live().store.set(key, value);
		return this;
	}

	/** Raw lookup. `undefined` for a missing key; use {@link has} to tell it from a stored `undefined`. */
	get(key: string): unknown {
		return this.live().store.get(key);
	}

	has(key: string): boolean {
		return this.live().store.has(key);
	}

	delete(key: string): boolean {
		return this.live().store.delete(key);
	}

	/** @throws StoreLookupError when the key is absent. */
	mustGet(key: string): unknown {
		const store = this.live().store;
		if (!store.has(key)) throw new StoreLookupError(key, "missing");
		return store.get(key);
	}

	/** Typed lookup with a caller-supplied guard. */
	getAs<T>(
		key: string,
		guard: (value: unknown) => value is T,
		expected: string,
	): Result<T, StoreLookupError> {
		const store = this.live().store;
		if (!store.has(key)) return Err(new StoreLookupError(key, "missing"));
		const value = store.get(key);
		if (!guard(value)) return Err(new StoreLookupError(key, "type-mismatch", expected));
		return Ok(value);
	}

	getString(key: string): Result<string, StoreLookupError> {
		return this.getAs(key, isString, "string");
	}

	getNumber(key: string): Result<number, StoreLookupError> {
		return this.getAs(key, isNumber, "number");
	}

	getInteger(key: string): Result<number, StoreLookupError> {
		return this.getAs(key, isInteger, "integer");
	}

	getBoolean(key: string): Result<boolean, StoreLookupError> {
		return this.getAs(key, isBoolean, "boolean");
	}
}

function isString(value: unknown): value is string {
	return typeof value === "string";
}

function isNumber(value: unknown): value is number {
	return typeof value === "number";
}

function isInteger(value: unknown): value is number {
	return Number.isInteger(value);
}

function isBoolean(value: unknown): value is boolean {
	return typeof value === "boolean";
}

function parseInteger(raw: string | undefined): number | undefined {
	if (raw === undefined || !/^-?\d+$/.test(raw)) return undefined;
	return Number.parseInt(raw, 10);
}
