/** Base error class for all Switchyard errors */
export class SwitchyardError extends Error {
	readonly code: string;
	override readonly cause?: Error;

	constructor(message: string, code: string, cause?: Error) {
		super(message);
		this.name = this.constructor.name;
		this.code = code;
		this.cause = cause;
	}
}

/**
 * An error that carries the HTTP status it should be reported with.
 *
 * Throwing one from a handler or middleware makes the dispatcher answer
 * with `status` and `{ error: message }` instead of a 500.
 */
export class HttpError extends SwitchyardError {
	readonly status: number;

	constructor(status: number, message: string, cause?: Error) {
		super(message, httpErrorCode(status), cause);
		this.status = status;
	}
}

/** Route pattern rejected at registration */
export class InvalidPatternError extends SwitchyardError {
	constructor(message: string, cause?: Error) {
		super(message, "INVALID_PATTERN", cause);
	}
}

/** A context was used after its lease was returned to the pool */
export class ContextReleasedError extends SwitchyardError {
	constructor(message = "Context used after release", cause?: Error) {
		super(message, "CONTEXT_RELEASED", cause);
	}
}

/** A second response write was attempted on the same request */
export class ResponseAlreadyWrittenError extends SwitchyardError {
	constructor(message = "Response already written", cause?: Error) {
		super(message, "RESPONSE_ALREADY_WRITTEN", cause);
	}
}

/** Why a typed store lookup failed. */
export type StoreLookupReason = "missing" | "type-mismatch";

/** Typed context-store lookup failure. Missing and wrong-typed keys are distinct. */
export class StoreLookupError extends SwitchyardError {
	readonly key: string;
	readonly reason: StoreLookupReason;

	constructor(key: string, reason: StoreLookupReason, expected?: string) {
		super(
			reason === "missing"
				? `Key "${key}" does not exist in context`
				: `Key "${key}" is not a ${expected ?? "value of the requested type"}`,
			reason === "missing" ? "STORE_KEY_MISSING" : "STORE_TYPE_MISMATCH",
		);
		this.key = key;
		this.reason = reason;
	}
}

/** Structured error codes for API responses. */
export const API_ERROR_CODES = {
	BAD_REQUEST: "BAD_REQUEST",
	UNAUTHORIZED: "UNAUTHORIZED",
	FORBIDDEN: "FORBIDDEN",
	NOT_FOUND: "NOT_FOUND",
	METHOD_NOT_ALLOWED: "METHOD_NOT_ALLOWED",
	PAYLOAD_TOO_LARGE: "PAYLOAD_TOO_LARGE",
	RATE_LIMITED: "RATE_LIMITED",
	INTERNAL_ERROR: "INTERNAL_ERROR",
	TIMEOUT: "TIMEOUT",
} as const;

/** A single error code value from {@link API_ERROR_CODES}. */
export type ApiErrorCode = (typeof API_ERROR_CODES)[keyof typeof API_ERROR_CODES];

function httpErrorCode(status: number): ApiErrorCode {
	switch (status) {
		case 400:
			return API_ERROR_CODES.BAD_REQUEST;
		case 401:
			return API_ERROR_CODES.UNAUTHORIZED;
		case 403:
			return API_ERROR_CODES.FORBIDDEN;
		case 404:
			return API_ERROR_CODES.NOT_FOUND;
		case 405:
			return API_ERROR_CODES.METHOD_NOT_ALLOWED;
		case 413:
			return API_ERROR_CODES.PAYLOAD_TOO_LARGE;
		case 429:
			return API_ERROR_CODES.RATE_LIMITED;
		case 504:
			return API_ERROR_CODES.TIMEOUT;
		default:
			return API_ERROR_CODES.INTERNAL_ERROR;
	}
}

/** Coerce an unknown thrown value into an Error instance. */
export function toError(err: unknown): Error {
	return err instanceof Error ? err : new Error(String(err));
}
