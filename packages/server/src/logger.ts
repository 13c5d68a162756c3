// ---------------------------------------------------------------------------
// Structured Logger: JSON-lines output for the HTTP server
// ---------------------------------------------------------------------------

import type { CoreLogger, LogLevel } from "@switchyard/core";

export type { LogLevel };

/** A single structured log line. Bindings and call data are spread in after `ts`. */
export interface LogEntry {
	level: LogLevel;
	msg: string;
	ts: string;
	[key: string]: unknown;
}

export interface LoggerOptions {
	/** Lowest level written (default: info). */
	level?: LogLevel;
	/** Fields added to every line. */
	bindings?: Record<string, unknown>;
	/** Line sink (default: stdout). */
	write?: (line: string) => void;
	/** Timestamp source (default: the current time). */
	clock?: () => Date;
}

const SEVERITY: Record<LogLevel, number> = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
};

/** Narrow an arbitrary string to a {@link LogLevel}. */
export function isLogLevel(value: string): value is LogLevel {
	return Object.hasOwn(SEVERITY, value);
}

/** Level for a finished request: error for 5xx, warn for 4xx, info otherwise. */
export function levelForStatus(status: number): LogLevel {
	if (status >= 500) return "error";
	if (status >= 400) return "warn";
	return "info";
}

const writeStdout = (line: string): void => {
	process.stdout.write(`${line}\n`);
};

/**
 * JSON-lines logger used by the server, its middleware and the push hubs.
 *
 * `child()` returns a logger sharing level, sink and clock, with extra
 * bindings; `Server.ws()` and `Server.sse()` use it to tag hub lines with
 * their `component`.
 *
 * @example
 * ```ts
 * const logger = new Logger({ level: "debug" });
 * logger.child({ component: "ws" }).info("client connected", { clientId: "c-1" });
 * // => {"level":"info","msg":"client connected","ts":"...","component":"ws","clientId":"c-1"}
 * ```
 */
export class Logger {
	readonly level: LogLevel;
	private readonly bindings: Readonly<Record<string, unknown>>;
	private readonly write: (line: string) => void;
	private readonly clock: () => Date;

	constructor(options: LoggerOptions = {}) {
		this.level = options.level ?? "info";
		this.bindings = options.bindings ?? {};
		this.write = options.write ?? writeStdout;
		this.clock = options.clock ?? (() => new Date());
	}

	/** Whether a line at `level` would be written. */
	enabled(level: LogLevel): boolean {
		return SEVERITY[level] >= SEVERITY[this.level];
	}

	child(bindings: Record<string, unknown>): Logger {
		return new Logger({
			level: this.level,
			bindings: { ...this.bindings, ...bindings },
			write: this.write,
			clock: this.clock,
		});
	}

	debug(msg: string, data?: Record<string, unknown>): void {
		this.log("debug", msg, data);
	}

	info(msg: string, data?: Record<string, unknown>): void {
		this.log("info", msg, data);
	}

	warn(msg: string, data?: Record<string, unknown>): void {
		this.log("warn", msg, data);
	}

	error(msg: string, data?: Record<string, unknown>): void {
		this.log("error", msg, data);
	}

	log(level: LogLevel, msg: string, data?: Record<string, unknown>): void {
		if (!this.enabled(level)) return;
		const entry: LogEntry = {
			level,
			msg,
			ts: this.clock().toISOString(),
			...this.bindings,
			...data,
		};
		this.write(JSON.stringify(entry));
	}
}

/** Adapt a {@link Logger} to the callback the dispatcher and its pool take. */
export function toCoreLogger(logger: Logger): CoreLogger {
	return (level, message, meta) => logger.log(level, message, meta);
}
