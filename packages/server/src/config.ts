// ---------------------------------------------------------------------------
// Server Configuration: defaults and environment parsing
// ---------------------------------------------------------------------------

import { Err, Ok, type Result, SwitchyardError } from "@switchyard/core";
import { isLogLevel, type LogLevel } from "./logger";

/** Configuration for {@link Server}. Every field has a default. */
export interface ServerConfig {
	/** Port to listen on; 0 picks an ephemeral port (default 3000). */
	port: number;
	/** Interface to bind (default "0.0.0.0"). */
	host: string;
	/** Minimum level written by the server logger (default "info"). */
	logLevel: LogLevel;
	/** Per-request deadline; 0 disables the timeout (default 30s). */
	requestTimeoutMs: number;
	/** Largest accepted request body; larger bodies get 413 (default 1 MiB). */
	maxBodyBytes: number;
	/** Grace period for open connections on `stop()` (default 10s). */
	shutdownTimeoutMs: number;
	/** Render fault details in error pages (default false). */
	devMode: boolean;
	/** Idle contexts kept for reuse (default 1024). */
	poolSize: number;
}

export const DEFAULT_PORT = 3000;
export const DEFAULT_HOST = "0.0.0.0";
export const DEFAULT_LOG_LEVEL: LogLevel = "info";
export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;
export const DEFAULT_MAX_BODY_BYTES = 1024 * 1024;
export const DEFAULT_SHUTDOWN_TIMEOUT_MS = 10_000;
export const DEFAULT_POOL_SIZE = 1024;

/** Raised for a malformed configuration value. */
export class ConfigError extends SwitchyardError {
	constructor(message: string) {
		super(message, "CONFIG_ERROR");
	}
}

/** Fill every field missing from `partial` with its default. */
export function resolveServerConfig(partial: Partial<ServerConfig> = {}): ServerConfig {
	return {
		port: partial.port ?? DEFAULT_PORT,
		host: partial.host ?? DEFAULT_HOST,
		logLevel: partial.logLevel ?? DEFAULT_LOG_LEVEL,
		requestTimeoutMs: partial.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS,
		maxBodyBytes: partial.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES,
		shutdownTimeoutMs: partial.shutdownTimeoutMs ?? DEFAULT_SHUTDOWN_TIMEOUT_MS,
		devMode: partial.devMode ?? false,
		poolSize: partial.poolSize ?? DEFAULT_POOL_SIZE,
	};
}

type Env = Record<string, string | undefined>;

/**
 * Read the `SWITCHYARD_*` variables present in `env`.
 *
 * Unset variables are left out of the result so that
 * {@link resolveServerConfig} supplies their defaults.
 */
export function configFromEnv(env: Env = process.env): Result<Partial<ServerConfig>, ConfigError> {
	const config: Partial<ServerConfig> = {};

	const port = readInteger(env, "SWITCHYARD_PORT", 0, 65_535);
	if (!port.ok) return port;
	if (port.value !== undefined) config.port = port.value;

	const host = env.SWITCHYARD_HOST;
	if (host !== undefined && host !== "") config.host = host;

	const level = env.SWITCHYARD_LOG_LEVEL;
	if (level !== undefined && level !== "") {
		const normalised = level.toLowerCase();
		if (!isLogLevel(normalised)) {
			return Err(new ConfigError(`SWITCHYARD_LOG_LEVEL must be one of debug, info, warn, error; got "${level}"`));
		}
		config.logLevel = normalised;
	}

	const timeout = readInteger(env, "SWITCHYARD_REQUEST_TIMEOUT_MS", 0);
	if (!timeout.ok) return timeout;
	if (timeout.value !== undefined) config.requestTimeoutMs = timeout.value;

	const maxBody = readInteger(env, "SWITCHYARD_MAX_BODY_BYTES", 1);
	if (!maxBody.ok) return maxBody;
	if (maxBody.value !== undefined) config.maxBodyBytes = maxBody.value;

	const shutdown = readInteger(env, "SWITCHYARD_SHUTDOWN_TIMEOUT_MS", 0);
	if (!shutdown.ok) return shutdown;
	if (shutdown.value !== undefined) config.shutdownTimeoutMs = shutdown.value;

	const devMode = readBoolean(env, "SWITCHYARD_DEV_MODE");
	if (!devMode.ok) return devMode;
	if (devMode.value !== undefined) config.devMode = devMode.value;

	return Ok(config);
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function readInteger(
	env: Env,
	name: string,
	min: number,
	max = Number.MAX_SAFE_INTEGER,
): Result<number | undefined, ConfigError> {
	const raw = env[name];
	if (raw === undefined || raw === "") return Ok(undefined);
	if (!/^\d+$/.test(raw)) {
		return Err(new ConfigError(`${name} must be a non-negative integer; got "${raw}"`));
	}
	const value = Number.parseInt(raw, 10);
	if (value < min || value > max) {
		return Err(new ConfigError(`${name} must be between ${min} and ${max}; got ${value}`));
	}
	return Ok(value);
}

const TRUE_VALUES = new Set(["1", "true", "yes", "on"]);
const FALSE_VALUES = new Set(["0", "false", "no", "off"]);

function readBoolean(env: Env, name: string): Result<boolean | undefined, ConfigError> {
	const raw = env[name];
	if (raw === undefined || raw === "") return Ok(undefined);
	const value = raw.toLowerCase();
	if (TRUE_VALUES.has(value)) return Ok(true);
	if (FALSE_VALUES.has(value)) return Ok(false);
	return Err(new ConfigError(`${name} must be a boolean; got "${raw}"`));
}
