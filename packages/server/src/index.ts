export {
	type ApiKeyOptions,
	type AuthOptions,
	apiKeyAuth,
	type BasicValidator,
	basicAuth,
	basicAuthUsers,
	bearerAuth,
	extractBearerToken,
	parseBasicCredentials,
	safeEqual,
	staticApiKey,
	type TokenValidator,
} from "./auth-middleware";
export {
	BroadcastHub,
	type HubOptions,
	type PushClient,
	type PushMessage,
} from "./broadcast-hub";
export {
	ConfigError,
	configFromEnv,
	DEFAULT_HOST,
	DEFAULT_LOG_LEVEL,
	DEFAULT_MAX_BODY_BYTES,
	DEFAULT_POOL_SIZE,
	DEFAULT_PORT,
	DEFAULT_REQUEST_TIMEOUT_MS,
	DEFAULT_SHUTDOWN_TIMEOUT_MS,
	resolveServerConfig,
	type ServerConfig,
} from "./config";
export { type CorsConfig, cors, corsHeaders } from "./cors-middleware";
export {
	isLogLevel,
	type LogEntry,
	Logger,
	type LoggerOptions,
	type LogLevel,
	levelForStatus,
	toCoreLogger,
} from "./logger";
export {
	Counter,
	Gauge,
	Histogram,
	type Labels,
	MetricsRegistry,
} from "./metrics";
export {
	metrics,
	metricsHandler,
	type RecoveryOptions,
	type RequestLoggerOptions,
	recovery,
	requestId,
	requestLogger,
	SECURITY_HEADERS,
	secureHeaders,
	timeout,
} from "./middleware";
export {
	type RateLimitOptions,
	RateLimiter,
	type RateLimiterConfig,
	rateLimit,
} from "./rate-limiter";
export { Server, type ServerOptions } from "./server";
export { formatSseEvent, SseClient, SseHub, type SseHubOptions } from "./sse-hub";
export {
	type ControlMessage,
	isControlMessage,
	roomsFromQuery,
	WebSocketHub,
	type WebSocketHubOptions,
	WsClient,
} from "./ws-hub";
