// ---------------------------------------------------------------------------
// Prometheus-Compatible Metrics: counters, gauges, histograms
// ---------------------------------------------------------------------------

/** Label set for a metric observation. */
export type Labels = Record<string, string>;

/** Anything that can render itself in the text exposition format. */
interface Exposable {
	expose(): string;
	reset(): void;
}

// ---------------------------------------------------------------------------
// Counter
// ---------------------------------------------------------------------------

/**
 * Monotonically increasing counter.
 *
 * @example
 * ```ts
 * const requests = new Counter("switchyard_requests_total", "Total HTTP requests");
 * requests.inc({ method: "GET", status: "200" });
 * ```
 */
export class Counter implements Exposable {
	private readonly values = new Map<string, number>();

	constructor(
		readonly name: string,
		readonly help: string,
	) {}

	/** Increment the counter by `n` (default 1). */
	inc(labels: Labels = {}, n = 1): void {
		const key = labelKey(labels);
		this.values.set(key, (this.values.get(key) ?? 0) + n);
	}

	get(labels: Labels = {}): number {
		return this.values.get(labelKey(labels)) ?? 0;
	}

	reset(): void {
		this.values.clear();
	}

	expose(): string {
		return exposeSeries(this.name, this.help, "counter", this.values);
	}
}

// ---------------------------------------------------------------------------
// Gauge
// ---------------------------------------------------------------------------

/** Gauge that can go up and down. */
export class Gauge implements Exposable {
	private readonly values = new Map<string, number>();

	constructor(
		readonly name: string,
		readonly help: string,
	) {}

	set(labels: Labels = {}, value = 0): void {
		this.values.set(labelKey(labels), value);
	}

	inc(labels: Labels = {}, n = 1): void {
		const key = labelKey(labels);
		this.values.set(key, (this.values.get(key) ?? 0) + n);
	}

	dec(labels: Labels = {}, n = 1): void {
		this.inc(labels, -n);
	}

	get(labels: Labels = {}): number {
		return this.values.get(labelKey(labels)) ?? 0;
	}

	reset(): void {
		this.values.clear();
	}

	expose(): string {
		return exposeSeries(this.name, this.help, "gauge", this.values);
	}
}

// ---------------------------------------------------------------------------
// Histogram
// ---------------------------------------------------------------------------

interface HistogramSeries {
	labels: Labels;
	/** Cumulative count per bucket; the final slot is `+Inf`. */
	bucketCounts: number[];
	sum: number;
	count: number;
}

/**
 * Histogram with fixed upper bounds.
 *
 * @example
 * ```ts
 * const duration = new Histogram("switchyard_request_duration_ms", "Request duration", [5, 50, 500]);
 * duration.observe({ method: "GET" }, 42);
 * ```
 */
export class Histogram implements Exposable {
	readonly buckets: readonly number[];
	private readonly data = new Map<string, HistogramSeries>();

	constructor(
		readonly name: string,
		readonly help: string,
		buckets: readonly number[],
	) {
		this.buckets = [...buckets].sort((a, b) => a - b);
	}

	observe(labels: Labels = {}, value = 0): void {
		const key = labelKey(labels);
		let series = this.data.get(key);
		if (!series) {
			series = {
				labels: { ...labels },
				bucketCounts: Array.from({ length: this.buckets.length + 1 }, () => 0),
				sum: 0,
				count: 0,
			};
			this.data.set(key, series);
		}
		series.sum += value;
		series.count += 1;
		series.bucketCounts = series.bucketCounts.map((n, i) => {
			const bound = this.buckets[i];
			return bound === undefined || value <= bound ? n + 1 : n;
		});
	}

	getCount(labels: Labels = {}): number {
		return this.data.get(labelKey(labels))?.count ?? 0;
	}

	getSum(labels: Labels = {}): number {
		return this.data.get(labelKey(labels))?.sum ?? 0;
	}

	reset(): void {
		this.data.clear();
	}

	expose(): string {
		const lines = [`# HELP ${this.name} ${this.help}`, `# TYPE ${this.name} histogram`];

		for (const [key, series] of this.data) {
			series.bucketCounts.forEach((n, i) => {
				const le = this.buckets[i]?.toString() ?? "+Inf";
				lines.push(`${this.name}_bucket${labelKey({ ...series.labels, le })} ${n}`);
			});
			lines.push(`${this.name}_sum${key} ${series.sum}`);
			lines.push(`${this.name}_count${key} ${series.count}`);
		}

		return lines.join("\n");
	}
}

// ---------------------------------------------------------------------------
// Metrics Registry
// ---------------------------------------------------------------------------

/**
 * The standard switchyard metrics and a single `expose()` returning the
 * complete text exposition payload.
 */
export class MetricsRegistry {
	readonly requestsTotal = new Counter("switchyard_requests_total", "Total HTTP requests");

	readonly requestDuration = new Histogram(
		"switchyard_request_duration_ms",
		"HTTP request duration in milliseconds",
		[1, 5, 10, 50, 100, 500, 1000, 5000],
	);

	readonly activeRequests = new Gauge("switchyard_active_requests", "In-flight HTTP requests");
	readonly wsConnections = new Gauge("switchyard_ws_connections", "Open WebSocket connections");
	readonly sseConnections = new Gauge("switchyard_sse_connections", "Open SSE connections");

	readonly broadcastsTotal = new Counter(
		"switchyard_broadcast_messages_total",
		"Messages delivered by the broadcast hubs",
	);

	readonly broadcastFailures = new Counter(
		"switchyard_broadcast_failures_total",
		"Failed deliveries by the broadcast hubs",
	);

	private all(): Exposable[] {
		return [
			this.requestsTotal,
			this.requestDuration,
			this.activeRequests,
			this.wsConnections,
			this.sseConnections,
			this.broadcastsTotal,
			this.broadcastFailures,
		];
	}

	/** Return the full Prometheus text exposition payload. */
	expose(): string {
		return `${this.all()
			.map((m) => m.expose())
			.join("\n\n")}\n`;
	}

	reset(): void {
		for (const metric of this.all()) metric.reset();
	}
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function exposeSeries(
	name: string,
	help: string,
	type: "counter" | "gauge",
	values: Map<string, number>,
): string {
	const lines = [`# HELP ${name} ${help}`, `# TYPE ${name} ${type}`];
	for (const [key, val] of values) {
		lines.push(`${name}${key} ${val}`);
	}
	return lines.join("\n");
}

/** Build a Prometheus-format label key string like `{status="ok"}`. */
function labelKey(labels: Labels): string {
	const entries = Object.entries(labels);
	if (entries.length === 0) return "";
	const parts = entries.map(([k, v]) => `${k}="${escapeLabel(v)}"`).join(",");
	return `{${parts}}`;
}

function escapeLabel(value: string): string {
	return value.replace(/\\/g, "\\\\").replace(/"/g, '\\"').replace(/\n/g, "\\n");
}
