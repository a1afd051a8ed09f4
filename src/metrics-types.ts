/**
 * Pluggable Metrics
 *
 * The channel emits metric events and does not know about backends.
 * Sinks decide what to do with them (keep in memory, fan out, push).
 */

// =============================================================================
// CORE TYPES
// =============================================================================

export type MetricValue = number | string | boolean;

/**
 * Tags for metric dimensionality.
 */
export type MetricTags = Record<string, MetricValue | undefined>;

/**
 * - counter: monotonically increasing (commands_total)
 * - gauge: point-in-time value (connections_active)
 * - histogram: distribution (command_duration_ms)
 * - event: single occurrence (user_joined)
 */
export type MetricType = "counter" | "gauge" | "histogram" | "event";

export interface MetricEvent {
  name: string;
  type: MetricType;
  /** Required for counter/gauge/histogram */
  value?: number;
  tags?: MetricTags;
  /** Epoch ms, defaults to now */
  timestamp?: number;
}

// =============================================================================
// SINK INTERFACE
// =============================================================================

/**
 * MetricsSink - Interface for metric backends.
 * `record` is called for every metric and must be fast.
 */
export interface MetricsSink {
  record(event: MetricEvent): void;

  /** Flush buffered metrics during graceful shutdown. */
  flush?(): Promise<void>;

  dispose?(): Promise<void> | void;

  getMetrics?(): Record<string, unknown>;
}

// =============================================================================
// BUILT-IN SINKS
// =============================================================================

/**
 * NoOpSink - Discards all metrics (default).
 */
export class NoOpSink implements MetricsSink {
  record(_event: MetricEvent): void {
    // Discard
  }
}

interface HistogramSummary {
  sum: number;
  count: number;
  min: number;
  max: number;
}

/**
 * MemorySink - Keeps counters, gauges and histogram summaries in maps.
 *
 * Not suitable for high-cardinality tags (per-connection ids).
 */
export class MemorySink implements MetricsSink {
  private counters = new Map<string, number>();
  private gauges = new Map<string, number>();
  private histograms = new Map<string, HistogramSummary>();
  private events: Array<MetricEvent & { timestamp: number }> = [];
  private maxEvents: number;

  constructor(options: { maxEvents?: number } = {}) {
    this.maxEvents = options.maxEvents ?? 1000;
  }

  record(event: MetricEvent): void {
    const key = this.buildKey(event.name, event.tags);

    switch (event.type) {
      case "counter":
        this.counters.set(key, (this.counters.get(key) ?? 0) + (event.value ?? 1));
        break;

      case "gauge":
        this.gauges.set(key, event.value ?? 0);
        break;

      case "histogram": {
        const hist = this.histograms.get(key) ?? { sum: 0, count: 0, min: Infinity, max: -Infinity };
        const val = event.value ?? 0;
        hist.sum += val;
        hist.count++;
        hist.min = Math.min(hist.min, val);
        hist.max = Math.max(hist.max, val);
        this.histograms.set(key, hist);
        break;
      }

      case "event":
        this.events.push({ ...event, timestamp: event.timestamp ?? Date.now() });
        if (this.events.length > this.maxEvents) {
          this.events.shift();
        }
        break;
    }
  }

  /**
   * Sum of a counter across every tag combination.
   */
  getCounterTotal(name: string): number {
    let total = 0;
    for (const [key, value] of this.counters) {
      if (key === name || key.startsWith(`${name}{`)) {
        total += value;
      }
    }
    return total;
  }

  getGauge(name: string, tags?: MetricTags): number | undefined {
    return this.gauges.get(this.buildKey(name, tags));
  }

  getMetrics(): Record<string, unknown> {
    return {
      counters: Object.fromEntries(this.counters),
      gauges: Object.fromEntries(this.gauges),
      histograms: Object.fromEntries(
        Array.from(this.histograms.entries()).map(([k, v]) => [k, { ...v, avg: v.sum / v.count }])
      ),
      recentEvents: this.events.slice(-100),
    };
  }

  clear(): void {
    this.counters.clear();
    this.gauges.clear();
    this.histograms.clear();
    this.events = [];
  }

  private buildKey(name: string, tags?: MetricTags): string {
    if (!tags) return name;

    const tagStr = Object.entries(tags)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([k, v]) => `${k}=${String(v)}`)
      .join(",");

    return tagStr ? `${name}{${tagStr}}` : name;
  }
}

/**
 * CompositeSink - Fan-out to multiple sinks.
 */
export class CompositeSink implements MetricsSink {
  constructor(private sinks: MetricsSink[]) {}

  record(event: MetricEvent): void {
    for (const sink of this.sinks) {
      try {
        sink.record(event);
      } catch (error) {
        // One failing sink must not break the others
        console.error(`[CompositeSink] Sink failed to record:`, error);
      }
    }
  }

  async flush(): Promise<void> {
    await Promise.all(
      this.sinks.map(async (sink) => {
        try {
          await sink.flush?.();
        } catch (err) {
          console.error(`[CompositeSink] Sink failed to flush:`, err);
        }
      })
    );
  }

  async dispose(): Promise<void> {
    await Promise.all(
      this.sinks.map(async (sink) => {
        try {
          await sink.dispose?.();
        } catch (err) {
          console.error(`[CompositeSink] Sink failed to dispose:`, err);
        }
      })
    );
  }

  getMetrics(): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const sink of this.sinks) {
      if (sink.getMetrics) {
        Object.assign(result, sink.getMetrics());
      }
    }
    return result;
  }
}

// =============================================================================
// METRIC NAMES
// =============================================================================

/**
 * Metric names, Prometheus style:
 * _total for counters, unit suffixes, lowercase with underscores.
 */
export const MetricNames = {
  // Connections
  CONNECTIONS_ACTIVE: "worktrack_channel_connections_active",
  CONNECTIONS_TOTAL: "worktrack_channel_connections_total",
  CONNECTIONS_REJECTED_TOTAL: "worktrack_channel_connections_rejected_total",
  CONNECTIONS_STALE_REMOVED_TOTAL: "worktrack_channel_connections_stale_removed_total",
  CONNECTIONS_RESUMED_TOTAL: "worktrack_channel_connections_resumed_total",

  // Commands
  COMMANDS_TOTAL: "worktrack_channel_commands_total",
  COMMANDS_DURATION_MS: "worktrack_channel_commands_duration_ms",
  COMMANDS_REJECTED_TOTAL: "worktrack_channel_commands_rejected_total",

  // Security
  SECURITY_REJECTED_TOTAL: "worktrack_channel_security_rejected_total",

  // Idempotency
  IDEMPOTENCY_HITS_TOTAL: "worktrack_channel_idempotency_hits_total",
  IDEMPOTENCY_PAYLOAD_MISMATCH_TOTAL: "worktrack_channel_idempotency_payload_mismatch_total",

  // Rate limiting
  RATE_LIMIT_REJECTED_TOTAL: "worktrack_channel_rate_limit_rejected_total",

  // Events
  EVENTS_PUBLISHED_TOTAL: "worktrack_channel_events_published_total",
  EVENTS_DROPPED_TOTAL: "worktrack_channel_events_dropped_total",

  // Presence
  EVENT_USER_JOINED: "worktrack_channel_event_user_joined",
  EVENT_USER_LEFT: "worktrack_channel_event_user_left",
} as const;

// =============================================================================
// HELPER FUNCTIONS
// =============================================================================

/**
 * Standard tags for a command.
 */
export function commandTags(commandType: string, success?: boolean, code?: string): MetricTags {
  return {
    command: commandType,
    success,
    code,
  };
}
