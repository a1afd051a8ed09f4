/**
 * Metrics Emitter - Central point for emitting metrics.
 *
 * ```typescript
 * const metrics = new MetricsEmitter({ sink: new MemorySink() });
 *
 * metrics.counter(MetricNames.COMMANDS_TOTAL, 1, commandTags("create_label", true));
 * const timer = metrics.startTimer(MetricNames.COMMANDS_DURATION_MS, { command: "create_label" });
 * await router.execute(command);
 * timer.end();
 * ```
 */

import type { MetricEvent, MetricTags, MetricsSink } from "./metrics-types.js";
import { NoOpSink } from "./metrics-types.js";

/**
 * Timer handle for duration tracking.
 */
export interface TimerHandle {
  /** End the timer and record the duration. Returns the elapsed ms. */
  end(tags?: MetricTags): number;
  /** Abort the timer (don't record). */
  abort(): void;
}

export class MetricsEmitter {
  private sink: MetricsSink;
  private prefix: string;
  private defaultTags: MetricTags;

  constructor(options: {
    sink?: MetricsSink;
    /** Prefix added to all metric names */
    prefix?: string;
    /** Tags added to all metrics */
    defaultTags?: MetricTags;
  } = {}) {
    this.sink = options.sink ?? new NoOpSink();
    this.prefix = options.prefix ?? "";
    this.defaultTags = options.defaultTags ?? {};
  }

  getSink(): MetricsSink {
    return this.sink;
  }

  // ==========================================================================
  // CORE METRIC METHODS
  // ==========================================================================

  counter(name: string, value = 1, tags?: MetricTags): void {
    this.emit({ name: this.prefix + name, type: "counter", value, tags: this.mergeTags(tags) });
  }

  gauge(name: string, value: number, tags?: MetricTags): void {
    this.emit({ name: this.prefix + name, type: "gauge", value, tags: this.mergeTags(tags) });
  }

  histogram(name: string, value: number, tags?: MetricTags): void {
    this.emit({ name: this.prefix + name, type: "histogram", value, tags: this.mergeTags(tags) });
  }

  event(name: string, tags?: MetricTags): void {
    this.emit({ name: this.prefix + name, type: "event", tags: this.mergeTags(tags) });
  }

  /**
   * Emit a raw metric event. Sink failures are logged, never thrown.
   */
  emit(event: MetricEvent): void {
    const fullEvent: MetricEvent = {
      ...event,
      timestamp: event.timestamp ?? Date.now(),
    };

    try {
      this.sink.record(fullEvent);
    } catch (error) {
      console.error(`[MetricsEmitter] Failed to record metric '${event.name}':`, error);
    }
  }

  // ==========================================================================
  // TIMERS
  // ==========================================================================

  /**
   * Start a timer that records a histogram value when ended.
   */
  startTimer(name: string, tags?: MetricTags): TimerHandle {
    const startTime = Date.now();
    const mergedTags = this.mergeTags(tags);
    let recorded = false;

    return {
      end: (extraTags?: MetricTags) => {
        const duration = Date.now() - startTime;
        if (!recorded) {
          recorded = true;
          this.histogram(name, duration, { ...mergedTags, ...extraTags });
        }
        return duration;
      },

      abort: () => {
        recorded = true;
      },
    };
  }

  // ==========================================================================
  // LIFECYCLE
  // ==========================================================================

  async flush(): Promise<void> {
    if (!this.sink.flush) return;
    try {
      await this.sink.flush();
    } catch (error) {
      console.error("[MetricsEmitter] Failed to flush:", error);
    }
  }

  async dispose(): Promise<void> {
    await this.flush();
    if (this.sink.dispose) {
      try {
        await this.sink.dispose();
      } catch (error) {
        console.error("[MetricsEmitter] Failed to dispose sink:", error);
      }
    }
  }

  getMetrics(): Record<string, unknown> | undefined {
    return this.sink.getMetrics?.();
  }

  private mergeTags(tags?: MetricTags): MetricTags {
    if (!tags) return { ...this.defaultTags };
    if (Object.keys(this.defaultTags).length === 0) return tags;
    return { ...this.defaultTags, ...tags };
  }
}
