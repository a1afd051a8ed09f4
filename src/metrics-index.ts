/**
 * Metrics System - Public API
 *
 * @example
 * ```typescript
 * import { MetricsEmitter, MemorySink, CompositeSink, MetricNames } from "./metrics-index.js";
 *
 * const metrics = new MetricsEmitter({ sink: new CompositeSink([new MemorySink()]) });
 * metrics.gauge(MetricNames.CONNECTIONS_ACTIVE, registry.count());
 * ```
 */

export type { MetricValue, MetricTags, MetricType, MetricEvent, MetricsSink } from "./metrics-types.js";

export { NoOpSink, MemorySink, CompositeSink } from "./metrics-types.js";

export { MetricsEmitter } from "./metrics-emitter.js";
export type { TimerHandle } from "./metrics-emitter.js";

export { MetricNames, commandTags } from "./metrics-types.js";
