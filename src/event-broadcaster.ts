/**
 * EventBroadcaster - best-effort fan-out of channel events.
 *
 * An event reaches every connected connection subscribed to its topic and,
 * when the event names a workspace, whose principal is in that workspace.
 * Events are non-critical: a receiver under backpressure drops them and the
 * publisher never waits.
 */

import type { ConnectionRegistry } from "./connection-registry.js";
import type { Logger } from "./logger-types.js";
import { NoOpLogger } from "./logger-types.js";
import { MetricNames, MetricsEmitter } from "./metrics-index.js";
import type { ChannelEvent, ServerMessage } from "./types.js";

export interface PublishResult {
  delivered: number;
  dropped: number;
}

export interface EventBroadcasterStats {
  published: number;
  delivered: number;
  dropped: number;
}

export class EventBroadcaster {
  private published = 0;
  private delivered = 0;
  private dropped = 0;

  constructor(
    private readonly registry: ConnectionRegistry,
    private readonly logger: Logger = new NoOpLogger(),
    private readonly metrics: MetricsEmitter = new MetricsEmitter()
  ) {}

  publish(event: ChannelEvent, now = Date.now()): PublishResult {
    const message: ServerMessage = { type: "event", timestamp: new Date(now).toISOString(), ...event };
    const result: PublishResult = { delivered: 0, dropped: 0 };

    for (const connection of this.registry.connected()) {
      if (!connection.isSubscribed(event.topic)) continue;
      if (event.workspace_id !== undefined && connection.principal.workspace_id !== event.workspace_id) continue;

      if (connection.send(message, { critical: false }) === "sent") {
        result.delivered++;
      } else {
        result.dropped++;
      }
    }

    this.published++;
    this.delivered += result.delivered;
    this.dropped += result.dropped;
    this.metrics.counter(MetricNames.EVENTS_PUBLISHED_TOTAL, 1, { topic: event.topic });
    if (result.dropped > 0) {
      this.metrics.counter(MetricNames.EVENTS_DROPPED_TOTAL, result.dropped, { topic: event.topic });
      this.logger.debug("Event dropped for slow consumers", {
        topic: event.topic,
        event: event.event,
        dropped: result.dropped,
      });
    }
    return result;
  }

  getStats(): EventBroadcasterStats {
    return { published: this.published, delivered: this.delivered, dropped: this.dropped };
  }
}
