/**
 * Command Lanes - per-connection serialization and execution timeouts.
 *
 * Commands sharing a lane key run one after another in submission order.
 * Different lanes run concurrently on the event loop.
 */

import { AppError } from "./error-mapper.js";
import type { Logger } from "./logger-types.js";
import { NoOpLogger } from "./logger-types.js";

/**
 * Wrap a promise with a timeout.
 * Rejects with a timeout AppError when the deadline passes first.
 */
export function withTimeout<T>(promise: Promise<T>, timeoutMs: number, commandType: string): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    let settled = false;

    const timer = setTimeout(() => {
      if (settled) return;
      settled = true;
      reject(new AppError("timeout", `Command '${commandType}' timed out after ${timeoutMs}ms`));
    }, timeoutMs);

    promise
      .then((result) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        resolve(result);
      })
      .catch((error: unknown) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        reject(error);
      });
  });
}

export class CommandLanes {
  /** Tail of each lane; removed once the lane drains. */
  private laneTails = new Map<string, Promise<void>>();

  constructor(private readonly logger: Logger = new NoOpLogger()) {}

  getStats(): { laneCount: number } {
    return { laneCount: this.laneTails.size };
  }

  /**
   * Lane key for a connection.
   */
  static forConnection(connectionId: string): string {
    return `connection:${connectionId}`;
  }

  /**
   * Run a task in a serialized lane.
   * A failed task does not stop the tasks queued behind it.
   */
  async runOnLane<T>(laneKey: string, task: () => Promise<T>): Promise<T> {
    const previousTail = this.laneTails.get(laneKey) ?? Promise.resolve();

    let releaseCurrent: (() => void) | undefined;
    const currentTail = new Promise<void>((resolve) => {
      releaseCurrent = resolve;
    });

    const laneTail = previousTail.then(
      () => currentTail,
      () => currentTail
    );
    this.laneTails.set(laneKey, laneTail);

    await previousTail.catch((error: unknown) => {
      this.logger.warn("Previous lane task failed", { laneKey, error: String(error) });
    });

    try {
      return await task();
    } finally {
      releaseCurrent?.();
      if (this.laneTails.get(laneKey) === laneTail) {
        this.laneTails.delete(laneKey);
      }
    }
  }
}
