/**
 * In-memory stand-ins shared by the test files.
 */

import type { ConnectionTransport, TransportSendResult } from "./connection.js";

/**
 * Records what a connection writes. `result` decides what send() reports,
 * so tests can simulate backpressure ("dropped") or a dead socket ("closed").
 */
export class RecordingTransport implements ConnectionTransport {
  readonly sent: string[] = [];
  readonly closes: Array<{ code: number; reason: string }> = [];
  result: TransportSendResult = "sent";

  send(data: string, _options: { critical: boolean }): TransportSendResult {
    if (this.result === "sent") {
      this.sent.push(data);
    }
    return this.result;
  }

  close(code: number, reason: string): void {
    this.closes.push({ code, reason });
  }

  /** Sent messages, parsed. */
  messages(): Array<Record<string, unknown>> {
    return this.sent.map((data) => {
      const parsed: Record<string, unknown> = JSON.parse(data);
      return parsed;
    });
  }

  /** Sent messages of one `type`. */
  ofType(type: string): Array<Record<string, unknown>> {
    return this.messages().filter((m) => m.type === type);
  }

  last(): Record<string, unknown> | undefined {
    const all = this.messages();
    return all[all.length - 1];
  }
}
