// ABOUTME: One-way sink for send-status events pushed by the orchestrator.
// ABOUTME: Keeps only the most recent event and forwards each one to the UI channel.

import type { SendStatus } from "../types.js";

export interface StatusSink {
  push(status: SendStatus): void;
}

export class StatusNotifier implements StatusSink {
  private last: SendStatus | null = null;

  constructor(private readonly publish: (status: SendStatus) => void) {}

  push(status: SendStatus): void {
    this.last = status;
    this.publish(status);
  }

  latest(): SendStatus | null {
    return this.last;
  }
}
