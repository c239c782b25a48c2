// Analytics event sink
// Segment forwards the nudge events to the marketing email platform

import { Analytics } from "@segment/analytics-node";

export type EventProperties = Record<string, string | number | boolean | null>;

export interface AnalyticsSink {
  /** Fire-and-forget; delivery is not confirmed */
  track(userId: number | string, event: string, properties: EventProperties): void;
  flush(): Promise<void>;
}

export type SegmentClient = Pick<Analytics, "track" | "closeAndFlush">;

export class SegmentAnalyticsSink implements AnalyticsSink {
  constructor(private readonly client: SegmentClient, private readonly flushTimeoutMs = 10000) {}

  track(userId: number | string, event: string, properties: EventProperties): void {
    this.client.track({ userId: String(userId), event, properties });
  }

  async flush(): Promise<void> {
    await this.client.closeAndFlush({ timeout: this.flushTimeoutMs });
  }
}

export function createSegmentSink(writeKey: string): SegmentAnalyticsSink {
  if (!writeKey) {
    throw new Error("SEGMENT_WRITE_KEY is required to emit analytics events");
  }
  return new SegmentAnalyticsSink(new Analytics({ writeKey }));
}
