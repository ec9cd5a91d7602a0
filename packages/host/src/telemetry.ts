import { TelemetrySample } from "./types";

const INTERVAL_WINDOW = 50;

interface SlotStats {
  clientId: number | null;
  windowCount: number;
  windowStartedAt: number;
  lastArrivalAt: number | null;
  intervals: number[];
  lastSequence: number | null;
}

/**
 * Per-slot receive statistics.
 *
 * The wire protocol is one-way, so nothing here is a round-trip time: "interval" and
 * "jitter" are the mean and sample standard deviation of local inter-arrival gaps over
 * the last 50 forwarded packets.
 */
export class TelemetryAggregator {
  private readonly slots: SlotStats[];
  private latestSamples: TelemetrySample[] = [];

  public constructor(slotCount: number, nowMs: number) {
    this.slots = Array.from({ length: slotCount }, () => emptyStats(nowMs));
  }

  public record(slot: number, clientId: number, sequence: number, nowMs: number): void {
    const stats = this.slots[slot];
    if (!stats) {
      return;
    }

    if (stats.clientId !== clientId) {
      this.slots[slot] = { ...emptyStats(nowMs), clientId };
      this.record(slot, clientId, sequence, nowMs);
      return;
    }

    if (stats.lastArrivalAt !== null) {
      stats.intervals.push(nowMs - stats.lastArrivalAt);
      if (stats.intervals.length > INTERVAL_WINDOW) {
        stats.intervals.shift();
      }
    }

    stats.lastArrivalAt = nowMs;
    stats.lastSequence = sequence;
    stats.windowCount += 1;
  }

  /**
   * Closes the current rate window on every slot and returns one sample per slot.
   */
  public sample(nowMs: number): TelemetrySample[] {
    this.latestSamples = this.slots.map((stats, slot) => {
      const elapsedMs = nowMs - stats.windowStartedAt;
      const packetsPerSecond = elapsedMs > 0 ? (stats.windowCount * 1_000) / elapsedMs : 0;

      stats.windowCount = 0;
      stats.windowStartedAt = nowMs;

      return {
        slot,
        clientId: stats.clientId,
        packetsPerSecond,
        meanIntervalMs: mean(stats.intervals),
        jitterMs: standardDeviation(stats.intervals),
        lastSequence: stats.lastSequence,
      };
    });

    return this.latest();
  }

  public latest(): TelemetrySample[] {
    return this.latestSamples.map((sample) => ({ ...sample }));
  }

  public reset(slot: number, nowMs: number): void {
    if (slot >= 0 && slot < this.slots.length) {
      this.slots[slot] = emptyStats(nowMs);
    }
  }
}

function emptyStats(nowMs: number): SlotStats {
  return {
    clientId: null,
    windowCount: 0,
    windowStartedAt: nowMs,
    lastArrivalAt: null,
    intervals: [],
    lastSequence: null,
  };
}

function mean(values: number[]): number {
  if (values.length === 0) {
    return 0;
  }
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

function standardDeviation(values: number[]): number {
  if (values.length < 2) {
    return 0;
  }
  const average = mean(values);
  const squared = values.reduce((sum, value) => sum + (value - average) ** 2, 0);
  return Math.sqrt(squared / (values.length - 1));
}
