import { Packet, toNanoseconds } from "@padlink/protocol";
import { ReplayRejection } from "./types";

const SEQUENCE_MODULUS = 0x1_0000;
const SEQUENCE_HALF_RANGE = 0x8000;

export interface ReplayGuardOptions {
  maxTimestampAgeMs: number;
  maxTimestampFutureMs: number;
}

/**
 * True when `sequence` is ahead of `last` by 1..32767 steps modulo 2^16. Exact repeats
 * and anything up to half the space behind count as old.
 */
export function isNewerSequence(sequence: number, last: number): boolean {
  const distance = (((sequence - last) % SEQUENCE_MODULUS) + SEQUENCE_MODULUS) % SEQUENCE_MODULUS;
  return distance >= 1 && distance < SEQUENCE_HALF_RANGE;
}

/**
 * Freshness check on a packet from one client, against that client's last accepted sequence.
 */
export class ReplayGuard {
  private readonly maxAgeNs: bigint;
  private readonly maxFutureNs: bigint;

  public constructor(options: ReplayGuardOptions) {
    this.maxAgeNs = toNanoseconds(options.maxTimestampAgeMs);
    this.maxFutureNs = toNanoseconds(options.maxTimestampFutureMs);
  }

  /**
   * `lastSequence` is null for a client with no accepted packet yet; only the timestamp
   * window applies then.
   */
  public check(packet: Packet, lastSequence: number | null, nowMs: number): ReplayRejection | null {
    const ageNs = toNanoseconds(nowMs) - packet.timestamp;

    if (ageNs > this.maxAgeNs) {
      return "stale_timestamp";
    }

    if (-ageNs > this.maxFutureNs) {
      return "future_timestamp";
    }

    if (lastSequence !== null && !isNewerSequence(packet.sequence, lastSequence)) {
      return "duplicate_sequence";
    }

    return null;
  }
}
