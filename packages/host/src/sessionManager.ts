import { EventEmitter } from "events";
import { RouteDecision, SessionEvent, SlotSnapshot } from "./types";

interface SlotBinding {
  clientId: number;
  boundAt: number;
  lastActivityAt: number;
}

export type SessionEventListener = (event: SessionEvent) => void;

/**
 * Decides which virtual controller slot, if any, an accepted packet drives.
 *
 * Single-owner mode is the one-slot case: the first accepted client owns slot 0 and
 * everyone else stands by until the owner has been silent longer than the ownership
 * timeout. In co-op mode each new client takes the lowest free slot and keeps it until
 * its own silence exceeds the timeout.
 *
 * A binding is released only when `now - lastActivity > timeout`. At exactly the timeout
 * the incumbent still holds the slot, so a contender arriving at the boundary stands by.
 */
export class SessionManager {
  private readonly slots: (SlotBinding | null)[];
  private readonly emitter = new EventEmitter();

  public constructor(
    slotCount: number,
    private readonly ownershipTimeoutMs: number,
  ) {
    if (!Number.isInteger(slotCount) || slotCount < 1) {
      throw new RangeError(`Slot count must be a positive integer, got ${slotCount}.`);
    }
    this.slots = new Array<SlotBinding | null>(slotCount).fill(null);
  }

  public route(clientId: number, nowMs: number): RouteDecision {
    this.expire(nowMs);

    const bound = this.slots.findIndex((binding) => binding?.clientId === clientId);
    if (bound >= 0) {
      const binding = this.slots[bound];
      if (binding) {
        binding.lastActivityAt = nowMs;
      }
      return { kind: "slot", slot: bound, claimed: false };
    }

    const free = this.slots.findIndex((binding) => binding === null);
    if (free >= 0) {
      this.slots[free] = { clientId, boundAt: nowMs, lastActivityAt: nowMs };
      this.emit({ kind: "player_join", slot: free, clientId, at: nowMs });
      return { kind: "slot", slot: free, claimed: true };
    }

    return { kind: "standby", reason: this.slots.length === 1 ? "not_owner" : "slots_full" };
  }

  /**
   * Releases every binding whose client has been silent past the timeout.
   */
  public expire(nowMs: number): SessionEvent[] {
    const released: SessionEvent[] = [];

    this.slots.forEach((binding, slot) => {
      if (!binding || nowMs - binding.lastActivityAt <= this.ownershipTimeoutMs) {
        return;
      }

      this.slots[slot] = null;
      const event: SessionEvent = { kind: "player_leave", slot, clientId: binding.clientId, at: nowMs };
      released.push(event);
      this.emit(event);
    });

    return released;
  }

  public snapshot(): SlotSnapshot[] {
    return this.slots.map((binding, slot) => ({
      slot,
      clientId: binding ? binding.clientId : null,
      boundAt: binding ? binding.boundAt : null,
      lastActivityAt: binding ? binding.lastActivityAt : null,
    }));
  }

  /**
   * Subscribes to join/leave events. Returns the unsubscribe function.
   */
  public onSessionEvent(listener: SessionEventListener): () => void {
    this.emitter.on("session-event", listener);
    return () => {
      this.emitter.off("session-event", listener);
    };
  }

  private emit(event: SessionEvent): void {
    this.emitter.emit("session-event", event);
  }
}
