import type { Packet } from "@padlink/protocol";
import { Clock } from "./clock";
import { EventRing } from "./eventRing";
import { Logger } from "./logger";
import { TokenBucket } from "./tokenBucket";
import {
  AddressRecord,
  AdmissionRejection,
  ClientRecord,
  HostConfig,
  RegistryStats,
  ReplayRejection,
  SecurityEvent,
  SecurityEventKind,
  SweepResult,
} from "./types";

const EVENT_CAPACITY = 1_000;
const ACTIVE_WINDOW_MS = 60_000;

interface Blockable {
  violations: number;
  blockedUntil: number | null;
}

interface ClientEntry extends Blockable {
  clientId: number;
  address: string;
  firstSeenAt: number;
  lastActivityAt: number;
  lastSequence: number;
  lastTimestamp: bigint;
  packetCount: number;
  slot: number | null;
  bucket: TokenBucket;
}

interface AddressEntry extends Blockable {
  address: string;
  clientIds: Set<number>;
  lastActivityAt: number;
  bucket: TokenBucket;
}

/**
 * Proof that a packet passed admission. Carries what the replay guard needs and nothing
 * that would let a caller reach the registry's maps.
 */
export interface AdmissionTicket {
  readonly clientId: number;
  readonly address: string;
  readonly known: boolean;
  readonly lastSequence: number | null;
}

export type AdmissionResult = { ok: true; ticket: AdmissionTicket } | { ok: false; reason: AdmissionRejection };

/**
 * Per-client and per-address admission state for the receive path.
 *
 * Records move Active -> Blocked when their violation count reaches the configured
 * threshold and back to Active, with the count cleared, once the block expires. Expiry
 * is evaluated lazily when the record is next consulted and again by `sweep`.
 *
 * All reads return copies. The receive path is the only writer; status readers run on
 * the same event loop between packets, so every lookup/update completes before another
 * reader or writer can observe the maps.
 */
export class SecurityRegistry {
  private readonly clients = new Map<number, ClientEntry>();
  private readonly addresses = new Map<string, AddressEntry>();
  private readonly manualBlocks = new Map<string, number>();
  private readonly whitelist: ReadonlySet<string>;
  private readonly events = new EventRing<SecurityEvent>(EVENT_CAPACITY);

  public constructor(
    private readonly config: HostConfig,
    private readonly clock: Clock,
    private readonly logger: Logger,
  ) {
    this.whitelist = new Set(config.whitelistIps);
  }

  /**
   * Earliest check on a datagram: whitelist, then manual and automatic address blocks.
   */
  public screenAddress(address: string): AdmissionRejection | null {
    const now = this.clock.now();

    if (this.config.enableWhitelist && !this.whitelist.has(address)) {
      this.logEvent("whitelist_reject", address, null, "address not in whitelist");
      return "whitelist";
    }

    if (this.isManuallyBlocked(address, now) || this.isAddressAutoBlocked(address, now)) {
      if (this.config.logBlockedPackets) {
        this.logEvent("blocked_ip", address, null, "");
      }
      return "blocked_ip";
    }

    return null;
  }

  /**
   * A datagram over the size ceiling is the one malformed input that counts as a violation.
   * It is charged to the source address since no client id has been read.
   */
  public recordOversized(address: string, size: number): void {
    if (this.screenAddress(address) !== null) {
      return;
    }

    const entry = this.ensureAddress(address, this.clock.now());
    this.recordViolation(entry, address, null, `oversized datagram (${size} bytes)`);
  }

  public admit(clientId: number, address: string): AdmissionResult {
    const now = this.clock.now();
    const client = this.clients.get(clientId);

    if (client && this.isBlocked(client, now)) {
      if (this.config.logBlockedPackets) {
        this.logEvent("blocked_client", address, clientId, "");
      }
      return { ok: false, reason: "blocked_client" };
    }

    const addressEntry = this.ensureAddress(address, now);
    addressEntry.lastActivityAt = now;

    if (!addressEntry.clientIds.has(clientId) && addressEntry.clientIds.size >= this.config.maxClientsPerIp) {
      this.recordViolation(
        addressEntry,
        address,
        clientId,
        `client limit ${this.config.maxClientsPerIp} reached`,
        "connection_limit",
      );
      return { ok: false, reason: "connection_limit" };
    }

    // A client without a record starts with a full bucket; its first token is taken on accept.
    if (client && !client.bucket.tryConsume(now)) {
      this.recordViolation(client, address, clientId, "client rate limit exceeded");
      return { ok: false, reason: "client_rate_limit" };
    }

    if (!addressEntry.bucket.tryConsume(now)) {
      this.recordViolation(client ?? addressEntry, address, clientId, "address rate limit exceeded");
      return { ok: false, reason: "ip_rate_limit" };
    }

    return {
      ok: true,
      ticket: {
        clientId,
        address,
        known: client !== undefined,
        lastSequence: client ? client.lastSequence : null,
      },
    };
  }

  /**
   * Charges a replay-guard rejection to the client, or to its address when the client
   * has never had a packet accepted.
   */
  public rejectAdmitted(ticket: AdmissionTicket, reason: ReplayRejection): void {
    const now = this.clock.now();
    const client = this.clients.get(ticket.clientId);
    const target = client ?? this.ensureAddress(ticket.address, now);
    this.recordViolation(target, ticket.address, ticket.clientId, reason);
  }

  /**
   * Commits an admitted packet. The first accepted packet of a client id creates its record.
   */
  public accept(ticket: AdmissionTicket, packet: Packet): void {
    const now = this.clock.now();
    const addressEntry = this.ensureAddress(ticket.address, now);
    let client = this.clients.get(ticket.clientId);

    if (!client) {
      const bucket = new TokenBucket(this.config.rateLimitMax, this.config.rateLimitBurst, now);
      bucket.tryConsume(now);
      client = {
        clientId: ticket.clientId,
        address: ticket.address,
        firstSeenAt: now,
        lastActivityAt: now,
        lastSequence: packet.sequence,
        lastTimestamp: packet.timestamp,
        packetCount: 0,
        violations: 0,
        blockedUntil: null,
        slot: null,
        bucket,
      };
      this.clients.set(ticket.clientId, client);
      this.logger.debug(`New client ${ticket.clientId} from ${ticket.address}`);
    } else if (client.address !== ticket.address) {
      this.addresses.get(client.address)?.clientIds.delete(client.clientId);
      this.logger.info(`Client ${client.clientId} moved from ${client.address} to ${ticket.address}`);
      client.address = ticket.address;
    }

    addressEntry.clientIds.add(ticket.clientId);
    addressEntry.lastActivityAt = now;

    client.lastActivityAt = now;
    client.lastSequence = packet.sequence;
    client.lastTimestamp = packet.timestamp;
    client.packetCount += 1;
  }

  public assignSlot(clientId: number, slot: number | null): void {
    const client = this.clients.get(clientId);
    if (client) {
      client.slot = slot;
    }
  }

  public blockIp(address: string, durationMs = this.config.blockDurationMs): void {
    const now = this.clock.now();
    this.manualBlocks.set(address, now + durationMs);
    this.logEvent("manual_block", address, null, `duration=${durationMs}ms`);
    this.logger.info(`Address ${address} blocked for ${durationMs} ms`);
  }

  /**
   * Lifts a manual block. Automatic blocks keep running on their own timer.
   * Returns false, logging nothing, when no manual block was in place.
   */
  public unblockIp(address: string): boolean {
    if (!this.manualBlocks.delete(address)) {
      return false;
    }

    this.logEvent("manual_unblock", address, null, "");
    this.logger.info(`Address ${address} unblocked`);
    return true;
  }

  public isAddressBlocked(address: string): boolean {
    const now = this.clock.now();
    return this.isManuallyBlocked(address, now) || this.isAddressAutoBlocked(address, now);
  }

  /**
   * Drops state that no longer matters: lapsed manual blocks, and clients and addresses
   * idle past the retention window that are not serving a block.
   */
  public sweep(): SweepResult {
    const now = this.clock.now();
    const result: SweepResult = { evictedClients: 0, evictedAddresses: 0, expiredManualBlocks: 0 };

    for (const [address, until] of this.manualBlocks) {
      if (now >= until) {
        this.manualBlocks.delete(address);
        result.expiredManualBlocks += 1;
      }
    }

    for (const [clientId, client] of this.clients) {
      if (this.isBlocked(client, now) || now - client.lastActivityAt <= this.config.retentionMs) {
        continue;
      }

      this.clients.delete(clientId);
      this.addresses.get(client.address)?.clientIds.delete(clientId);
      result.evictedClients += 1;
    }

    for (const [address, entry] of this.addresses) {
      if (this.isBlocked(entry, now) || entry.clientIds.size > 0) {
        continue;
      }
      if (now - entry.lastActivityAt <= this.config.retentionMs) {
        continue;
      }

      this.addresses.delete(address);
      result.evictedAddresses += 1;
    }

    return result;
  }

  public getClient(clientId: number): ClientRecord | null {
    const client = this.clients.get(clientId);
    return client ? cloneClient(client) : null;
  }

  public listClients(): ClientRecord[] {
    return [...this.clients.values()].map(cloneClient).sort((left, right) => left.clientId - right.clientId);
  }

  public getAddress(address: string): AddressRecord | null {
    const entry = this.addresses.get(address);
    return entry ? cloneAddress(entry) : null;
  }

  public recentEvents(limit = 100): SecurityEvent[] {
    return this.events.recent(limit);
  }

  public stats(): RegistryStats {
    const now = this.clock.now();
    let activeClients = 0;
    let blockedClients = 0;
    let blockedAddresses = 0;
    let manualBlocks = 0;

    for (const client of this.clients.values()) {
      if (now - client.lastActivityAt < ACTIVE_WINDOW_MS) {
        activeClients += 1;
      }
      if (blockInForce(client, now)) {
        blockedClients += 1;
      }
    }

    for (const until of this.manualBlocks.values()) {
      if (now < until) {
        manualBlocks += 1;
      }
    }

    for (const entry of this.addresses.values()) {
      if (blockInForce(entry, now)) {
        blockedAddresses += 1;
      }
    }

    return {
      totalClients: this.clients.size,
      activeClients,
      blockedClients,
      trackedAddresses: this.addresses.size,
      blockedAddresses,
      manualBlocks,
      recentEvents: this.events.size,
    };
  }

  private ensureAddress(address: string, now: number): AddressEntry {
    const existing = this.addresses.get(address);
    if (existing) {
      return existing;
    }

    const entry: AddressEntry = {
      address,
      clientIds: new Set(),
      lastActivityAt: now,
      violations: 0,
      blockedUntil: null,
      bucket: new TokenBucket(this.config.ipRateLimitMax, this.config.rateLimitBurst, now),
    };
    this.addresses.set(address, entry);
    return entry;
  }

  private isManuallyBlocked(address: string, now: number): boolean {
    const until = this.manualBlocks.get(address);
    if (until === undefined) {
      return false;
    }
    if (now < until) {
      return true;
    }

    this.manualBlocks.delete(address);
    return false;
  }

  private isAddressAutoBlocked(address: string, now: number): boolean {
    const entry = this.addresses.get(address);
    return entry ? this.isBlocked(entry, now) : false;
  }

  /**
   * Block check with expiry: a lapsed block is cleared and the violation count reset.
   */
  private isBlocked(target: Blockable, now: number): boolean {
    if (target.blockedUntil === null) {
      return false;
    }
    if (now < target.blockedUntil) {
      return true;
    }

    target.blockedUntil = null;
    target.violations = 0;
    return false;
  }

  /**
   * One violation against `target`. Reaching the threshold blocks it and logs the block in
   * place of the violation, so a packet never produces more than one event.
   */
  private recordViolation(
    target: ClientEntry | AddressEntry,
    address: string,
    clientId: number | null,
    detail: string,
    kind: SecurityEventKind = "violation",
  ): void {
    const now = this.clock.now();
    target.violations += 1;

    if (target.blockedUntil === null && target.violations >= this.config.autoBlockThreshold) {
      target.blockedUntil = now + this.config.blockDurationMs;
      const isClient = "clientId" in target;
      const blockKind: SecurityEventKind = isClient ? "auto_block_client" : "auto_block_ip";
      this.logEvent(blockKind, address, clientId, detail);
      this.logger.warn(
        `${isClient ? `Client ${clientId}` : `Address ${address}`} blocked for ${this.config.blockDurationMs} ms after ${target.violations} violations (last: ${detail})`,
      );
      return;
    }

    this.logEvent(kind, address, clientId, detail);
  }

  private logEvent(kind: SecurityEventKind, address: string, clientId: number | null, detail: string): void {
    if (!this.config.logSecurityEvents) {
      return;
    }

    this.events.push(
      Object.freeze({
        at: this.clock.now(),
        kind,
        address,
        clientId,
        detail,
      }),
    );
  }
}

function blockInForce(target: Blockable, now: number): boolean {
  return target.blockedUntil !== null && now < target.blockedUntil;
}

function cloneClient(client: ClientEntry): ClientRecord {
  return {
    clientId: client.clientId,
    address: client.address,
    firstSeenAt: client.firstSeenAt,
    lastActivityAt: client.lastActivityAt,
    lastSequence: client.lastSequence,
    lastTimestamp: client.lastTimestamp,
    packetCount: client.packetCount,
    violations: client.violations,
    blockedUntil: client.blockedUntil,
    slot: client.slot,
  };
}

function cloneAddress(entry: AddressEntry): AddressRecord {
  return {
    address: entry.address,
    clientIds: [...entry.clientIds].sort((left, right) => left - right),
    lastActivityAt: entry.lastActivityAt,
    violations: entry.violations,
    blockedUntil: entry.blockedUntil,
  };
}
