import assert from "node:assert/strict";
import { test } from "node:test";
import { neutralState, Packet, toNanoseconds } from "@padlink/protocol";
import { createHostConfig } from "../config";
import { Logger } from "../logger";
import { AdmissionTicket, SecurityRegistry } from "../securityRegistry";
import { HostConfig } from "../types";
import { ManualClock, START_MS } from "./helpers";

function createRegistry(overrides: Partial<HostConfig> = {}): { registry: SecurityRegistry; clock: ManualClock } {
  const clock = new ManualClock(START_MS);
  return { registry: new SecurityRegistry(createHostConfig(overrides), clock, new Logger(false)), clock };
}

function packetFor(clock: ManualClock, clientId: number, sequence: number): Packet {
  return {
    version: 2,
    clientId,
    sequence,
    state: neutralState(),
    timestamp: toNanoseconds(clock.now()),
  };
}

function admitOrFail(registry: SecurityRegistry, clientId: number, address: string): AdmissionTicket {
  const result = registry.admit(clientId, address);
  if (!result.ok) {
    assert.fail(`admission of client ${clientId} from ${address} rejected: ${result.reason}`);
  }
  return result.ticket;
}

function acceptPacket(registry: SecurityRegistry, clock: ManualClock, clientId: number, address: string, sequence: number): void {
  registry.accept(admitOrFail(registry, clientId, address), packetFor(clock, clientId, sequence));
}

test("whitelist rejects unknown addresses without creating any record", () => {
  const { registry } = createRegistry({ enableWhitelist: true, whitelistIps: ["10.0.0.5"] });

  assert.equal(registry.screenAddress("10.0.0.6"), "whitelist");
  assert.equal(registry.screenAddress("10.0.0.5"), null);
  assert.deepEqual(registry.listClients(), []);
  assert.equal(registry.getAddress("10.0.0.6"), null);

  const events = registry.recentEvents();
  assert.equal(events.length, 1);
  assert.equal(events[0].kind, "whitelist_reject");
  assert.equal(events[0].address, "10.0.0.6");
});

test("first accepted packet creates the client record", () => {
  const { registry, clock } = createRegistry();

  const ticket = admitOrFail(registry, 77, "192.168.1.20");
  assert.equal(ticket.known, false);
  assert.equal(ticket.lastSequence, null);
  registry.accept(ticket, packetFor(clock, 77, 9));

  const record = registry.getClient(77);
  assert.ok(record);
  assert.equal(record.address, "192.168.1.20");
  assert.equal(record.lastSequence, 9);
  assert.equal(record.packetCount, 1);
  assert.equal(record.firstSeenAt, START_MS);
  assert.deepEqual(registry.getAddress("192.168.1.20")?.clientIds, [77]);

  const second = admitOrFail(registry, 77, "192.168.1.20");
  assert.equal(second.known, true);
  assert.equal(second.lastSequence, 9);
});

test("returned records are copies", () => {
  const { registry, clock } = createRegistry();
  acceptPacket(registry, clock, 5, "192.168.1.20", 1);

  const record = registry.getClient(5);
  assert.ok(record);
  record.violations = 99;
  assert.equal(registry.getClient(5)?.violations, 0);
});

test("connection cap rejects a new client id from a full address", () => {
  const { registry, clock } = createRegistry({ maxClientsPerIp: 2 });
  acceptPacket(registry, clock, 1, "10.0.0.1", 1);
  acceptPacket(registry, clock, 2, "10.0.0.1", 1);

  assert.deepEqual(registry.admit(3, "10.0.0.1"), { ok: false, reason: "connection_limit" });
  assert.equal(registry.getAddress("10.0.0.1")?.violations, 1);
  assert.equal(registry.recentEvents().at(-1)?.kind, "connection_limit");
  assert.equal(registry.admit(1, "10.0.0.1").ok, true);
  assert.equal(registry.admit(3, "10.0.0.2").ok, true);
});

test("five violations block the client and further packets are refused without counting", () => {
  const { registry, clock } = createRegistry();
  acceptPacket(registry, clock, 7, "10.0.0.7", 1);

  for (let attempt = 0; attempt < 5; attempt += 1) {
    registry.rejectAdmitted(admitOrFail(registry, 7, "10.0.0.7"), "duplicate_sequence");
  }

  const blocked = registry.getClient(7);
  assert.ok(blocked);
  assert.equal(blocked.violations, 5);
  assert.equal(blocked.blockedUntil, START_MS + 300_000);

  const kinds = registry.recentEvents().map((event) => event.kind);
  assert.deepEqual(kinds, ["violation", "violation", "violation", "violation", "auto_block_client"]);

  assert.deepEqual(registry.admit(7, "10.0.0.7"), { ok: false, reason: "blocked_client" });
  assert.equal(registry.getClient(7)?.violations, 5);
  assert.equal(registry.stats().blockedClients, 1);
});

test("an expired block returns the client to active with a clean count", () => {
  const { registry, clock } = createRegistry();
  acceptPacket(registry, clock, 7, "10.0.0.7", 1);
  for (let attempt = 0; attempt < 5; attempt += 1) {
    registry.rejectAdmitted(admitOrFail(registry, 7, "10.0.0.7"), "stale_timestamp");
  }

  clock.advance(299_999);
  assert.equal(registry.admit(7, "10.0.0.7").ok, false);

  clock.advance(1);
  assert.equal(registry.admit(7, "10.0.0.7").ok, true);

  const record = registry.getClient(7);
  assert.equal(record?.violations, 0);
  assert.equal(record?.blockedUntil, null);
});

test("client rate limit trips after the burst is spent", () => {
  const { registry, clock } = createRegistry();
  acceptPacket(registry, clock, 11, "10.0.0.11", 1);

  for (let index = 0; index < 19; index += 1) {
    assert.equal(registry.admit(11, "10.0.0.11").ok, true);
  }

  assert.deepEqual(registry.admit(11, "10.0.0.11"), { ok: false, reason: "client_rate_limit" });
  assert.equal(registry.getClient(11)?.violations, 1);
});

test("address rate limit charges the address when the client is unknown", () => {
  const { registry } = createRegistry();

  for (let index = 0; index < 20; index += 1) {
    assert.equal(registry.admit(12, "10.0.0.12").ok, true);
  }

  assert.deepEqual(registry.admit(12, "10.0.0.12"), { ok: false, reason: "ip_rate_limit" });
  assert.equal(registry.getAddress("10.0.0.12")?.violations, 1);
  assert.equal(registry.getClient(12), null);
});

test("repeated oversized datagrams auto-block the address", () => {
  const { registry } = createRegistry();

  for (let index = 0; index < 5; index += 1) {
    registry.recordOversized("10.0.0.13", 2_048);
  }

  assert.equal(registry.isAddressBlocked("10.0.0.13"), true);
  assert.equal(registry.screenAddress("10.0.0.13"), "blocked_ip");
  assert.equal(registry.recentEvents().at(-1)?.kind, "auto_block_ip");
  assert.equal(registry.stats().blockedAddresses, 1);
});

test("manual block and unblock are idempotent", () => {
  const { registry, clock } = createRegistry();

  registry.blockIp("10.0.0.9", 1_000);
  assert.equal(registry.screenAddress("10.0.0.9"), "blocked_ip");
  assert.equal(registry.stats().manualBlocks, 1);

  assert.equal(registry.unblockIp("10.0.0.9"), true);
  assert.equal(registry.unblockIp("10.0.0.9"), false);
  assert.equal(registry.screenAddress("10.0.0.9"), null);
  assert.deepEqual(
    registry.recentEvents().map((event) => event.kind),
    ["manual_block", "manual_unblock"],
  );

  registry.blockIp("10.0.0.9", 1_000);
  clock.advance(1_000);
  assert.equal(registry.isAddressBlocked("10.0.0.9"), false);
});

test("a client id seen from a new address moves to it", () => {
  const { registry, clock } = createRegistry();
  acceptPacket(registry, clock, 21, "10.0.0.21", 1);
  acceptPacket(registry, clock, 21, "10.0.0.22", 2);

  assert.equal(registry.getClient(21)?.address, "10.0.0.22");
  assert.deepEqual(registry.getAddress("10.0.0.21")?.clientIds, []);
  assert.deepEqual(registry.getAddress("10.0.0.22")?.clientIds, [21]);
});

test("sweep evicts idle records past retention", () => {
  const { registry, clock } = createRegistry();
  acceptPacket(registry, clock, 31, "10.0.0.31", 1);

  clock.advance(300_000);
  assert.deepEqual(registry.sweep(), { evictedClients: 0, evictedAddresses: 0, expiredManualBlocks: 0 });

  clock.advance(1);
  assert.deepEqual(registry.sweep(), { evictedClients: 1, evictedAddresses: 1, expiredManualBlocks: 0 });
  assert.equal(registry.getClient(31), null);
  assert.equal(registry.getAddress("10.0.0.31"), null);
});

test("sweep keeps a client that is still serving a block", () => {
  const { registry, clock } = createRegistry({ blockDurationMs: 600_000 });
  acceptPacket(registry, clock, 32, "10.0.0.32", 1);
  for (let attempt = 0; attempt < 5; attempt += 1) {
    registry.rejectAdmitted(admitOrFail(registry, 32, "10.0.0.32"), "duplicate_sequence");
  }
  registry.blockIp("10.0.0.99", 1_000);

  clock.advance(300_001);
  assert.deepEqual(registry.sweep(), { evictedClients: 0, evictedAddresses: 0, expiredManualBlocks: 1 });
  assert.ok(registry.getClient(32));
});

test("security events are not recorded when event logging is off", () => {
  const { registry } = createRegistry({ logSecurityEvents: false });

  for (let index = 0; index < 5; index += 1) {
    registry.recordOversized("10.0.0.40", 4_000);
  }

  assert.equal(registry.isAddressBlocked("10.0.0.40"), true);
  assert.deepEqual(registry.recentEvents(), []);
});

test("stats count active, blocked and tracked records", () => {
  const { registry, clock } = createRegistry();
  acceptPacket(registry, clock, 1, "10.0.0.1", 1);
  clock.advance(61_000);
  acceptPacket(registry, clock, 2, "10.0.0.2", 1);

  assert.deepEqual(registry.stats(), {
    totalClients: 2,
    activeClients: 1,
    blockedClients: 0,
    trackedAddresses: 2,
    blockedAddresses: 0,
    manualBlocks: 0,
    recentEvents: 0,
  });
});
