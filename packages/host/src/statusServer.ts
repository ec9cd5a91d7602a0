import { createServer, IncomingMessage, Server, ServerResponse } from "http";
import { AddressInfo } from "net";
import { Duplex } from "stream";
import { URL } from "url";
import WebSocket, { WebSocketServer } from "ws";
import { parseAddress, parseBlockRequest, parseUnblockRequest, StatusFrame } from "@padlink/protocol";
import { Clock, systemClock } from "./clock";
import { StatusApiError } from "./errors";
import { HostServer, normalizeRemoteHost } from "./hostServer";
import { Logger } from "./logger";
import { describeError } from "./sink";
import { TokenBucket } from "./tokenBucket";
import { ClientRecord, HostConfig, HostErrorPayload } from "./types";

const MAX_JSON_BODY_BYTES = 16_384;
const REQUEST_TIMEOUT_MS = 20_000;
const DEFAULT_EVENT_LIMIT = 100;
const MAX_EVENT_LIMIT = 1_000;
const ADDRESS_ROUTE_PREFIX = "/api/v1/security/addresses/";

interface AuthFailure {
  payload: HostErrorPayload;
  reason: string;
}

/**
 * Host-local status API.
 *
 * Responsibilities:
 * - report pipeline counters, slots, registry stats and telemetry,
 * - list security events and client records, look up one source address,
 * - accept manual block/unblock of source addresses,
 * - push telemetry and session frames to WebSocket subscribers.
 */
export class StatusServer {
  private server: Server | null = null;
  private wsServer: WebSocketServer | null = null;
  private requestSeq = 0;
  private mutationBuckets = new Map<string, TokenBucket>();
  private unsubscribers: (() => void)[] = [];

  public constructor(
    private readonly config: HostConfig,
    private readonly host: HostServer,
    private readonly logger: Logger,
    private readonly clock: Clock = systemClock,
  ) {}

  public async start(): Promise<void> {
    if (this.server) {
      return;
    }

    const server = createServer((request, response) => {
      void this.handleRequest(request, response);
    });
    server.requestTimeout = REQUEST_TIMEOUT_MS;

    this.wsServer = new WebSocketServer({ noServer: true });

    server.on("upgrade", (request: IncomingMessage, socket: Duplex, head: Buffer) => {
      this.handleUpgrade(request, socket, head);
    });

    await new Promise<void>((resolvePromise, rejectPromise) => {
      server.once("error", rejectPromise);
      server.listen(this.config.statusPort, this.config.statusBindHost, () => {
        server.off("error", rejectPromise);
        resolvePromise();
      });
    });
    this.server = server;

    this.unsubscribers = [
      this.host.onTelemetry((samples, at) => {
        this.broadcast({ type: "telemetry", at, samples });
      }),
      this.host.onSessionEvent((event) => {
        this.broadcast({ type: "session", event });
      }),
    ];

    const bound = this.address();
    const mode = this.config.statusAuthToken ? "token" : "localhost-only";
    this.logger.info(
      `Status API listening on http://${this.config.statusBindHost}:${bound ? bound.port : this.config.statusPort} (auth=${mode})`,
    );
  }

  public async stop(): Promise<void> {
    for (const unsubscribe of this.unsubscribers) {
      unsubscribe();
    }
    this.unsubscribers = [];

    if (this.wsServer) {
      this.wsServer.removeAllListeners();
      this.wsServer.clients.forEach((socket) => {
        socket.close();
      });
      this.wsServer = null;
    }

    const server = this.server;
    if (!server) {
      return;
    }
    this.server = null;

    await new Promise<void>((resolvePromise) => {
      server.close(() => resolvePromise());
      server.closeAllConnections();
    });

    this.logger.info("Status API stopped.");
  }

  public address(): AddressInfo | null {
    const bound = this.server?.address();
    return bound && typeof bound === "object" ? bound : null;
  }

  private async handleRequest(request: IncomingMessage, response: ServerResponse): Promise<void> {
    const requestId = this.nextRequestId();
    const startedAt = Date.now();
    const method = request.method ?? "GET";
    const parsedUrl = this.parseUrl(request);
    const pathname = parsedUrl.pathname;

    this.logger.debug(`[${requestId}] ${method} ${pathname}`);

    try {
      if (method === "GET" && pathname === "/healthz") {
        const status = this.host.status();
        this.writeJson(response, 200, {
          ok: true,
          ts: new Date(this.clock.now()).toISOString(),
          listening: status.listening,
          uptimeMs: status.startedAt ? this.clock.now() - Date.parse(status.startedAt) : 0,
        });
        return;
      }

      if (pathname.startsWith("/api/")) {
        const authError = this.checkAuth(request, parsedUrl);
        if (authError) {
          this.logAuthFailure(requestId, request, parsedUrl, authError.reason);
          this.writeJson(response, 401, authError.payload);
          return;
        }

        await this.handleApiRequest(method, parsedUrl, request, response, requestId);
        return;
      }

      this.writeJson(response, 404, notFound(`${method} ${pathname}`));
    } catch (error) {
      if (error instanceof StatusApiError) {
        this.writeJson(response, error.statusCode, { error: error.code, message: error.message });
        return;
      }

      this.logger.error(`[${requestId}] Unhandled request error: ${describeError(error)}`);
      this.writeJson(response, 500, {
        error: "INTERNAL_ERROR",
        message: "Unexpected host error.",
      });
    } finally {
      const elapsedMs = Date.now() - startedAt;
      this.logger.debug(`[${requestId}] Completed in ${elapsedMs} ms`);
    }
  }

  private async handleApiRequest(
    method: string,
    parsedUrl: URL,
    request: IncomingMessage,
    response: ServerResponse,
    requestId: string,
  ): Promise<void> {
    const pathname = parsedUrl.pathname;

    if (method === "GET" && pathname === "/api/v1/status") {
      this.writeJson(response, 200, this.host.status());
      return;
    }

    if (method === "GET" && pathname === "/api/v1/security/events") {
      const limit = parseLimit(parsedUrl.searchParams.get("limit"));
      this.writeJson(response, 200, { items: this.host.registry.recentEvents(limit) });
      return;
    }

    if (method === "GET" && pathname === "/api/v1/security/clients") {
      this.writeJson(response, 200, { items: this.host.registry.listClients().map(toClientView) });
      return;
    }

    if (method === "GET" && pathname.startsWith(ADDRESS_ROUTE_PREFIX)) {
      const address = parsePayload(
        (raw: string) => parseAddress(decodeURIComponent(raw)),
        pathname.slice(ADDRESS_ROUTE_PREFIX.length),
      );
      this.writeJson(response, 200, {
        address,
        blocked: this.host.registry.isAddressBlocked(address),
        record: this.host.registry.getAddress(address),
      });
      return;
    }

    if (method === "POST" && pathname === "/api/v1/security/block") {
      if (!this.checkMutatingRateLimit(request, response, requestId, "block")) {
        return;
      }

      const body = parsePayload(parseBlockRequest, await this.readJsonBody(request));
      const durationMs = body.durationMs ?? this.config.blockDurationMs;
      this.host.registry.blockIp(body.address, durationMs);
      this.logger.info(`[${requestId}] Manual block of ${body.address} for ${durationMs} ms`);

      this.writeJson(response, 200, {
        ok: true,
        address: body.address,
        blockedUntil: this.clock.now() + durationMs,
      });
      return;
    }

    if (method === "POST" && pathname === "/api/v1/security/unblock") {
      if (!this.checkMutatingRateLimit(request, response, requestId, "unblock")) {
        return;
      }

      const body = parsePayload(parseUnblockRequest, await this.readJsonBody(request));
      const removed = this.host.registry.unblockIp(body.address);
      this.writeJson(response, 200, { ok: true, address: body.address, removed });
      return;
    }

    this.writeJson(response, 404, notFound(`${method} ${pathname}`));
  }

  private checkMutatingRateLimit(
    request: IncomingMessage,
    response: ServerResponse,
    requestId: string,
    routeTag: string,
  ): boolean {
    const remoteHost = normalizeRemoteHost(request.socket.remoteAddress);
    const nowMs = this.clock.now();

    let bucket = this.mutationBuckets.get(remoteHost);
    if (!bucket) {
      // statusMutationRateMax is per minute; the bucket holds one minute's worth.
      bucket = new TokenBucket(this.config.statusMutationRateMax / 60, this.config.statusMutationRateMax, nowMs);
      this.mutationBuckets.set(remoteHost, bucket);
    }

    if (bucket.tryConsume(nowMs)) {
      response.setHeader("x-ratelimit-remaining", String(Math.floor(bucket.available(nowMs))));
      return true;
    }

    const retryAfterMs = Math.max(1_000, bucket.msUntilAvailable(nowMs));
    response.setHeader("retry-after", String(Math.ceil(retryAfterMs / 1_000)));
    this.logger.warn(`[${requestId}] Rate limit exceeded for host ${remoteHost} on ${routeTag}`);
    this.writeJson(response, 429, {
      error: "RATE_LIMITED",
      message: "Too many mutating requests. Please retry shortly.",
      retryAfterMs,
    });
    return false;
  }

  private handleUpgrade(request: IncomingMessage, socket: Duplex, head: Buffer): void {
    const requestId = this.nextRequestId();
    const parsedUrl = this.parseUrl(request);

    if (parsedUrl.pathname !== "/ws/v1/telemetry") {
      socket.destroy();
      return;
    }

    const authError = this.checkAuth(request, parsedUrl);
    if (authError) {
      this.logAuthFailure(requestId, request, parsedUrl, authError.reason);
      socket.write("HTTP/1.1 401 Unauthorized\r\n\r\n");
      socket.destroy();
      return;
    }

    const wsServer = this.wsServer;
    if (!wsServer) {
      socket.destroy();
      return;
    }

    wsServer.handleUpgrade(request, socket, head, (clientSocket) => {
      this.logger.debug(`[${requestId}] Telemetry subscriber connected`);
      wsServer.emit("connection", clientSocket, request);
    });
  }

  private broadcast(frame: StatusFrame): void {
    if (!this.wsServer) {
      return;
    }

    const payload = JSON.stringify(frame);
    this.wsServer.clients.forEach((socket) => {
      if (socket.readyState === WebSocket.OPEN) {
        socket.send(payload);
      }
    });
  }

  private parseUrl(request: IncomingMessage): URL {
    const host = request.headers.host ?? `${this.config.statusBindHost}:${this.config.statusPort}`;
    return new URL(request.url ?? "/", `http://${host}`);
  }

  private checkAuth(request: IncomingMessage, parsedUrl: URL): AuthFailure | null {
    const remote = normalizeRemoteHost(request.socket.remoteAddress);

    if (this.config.statusAuthToken) {
      const auth = request.headers.authorization ?? "";
      if (auth === `Bearer ${this.config.statusAuthToken}`) {
        return null;
      }

      // WebSocket clients in browsers cannot set headers on the handshake.
      const tokenQuery = parsedUrl.searchParams.get("token") ?? "";
      if (tokenQuery && tokenQuery === this.config.statusAuthToken) {
        return null;
      }

      return {
        reason: "missing-or-invalid-token",
        payload: {
          error: "UNAUTHORIZED",
          message: "Missing or invalid bearer token.",
        },
      };
    }

    if (!isLoopbackHost(remote)) {
      return {
        reason: "token-disabled-non-loopback-request",
        payload: {
          error: "UNAUTHORIZED",
          message: "Status token is disabled and request is not from localhost.",
        },
      };
    }

    return null;
  }

  private logAuthFailure(requestId: string, request: IncomingMessage, parsedUrl: URL, reason: string): void {
    const remoteHost = normalizeRemoteHost(request.socket.remoteAddress);
    const method = request.method ?? "GET";
    this.logger.warn(`[${requestId}] Auth denied (${reason}) ${method} ${parsedUrl.pathname} remote=${remoteHost}`);
  }

  private async readJsonBody(request: IncomingMessage): Promise<unknown> {
    const chunks: Buffer[] = [];
    let totalBytes = 0;

    for await (const chunk of request) {
      const piece = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
      totalBytes += piece.length;

      if (totalBytes > MAX_JSON_BODY_BYTES) {
        throw new StatusApiError(413, "PAYLOAD_TOO_LARGE", "JSON payload exceeded limit.");
      }

      chunks.push(piece);
    }

    if (chunks.length === 0) {
      return {};
    }

    try {
      const parsed: unknown = JSON.parse(Buffer.concat(chunks).toString("utf8"));
      return parsed;
    } catch (error) {
      throw new StatusApiError(400, "INVALID_INPUT", `Invalid JSON payload: ${describeError(error)}`);
    }
  }

  private writeJson(response: ServerResponse, statusCode: number, payload: unknown): void {
    response.statusCode = statusCode;
    response.setHeader("content-type", "application/json; charset=utf-8");
    response.end(JSON.stringify(payload));
  }

  private nextRequestId(): string {
    this.requestSeq += 1;
    return `status-${this.requestSeq}`;
  }
}

function parsePayload<I, T>(parse: (value: I) => T, value: I): T {
  try {
    return parse(value);
  } catch (error) {
    throw new StatusApiError(400, "INVALID_INPUT", describeError(error));
  }
}

function parseLimit(raw: string | null): number {
  const value = raw === null ? Number.NaN : Number(raw);
  if (!Number.isFinite(value)) {
    return DEFAULT_EVENT_LIMIT;
  }
  return Math.min(MAX_EVENT_LIMIT, Math.max(1, Math.floor(value)));
}

/**
 * JSON view of a client record. The wire timestamp is a 64-bit nanosecond count and
 * travels as a decimal string.
 */
function toClientView(record: ClientRecord): Omit<ClientRecord, "lastTimestamp"> & { lastTimestamp: string } {
  return { ...record, lastTimestamp: record.lastTimestamp.toString() };
}

function isLoopbackHost(host: string): boolean {
  return host === "127.0.0.1" || host === "::1" || host === "localhost";
}

function notFound(route: string): HostErrorPayload {
  return {
    error: "NOT_FOUND",
    message: `No route for ${route}.`,
  };
}
