export interface ClientConfig {
  readonly targetHost: string;
  readonly port: number;
  readonly updateRateHz: number;
  readonly clientId: number;
  readonly verboseLogs: boolean;
}

export interface ClientStats {
  packetsSent: number;
  sendErrors: number;
  lastSequence: number | null;
  meanIntervalMs: number;
  jitterMs: number;
}
