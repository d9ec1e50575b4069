// cspell:words Uart
import { EventEmitter } from "events";
import type { DeviceEndpoint, RelayKind, StatusReading } from "../types/bms";
import { createNobleTransport } from "./bleUart";
import { loadBmsConfig, type BmsConfig } from "./config";
import { describeError } from "./errors";
import { BmsSession } from "./session";
import type { BleTransport } from "./transport";

export type BmsEvent =
  | { ts: string; event: "hello" }
  | { ts: string; event: "state"; reading: StatusReading; missedUpdates: number }
  | { ts: string; event: "connection"; enabled: boolean }
  | { ts: string; event: "command"; relay: RelayKind; enabled: boolean }
  | { ts: string; event: "command_error"; message: string };

export type BmsServiceStatus = {
  device: DeviceEndpoint;
  connected: boolean;
  connectionEnabled: boolean;
  missedUpdates: number;
  lastReading: StatusReading | null;
  lastUpdate: string | null;
};

const now = () => new Date().toISOString();

/*
  Fixed-interval poller around one BmsSession.
  A tick that lands while a cycle is still running joins it, so at most one
  query is ever in flight. Every reading the session produces is re-emitted
  as a "state" event.
*/
export class BmsService extends EventEmitter {
  readonly session: BmsSession;
  private pollTimer: NodeJS.Timeout | null = null;
  private cycle: Promise<StatusReading> | null = null;
  private lastReading: StatusReading | null = null;
  private lastUpdate: string | null = null;

  constructor(private readonly config: BmsConfig, transport: BleTransport) {
    super();
    this.session = new BmsSession({ address: config.address, name: config.name }, transport, {
      responseTimeoutMs: config.responseTimeoutMs,
      connectAttempts: config.connectAttempts,
      connectRetryMs: config.connectRetryMs,
      connectTimeoutMs: config.connectTimeoutMs,
      onReading: (reading) => this.onReading(reading),
    });
  }

  get started() {
    return this.pollTimer !== null;
  }

  getLastReading() {
    return this.lastReading;
  }

  getStatus(): BmsServiceStatus {
    return {
      device: this.session.endpoint,
      connected: this.session.isConnected,
      connectionEnabled: this.session.connectionEnabled,
      missedUpdates: this.session.missedUpdates,
      lastReading: this.lastReading,
      lastUpdate: this.lastUpdate,
    };
  }

  ensureStarted() {
    if (this.pollTimer) return;
    console.info(`BMS: polling ${this.config.address} every ${this.config.pollMs} ms`);
    this.pollTimer = setInterval(() => this.tick(), this.config.pollMs);
    // first reading without waiting a full interval
    this.tick();
  }

  pollOnce(): Promise<StatusReading> {
    if (this.cycle) return this.cycle;
    this.cycle = this.session.poll().finally(() => {
      this.cycle = null;
    });
    return this.cycle;
  }

  async setRelayState(relay: RelayKind, enabled: boolean) {
    this.emitEvent({ ts: now(), event: "command", relay, enabled });
    try {
      await this.session.setRelayState(relay, enabled);
    } catch (e) {
      this.emitEvent({ ts: now(), event: "command_error", message: describeError(e) });
    }
  }

  async setConnectionEnabled(enabled: boolean) {
    this.emitEvent({ ts: now(), event: "connection", enabled });
    await this.session.setConnectionEnabled(enabled);
  }

  async stop() {
    if (this.pollTimer) clearInterval(this.pollTimer);
    this.pollTimer = null;
    await this.session.shutdown();
  }

  private tick() {
    this.pollOnce().catch((e) => console.warn(`BMS: poll failed: ${describeError(e)}`));
  }

  private emitEvent(evt: BmsEvent) {
    this.emit("evt", evt);
  }

  private onReading(reading: StatusReading) {
    this.lastReading = reading;
    this.lastUpdate = now();
    this.emitEvent({
      ts: this.lastUpdate,
      event: "state",
      reading,
      missedUpdates: this.session.missedUpdates,
    });
  }
}

type GlobalWithBms = typeof globalThis & { __bmsService?: BmsService };
declare const global: GlobalWithBms;

// null when ADDR is not configured
export function getBmsService(): BmsService | null {
  if (!global.__bmsService) {
    const config = loadBmsConfig();
    if (!config.address) return null;
    global.__bmsService = new BmsService(
      config,
      createNobleTransport({
        scanTimeoutMs: config.scanTimeoutMs,
        freshMs: config.deviceFreshMs,
      })
    );
  }
  return global.__bmsService;
}

export function setBmsService(svc: BmsService | undefined) {
  global.__bmsService = svc;
}
