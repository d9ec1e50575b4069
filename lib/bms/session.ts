import type { DeviceEndpoint, RelayKind, StatusReading } from "../types/bms";
import { OPCODES } from "./constants";
import { ResponseTimeoutError, describeError } from "./errors";
import { LinkManager } from "./link";
import { decodeStatus } from "./litime";
import { DegradedStatePolicy, offlineReading } from "./policy";
import { NotificationReassembler } from "./reassembler";
import type { BleTransport } from "./transport";

export type SessionOptions = {
  responseTimeoutMs?: number;
  connectAttempts?: number;
  connectRetryMs?: number;
  connectTimeoutMs?: number;
  // every reading the session produces, including out-of-band refreshes
  onReading?: (reading: StatusReading) => void;
};

type PendingResponse = {
  promise: Promise<Buffer | null>;
  cancel: () => void;
};

const RELAY_OPCODES: Record<RelayKind, { on: number; off: number }> = {
  charge: { on: OPCODES.CHARGE_ON, off: OPCODES.CHARGE_OFF },
  discharge: { on: OPCODES.DISCHARGE_ON, off: OPCODES.DISCHARGE_OFF },
};

/**
 * One command/response session with a single BMS.
 *
 * Polls, relay commands and re-enabling run one at a time through an internal
 * queue. Disabling and shutdown act immediately: they drop the link, and a
 * cycle still waiting for its response simply times out.
 */
export class BmsSession {
  private readonly link: LinkManager;
  private readonly reassembler: NotificationReassembler;
  private readonly policy = new DegradedStatePolicy();
  private readonly responseTimeoutMs: number;
  private waiter: ((frame: Buffer) => void) | null = null;
  private queue: Promise<void> = Promise.resolve();

  constructor(
    readonly endpoint: DeviceEndpoint,
    transport: BleTransport,
    private readonly opts: SessionOptions = {}
  ) {
    this.responseTimeoutMs = opts.responseTimeoutMs ?? 10000;
    this.reassembler = new NotificationReassembler((frame) => this.handleFrame(frame));
    this.link = new LinkManager(endpoint, transport, {
      connectAttempts: opts.connectAttempts,
      connectRetryMs: opts.connectRetryMs,
      connectTimeoutMs: opts.connectTimeoutMs,
      onPacket: (data) => this.reassembler.push(data),
      onConnected: () => this.policy.recordSuccess(),
    });
  }

  get missedUpdates() {
    return this.policy.missedUpdates;
  }

  get connectionEnabled() {
    return this.policy.connectionEnabled;
  }

  get isConnected() {
    return this.link.isConnected;
  }

  ensureConnected() {
    return this.link.ensureConnected();
  }

  poll(): Promise<StatusReading> {
    return this.exclusive(() => this.runCycle());
  }

  setRelayState(which: RelayKind, enabled: boolean): Promise<void> {
    return this.exclusive(async () => {
      const { address } = this.endpoint;
      console.info(`BMS: setting ${which} ${enabled ? "ON" : "OFF"} on ${address}`);
      if (!this.policy.shouldAttempt()) {
        console.warn(`BMS: cannot set ${which}, connection to ${address} is disabled`);
        return;
      }
      if (!(await this.link.ensureConnected())) {
        console.warn(`BMS: cannot set ${which}, ${address} not connected`);
        return;
      }
      const opcode = enabled ? RELAY_OPCODES[which].on : RELAY_OPCODES[which].off;
      try {
        await this.link.send(opcode);
      } catch (e) {
        console.warn(`BMS: ${which} command to ${address} failed: ${describeError(e)}`);
        await this.link.disconnect();
        return;
      }
      await this.runCycle();
    });
  }

  async setConnectionEnabled(enabled: boolean): Promise<void> {
    const { address } = this.endpoint;
    if (!enabled) {
      console.info(`BMS: connection disabled for ${address}, disconnecting`);
      this.policy.setEnabled(false);
      this.reassembler.reset();
      await this.link.disconnect();
      this.publish(offlineReading());
      return;
    }
    console.info(`BMS: connection enabled for ${address}, reconnecting`);
    this.policy.setEnabled(true);
    await this.exclusive(async () => {
      await this.runCycle();
    });
  }

  async shutdown() {
    this.reassembler.reset();
    await this.link.disconnect();
  }

  private async runCycle(): Promise<StatusReading> {
    const reading = await this.cycle();
    this.publish(reading);
    return reading;
  }

  private async cycle(): Promise<StatusReading> {
    const { address } = this.endpoint;
    if (!this.policy.shouldAttempt()) return offlineReading();

    if (!(await this.link.ensureConnected())) {
      const missed = this.policy.recordMiss();
      console.debug(`BMS: cannot connect to ${address} (missed ${missed})`);
      return offlineReading();
    }
    // disabled while we were negotiating
    if (!this.policy.shouldAttempt()) {
      await this.link.disconnect();
      return offlineReading();
    }

    this.reassembler.reset();
    const response = this.expectResponse(this.responseTimeoutMs);
    try {
      await this.link.send(OPCODES.QUERY_STATUS);
    } catch (e) {
      response.cancel();
      console.warn(`BMS: failed to send query to ${address}: ${describeError(e)}`);
      this.policy.recordMiss();
      await this.link.disconnect();
      return offlineReading();
    }

    const frame = await response.promise;
    if (!frame) {
      // link stays up for the next cycle
      const err = new ResponseTimeoutError(address, this.responseTimeoutMs, this.reassembler.buffered);
      console.warn(`BMS: ${err.message}`);
      this.reassembler.reset();
      this.policy.recordMiss();
      return offlineReading();
    }
    if (!this.policy.shouldAttempt()) return offlineReading();

    try {
      const reading = decodeStatus(frame);
      this.policy.recordSuccess();
      return reading;
    } catch (e) {
      console.warn(`BMS: failed to parse ${frame.length}-byte response from ${address}: ${describeError(e)}`);
      this.policy.recordMiss();
      return offlineReading();
    }
  }

  private expectResponse(timeoutMs: number): PendingResponse {
    let timer: NodeJS.Timeout | undefined;
    let settled = false;
    let settle: (frame: Buffer | null) => void = () => undefined;

    const promise = new Promise<Buffer | null>((resolve) => {
      settle = (frame) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        this.waiter = null;
        resolve(frame);
      };
      timer = setTimeout(() => settle(null), timeoutMs);
    });

    this.waiter = (frame) => settle(frame);
    return { promise, cancel: () => settle(null) };
  }

  private handleFrame(frame: Buffer) {
    console.debug(`BLE: complete response from ${this.endpoint.address}: ${frame.length} bytes`);
    if (this.waiter) {
      this.waiter(frame);
      return;
    }
    console.debug(`BMS: dropping unsolicited ${frame.length}-byte frame`);
  }

  private publish(reading: StatusReading) {
    try {
      this.opts.onReading?.(reading);
    } catch (e) {
      console.warn(`BMS: reading listener failed: ${describeError(e)}`);
    }
  }

  private exclusive<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.queue.then(fn);
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}
