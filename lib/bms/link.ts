// cspell:words FFE1 FFE2
import type { DeviceEndpoint } from "../types/bms";
import { sleep, withTimeout } from "../utils/timeout";
import { UUIDS } from "./constants";
import {
  DeviceUnreachableError,
  NegotiationFailedError,
  TransportFailureError,
  describeError,
} from "./errors";
import { buildCommand } from "./litime";
import {
  isWritable,
  normalizeUuid,
  type BleCharacteristic,
  type BleConnection,
  type BleDevice,
  type BleTransport,
} from "./transport";

export type LinkOptions = {
  connectAttempts?: number;
  connectRetryMs?: number;
  connectTimeoutMs?: number;
  onPacket: (data: Buffer) => void;
  onConnected?: () => void;
};

type LinkHandle = {
  conn: BleConnection;
  writeChar: BleCharacteristic;
  notifyChar: BleCharacteristic;
};

const MAX_RETRY_MS = 30000;

export function selectCharacteristics(chars: BleCharacteristic[]) {
  let notifyChar: BleCharacteristic | undefined;
  let writeChar: BleCharacteristic | undefined;

  for (const c of chars) {
    if (normalizeUuid(c.serviceUuid) !== UUIDS.SERVICE) continue;
    const uuid = normalizeUuid(c.uuid);
    if (uuid === UUIDS.NOTIFY && c.properties.includes("notify")) notifyChar = c;
    if (!isWritable(c)) continue;
    // FFE2 wins over a writable FFE1 whatever the discovery order
    if (uuid === UUIDS.WRITE) writeChar = c;
    else if (uuid === UUIDS.NOTIFY && !writeChar) writeChar = c;
  }
  return { notifyChar, writeChar };
}

export class LinkManager {
  private handle: LinkHandle | null = null;
  private connecting: Promise<boolean> | null = null;
  private readonly connectAttempts: number;
  private readonly connectRetryMs: number;
  private readonly connectTimeoutMs: number;

  constructor(
    private readonly endpoint: DeviceEndpoint,
    private readonly transport: BleTransport,
    private readonly opts: LinkOptions
  ) {
    this.connectAttempts = Math.max(1, opts.connectAttempts ?? 3);
    this.connectRetryMs = opts.connectRetryMs ?? 1000;
    this.connectTimeoutMs = opts.connectTimeoutMs ?? 15000;
  }

  get isConnected() {
    return !!this.handle && this.handle.conn.connected;
  }

  async ensureConnected(): Promise<boolean> {
    if (this.isConnected) return true;
    // one negotiation at a time; a concurrent caller shares the outcome
    if (!this.connecting) {
      this.connecting = this.negotiate().finally(() => {
        this.connecting = null;
      });
    }
    return this.connecting;
  }

  async send(opcode: number): Promise<void> {
    const handle = this.handle;
    const hex = `0x${opcode.toString(16).padStart(2, "0")}`;
    if (!handle) {
      throw new TransportFailureError(`Cannot send ${hex} to ${this.endpoint.address}: not connected`);
    }
    const frame = buildCommand(opcode);
    const withoutResponse = handle.writeChar.properties.includes("writeWithoutResponse");
    console.debug(
      `BLE: sending ${hex} to ${this.endpoint.address} via ${handle.writeChar.uuid} (${frame.length} bytes, hex=${frame.toString("hex")})`
    );
    try {
      await handle.writeChar.write(frame, withoutResponse);
    } catch (e) {
      console.warn(`BLE: failed to send ${hex} to ${this.endpoint.address}: ${describeError(e)}`);
      throw new TransportFailureError(`Write of ${hex} failed: ${describeError(e)}`, { cause: e });
    }
  }

  async disconnect() {
    const handle = this.handle;
    this.handle = null;
    if (!handle) return;
    try {
      await handle.conn.disconnect();
    } catch (e) {
      // best effort; the handle is gone either way
      console.debug(`BLE: disconnect from ${this.endpoint.address} failed: ${describeError(e)}`);
    }
  }

  private async negotiate(): Promise<boolean> {
    this.handle = null;
    const { address } = this.endpoint;
    let conn: BleConnection | null = null;

    try {
      const device = await this.transport.resolveDevice(address);
      if (!device) {
        console.debug(`BLE: device ${address} not available`);
        return false;
      }

      conn = await this.connectWithRetry(device);
      const chars = await conn.discoverCharacteristics();
      for (const c of chars) {
        console.debug(`BLE:   ${c.serviceUuid}/${c.uuid} properties=${c.properties.join(",")}`);
      }

      const { notifyChar, writeChar } = selectCharacteristics(chars);
      if (!notifyChar || !writeChar) {
        const missing = !notifyChar
          ? `notify characteristic ${UUIDS.NOTIFY} not found`
          : "no writable characteristic found";
        throw new NegotiationFailedError(address, missing);
      }

      await notifyChar.subscribe((data) => this.opts.onPacket(data));
      console.info(`BLE: subscribed to notifications on ${notifyChar.uuid}, writing to ${writeChar.uuid}`);

      const handle: LinkHandle = { conn, writeChar, notifyChar };
      conn.onDisconnect(() => {
        if (this.handle === handle) {
          console.warn(`BLE: ${address} disconnected`);
          this.handle = null;
        }
      });
      this.handle = handle;
      this.opts.onConnected?.();
      console.info(`BLE: connected to ${this.endpoint.name} (${address})`);
      return true;
    } catch (e) {
      console.warn(`BLE: failed to connect to ${address}: ${describeError(e)}`);
      this.handle = null;
      if (conn) await this.closeQuietly(conn);
      return false;
    }
  }

  private async connectWithRetry(device: BleDevice): Promise<BleConnection> {
    let backoffMs = this.connectRetryMs;
    let lastError: unknown;

    // Attempts that time out may still resolve later. Under noble every attempt
    // shares one peripheral, so a late resolution can be the very link a later
    // attempt returned; only strays that differ from the winner get closed.
    let settled = false;
    let winner: BleConnection | null = null;
    const strays: BleConnection[] = [];
    const onLate = (late: BleConnection) => {
      if (!settled) strays.push(late);
      else if (late !== winner) void this.closeQuietly(late);
    };
    const settle = (conn: BleConnection | null) => {
      settled = true;
      winner = conn;
      for (const late of strays.splice(0)) {
        if (late !== conn) void this.closeQuietly(late);
      }
    };

    for (let attempt = 1; attempt <= this.connectAttempts; attempt++) {
      const pending = device.connect();
      try {
        const conn = await withTimeout(pending, this.connectTimeoutMs, "BLE connect timeout");
        settle(conn);
        return conn;
      } catch (e) {
        lastError = e;
        device.cancelConnect();
        void pending.then(onLate, () => undefined);
        console.debug(
          `BLE: connect attempt ${attempt}/${this.connectAttempts} to ${device.address} failed: ${describeError(e)}`
        );
      }
      if (attempt < this.connectAttempts) {
        await sleep(backoffMs);
        backoffMs = Math.min(backoffMs * 2, MAX_RETRY_MS);
      }
    }
    settle(null);
    throw new DeviceUnreachableError(device.address, { cause: lastError });
  }

  private async closeQuietly(conn: BleConnection) {
    try {
      await conn.disconnect();
    } catch (e) {
      console.debug(`BLE: teardown of ${this.endpoint.address} failed: ${describeError(e)}`);
    }
  }
}
