// cspell:words Uart abandonware
// BLE transport over @abandonware/noble.
// Lazy-load noble so nothing native is touched until a link is first attempted.

import type { Characteristic, Peripheral } from "@abandonware/noble";
import { withTimeout } from "../utils/timeout";
import type { BleCharacteristic, BleConnection, BleDevice, BleTransport } from "./transport";

type Noble = typeof import("@abandonware/noble");

let nobleMod: Noble | null = null;
async function getNoble(): Promise<Noble> {
  if (nobleMod) return nobleMod;
  // CJS module: the instance sits on `default` when loaded from ESM
  const m: Noble & { default?: Noble } = await import("@abandonware/noble");
  nobleMod = m.default ?? m;
  return nobleMod;
}

const POWER_ON_TIMEOUT_MS = 10000;

async function waitForPoweredOn(noble: Noble) {
  if (noble.state === "poweredOn") return;
  const ready = new Promise<void>((resolve, reject) => {
    const onState = (state: string) => {
      if (state === "poweredOn") {
        noble.removeListener("stateChange", onState);
        resolve();
      } else if (state === "unauthorized" || state === "unsupported") {
        noble.removeListener("stateChange", onState);
        reject(new Error(`Bluetooth state: ${state}`));
      }
    };
    noble.on("stateChange", onState);
  });
  await withTimeout(ready, POWER_ON_TIMEOUT_MS, "Bluetooth adapter did not power on");
}

function wrapCharacteristic(serviceUuid: string, c: Characteristic): BleCharacteristic {
  return {
    serviceUuid,
    uuid: c.uuid,
    properties: c.properties,
    subscribe: async (onData) => {
      c.on("data", (data: Buffer) => onData(data));
      await c.subscribeAsync();
    },
    write: (data, withoutResponse) => c.writeAsync(data, withoutResponse),
  };
}

function wrapPeripheral(periph: Peripheral): BleConnection {
  return {
    get connected() {
      return periph.state === "connected";
    },
    discoverCharacteristics: async () => {
      const { services } = await periph.discoverAllServicesAndCharacteristicsAsync();
      return services.flatMap((s) =>
        (s.characteristics ?? []).map((c) => wrapCharacteristic(s.uuid, c))
      );
    },
    onDisconnect: (fn) => {
      periph.once("disconnect", () => fn());
    },
    disconnect: () => periph.disconnectAsync(),
  };
}

// Every connectAsync on a peripheral settles on the same "connect" event, so
// all attempts hand back one wrapper and callers can tell them apart by identity.
const connections = new WeakMap<Peripheral, BleConnection>();

function connectionFor(periph: Peripheral) {
  let conn = connections.get(periph);
  if (!conn) {
    conn = wrapPeripheral(periph);
    connections.set(periph, conn);
  }
  return conn;
}

function toDevice(periph: Peripheral): BleDevice {
  return {
    address: periph.address,
    name: periph.advertisement?.localName || "",
    connect: async () => {
      await periph.connectAsync();
      return connectionFor(periph);
    },
    cancelConnect: () => periph.cancelConnect(),
  };
}

/*
  Last advertisement seen per address. A device that has not advertised
  within `freshMs` is treated as gone, so an out-of-range BMS fails to
  resolve instead of burning connect retries.
*/
export class DeviceSightings<T> {
  private readonly seen = new Map<string, { device: T; at: number }>();

  constructor(
    private readonly freshMs: number,
    private readonly now: () => number = Date.now
  ) {}

  record(address: string, device: T) {
    this.seen.set(address.toLowerCase(), { device, at: this.now() });
  }

  fresh(address: string): T | null {
    const hit = this.seen.get(address.toLowerCase());
    if (!hit || this.now() - hit.at > this.freshMs) return null;
    return hit.device;
  }
}

async function scanFor(noble: Noble, addr: string, scanTimeoutMs: number) {
  try {
    return await new Promise<Peripheral | null>((resolve) => {
      const onDiscover = (p: Peripheral) => {
        if ((p.address || "").toLowerCase() !== addr) return;
        clearTimeout(timer);
        noble.removeListener("discover", onDiscover);
        resolve(p);
      };
      const timer = setTimeout(() => {
        noble.removeListener("discover", onDiscover);
        resolve(null);
      }, scanTimeoutMs);
      noble.on("discover", onDiscover);
      noble.startScanningAsync([], true).catch((err: unknown) => {
        console.warn("BLE: failed to start scanning", err);
      });
    });
  } finally {
    try {
      await noble.stopScanningAsync();
    } catch (err) {
      console.debug("BLE: stopScanning failed", err);
    }
  }
}

export function createNobleTransport({
  scanTimeoutMs = 10000,
  freshMs = 60000,
}: { scanTimeoutMs?: number; freshMs?: number } = {}): BleTransport {
  const sightings = new DeviceSightings<Peripheral>(freshMs);
  let listening = false;

  return {
    resolveDevice: async (address) => {
      const addr = address.toLowerCase();
      const recent = sightings.fresh(addr);
      if (recent) return toDevice(recent);

      const noble = await getNoble();
      await waitForPoweredOn(noble);
      if (!listening) {
        // stays registered: every advertisement refreshes its sighting
        noble.on("discover", (p: Peripheral) => sightings.record(p.address || "", p));
        listening = true;
      }

      const periph = await scanFor(noble, addr, scanTimeoutMs);
      if (!periph) {
        console.debug(`BLE: ${addr} not seen within ${scanTimeoutMs} ms`);
        return null;
      }
      sightings.record(addr, periph);
      return toDevice(periph);
    },
  };
}
