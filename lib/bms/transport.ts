// Transport seam between the link manager and a BLE stack.
// Property names follow noble: "read", "write", "writeWithoutResponse", "notify", "indicate".

export interface BleCharacteristic {
  serviceUuid: string;
  uuid: string;
  properties: string[];
  subscribe: (onData: (data: Buffer) => void) => Promise<void>;
  write: (data: Buffer, withoutResponse: boolean) => Promise<void>;
}

export interface BleConnection {
  readonly connected: boolean;
  discoverCharacteristics: () => Promise<BleCharacteristic[]>;
  onDisconnect: (fn: () => void) => void;
  disconnect: () => Promise<void>;
}

export interface BleDevice {
  address: string;
  name: string;
  // throws when the link cannot be established
  connect: () => Promise<BleConnection>;
  // abandons a connect still in progress; no-op when none is
  cancelConnect: () => void;
}

export interface BleTransport {
  // null when the address is not currently resolvable (out of range, not advertising)
  resolveDevice: (address: string) => Promise<BleDevice | null>;
}

// Collapses "0000ffe1-0000-1000-8000-00805f9b34fb", "0000FFE1...", "FFE1" to "ffe1".
const BASE_SUFFIX = "00001000800000805f9b34fb";

export function normalizeUuid(u: string) {
  const h = u.replace(/-/g, "").toLowerCase();
  if (h.length === 32 && h.startsWith("0000") && h.endsWith(BASE_SUFFIX)) {
    return h.slice(4, 8);
  }
  return h;
}

export function isWritable(c: Pick<BleCharacteristic, "properties">) {
  return c.properties.includes("write") || c.properties.includes("writeWithoutResponse");
}
