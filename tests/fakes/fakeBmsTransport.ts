import { OPCODES } from "@/lib/bms/constants";
import type {
  BleCharacteristic,
  BleConnection,
  BleDevice,
  BleTransport,
} from "@/lib/bms/transport";
import { statusFrame } from "./frames";

type CharSpec = { serviceUuid: string; uuid: string; properties: string[] };

export const DEFAULT_CHARS: CharSpec[] = [
  { serviceUuid: "180a", uuid: "2a29", properties: ["read"] },
  { serviceUuid: "ffe0", uuid: "ffe1", properties: ["notify", "write", "writeWithoutResponse"] },
  { serviceUuid: "ffe0", uuid: "ffe2", properties: ["write", "writeWithoutResponse"] },
];

export type Write = { uuid: string; data: Buffer; withoutResponse: boolean };

class FakeCharacteristic implements BleCharacteristic {
  readonly serviceUuid: string;
  readonly uuid: string;
  readonly properties: string[];
  listeners: ((data: Buffer) => void)[] = [];

  constructor(def: CharSpec, private readonly bms: FakeBms) {
    this.serviceUuid = def.serviceUuid;
    this.uuid = def.uuid;
    this.properties = def.properties;
  }

  async subscribe(onData: (data: Buffer) => void) {
    this.listeners.push(onData);
  }

  async write(data: Buffer, withoutResponse: boolean) {
    this.bms.handleWrite({ uuid: this.uuid, data: Buffer.from(data), withoutResponse });
  }
}

class FakeConnection implements BleConnection {
  connected = true;
  private disconnectFns: (() => void)[] = [];

  constructor(private readonly bms: FakeBms) {}

  async discoverCharacteristics() {
    return this.bms.chars;
  }

  onDisconnect(fn: () => void) {
    this.disconnectFns.push(fn);
  }

  async disconnect() {
    this.bms.disconnects += 1;
    this.connected = false;
    if (this.bms.failNextDisconnect) {
      this.bms.failNextDisconnect = false;
      throw new Error("disconnect failed");
    }
  }

  // peripheral dropped the link on its own
  drop() {
    this.connected = false;
    this.disconnectFns.forEach((fn) => fn());
  }
}

/*
  In-process stand-in for a BMS behind a BLE stack.
  Answers every status query with `response`, split into fragments at
  `splitAt`; failure switches are consumed in order.
*/
export class FakeBms implements BleTransport {
  reachable = true;
  failConnects = 0;
  failNextWrite = false;
  failNextDisconnect = false;
  silent = false;
  response: Buffer = statusFrame();
  splitAt: number[] = [40];
  connectDelayMs = 0;
  // the next N connects hang; like noble, the next connect that succeeds
  // settles them all with its own connection
  hangConnects = 0;

  chars: FakeCharacteristic[];
  connects = 0;
  disconnects = 0;
  cancels = 0;
  writes: Write[] = [];
  connections: FakeConnection[] = [];
  private hung: ((conn: FakeConnection) => void)[] = [];

  constructor(readonly address = "aa:bb:cc:dd:ee:ff", chars: CharSpec[] = DEFAULT_CHARS) {
    this.chars = chars.map((c) => new FakeCharacteristic(c, this));
  }

  get lastConnection() {
    return this.connections[this.connections.length - 1];
  }

  async resolveDevice(address: string): Promise<BleDevice | null> {
    if (!this.reachable || address.toLowerCase() !== this.address) return null;
    return {
      address: this.address,
      name: "Test BMS",
      connect: () => this.connect(),
      cancelConnect: () => {
        this.cancels += 1;
      },
    };
  }

  // settles hung connects with a connection of their own
  releaseHung() {
    const conn = new FakeConnection(this);
    this.connections.push(conn);
    this.hung.splice(0).forEach((resolve) => resolve(conn));
    return conn;
  }

  private async connect(): Promise<BleConnection> {
    this.connects += 1;
    if (this.hangConnects > 0) {
      this.hangConnects -= 1;
      return new Promise<FakeConnection>((resolve) => this.hung.push(resolve));
    }
    if (this.connectDelayMs > 0) {
      await new Promise((r) => setTimeout(r, this.connectDelayMs));
    }
    if (this.failConnects > 0) {
      this.failConnects -= 1;
      throw new Error("connect failed");
    }
    const conn = new FakeConnection(this);
    this.connections.push(conn);
    this.hung.splice(0).forEach((resolve) => resolve(conn));
    return conn;
  }

  // pushes raw bytes to every subscriber of the notify characteristic
  notify(data: Buffer) {
    for (const c of this.chars) c.listeners.forEach((fn) => fn(data));
  }

  handleWrite(w: Write) {
    if (this.failNextWrite) {
      this.failNextWrite = false;
      throw new Error("write failed");
    }
    this.writes.push(w);
    if (w.data[4] !== OPCODES.QUERY_STATUS || this.silent) return;

    const cuts = [0, ...this.splitAt, this.response.length];
    const fragments = cuts.slice(1).map((end, i) => this.response.subarray(cuts[i], end));
    setTimeout(() => fragments.forEach((f) => this.notify(Buffer.from(f))), 0);
  }

  opcodes() {
    return this.writes.map((w) => w.data[4]);
  }
}
