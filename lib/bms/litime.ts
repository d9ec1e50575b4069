/* LiTime BMS status protocol: 8-byte commands, 104-byte little-endian status frames. */

import type { StatusReading } from "../types/bms";
import {
  BATTERY_STATE,
  HEAT_DISCHARGE_DISABLED,
  MAX_CELLS,
  MIN_RESPONSE_LENGTH,
  PROTECTION_FLAGS,
} from "./constants";
import { roundHalfEven } from "../utils/round";
import { FrameTooShortError } from "./errors";

export function buildCommand(opcode: number) {
  const cmd = opcode & 0xff;
  return Buffer.from([0x00, 0x00, 0x04, 0x01, cmd, 0x55, 0xaa, (0x05 + cmd) & 0xff]);
}

export function decodeProtectionFlags(flags: number) {
  if (flags === 0) return "OK";
  const parts = PROTECTION_FLAGS.filter(([bit]) => (flags & bit) !== 0).map(
    ([, label]) => label
  );
  return parts.length ? parts.join(", ") : "OK";
}

export function decodeFailureFlags(flags: number) {
  if (flags === 0) return "OK";
  return `Error: 0x${flags.toString(16).toUpperCase().padStart(8, "0")}`;
}

/* ----------------- Bounds-checked LE reads ----------------- */

type Width = "u16" | "i16" | "u32" | "i32";
const SIZE: Record<Width, number> = { u16: 2, i16: 2, u32: 4, i32: 4 };

function read(data: Buffer, offset: number, width: Width): number {
  if (offset + SIZE[width] > data.length) {
    throw new FrameTooShortError(data.length, offset + SIZE[width]);
  }
  switch (width) {
    case "u16":
      return data.readUInt16LE(offset);
    case "i16":
      return data.readInt16LE(offset);
    case "u32":
      return data.readUInt32LE(offset);
    case "i32":
      return data.readInt32LE(offset);
  }
}

/* ----------------- Decoding ----------------- */

export function decodeStatus(data: Buffer): StatusReading {
  if (data.length < MIN_RESPONSE_LENGTH) {
    throw new FrameTooShortError(data.length, MIN_RESPONSE_LENGTH);
  }

  const voltage_V = read(data, 12, "u32") / 1000;

  // raw 0 = no cell fitted at that index
  const cells_V: (number | null)[] = [];
  for (let i = 0; i < MAX_CELLS; i++) {
    const mv = read(data, 16 + i * 2, "u16");
    cells_V.push(mv === 0 ? null : mv / 1000);
  }
  const present = cells_V.filter((v): v is number => v !== null);
  const cellMin_V = present.length ? Math.min(...present) : null;
  const cellMax_V = present.length ? Math.max(...present) : null;
  const cellDelta_V =
    cellMin_V !== null && cellMax_V !== null
      ? roundHalfEven(cellMax_V - cellMin_V, 3)
      : null;

  const current_A = read(data, 48, "i32") / 1000;
  const heatState = read(data, 68, "u32");
  const batteryState = read(data, 88, "u16");

  return {
    online: true,
    voltage_V,
    current_A,
    power_W: roundHalfEven(voltage_V * current_A, 1),
    soc_pct: read(data, 90, "u16"),
    soh_pct: read(data, 92, "u16"),
    cellTemp_C: read(data, 52, "i16"),
    mosfetTemp_C: read(data, 54, "i16"),
    remainCapacity_Ah: read(data, 62, "u16") / 100,
    fullCapacity_Ah: read(data, 64, "u16") / 100,
    dischargeCycles: read(data, 96, "u32"),
    totalDischarged_Ah: read(data, 100, "u32") / 1000,
    cells_V,
    cellMin_V,
    cellMax_V,
    cellDelta_V,
    charging: batteryState === BATTERY_STATE.CHARGING,
    discharging: batteryState === BATTERY_STATE.DISCHARGING && current_A < 0,
    balancingActive: read(data, 84, "u32") !== 0,
    chargeEnabled: batteryState !== BATTERY_STATE.CHARGE_DISABLED,
    dischargeEnabled: (heatState & HEAT_DISCHARGE_DISABLED) === 0,
    protectionStatus: decodeProtectionFlags(read(data, 76, "u32")),
    failureStatus: decodeFailureFlags(read(data, 80, "u32")),
  };
}
