// cspell:words FFE0 FFE1 FFE2
// LiTime LiFePO4 BMS, BLE UART profile on service FFE0.

export const UUIDS = {
  SERVICE: "ffe0",
  NOTIFY: "ffe1", // notify, sometimes also writable
  WRITE: "ffe2", // preferred write target
};

export const OPCODES = {
  QUERY_STATUS: 0x13,
  CHARGE_OFF: 0x0a,
  CHARGE_ON: 0x0b,
  DISCHARGE_OFF: 0x0c,
  DISCHARGE_ON: 0x0d,
} as const;

export const MIN_RESPONSE_LENGTH = 104;
export const MAX_CELLS = 16;

// byte[2] of the first fragment of every status response
export const RESPONSE_MARKER_OFFSET = 2;
export const RESPONSE_MARKER_VALUE = 0x65;

export const BATTERY_STATE = {
  CHARGING: 0x0001,
  DISCHARGING: 0x0002,
  CHARGE_DISABLED: 0x0004,
} as const;

export const HEAT_DISCHARGE_DISABLED = 0x00000080;

export const PROTECTION_FLAGS: ReadonlyArray<[bit: number, label: string]> = [
  [0x00000004, "Cell overvoltage"],
  [0x00000008, "Pack overvoltage"],
  [0x00000020, "Cell undervoltage"],
  [0x00000040, "Charge overcurrent"],
  [0x00000080, "Discharge overcurrent"],
  [0x00000100, "Charge over-temperature"],
  [0x00000200, "Discharge over-temperature"],
  [0x00000400, "Charge under-temperature"],
  [0x00000800, "Discharge under-temperature"],
  [0x00004000, "Short circuit"],
];
