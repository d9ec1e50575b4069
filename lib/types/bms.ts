// Absent values are null (not undefined) so a serialized reading always
// carries the same keys, online or not.
export type StatusReading = {
  online: boolean;
  voltage_V: number | null;
  current_A: number | null;
  power_W: number | null;
  soc_pct: number | null;
  soh_pct: number | null;
  cellTemp_C: number | null;
  mosfetTemp_C: number | null;
  remainCapacity_Ah: number | null;
  fullCapacity_Ah: number | null;
  dischargeCycles: number | null;
  totalDischarged_Ah: number | null;
  cells_V: (number | null)[];
  cellMin_V: number | null;
  cellMax_V: number | null;
  cellDelta_V: number | null;
  charging: boolean | null;
  discharging: boolean | null;
  balancingActive: boolean | null;
  chargeEnabled: boolean | null;
  dischargeEnabled: boolean | null;
  protectionStatus: string | null;
  failureStatus: string | null;
};

export type DeviceEndpoint = {
  readonly address: string;
  readonly name: string;
};

export type RelayKind = "charge" | "discharge";
