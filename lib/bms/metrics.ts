import type { StatusReading } from "../types/bms";
import { fmt } from "../utils/fmt";
import { roundHalfEven } from "../utils/round";
import { MAX_CELLS } from "./constants";

export type MetricValue = number | boolean | string | null;

export type MetricKind = "sensor" | "binary" | "switch";

export type Metric = {
  key: string;
  kind: MetricKind;
  unit?: string;
  digits?: number;
  extract: (r: StatusReading) => MetricValue;
};

export function remainingTimeHours(r: StatusReading) {
  if (r.remainCapacity_Ah === null || r.current_A === null || r.current_A >= 0) return null;
  return roundHalfEven(r.remainCapacity_Ah / -r.current_A, 2);
}

const cellMetrics: Metric[] = Array.from({ length: MAX_CELLS }, (_, i): Metric => ({
  key: `cell_voltage_${i + 1}`,
  kind: "sensor",
  unit: "V",
  digits: 3,
  extract: (r) => r.cells_V[i] ?? null,
}));

export const METRICS: readonly Metric[] = [
  { key: "total_voltage", kind: "sensor", unit: "V", digits: 3, extract: (r) => r.voltage_V },
  { key: "current", kind: "sensor", unit: "A", digits: 2, extract: (r) => r.current_A },
  { key: "power", kind: "sensor", unit: "W", digits: 1, extract: (r) => r.power_W },
  { key: "state_of_charge", kind: "sensor", unit: "%", extract: (r) => r.soc_pct },
  { key: "state_of_health", kind: "sensor", unit: "%", extract: (r) => r.soh_pct },
  { key: "cell_temperature", kind: "sensor", unit: "°C", digits: 0, extract: (r) => r.cellTemp_C },
  { key: "mosfet_temperature", kind: "sensor", unit: "°C", digits: 0, extract: (r) => r.mosfetTemp_C },
  { key: "remaining_capacity", kind: "sensor", unit: "Ah", extract: (r) => r.remainCapacity_Ah },
  { key: "full_charge_capacity", kind: "sensor", unit: "Ah", extract: (r) => r.fullCapacity_Ah },
  { key: "discharge_cycles", kind: "sensor", digits: 0, extract: (r) => r.dischargeCycles },
  { key: "total_discharge_ah", kind: "sensor", unit: "Ah", extract: (r) => r.totalDischarged_Ah },
  { key: "min_cell_voltage", kind: "sensor", unit: "V", digits: 3, extract: (r) => r.cellMin_V },
  { key: "max_cell_voltage", kind: "sensor", unit: "V", digits: 3, extract: (r) => r.cellMax_V },
  { key: "delta_cell_voltage", kind: "sensor", unit: "V", digits: 3, extract: (r) => r.cellDelta_V },
  { key: "remaining_time_hours", kind: "sensor", unit: "h", digits: 2, extract: remainingTimeHours },
  { key: "protection_status", kind: "sensor", extract: (r) => r.protectionStatus },
  { key: "failure_status", kind: "sensor", extract: (r) => r.failureStatus },
  { key: "charging", kind: "binary", extract: (r) => r.charging },
  { key: "discharging", kind: "binary", extract: (r) => r.discharging },
  { key: "balancing", kind: "binary", extract: (r) => r.balancingActive },
  { key: "online", kind: "binary", extract: (r) => r.online },
  { key: "charging_switch", kind: "switch", extract: (r) => r.chargeEnabled },
  { key: "discharging_switch", kind: "switch", extract: (r) => r.dischargeEnabled },
  ...cellMetrics,
];

// Offline readings make every metric but `online` unavailable.
export function collectMetrics(reading: StatusReading): Record<string, MetricValue> {
  const out: Record<string, MetricValue> = {};
  for (const m of METRICS) {
    out[m.key] = reading.online || m.key === "online" ? m.extract(reading) : null;
  }
  return out;
}

export function formatMetric(m: Metric, value: MetricValue) {
  if (value === null) return fmt(null);
  if (typeof value === "boolean") return value ? "on" : "off";
  if (typeof value === "string") return value;
  return fmt(value, m.unit, m.digits ?? 2);
}
