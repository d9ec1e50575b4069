import { describe, expect, it } from "vitest";

import { decodeStatus } from "@/lib/bms/litime";
import { METRICS, collectMetrics, formatMetric, remainingTimeHours } from "@/lib/bms/metrics";
import { offlineReading } from "@/lib/bms/policy";
import { statusFrame } from "./fakes/frames";

const metric = (key: string) => {
  const m = METRICS.find((x) => x.key === key);
  if (!m) throw new Error(`no metric ${key}`);
  return m;
};

describe("remainingTimeHours", () => {
  it("divides remaining capacity by the discharge current", () => {
    expect(remainingTimeHours(decodeStatus(statusFrame()))).toBe(8);
    expect(remainingTimeHours(decodeStatus(statusFrame({ current_mA: -3000 })))).toBe(26.67);
  });

  it("is null while charging, idle or offline", () => {
    expect(remainingTimeHours(decodeStatus(statusFrame({ current_mA: 5000 })))).toBeNull();
    expect(remainingTimeHours(decodeStatus(statusFrame({ current_mA: 0 })))).toBeNull();
    expect(remainingTimeHours(offlineReading())).toBeNull();
  });
});

describe("collectMetrics", () => {
  it("has one entry per metric with unique keys", () => {
    const keys = METRICS.map((m) => m.key);
    expect(new Set(keys).size).toBe(keys.length);
    expect(keys).toContain("cell_voltage_16");
    expect(Object.keys(collectMetrics(offlineReading()))).toEqual(keys);
  });

  it("extracts values from a live reading", () => {
    const values = collectMetrics(decodeStatus(statusFrame()));

    expect(values.total_voltage).toBe(52.3);
    expect(values.state_of_charge).toBe(80);
    expect(values.delta_cell_voltage).toBe(0.01);
    expect(values.protection_status).toBe("OK");
    expect(values.charging_switch).toBe(true);
    expect(values.cell_voltage_1).toBe(3.27);
    expect(values.cell_voltage_5).toBeNull();
    expect(values.online).toBe(true);
  });

  it("leaves only online available for an offline reading", () => {
    const values = collectMetrics(offlineReading());
    const available = Object.entries(values).filter(([, v]) => v !== null);
    expect(available).toEqual([["online", false]]);
  });
});

describe("formatMetric", () => {
  it("renders values with their unit", () => {
    const values = collectMetrics(decodeStatus(statusFrame()));
    const show = (key: string) => formatMetric(metric(key), values[key]);

    expect(show("total_voltage")).toBe("52.3 V");
    expect(show("power")).toBe("-523 W");
    expect(show("state_of_charge")).toBe("80 %");
    expect(show("total_discharge_ah")).toBe("456.79 Ah");
    expect(show("discharge_cycles")).toBe("123");
    expect(show("remaining_time_hours")).toBe("8 h");
    expect(show("charging")).toBe("off");
    expect(show("discharging")).toBe("on");
    expect(show("failure_status")).toBe("OK");
    expect(show("cell_voltage_16")).toBe("—");
  });
});
