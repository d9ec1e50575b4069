import type { StatusReading } from "../types/bms";
import { MAX_CELLS } from "./constants";

export function offlineReading(): StatusReading {
  return {
    online: false,
    voltage_V: null,
    current_A: null,
    power_W: null,
    soc_pct: null,
    soh_pct: null,
    cellTemp_C: null,
    mosfetTemp_C: null,
    remainCapacity_Ah: null,
    fullCapacity_Ah: null,
    dischargeCycles: null,
    totalDischarged_Ah: null,
    cells_V: new Array<number | null>(MAX_CELLS).fill(null),
    cellMin_V: null,
    cellMax_V: null,
    cellDelta_V: null,
    charging: null,
    discharging: null,
    balancingActive: null,
    chargeEnabled: null,
    dischargeEnabled: null,
    protectionStatus: null,
    failureStatus: null,
  };
}

/*
  Degraded-state bookkeeping for one session.
  The miss counter is diagnostic only: nothing disables the link automatically,
  only setEnabled(false) does.
*/
export class DegradedStatePolicy {
  private misses = 0;
  private enabled = true;

  get missedUpdates() {
    return this.misses;
  }

  get connectionEnabled() {
    return this.enabled;
  }

  shouldAttempt() {
    return this.enabled;
  }

  recordMiss() {
    this.misses += 1;
    return this.misses;
  }

  recordSuccess() {
    this.misses = 0;
  }

  setEnabled(enabled: boolean) {
    this.enabled = enabled;
    if (enabled) this.misses = 0;
  }
}
