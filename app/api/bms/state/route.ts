export const runtime = "nodejs";
export const dynamic = "force-dynamic";

import { NextRequest } from "next/server";
import { isAuthed, json } from "@/lib/auth";
import { METRICS, collectMetrics, formatMetric } from "@/lib/bms/metrics";
import { offlineReading } from "@/lib/bms/policy";
import { getBmsService } from "@/lib/bms/service";

export async function GET(req: NextRequest) {
  if (!isAuthed(req)) return json({ error: "Unauthorized" }, 401);

  const svc = getBmsService();
  if (!svc) return json({ error: "BMS address (ADDR) not configured" }, 503);
  svc.ensureStarted();

  const status = svc.getStatus();
  // before the first cycle completes, report the offline shape
  const reading = status.lastReading ?? offlineReading();
  const metrics = collectMetrics(reading);
  const display = Object.fromEntries(METRICS.map((m) => [m.key, formatMetric(m, metrics[m.key])]));

  return json({
    ts: new Date().toISOString(),
    device: status.device,
    connected: status.connected,
    connectionEnabled: status.connectionEnabled,
    missedUpdates: status.missedUpdates,
    lastUpdate: status.lastUpdate,
    reading,
    metrics,
    display,
  });
}
