import type { RelayKind } from "../types/bms";

export type ControlCommand =
  | { action: "relay"; relay: RelayKind; enabled: boolean }
  | { action: "connection"; enabled: boolean };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function parseControlCommand(body: unknown): ControlCommand | null {
  if (!isRecord(body) || typeof body.enabled !== "boolean") return null;
  if (body.action === "connection") {
    return { action: "connection", enabled: body.enabled };
  }
  if (body.action === "relay" && (body.relay === "charge" || body.relay === "discharge")) {
    return { action: "relay", relay: body.relay, enabled: body.enabled };
  }
  return null;
}
