export const runtime = "nodejs";
export const dynamic = "force-dynamic";

import { NextRequest } from "next/server";
import { isAuthed, json } from "@/lib/auth";
import { getBmsService } from "@/lib/bms/service";
import { parseControlCommand } from "@/lib/bms/commands";

export async function POST(req: NextRequest) {
  if (!isAuthed(req)) return json({ error: "Unauthorized" }, 401);

  let body: unknown;
  try {
    body = await req.json();
  } catch {
    return json({ error: "Body must be JSON" }, 400);
  }
  const command = parseControlCommand(body);
  if (!command) {
    return json(
      {
        error:
          'Expected {"action":"relay","relay":"charge"|"discharge","enabled":bool} or {"action":"connection","enabled":bool}',
      },
      400
    );
  }

  const svc = getBmsService();
  if (!svc) return json({ error: "BMS address (ADDR) not configured" }, 503);
  svc.ensureStarted();

  if (command.action === "relay") {
    await svc.setRelayState(command.relay, command.enabled);
  } else {
    await svc.setConnectionEnabled(command.enabled);
  }

  const status = svc.getStatus();
  return json({
    ok: true,
    command,
    connectionEnabled: status.connectionEnabled,
    reading: status.lastReading,
  });
}
