export const runtime = "nodejs";
export const dynamic = "force-dynamic";

import { NextRequest } from "next/server";
import { isAuthed, json } from "@/lib/auth";
import { getBmsService, type BmsEvent } from "@/lib/bms/service";

const KEEPALIVE_MS = 15000;

export async function GET(req: NextRequest) {
  if (!isAuthed(req)) return json({ error: "Unauthorized" }, 401);

  const svc = getBmsService();
  if (!svc) return json({ error: "BMS address (ADDR) not configured" }, 503);
  svc.ensureStarted();

  const encoder = new TextEncoder();
  let teardown: (() => boolean) | null = null;

  const stream = new ReadableStream<Uint8Array>({
    start(controller) {
      const send = (text: string) => controller.enqueue(encoder.encode(text));
      const write = (evt: BmsEvent) => send(`data: ${JSON.stringify(evt)}\n\n`);

      write({ ts: new Date().toISOString(), event: "hello" });
      write({
        ts: new Date().toISOString(),
        event: "connection",
        enabled: svc.session.connectionEnabled,
      });

      // seed with the last known reading
      const reading = svc.getLastReading();
      if (reading) {
        write({
          ts: new Date().toISOString(),
          event: "state",
          reading,
          missedUpdates: svc.session.missedUpdates,
        });
      }

      // keepalive pings (some proxies need no-transform to avoid buffering)
      const ping = setInterval(() => send(`: keepalive\n\n`), KEEPALIVE_MS);

      svc.on("evt", write);

      let closed = false;
      // true only for the first caller
      teardown = () => {
        if (closed) return false;
        closed = true;
        clearInterval(ping);
        svc.off("evt", write);
        return true;
      };

      req.signal.addEventListener("abort", () => {
        // a cancelled stream is already closed
        if (teardown?.()) controller.close();
      });
    },
    cancel() {
      teardown?.();
    },
  });

  return new Response(stream, {
    headers: {
      "Content-Type": "text/event-stream",
      "Cache-Control": "no-cache, no-transform",
      Connection: "keep-alive",
      "Access-Control-Allow-Origin": "*",
      "X-Accel-Buffering": "no",
    },
  });
}
