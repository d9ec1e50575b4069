import type { NextRequest } from "next/server";

// DASH_PASS unset means every request is rejected.
export function isAuthed(req: NextRequest) {
  const expected = process.env.DASH_PASS;
  const pass = req.nextUrl.searchParams.get("pass") || req.headers.get("x-pass");
  return !!expected && pass === expected;
}

export function json(body: unknown, status = 200) {
  return new Response(JSON.stringify(body), {
    status,
    headers: {
      "Content-Type": "application/json",
      "Access-Control-Allow-Origin": "*",
    },
  });
}
