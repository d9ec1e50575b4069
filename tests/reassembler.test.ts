import { describe, expect, it, vi } from "vitest";

import { NotificationReassembler } from "@/lib/bms/reassembler";
import { statusFrame } from "./fakes/frames";

vi.spyOn(console, "debug").mockImplementation(() => undefined);

const setup = () => {
  const frames: Buffer[] = [];
  const r = new NotificationReassembler((f) => frames.push(f));
  return { r, frames };
};

describe("NotificationReassembler", () => {
  it("joins a response split across two notifications", () => {
    const { r, frames } = setup();
    const first = statusFrame();

    r.push(first.subarray(0, 40));
    expect(frames).toHaveLength(0);
    expect(r.isAccumulating).toBe(true);
    expect(r.buffered).toBe(40);

    r.push(first.subarray(40, 104));
    expect(frames).toHaveLength(1);
    expect(frames[0].equals(first)).toBe(true);
    expect(r.isAccumulating).toBe(false);
    expect(r.buffered).toBe(0);
  });

  it("discards an unrelated packet once the frame is complete", () => {
    const { r, frames } = setup();
    r.push(statusFrame());
    r.push(Buffer.from([0x01, 0x02, 0x03, 0x04]));

    expect(frames).toHaveLength(1);
    expect(r.isAccumulating).toBe(false);
    expect(r.buffered).toBe(0);
  });

  it("ignores continuation fragments while idle", () => {
    const { r, frames } = setup();
    r.push(statusFrame().subarray(40));

    expect(frames).toHaveLength(0);
    expect(r.buffered).toBe(0);
  });

  it("restarts on a new marker packet and drops the partial frame", () => {
    const { r, frames } = setup();
    r.push(statusFrame({ soc: 10 }).subarray(0, 30));

    const second = statusFrame({ soc: 90 });
    r.push(second);

    expect(frames).toHaveLength(1);
    expect(frames[0].equals(second)).toBe(true);
  });

  it("emits everything buffered when the last fragment overshoots", () => {
    const { r, frames } = setup();
    const long = statusFrame({}, 120);
    r.push(long.subarray(0, 40));
    r.push(long.subarray(40));

    expect(frames[0]).toHaveLength(120);
  });

  it("reset drops a partial frame", () => {
    const { r, frames } = setup();
    const frame = statusFrame();
    r.push(frame.subarray(0, 40));
    r.reset();
    r.push(frame.subarray(40));

    expect(frames).toHaveLength(0);
    expect(r.isAccumulating).toBe(false);
  });

  it("treats packets too short to carry the marker as continuations", () => {
    const { r, frames } = setup();
    r.push(Buffer.from([0x00, 0x65]));
    expect(r.isAccumulating).toBe(false);
    expect(frames).toHaveLength(0);
  });
});
