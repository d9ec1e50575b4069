import { describe, expect, it } from "vitest";

import { parseControlCommand } from "@/lib/bms/commands";

describe("parseControlCommand", () => {
  it("accepts relay commands", () => {
    expect(parseControlCommand({ action: "relay", relay: "discharge", enabled: false })).toEqual({
      action: "relay",
      relay: "discharge",
      enabled: false,
    });
  });

  it("accepts connection commands and drops extra fields", () => {
    expect(parseControlCommand({ action: "connection", enabled: true, relay: "charge" })).toEqual({
      action: "connection",
      enabled: true,
    });
  });

  it("rejects anything else", () => {
    expect(parseControlCommand(null)).toBeNull();
    expect(parseControlCommand([])).toBeNull();
    expect(parseControlCommand({ action: "relay", relay: "heater", enabled: true })).toBeNull();
    expect(parseControlCommand({ action: "relay", relay: "charge", enabled: "yes" })).toBeNull();
    expect(parseControlCommand({ action: "reboot", enabled: true })).toBeNull();
  });
});
