import { describe, expect, it } from "vitest";
import { activationForKey } from "../activation/keyboardActivationSource";

describe("activationForKey", () => {
  it("maps keys to activation events", () => {
    expect(activationForKey({ name: "space" })).toBe("activate");
    expect(activationForKey({ name: "return" })).toBe("activate");
    expect(activationForKey({ name: "escape" })).toBe("cancel");
    expect(activationForKey({ name: "q" })).toBe("quit");
    expect(activationForKey({ name: "c", ctrl: true })).toBe("quit");
  });

  it("ignores everything else", () => {
    expect(activationForKey({ name: "c" })).toBeUndefined();
    expect(activationForKey({ name: "x" })).toBeUndefined();
    expect(activationForKey(undefined)).toBeUndefined();
  });
});
