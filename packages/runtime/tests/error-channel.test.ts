import { describe, it, expect } from "vitest";
import { ErrorChannel, SOFT_FAILURE, isSoftFailure } from "../src/context/error-channel.js";

describe("ErrorChannel", () => {
  it("starts empty", () => {
    expect(new ErrorChannel().last()).toBeUndefined();
  });

  it("returns the soft-failure marker from set", () => {
    const channel = new ErrorChannel();
    expect(channel.set("boom")).toBe(SOFT_FAILURE);
    expect(isSoftFailure(SOFT_FAILURE)).toBe(true);
    expect(isSoftFailure(null)).toBe(false);
  });

  it("keeps the last message across reads", () => {
    const channel = new ErrorChannel();
    channel.set("first");
    channel.set("second");
    expect(channel.last()).toBe("second");
    expect(channel.last()).toBe("second");
  });
});
