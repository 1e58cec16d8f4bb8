import { describe, it, expect } from "vitest";
import { RecordingTransport, testContext, testServices } from "./helpers.js";

describe("ExecutionContext", () => {
  it("gives each context its own error slot and store", () => {
    const services = testServices();
    const first = testContext(services);
    const second = testContext(services);

    first.fail("first failed");
    first.store.openSession();

    expect(first.id).not.toBe(second.id);
    expect(second.errors.last()).toBeUndefined();
    expect(second.store.sessionCount).toBe(0);
  });

  it("opens sessions with the configured defaults", () => {
    const ctx = testContext(testServices());
    const session = ctx.store.getSession(ctx.store.openSession());

    expect(session?.userAgent).toBe("capbridge/0.1");
    expect(session?.maxRedirects).toBe(5);
    expect(session?.cookies.size).toBe(0);
  });

  it("disposes once", async () => {
    const transport = new RecordingTransport();
    const ctx = testContext(testServices({ transport }));
    ctx.store.openSession();

    await ctx.dispose();
    await ctx.dispose();

    expect(ctx.isDisposed).toBe(true);
    expect(transport.released).toHaveLength(1);
  });
});
