import { describe, it, expect } from "vitest";
import { newAsyncContext } from "quickjs-emscripten";
import { ArgumentError, ERROR_CODES, NIL, OperationalError, ValueBridge, bool, num, str } from "@capbridge/shared";
import { CapabilityRegistry } from "../src/registry/capability-registry.js";
import { defineAsyncCapability, defineCapability } from "../src/registry/capability.js";
import { silentLogger, testContext, testServices } from "./helpers.js";

function buildRegistry(): CapabilityRegistry {
  return new CapabilityRegistry(silentLogger)
    .register(
      defineCapability({
        name: "flaky",
        description: "fails when asked to",
        params: [{ name: "fail", shape: "boolean" }],
        parse: (args) => args.boolean(0),
        run: (_ctx, fail) => {
          if (fail) {
            throw new OperationalError(ERROR_CODES.TRANSPORT, "boom");
          }
          return str("ok");
        },
      })
    )
    .register(
      defineCapability({
        name: "check",
        description: "boolean capability that fails softly",
        params: [],
        failureValue: bool(false),
        parse: () => undefined,
        run: (ctx) => ctx.fail("check failed"),
      })
    )
    .register(
      defineAsyncCapability({
        name: "later",
        description: "resolves after a tick",
        params: [{ name: "n", shape: "number" }],
        parse: (args) => args.number(0),
        run: async (_ctx, n) => {
          await Promise.resolve();
          return num(n + 1);
        },
      })
    );
}

describe("CapabilityRegistry", () => {
  it("lists names in order", () => {
    expect(buildRegistry().names()).toEqual(["check", "flaky", "later"]);
  });

  it("rejects duplicate registrations", () => {
    const registry = buildRegistry();
    expect(() =>
      registry.register(
        defineCapability({ name: "flaky", description: "", params: [], parse: () => undefined, run: () => NIL })
      )
    ).toThrow("Capability already registered: flaky");
  });

  it("keeps the original failure message after a later success", () => {
    const registry = buildRegistry();
    const ctx = testContext(testServices());

    expect(registry.invokeSync(ctx, "flaky", [bool(true)])).toBe(NIL);
    expect(registry.invokeSync(ctx, "flaky", [bool(false)])).toEqual(str("ok"));
    expect(ctx.errors.last()).toBe("boom");
  });

  it("returns the capability's failure value on soft failure", () => {
    const registry = buildRegistry();
    const ctx = testContext(testServices());

    expect(registry.invokeSync(ctx, "check", [])).toEqual(bool(false));
    expect(ctx.errors.last()).toBe("check failed");
  });

  it("raises programmer errors without touching the error channel", () => {
    const registry = buildRegistry();
    const ctx = testContext(testServices());

    expect(() => registry.invokeSync(ctx, "flaky", [])).toThrow("flaky: expected 1 argument(s), got 0");
    expect(() => registry.invokeSync(ctx, "flaky", [str("x")])).toThrow(
      'flaky: argument 1 (fail): expected boolean, got "x"'
    );
    expect(() => registry.invokeSync(ctx, "nope", [])).toThrow(ArgumentError);
    expect(ctx.errors.last()).toBeUndefined();
  });

  it("refuses to run asynchronous capabilities synchronously", async () => {
    const registry = buildRegistry();
    const ctx = testContext(testServices());

    expect(() => registry.invokeSync(ctx, "later", [num(1)])).toThrow("later: capability is asynchronous");
    await expect(registry.invoke(ctx, "later", [num(1)])).resolves.toEqual(num(2));
  });

  it("rejects unknown names from invoke", async () => {
    const ctx = testContext(testServices());
    await expect(buildRegistry().invoke(ctx, "nope", [])).rejects.toThrow("unknown capability: nope");
  });

  describe("install", () => {
    async function evaluate(code: string): Promise<unknown> {
      const registry = buildRegistry();
      const ctx = testContext(testServices());
      const vm = await newAsyncContext();
      const bridge = new ValueBridge(vm);
      try {
        registry.install(vm, ctx, bridge);
        const result = await vm.evalCodeAsync(code);
        const handle = vm.unwrapResult(result);
        const value: unknown = vm.dump(handle);
        handle.dispose();
        return value;
      } finally {
        bridge.dispose();
        vm.dispose();
      }
    }

    it("exposes sync capabilities as global functions", async () => {
      expect(await evaluate("flaky(false)")).toBe("ok");
      expect(await evaluate("flaky(true)")).toBe(null);
    });

    it("exposes async capabilities as blocking calls", async () => {
      expect(await evaluate("later(41) + 1")).toBe(43);
    });

    it("raises argument errors as TypeError", async () => {
      const code = "try { flaky(1) } catch (e) { `${e.name}: ${e.message}` }";
      expect(await evaluate(code)).toBe("TypeError: flaky: argument 1 (fail): expected boolean, got 1");
    });

    it("raises unconvertible arguments as TypeError", async () => {
      const code = "try { later(() => 1) } catch (e) { `${e.name}: ${e.message}` }";
      expect(await evaluate(code)).toBe(
        "TypeError: later: argument 1: unsupported script value of type function"
      );
    });
  });
});
