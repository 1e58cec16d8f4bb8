/**
 * Process, database probe, randomness, timing and output capabilities
 */

import { NIL, bool, errorMessage, formatValue, num, str } from "@capbridge/shared";
import { defineAsyncCapability, defineCapability, type Capability } from "../registry/capability.js";
import { MAX_RANDOM_RANGE } from "../services/crypto.js";
import type { HostServices } from "../services/index.js";

export function systemCapabilities(services: HostServices): Capability[] {
  return [
    defineAsyncCapability({
      name: "execve",
      description: "Run a program to completion and return its exit code",
      params: [
        { name: "program", shape: "string" },
        { name: "args", shape: "string[]" },
      ],
      parse: (args) => ({ program: args.string(0), argv: args.strings(1) }),
      run: async (ctx, { program, argv }) => {
        ctx.log.debug({ program, args: argv }, "Spawning process");
        return num(await services.runProcess(program, argv, ctx.output));
      },
    }),

    defineAsyncCapability({
      name: "mysql_connect",
      description: "Check that a MySQL server accepts the given credentials",
      params: [
        { name: "host", shape: "string" },
        { name: "port", shape: "integer" },
        { name: "user", shape: "string" },
        { name: "password", shape: "string" },
      ],
      failureValue: bool(false),
      parse: (args) => {
        const port = args.integer(1);
        if (port < 0 || port > 65535) {
          throw args.invalid(1, `port out of range: ${port}`);
        }
        return { host: args.string(0), port, user: args.string(2), password: args.string(3) };
      },
      run: async (ctx, target) => {
        try {
          await services.sqlProbe(target);
          return bool(true);
        } catch (error) {
          return ctx.fail(`mysql connection failed: ${errorMessage(error)}`);
        }
      },
    }),

    defineCapability({
      name: "rand",
      description: "Uniform random integer in [min, max)",
      params: [
        { name: "min", shape: "integer" },
        { name: "max", shape: "integer" },
      ],
      parse: (args) => {
        const min = args.integer(0);
        const max = args.integer(1);
        if (!Number.isSafeInteger(min)) {
          throw args.invalid(0, `expected a safe integer, got ${min}`);
        }
        if (!Number.isSafeInteger(max)) {
          throw args.invalid(1, `expected a safe integer, got ${max}`);
        }
        if (min >= max) {
          throw args.invalid(1, `max must be greater than min (${min} >= ${max})`);
        }
        if (max - min > MAX_RANDOM_RANGE) {
          throw args.invalid(1, `range too wide (max - min must be at most ${MAX_RANDOM_RANGE})`);
        }
        return { min, max };
      },
      run: (_ctx, { min, max }) => num(services.random(min, max)),
    }),

    defineAsyncCapability({
      name: "sleep",
      description: "Suspend the script for a number of seconds",
      params: [{ name: "seconds", shape: "integer" }],
      parse: (args) => {
        const seconds = args.integer(0);
        if (seconds < 0) {
          throw args.invalid(0, `expected a non-negative number of seconds, got ${seconds}`);
        }
        if (!Number.isSafeInteger(seconds * 1000)) {
          throw args.invalid(0, `too many seconds: ${seconds}`);
        }
        return seconds;
      },
      run: async (_ctx, seconds) => {
        await services.sleep(seconds * 1000);
        return num(0);
      },
    }),

    defineCapability({
      name: "print",
      description: "Write the debug form of a value to stdout",
      params: [{ name: "value", shape: "value" }],
      parse: (args) => args.value(0),
      run: (ctx, value) => {
        ctx.output.onStdout(`${formatValue(value)}\n`);
        return NIL;
      },
    }),

    defineCapability({
      name: "last_err",
      description: "Message of the most recent operational failure, or null",
      params: [],
      parse: () => undefined,
      run: (ctx) => {
        const message = ctx.errors.last();
        return message === undefined ? NIL : str(message);
      },
    }),
  ];
}
