/**
 * Shared QuickJS utilities
 */

import type { QuickJSContext, QuickJSHandle } from "quickjs-emscripten";
import { formatValue } from "../marshal/format.js";
import type { ValueBridge } from "./values.js";

export interface OutputSinks {
	onStdout: (chunk: string) => void;
	onStderr: (chunk: string) => void;
}

/**
 * Render console arguments: strings verbatim, everything else in debug form
 */
export function formatConsoleArgs(bridge: ValueBridge, vm: QuickJSContext, args: QuickJSHandle[]): string {
	return args
		.map((arg) => {
			if (vm.typeof(arg) === "string") return vm.getString(arg);
			try {
				return formatValue(bridge.toDynamic(arg));
			} catch {
				return `[${vm.typeof(arg)}]`;
			}
		})
		.join(" ");
}

/**
 * Setup console object in QuickJS VM with output callbacks
 */
export function setupConsole(vm: QuickJSContext, bridge: ValueBridge, sinks: OutputSinks): void {
	const { onStdout, onStderr } = sinks;

	const consoleHandle = vm.newObject();
	const methods: Array<[string, (line: string) => void]> = [
		["log", (line) => onStdout(`${line}\n`)],
		["info", (line) => onStdout(`${line}\n`)],
		["warn", (line) => onStderr(`[WARN] ${line}\n`)],
		["error", (line) => onStderr(`${line}\n`)],
	];

	for (const [name, write] of methods) {
		const handle = vm.newFunction(name, (...args: QuickJSHandle[]) => {
			write(formatConsoleArgs(bridge, vm, args));
		});
		vm.setProp(consoleHandle, name, handle);
		handle.dispose();
	}

	vm.setProp(vm.global, "console", consoleHandle);
	consoleHandle.dispose();
}

/**
 * Turn a dumped QuickJS exception into one line of text
 */
export function describeVmError(dumped: unknown): string {
	if (typeof dumped === "object" && dumped !== null && "message" in dumped) {
		const name = "name" in dumped && typeof dumped.name === "string" ? dumped.name : "Error";
		return `${name}: ${String(dumped.message)}`;
	}
	return String(dumped);
}

/**
 * Summarise the last expression value of a script run
 */
export function dumpResult(bridge: ValueBridge, vm: QuickJSContext, handle: QuickJSHandle): string | undefined {
	if (vm.typeof(handle) === "undefined") {
		return undefined;
	}
	try {
		return formatValue(bridge.toDynamic(handle));
	} catch {
		return `[${vm.typeof(handle)}]`;
	}
}
