/**
 * External process execution
 */

import { spawn } from "node:child_process";
import { ERROR_CODES, OperationalError, withContext } from "@capbridge/shared";

export interface ProcessOutput {
  onStdout: (chunk: string) => void;
  onStderr: (chunk: string) => void;
}

export type ProcessRunner = (program: string, args: string[], output: ProcessOutput) => Promise<number>;

/**
 * Spawn a program and resolve with its exit code. Non-zero codes resolve;
 * spawn failures and signal terminations reject.
 */
export const spawnProcess: ProcessRunner = (program, args, output) =>
  new Promise<number>((resolve, reject) => {
    const child = spawn(program, args, { stdio: ["ignore", "pipe", "pipe"] });

    child.stdout.setEncoding("utf8");
    child.stderr.setEncoding("utf8");
    child.stdout.on("data", (chunk: string) => output.onStdout(chunk));
    child.stderr.on("data", (chunk: string) => output.onStderr(chunk));

    child.once("error", (error) => {
      reject(withContext(ERROR_CODES.PROCESS, "failed to spawn program", error));
    });

    child.once("close", (code, signal) => {
      if (code === null) {
        reject(new OperationalError(
          ERROR_CODES.PROCESS,
          signal ? `process didn't return exit code (signal ${signal})` : "process didn't return exit code"
        ));
        return;
      }
      resolve(code);
    });
  });
