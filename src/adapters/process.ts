/**
 * Child-process plumbing shared by the CLI adapters.
 */

import { spawn } from "node:child_process";
import process from "node:process";
import readline from "node:readline/promises";

export interface CliRunResult {
  exitCode: number;
  stdoutLines: string[];
  stderr: string;
  spawnError?: string;
}

/**
 * Run a CLI to completion, collecting non-empty stdout lines and stderr.
 * Never throws: spawn failures are reported through `spawnError`.
 */
export async function runCli(
  command: string,
  args: string[],
  env: NodeJS.ProcessEnv = process.env
): Promise<CliRunResult> {
  const stdoutLines: string[] = [];
  const stderrChunks: Buffer[] = [];
  let spawnError: string | undefined;

  let child: ReturnType<typeof spawn>;
  try {
    child = spawn(command, args, {
      cwd: process.cwd(),
      env,
      stdio: ["ignore", "pipe", "pipe"],
    });
  } catch (error) {
    return {
      exitCode: 1,
      stdoutLines,
      stderr: "",
      spawnError: error instanceof Error ? error.message : String(error),
    };
  }

  const readStdout = async (): Promise<void> => {
    if (!child.stdout) {
      return;
    }
    const rl = readline.createInterface({ input: child.stdout, crlfDelay: Infinity });
    for await (const line of rl) {
      const trimmed = line.trim();
      if (trimmed) {
        stdoutLines.push(trimmed);
      }
    }
  };

  child.stderr?.on("data", (chunk) => {
    stderrChunks.push(Buffer.from(chunk));
  });

  const exitPromise = new Promise<number>((resolve) => {
    child.once("close", (code) => resolve(code ?? 1));
    child.once("error", (error) => {
      spawnError = error.message;
      resolve(1);
    });
  });

  const [, exitCode] = await Promise.all([readStdout(), exitPromise]);

  return {
    exitCode,
    stdoutLines,
    stderr: Buffer.concat(stderrChunks).toString("utf8").trim(),
    spawnError,
  };
}
