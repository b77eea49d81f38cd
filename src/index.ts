#!/usr/bin/env node
/**
 * AgentFlow CLI entry point.
 */

import { existsSync, realpathSync } from "node:fs";
import path from "node:path";
import process from "node:process";
import { fileURLToPath } from "node:url";
import { createAdapter } from "./adapters/factory.js";
import { ADAPTER_NAMES, isAdapterName } from "./adapters/types.js";
import type { AgentGateway } from "./adapters/types.js";
import { ConfigurationError, loadSettings } from "./config.js";
import type { Settings } from "./config.js";
import { determineWorkflowId, runOnce, runWorkflow } from "./runner.js";
import { DEFAULT_VIEWER_HOST, DEFAULT_VIEWER_PORT, runViewer } from "./viewer.js";

const DEFAULT_ADAPTER = "codex";
const DEFAULT_CYCLES = 3;
const DEFAULT_HISTORY_ROOT = "sandbox/workflows";

export type OutputFormat = "yaml" | "afl";

export type Command =
  | { kind: "help" }
  | { kind: "run"; prompt: string; adapter: string; output: OutputFormat; outDir: string }
  | {
      kind: "workflow";
      prompt: string;
      adapter: string;
      output: OutputFormat;
      cycles: number;
      workflowId?: string;
      historyRoot: string;
    }
  | { kind: "view"; directory: string; host: string; port: number };

export interface CliDeps {
  env?: NodeJS.ProcessEnv;
  createGateway?: (settings: Settings) => Promise<AgentGateway>;
  now?: () => Date;
}

/**
 * Split `--flag value` and `--flag=value` forms. Returns the value and how
 * many argv entries were consumed, or null when `arg` is not `flag`.
 */
function readFlag(argv: string[], i: number, ...names: string[]): { value: string | undefined; consumed: number } | null {
  const arg = argv[i];
  for (const name of names) {
    if (arg === name) {
      return { value: argv[i + 1], consumed: 2 };
    }
    if (name.startsWith("--") && arg.startsWith(`${name}=`)) {
      return { value: arg.slice(name.length + 1), consumed: 1 };
    }
  }
  return null;
}

function parseOutput(value: string | undefined): OutputFormat | null {
  return value === "yaml" || value === "afl" ? value : null;
}

function parsePositiveInt(value: string | undefined): number | null {
  if (!value || !/^\d+$/.test(value)) return null;
  const parsed = Number.parseInt(value, 10);
  return parsed > 0 ? parsed : null;
}

function parseRunArgs(argv: string[], workflow: boolean): Command | null {
  let adapter = DEFAULT_ADAPTER;
  let output: OutputFormat = "yaml";
  let outDir = ".";
  let cycles = DEFAULT_CYCLES;
  let workflowId: string | undefined;
  let historyRoot = DEFAULT_HISTORY_ROOT;
  const promptParts: string[] = [];

  for (let i = 0; i < argv.length; ) {
    const arg = argv[i];

    if (arg === "--help" || arg === "-h") {
      return { kind: "help" };
    }
    if (arg === "--") {
      promptParts.push(...argv.slice(i + 1));
      break;
    }

    const adapterFlag = readFlag(argv, i, "--adapter", "-a");
    if (adapterFlag) {
      if (!adapterFlag.value) return null;
      adapter = adapterFlag.value;
      i += adapterFlag.consumed;
      continue;
    }

    const outputFlag = readFlag(argv, i, "--output");
    if (outputFlag) {
      const value = parseOutput(outputFlag.value);
      if (!value) return null;
      output = value;
      i += outputFlag.consumed;
      continue;
    }

    if (!workflow) {
      const outDirFlag = readFlag(argv, i, "--out-dir", "-o");
      if (outDirFlag) {
        if (!outDirFlag.value) return null;
        outDir = outDirFlag.value;
        i += outDirFlag.consumed;
        continue;
      }
    } else {
      const cyclesFlag = readFlag(argv, i, "--cycles");
      if (cyclesFlag) {
        const value = parsePositiveInt(cyclesFlag.value);
        if (!value) return null;
        cycles = value;
        i += cyclesFlag.consumed;
        continue;
      }

      const idFlag = readFlag(argv, i, "--workflow-id");
      if (idFlag) {
        if (!idFlag.value) return null;
        workflowId = idFlag.value;
        i += idFlag.consumed;
        continue;
      }

      const rootFlag = readFlag(argv, i, "--history-root");
      if (rootFlag) {
        if (!rootFlag.value) return null;
        historyRoot = rootFlag.value;
        i += rootFlag.consumed;
        continue;
      }
    }

    if (arg.startsWith("--")) {
      return null;
    }

    promptParts.push(arg);
    i++;
  }

  const prompt = promptParts.join(" ").trim();
  if (!prompt) {
    return null;
  }

  if (workflow) {
    return { kind: "workflow", prompt, adapter, output, cycles, workflowId, historyRoot };
  }
  return { kind: "run", prompt, adapter, output, outDir };
}

function parseViewArgs(argv: string[]): Command | null {
  let directory = ".";
  let host = DEFAULT_VIEWER_HOST;
  let port = DEFAULT_VIEWER_PORT;

  for (let i = 0; i < argv.length; ) {
    const arg = argv[i];
    if (arg === "--help" || arg === "-h") {
      return { kind: "help" };
    }

    const directoryFlag = readFlag(argv, i, "--directory", "-d");
    if (directoryFlag) {
      if (!directoryFlag.value) return null;
      directory = directoryFlag.value;
      i += directoryFlag.consumed;
      continue;
    }

    const hostFlag = readFlag(argv, i, "--host");
    if (hostFlag) {
      if (!hostFlag.value) return null;
      host = hostFlag.value;
      i += hostFlag.consumed;
      continue;
    }

    const portFlag = readFlag(argv, i, "--port", "-p");
    if (portFlag) {
      const value = parsePositiveInt(portFlag.value);
      if (!value || value > 65535) return null;
      port = value;
      i += portFlag.consumed;
      continue;
    }

    return null;
  }

  return { kind: "view", directory, host, port };
}

/**
 * Parse CLI arguments (without the node/script prefix). Returns null for
 * invalid input.
 */
export function parseArgs(argv: string[]): Command | null {
  if (argv.length === 0) return null;
  const [first, ...rest] = argv;
  if (first === "view") return parseViewArgs(rest);
  if (first === "workflow") return parseRunArgs(rest, true);
  return parseRunArgs(argv, false);
}

export function printHelp(): void {
  console.log(`
Usage:
  agentflow [options] "<prompt>"            Run the prompt once and write a run record.
  agentflow workflow [options] "<prompt>"   Run adaptive cycles driven by self-evaluation.
  agentflow view [options]                  Serve run records from a directory.

Run options:
  --adapter, -a <name>     Adapter: codex (default), claude or mock
  --output <format>        yaml (default) or afl to also write AgentFlowLanguage files
  --out-dir, -o <dir>      Output directory (default: current directory)

Workflow options:
  --adapter, -a <name>     Adapter: codex (default), claude or mock
  --output <format>        yaml (default) or afl
  --cycles <n>             Number of cycles (default: ${DEFAULT_CYCLES})
  --workflow-id <id>       Workflow identifier (default: workflow-<timestamp>)
  --history-root <dir>     History root (default: ${DEFAULT_HISTORY_ROOT})

View options:
  --directory, -d <dir>    Directory of YAML records (default: current directory)
  --host <host>            Interface to bind (default: ${DEFAULT_VIEWER_HOST})
  --port, -p <port>        Port (default: ${DEFAULT_VIEWER_PORT})

Environment:
  OPENAI_API_KEY           Required for the codex adapter
  ANTHROPIC_API_KEY        Required for the claude adapter
  AGENTFLOW_MODEL          Model passed to the adapter CLI
  AGENTFLOW_UNSAFE         Set to 1 to bypass CLI sandboxing (dangerous)
`.trim());
}

async function resolveGateway(adapter: string, deps: CliDeps): Promise<AgentGateway | null> {
  if (!isAdapterName(adapter)) {
    const names = ADAPTER_NAMES.map((name) => `'${name}'`);
    console.error(
      `Unknown adapter '${adapter}'. Use ${names.slice(0, -1).join(", ")}, or ${names[names.length - 1]}.`
    );
    return null;
  }
  try {
    const settings = loadSettings(adapter, deps.env ?? process.env);
    return await (deps.createGateway ?? createAdapter)(settings);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(`Configuration error: ${error.message}`);
      return null;
    }
    throw error;
  }
}

async function handleRun(command: Extract<Command, { kind: "run" }>, deps: CliDeps): Promise<number> {
  const gateway = await resolveGateway(command.adapter, deps);
  if (!gateway) return 1;

  const result = await runOnce({
    gateway,
    prompt: command.prompt,
    outDir: path.resolve(command.outDir),
    requestAfl: command.output === "afl",
    now: deps.now,
  });

  console.log(`[agentflow] Wrote run record: ${result.recordPath}`);
  if (result.aflPath) {
    console.log(`[agentflow] Wrote AgentFlowLanguage artifact: ${result.aflPath}`);
  }
  if (result.record.status === "failed") {
    console.error(`[agentflow] Run failed: ${result.record.error?.message ?? "unknown error"}`);
    return 1;
  }
  return 0;
}

async function handleWorkflow(
  command: Extract<Command, { kind: "workflow" }>,
  deps: CliDeps
): Promise<number> {
  const gateway = await resolveGateway(command.adapter, deps);
  if (!gateway) return 1;

  const now = deps.now ?? (() => new Date());
  const outcome = await runWorkflow({
    gateway,
    basePrompt: command.prompt,
    cycles: command.cycles,
    workflowId: determineWorkflowId(command.workflowId, now()),
    historyRoot: path.resolve(command.historyRoot),
    requestAfl: command.output === "afl",
    now,
  });

  console.log(`[agentflow] Workflow history written to: ${outcome.historyPath}`);
  if (outcome.failedCycle !== null) {
    console.log(
      `[agentflow] Workflow halted after cycle ${outcome.failedCycle}; inspect per-cycle artifacts for details.`
    );
    return 1;
  }
  return 0;
}

async function handleView(command: Extract<Command, { kind: "view" }>): Promise<number> {
  const directory = path.resolve(command.directory);
  if (!existsSync(directory)) {
    console.error(`Directory not found: ${directory}`);
    return 1;
  }
  await runViewer({ directory, host: command.host, port: command.port });
  return 0;
}

/**
 * Dispatch one CLI invocation and return the exit code. `view` resolves
 * once the server is listening; the process then stays up until killed.
 */
export async function main(argv: string[], deps: CliDeps = {}): Promise<number> {
  const command = parseArgs(argv);
  if (!command) {
    printHelp();
    return 1;
  }

  switch (command.kind) {
    case "help":
      printHelp();
      return 0;
    case "run":
      return handleRun(command, deps);
    case "workflow":
      return handleWorkflow(command, deps);
    case "view":
      return handleView(command);
  }
}

function isMainModule(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return realpathSync(entry) === realpathSync(fileURLToPath(import.meta.url));
  } catch {
    return false;
  }
}

if (isMainModule()) {
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error("[agentflow] Fatal error:", error);
      process.exitCode = 1;
    });
}
