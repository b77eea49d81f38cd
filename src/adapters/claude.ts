/**
 * Claude CLI adapter.
 *
 * Runs `claude --print --output-format json` and reads the result payload.
 */

import process from "node:process";
import type { Settings } from "../config.js";
import { isPlainObject } from "../utils/json.js";
import { runCli } from "./process.js";
import { AgentInvocationError } from "./types.js";
import type { AgentEvent, AgentGateway, AgentResult } from "./types.js";

/**
 * Parse claude's stdout as a single JSON document, falling back to one
 * payload per line.
 */
export function parseClaudePayloads(stdoutLines: string[]): AgentEvent[] {
  const joined = stdoutLines.join("\n").trim();
  if (!joined) {
    return [];
  }

  try {
    const parsed: unknown = JSON.parse(joined);
    if (isPlainObject(parsed)) {
      return [parsed];
    }
    if (Array.isArray(parsed)) {
      return parsed.filter(isPlainObject);
    }
  } catch {
    // fall through to line-delimited payloads
  }

  const payloads: AgentEvent[] = [];
  for (const line of stdoutLines) {
    try {
      const parsed: unknown = JSON.parse(line);
      if (isPlainObject(parsed)) {
        payloads.push(parsed);
      }
    } catch {
      continue;
    }
  }
  return payloads;
}

export class ClaudeAdapter implements AgentGateway {
  readonly name = "claude" as const;
  private readonly settings: Settings;

  constructor(settings: Settings) {
    this.settings = settings;
  }

  buildArgs(prompt: string): string[] {
    const args = ["--print", "--output-format", "json"];
    if (this.settings.model) {
      args.push("--model", this.settings.model);
    }
    if (this.settings.unsafe) {
      args.push("--dangerously-skip-permissions");
    }
    args.push(prompt);
    return args;
  }

  async invoke(prompt: string): Promise<AgentResult> {
    const env = { ...process.env };
    if (this.settings.apiKey) {
      env.ANTHROPIC_API_KEY = this.settings.apiKey;
    }
    const run = await runCli(this.settings.claudeCommand, this.buildArgs(prompt), env);

    if (run.spawnError) {
      throw new AgentInvocationError(`Failed to spawn claude: ${run.spawnError}`, {
        adapter: this.name,
        exitCode: run.exitCode,
      });
    }
    if (run.exitCode !== 0) {
      throw new AgentInvocationError(run.stderr || `claude exited with code ${run.exitCode}`, {
        adapter: this.name,
        exitCode: run.exitCode,
      });
    }

    const events = parseClaudePayloads(run.stdoutLines);
    const result = [...events].reverse().find((event) => event.type === "result");
    if (!result) {
      throw new AgentInvocationError("claude did not emit a result payload", {
        adapter: this.name,
        exitCode: run.exitCode,
      });
    }
    if (result.is_error === true) {
      const detail = typeof result.result === "string" && result.result ? result.result : "claude reported an error";
      throw new AgentInvocationError(detail, { adapter: this.name, exitCode: run.exitCode });
    }

    return {
      message: typeof result.result === "string" ? result.result : "",
      events,
      usage: isPlainObject(result.usage) ? result.usage : {},
    };
  }
}
