/**
 * Codex CLI adapter.
 *
 * Runs `codex exec --json` and reads its JSONL event stream: the last
 * agent message is the answer, `turn.completed` carries usage.
 */

import process from "node:process";
import type { Settings } from "../config.js";
import { isPlainObject } from "../utils/json.js";
import { runCli } from "./process.js";
import { AgentInvocationError } from "./types.js";
import type { AgentEvent, AgentGateway, AgentResult, AgentUsage } from "./types.js";

export interface CodexStreamSummary {
  events: AgentEvent[];
  message: string;
  usage: AgentUsage;
  threadId: string;
  fatalError: string;
}

/**
 * Fold codex JSONL lines into message, usage and the first fatal error.
 */
export function interpretCodexEvents(lines: string[]): CodexStreamSummary {
  const events: AgentEvent[] = [];
  let message = "";
  let usage: AgentUsage = {};
  let threadId = "";
  let fatalError = "";

  for (const line of lines) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch {
      fatalError = fatalError || `Failed to parse codex JSON event: ${line}`;
      continue;
    }
    if (!isPlainObject(parsed)) {
      continue;
    }
    events.push(parsed);

    switch (parsed.type) {
      case "thread.started":
        if (typeof parsed.thread_id === "string") {
          threadId = parsed.thread_id;
        }
        break;
      case "item.completed": {
        const item = parsed.item;
        if (isPlainObject(item) && item.type === "agent_message" && typeof item.text === "string") {
          message = item.text;
        }
        break;
      }
      case "turn.completed":
        if (isPlainObject(parsed.usage)) {
          usage = parsed.usage;
        }
        break;
      case "turn.failed": {
        const error = parsed.error;
        if (typeof error === "string") {
          fatalError = error;
        } else if (isPlainObject(error) && typeof error.message === "string") {
          fatalError = error.message;
        } else {
          fatalError = "Codex turn failed.";
        }
        break;
      }
      case "error":
        fatalError = typeof parsed.message === "string" ? parsed.message : "Codex error.";
        break;
      default:
        break;
    }
  }

  return { events, message, usage, threadId, fatalError };
}

export class CodexAdapter implements AgentGateway {
  readonly name = "codex" as const;
  private readonly settings: Settings;

  constructor(settings: Settings) {
    this.settings = settings;
  }

  buildArgs(prompt: string): string[] {
    const args = ["exec", "--json"];
    if (this.settings.model) {
      args.push("-m", this.settings.model);
    }
    if (this.settings.unsafe) {
      args.push("--dangerously-bypass-approvals-and-sandbox");
    }
    args.push(prompt);
    return args;
  }

  async invoke(prompt: string): Promise<AgentResult> {
    const env = { ...process.env };
    if (this.settings.apiKey) {
      env.OPENAI_API_KEY = this.settings.apiKey;
    }
    const run = await runCli(this.settings.codexCommand, this.buildArgs(prompt), env);

    if (run.spawnError) {
      throw new AgentInvocationError(`Failed to spawn codex: ${run.spawnError}`, {
        adapter: this.name,
        exitCode: run.exitCode,
      });
    }

    const summary = interpretCodexEvents(run.stdoutLines);
    if (summary.fatalError) {
      throw new AgentInvocationError(summary.fatalError, {
        adapter: this.name,
        exitCode: run.exitCode,
      });
    }
    if (run.exitCode !== 0) {
      throw new AgentInvocationError(run.stderr || `codex exited with code ${run.exitCode}`, {
        adapter: this.name,
        exitCode: run.exitCode,
      });
    }

    return { message: summary.message, events: summary.events, usage: summary.usage };
  }
}
