/**
 * Agent gateway interface.
 * Every adapter (codex, claude, mock) executes one prompt and reports the
 * final message, the structured event log and token usage.
 */

export type AdapterName = "codex" | "claude" | "mock";

export const ADAPTER_NAMES: readonly AdapterName[] = ["codex", "claude", "mock"];

export type AgentEvent = Record<string, unknown>;

export type AgentUsage = Record<string, unknown>;

export interface AgentResult {
  message: string;
  events: AgentEvent[];
  usage: AgentUsage;
}

export interface AgentGateway {
  readonly name: AdapterName;
  invoke(prompt: string): Promise<AgentResult>;
}

export class AgentInvocationError extends Error {
  readonly adapter: AdapterName;
  readonly exitCode?: number;

  constructor(message: string, params: { adapter: AdapterName; exitCode?: number }) {
    super(message);
    this.name = "AgentInvocationError";
    this.adapter = params.adapter;
    this.exitCode = params.exitCode;
  }
}

export function isAdapterName(value: string): value is AdapterName {
  return ADAPTER_NAMES.some((name) => name === value);
}
