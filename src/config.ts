/**
 * Environment-driven settings for the agent adapters.
 */

import process from "node:process";
import type { AdapterName } from "./adapters/types.js";

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export interface Settings {
  adapter: AdapterName;
  model?: string;
  apiKey?: string;
  codexCommand: string;
  claudeCommand: string;
  unsafe: boolean;
}

const truthyEnvValues = new Set(["1", "true", "yes", "on"]);

const REQUIRED_CREDENTIALS: Record<AdapterName, string | null> = {
  codex: "OPENAI_API_KEY",
  claude: "ANTHROPIC_API_KEY",
  mock: null,
};

function readEnv(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

/**
 * Resolve settings for the given adapter.
 * Throws ConfigurationError when the adapter's credential is missing.
 */
export function loadSettings(
  adapter: AdapterName,
  env: NodeJS.ProcessEnv = process.env
): Settings {
  const credentialKey = REQUIRED_CREDENTIALS[adapter];
  let apiKey: string | undefined;
  if (credentialKey) {
    apiKey = readEnv(env, credentialKey);
    if (!apiKey) {
      throw new ConfigurationError(
        `${credentialKey} must be set to use the ${adapter} adapter.`
      );
    }
  }

  const unsafe = readEnv(env, "AGENTFLOW_UNSAFE");

  return {
    adapter,
    model: readEnv(env, "AGENTFLOW_MODEL"),
    apiKey,
    codexCommand: readEnv(env, "CODEX_CLI_PATH") ?? "codex",
    claudeCommand: readEnv(env, "CLAUDE_CLI_PATH") ?? "claude",
    unsafe: unsafe ? truthyEnvValues.has(unsafe.toLowerCase()) : false,
  };
}
