/**
 * Adapter factory.
 */

import type { Settings } from "../config.js";
import type { AgentGateway } from "./types.js";

/**
 * Create the adapter named in the settings.
 */
export async function createAdapter(settings: Settings): Promise<AgentGateway> {
  switch (settings.adapter) {
    case "codex": {
      const { CodexAdapter } = await import("./codex.js");
      return new CodexAdapter(settings);
    }
    case "claude": {
      const { ClaudeAdapter } = await import("./claude.js");
      return new ClaudeAdapter(settings);
    }
    case "mock": {
      const { MockAdapter } = await import("./mock.js");
      return new MockAdapter();
    }
  }
}
