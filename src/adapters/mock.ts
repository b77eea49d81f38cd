/**
 * Mock adapter for testing and dry runs.
 */

import { AgentInvocationError } from "./types.js";
import type { AgentEvent, AgentGateway, AgentResult, AgentUsage } from "./types.js";

export type MockResponse =
  | { message: string; events?: AgentEvent[]; usage?: AgentUsage }
  | { error: string };

/**
 * Mock adapter that returns predefined responses in call order.
 * A scripted `{ error }` entry fails that call with AgentInvocationError.
 */
export class MockAdapter implements AgentGateway {
  readonly name = "mock" as const;
  private responses: MockResponse[];
  private callIndex = 0;
  public calls: string[] = [];

  constructor(responses: MockResponse[] = []) {
    this.responses = responses;
  }

  async invoke(prompt: string): Promise<AgentResult> {
    this.calls.push(prompt);
    const response = this.responses[this.callIndex] ?? { message: "Mock response" };
    this.callIndex++;

    if ("error" in response) {
      throw new AgentInvocationError(response.error, { adapter: this.name });
    }

    return {
      message: response.message,
      events: response.events ?? [{ type: "item.completed", item: { type: "agent_message", text: response.message } }],
      usage: response.usage ?? {},
    };
  }
}
