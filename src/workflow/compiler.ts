/**
 * Flow compiler fallback: re-prompt the agent for an explicit flow spec
 * and AgentFlowLanguage rendering when the primary answer had none.
 */

import { AgentInvocationError } from "../adapters/types.js";
import type { AgentGateway } from "../adapters/types.js";
import { extractAfl, extractFlowSpec } from "./extractor.js";
import { buildCompilePrompt } from "./prompt.js";
import type { CompileResult } from "./types.js";

export async function compileFlowSpec(gateway: AgentGateway, prompt: string): Promise<CompileResult> {
  let message: string;
  let usage: CompileResult["usage"];
  try {
    const result = await gateway.invoke(buildCompilePrompt(prompt));
    message = result.message;
    usage = result.usage;
  } catch (error) {
    if (!(error instanceof AgentInvocationError)) throw error;
    return {
      message: null,
      usage: {},
      flowSpec: null,
      afl: null,
      error: `Flow compilation call failed: ${error.message}`,
    };
  }

  const flowSpec = extractFlowSpec(message);
  const afl = extractAfl(message);
  let compileError: string | null = null;
  if (!flowSpec && !afl) {
    compileError = "Compiler response did not contain a flow_spec or AgentFlowLanguage block.";
  } else if (!flowSpec) {
    compileError = "Compiler response did not contain a valid flow_spec.";
  } else if (!afl) {
    compileError = "Compiler response did not contain an AgentFlowLanguage rendering.";
  }

  return { message, usage, flowSpec, afl, error: compileError };
}
