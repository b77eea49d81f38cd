/**
 * Prompt construction for flow compilation, self-evaluation and adaptive
 * workflow cycles.
 */

import type { HistoryEntry } from "../state/types.js";
import { truncate } from "../utils/json.js";

const REFLECTION_WINDOW = 3;

export const INITIAL_ADJUSTMENT_SUMMARY = "Initial cycle prompt with no adjustments.";
export const REFLECTIVE_ADJUSTMENT_SUMMARY =
  "Injected reflective context from previous cycles and targeted improvements.";

/**
 * Build the fallback prompt that asks for a flow spec plus its
 * AgentFlowLanguage rendering.
 */
export function buildCompilePrompt(prompt: string): string {
  const parts: string[] = [];

  parts.push("You are a flow compiler. Translate the request below into a control-flow graph.");
  parts.push("");
  parts.push("Request:");
  parts.push(prompt.trim());
  parts.push("");
  parts.push("Respond with exactly one ```json fenced block containing an object with two keys:");
  parts.push('- "flow_spec": { "nodes": [{ "id", "label", "type", "on_true"?, "on_false"? }], "edges": [{ "source", "target", "label"? }] }');
  parts.push('- "afl": the same flow written in AgentFlowLanguage, as a single string');
  parts.push("");
  parts.push("Rules:");
  parts.push("- Node ids must be unique; edges may only reference declared node ids.");
  parts.push('- Use type "branch" with on_true/on_false for conditions, "loop" for iteration, "evaluation" for checks.');
  parts.push("- The flow_spec and the afl text must describe the same graph.");

  return parts.join("\n");
}

/**
 * Build the judge prompt used for self-evaluation.
 */
export function buildEvaluationPrompt(prompt: string, answer: string): string {
  const parts: string[] = [];

  parts.push("You are a strict reviewer. Score how well the answer satisfies the original prompt.");
  parts.push("");
  parts.push("Original prompt:");
  parts.push(prompt.trim());
  parts.push("");
  parts.push("Answer:");
  parts.push(truncate(answer.trim() || "(empty)", 18_000));
  parts.push("");
  parts.push("Reply with a single line of JSON and nothing else:");
  parts.push('{"score": <float between 0.0 and 1.0>, "justification": "<one or two sentences>"}');

  return parts.join("\n");
}

export function formatScore(score: unknown): string {
  return typeof score === "number" && Number.isFinite(score) ? score.toFixed(3) : "n/a";
}

/**
 * Map keywords in the latest critique to concrete improvement directives.
 */
export function deriveAdjustmentDirectives(feedback: string): string[] {
  const normalized = feedback.toLowerCase();
  const directives: string[] = [];

  if (normalized.includes("branch") || normalized.includes("condition")) {
    directives.push("Strengthen branching coverage to handle the missing conditions noted above.");
  }
  if (normalized.includes("loop") || normalized.includes("iteration")) {
    directives.push("Refine loop nodes with clearer exit criteria and tracking of iterations.");
  }
  if (normalized.includes("evaluation") || normalized.includes("self")) {
    directives.push("Improve the evaluation node to report precise pass/fail signals.");
  }
  if (normalized.includes("prompt") || normalized.includes("clarity")) {
    directives.push("Clarify each node's prompt so tool calls and outputs are unambiguous.");
  }

  if (directives.length === 0) {
    directives.push("Address the critique directly and document how the flow changes resolve it.");
  }
  directives.push("Track concrete changes in the evaluation justification for this cycle.");
  return directives;
}

export type CyclePrompt = {
  prompt: string;
  adjustmentSummary: string;
  reflection: {
    reflection_log: string[];
    directives: string[];
  } | null;
};

function describeEntry(entry: HistoryEntry): string {
  const evaluation = entry.evaluation;
  const parts = [`Cycle ${entry.cycle}`];
  parts.push(
    typeof evaluation.score === "number" ? `score=${formatScore(evaluation.score)}` : "score=n/a"
  );

  const feedback = evaluation.justification || evaluation.error;
  if (feedback) {
    parts.push(`feedback=${feedback}`);
  }
  if (entry.flow_summary && typeof entry.flow_summary.node_count === "number") {
    parts.push(`nodes=${entry.flow_summary.node_count}`);
  }
  return parts.join(" | ");
}

/**
 * Build the prompt for the next cycle from the base prompt and prior
 * history entries. The first cycle uses the base prompt verbatim.
 */
export function buildCyclePrompt(basePrompt: string, history: HistoryEntry[]): CyclePrompt {
  if (history.length === 0) {
    return { prompt: basePrompt, adjustmentSummary: INITIAL_ADJUSTMENT_SUMMARY, reflection: null };
  }

  const reflectionLog = history.slice(-REFLECTION_WINDOW).map(describeEntry);
  const lastFeedback = history[history.length - 1].evaluation.justification ?? "";
  const directives = deriveAdjustmentDirectives(lastFeedback);

  const parts: string[] = [];
  parts.push(basePrompt);
  parts.push("");
  parts.push("### Reflection Log");
  parts.push(...reflectionLog.map((line) => `- ${line}`));
  parts.push("");
  parts.push("### Improvement Directives");
  parts.push(...directives.map((item) => `- ${item}`));
  parts.push("");
  parts.push(
    "Using the reflections above, regenerate or refine the flow. " +
      "Be explicit about how this cycle differs from earlier attempts and " +
      "explain the adjustments inside the self-evaluation justification."
  );

  return {
    prompt: parts.join("\n"),
    adjustmentSummary: REFLECTIVE_ADJUSTMENT_SUMMARY,
    reflection: { reflection_log: reflectionLog, directives },
  };
}
