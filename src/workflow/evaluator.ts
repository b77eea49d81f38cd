/**
 * Self-evaluation: ask the agent to judge its own answer and normalise the
 * verdict into `{ score, justification }`.
 */

import { AgentInvocationError } from "../adapters/types.js";
import type { AgentGateway } from "../adapters/types.js";
import { isPlainObject, stripCodeFences, tryParseJson } from "../utils/json.js";
import { buildEvaluationPrompt } from "./prompt.js";
import type { EvaluationResult, ParsedEvaluation } from "./types.js";

const JUSTIFICATION_KEYS = ["justification", "reasoning", "reason", "rationale"] as const;
const NUMBER_TOKEN = /-?\d+(?:\.\d+)?|-?\.\d+/;
const PURE_NUMBER = /^-?(?:\d+(?:\.\d+)?|\.\d+)$/;
const SCORE_LINE = /^score\b/i;
const REASON_LINE = /^(?:reasoning|reasons?|justifications?|rationales?)\b[\s:=-]*(.*)$/i;

export const UNPARSEABLE_EVALUATION_ERROR = "Evaluator response did not contain a numeric score.";

/**
 * Coerce a raw score to a float in [0, 1]; anything else is null.
 */
export function coerceScore(value: unknown): number | null {
  let numeric: number;
  if (typeof value === "number") {
    numeric = value;
  } else if (typeof value === "string" && value.trim() && !Number.isNaN(Number(value.trim()))) {
    numeric = Number(value.trim());
  } else {
    return null;
  }
  if (!Number.isFinite(numeric) || numeric < 0 || numeric > 1) {
    return null;
  }
  return numeric;
}

function parseJsonVerdict(text: string): ParsedEvaluation | null {
  const parsed = tryParseJson(text);
  if (!isPlainObject(parsed)) return null;

  let justification: string | null = null;
  for (const key of JUSTIFICATION_KEYS) {
    const value = parsed[key];
    if (typeof value === "string" && value.trim()) {
      justification = value.trim();
      break;
    }
  }
  return { score: coerceScore(parsed.score), justification };
}

/**
 * Line scanner for loosely formatted verdicts such as
 * "Score: 0.8\nReason: clear and complete".
 * Returns null when no usable score is found.
 */
export function scanPlaintextVerdict(text: string): ParsedEvaluation | null {
  let score: number | null = null;
  const justificationLines: string[] = [];
  let collecting = false;

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line) {
      collecting = false;
      continue;
    }

    if (SCORE_LINE.test(line)) {
      collecting = false;
      if (score === null) {
        const token = NUMBER_TOKEN.exec(line.slice("score".length));
        score = token ? coerceScore(token[0]) : null;
      }
      continue;
    }

    if (PURE_NUMBER.test(line)) {
      collecting = false;
      if (score === null) {
        score = coerceScore(line);
      }
      continue;
    }

    const reason = REASON_LINE.exec(line);
    if (reason) {
      collecting = true;
      if (reason[1].trim()) {
        justificationLines.push(reason[1].trim());
      }
      continue;
    }

    if (collecting) {
      justificationLines.push(line);
    }
  }

  if (score === null) return null;
  return {
    score,
    justification: justificationLines.length > 0 ? justificationLines.join(" ") : null,
  };
}

/**
 * Strict JSON first, plaintext scanner second. The JSON path keeps the
 * justification even when the score is unusable.
 */
export function parseEvaluation(text: string): ParsedEvaluation | null {
  const body = stripCodeFences(text);
  if (!body) return null;
  return parseJsonVerdict(body) ?? scanPlaintextVerdict(body);
}

/**
 * Run the judge prompt. Gateway failures become an evaluation-level error.
 */
export async function evaluateAnswer(
  gateway: AgentGateway,
  prompt: string,
  answer: string
): Promise<EvaluationResult> {
  let message: string;
  let usage: EvaluationResult["usage"];
  try {
    const result = await gateway.invoke(buildEvaluationPrompt(prompt, answer));
    message = result.message;
    usage = result.usage;
  } catch (error) {
    if (!(error instanceof AgentInvocationError)) throw error;
    return {
      evaluation: {
        score: null,
        justification: null,
        error: `Evaluation call failed: ${error.message}`,
      },
      usage: {},
    };
  }

  const parsed = parseEvaluation(message);
  const score = parsed?.score ?? null;
  return {
    evaluation: {
      score,
      justification: parsed?.justification ?? null,
      error: score === null ? UNPARSEABLE_EVALUATION_ERROR : null,
      raw_message: message,
    },
    usage,
  };
}
