/**
 * Types produced by the extraction, compilation and evaluation stages.
 */

import type { AgentUsage } from "../adapters/types.js";
import type { FlowSpec } from "./schema.js";

export type { FlowSpec, FlowSpecEdge, FlowSpecNode } from "./schema.js";

/**
 * Judge output as recovered by the evaluation parser, before error tagging.
 */
export type ParsedEvaluation = {
  score: number | null;
  justification: string | null;
};

export type Evaluation = {
  score: number | null;
  justification: string | null;
  error: string | null;
  raw_message?: string;
};

export type EvaluationResult = {
  evaluation: Evaluation;
  usage: AgentUsage;
};

export type CompileResult = {
  message: string | null;
  usage: AgentUsage;
  flowSpec: FlowSpec | null;
  afl: string | null;
  error: string | null;
};

export type FlowSummary = {
  node_count: number;
  edge_count: number;
  branch_nodes: number;
  loop_nodes: number;
  evaluation_nodes: number;
};
