/**
 * Persisted document types: run records and workflow history.
 * Keys are snake_case, as written to YAML.
 */

import type { Evaluation, FlowSummary } from "../workflow/types.js";

export type RunStatus = "pending" | "completed" | "failed";

export type NodeStatus = "succeeded" | "failed";

/**
 * "agent" for the primary invocation, "reflection" for workflow cycle
 * summaries, otherwise the flow spec node's own type.
 */
export type RunNodeType = "agent" | "reflection" | (string & {});

export type NodeTimeline = {
  queued_at: string;
  started_at: string;
  ended_at: string;
  duration_seconds: number;
};

export type NodeAttempt = {
  attempt_id: number;
  timestamp: string;
  status: NodeStatus;
  notes: string;
};

export type RunNode = {
  id: string;
  type: RunNodeType;
  summary: string;
  depends_on: string[];
  status: NodeStatus;
  attempt: number;
  inputs: Record<string, unknown>;
  outputs: Record<string, unknown>;
  artifacts: string[];
  metrics: Record<string, unknown>;
  timeline: NodeTimeline;
  history: NodeAttempt[];
  error?: { message: string };
};

export type RunRecord = {
  schema_version: "1.0";
  id: string;
  version: number;
  prompt: string;
  summary: string;
  status: RunStatus;
  created_by: string;
  started_at: string;
  finished_at: string;
  duration: number;
  nodes: RunNode[];
  rollup: {
    completion_percentage: number;
    counts: { succeeded: number; failed: number };
  };
  metadata: {
    events_count: number;
    afl_path?: string;
  };
  error?: { message: string };
};

export type HistoryEntry = {
  cycle: number;
  prompt: string;
  prompt_adjustment: string;
  record_path: string;
  afl_path?: string;
  evaluation: Evaluation;
  flow_summary: FlowSummary | null;
  record_status: RunStatus;
  created_at: string;
};

export type History = {
  workflow_id: string;
  base_prompt: string;
  created_at: string;
  last_updated: string;
  runs: HistoryEntry[];
};
