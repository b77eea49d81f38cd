/**
 * Run record assembly.
 */

import type { NodeStatus, RunNode, RunNodeType, RunRecord, RunStatus } from "./types.js";

export const PRIMARY_NODE_ID = "agent_execution";
export const RECORD_AUTHOR = "agentflow@local";

export type TimeWindow = {
  startedAt: string;
  finishedAt: string;
};

/**
 * Seconds between two ISO timestamps, rounded to milliseconds.
 */
export function secondsBetween(startedAt: string, finishedAt: string): number {
  const elapsed = (Date.parse(finishedAt) - Date.parse(startedAt)) / 1000;
  return Number.isFinite(elapsed) ? Math.round(Math.max(0, elapsed) * 1000) / 1000 : 0;
}

/**
 * The later of two ISO timestamps; `undefined` loses to anything.
 */
export function laterTimestamp(current: string | undefined, candidate: string): string {
  if (!current) return candidate;
  return Date.parse(candidate) > Date.parse(current) ? candidate : current;
}

export function createNode(params: {
  id: string;
  type: RunNodeType;
  summary: string;
  dependsOn: string[];
  status: NodeStatus;
  window: TimeWindow;
  notes: string;
  inputs?: Record<string, unknown>;
  outputs?: Record<string, unknown>;
  metrics?: Record<string, unknown>;
  error?: string;
}): RunNode {
  const { window } = params;
  const node: RunNode = {
    id: params.id,
    type: params.type,
    summary: params.summary,
    depends_on: params.dependsOn,
    status: params.status,
    attempt: 1,
    inputs: params.inputs ?? {},
    outputs: params.outputs ?? {},
    artifacts: [],
    metrics: params.metrics ?? {},
    timeline: {
      queued_at: window.startedAt,
      started_at: window.startedAt,
      ended_at: window.finishedAt,
      duration_seconds: secondsBetween(window.startedAt, window.finishedAt),
    },
    history: [
      {
        attempt_id: 1,
        timestamp: window.finishedAt,
        status: params.status,
        notes: params.notes,
      },
    ],
  };
  if (params.error) {
    node.error = { message: params.error };
  }
  return node;
}

export function countNodes(nodes: RunNode[]): { succeeded: number; failed: number } {
  let succeeded = 0;
  let failed = 0;
  for (const node of nodes) {
    if (node.status === "succeeded") succeeded++;
    else failed++;
  }
  return { succeeded, failed };
}

/**
 * Build a run record around the given nodes. Status follows the primary
 * node: completed iff it succeeded.
 */
export function assembleRunRecord(params: {
  id: string;
  prompt: string;
  summary: string;
  window: TimeWindow;
  nodes: RunNode[];
  eventsCount: number;
  error?: string;
}): RunRecord {
  const primary = params.nodes.find((node) => node.id === PRIMARY_NODE_ID) ?? params.nodes[0];
  const status: RunStatus = primary?.status === "succeeded" ? "completed" : "failed";

  const record: RunRecord = {
    schema_version: "1.0",
    id: params.id,
    version: 1,
    prompt: params.prompt,
    summary: params.summary,
    status,
    created_by: RECORD_AUTHOR,
    started_at: params.window.startedAt,
    finished_at: params.window.finishedAt,
    duration: secondsBetween(params.window.startedAt, params.window.finishedAt),
    nodes: params.nodes,
    rollup: {
      completion_percentage: status === "completed" ? 100 : 0,
      counts: countNodes(params.nodes),
    },
    metadata: { events_count: params.eventsCount },
  };
  if (params.error) {
    record.error = { message: params.error };
  }
  return record;
}

/**
 * Copy of the record with one more node and refreshed counts. Status is
 * left as recorded.
 */
export function appendNode(record: RunRecord, node: RunNode): RunRecord {
  const nodes = [...record.nodes, node];
  return {
    ...record,
    nodes,
    rollup: { ...record.rollup, counts: countNodes(nodes) },
  };
}

/**
 * A failed record with a single failed primary node, used when the
 * pipeline aborts unexpectedly.
 */
export function failedRunRecord(params: {
  id: string;
  prompt: string;
  summary: string;
  window: TimeWindow;
  message: string;
}): RunRecord {
  const node = createNode({
    id: PRIMARY_NODE_ID,
    type: "agent",
    summary: params.summary,
    dependsOn: [],
    status: "failed",
    window: params.window,
    notes: params.message,
    inputs: { prompt: params.prompt },
    outputs: { events: [] },
    metrics: { usage: {} },
    error: params.message,
  });
  return assembleRunRecord({
    id: params.id,
    prompt: params.prompt,
    summary: params.summary,
    window: params.window,
    nodes: [node],
    eventsCount: 0,
    error: params.message,
  });
}

/**
 * First 80 characters of the prompt on one line.
 */
export function summarizePrompt(prompt: string, fallback = "Agent execution"): string {
  return prompt.slice(0, 80).replace(/\n/g, " ").trim() || fallback;
}
