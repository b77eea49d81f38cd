/**
 * Run execution and the adaptive workflow loop.
 *
 * A workflow runs the pipeline once per cycle, feeding the previous
 * cycles' evaluations back into the next prompt and persisting history
 * after every cycle.
 */

import { mkdir } from "node:fs/promises";
import path from "node:path";
import type { AgentGateway } from "./adapters/types.js";
import { runPipeline } from "./pipeline.js";
import {
  aflPathFor,
  historyPathFor,
  loadHistory,
  resolveRecordPath,
  saveHistory,
  writeAfl,
  writeRunRecord,
} from "./state/artifacts.js";
import { PRIMARY_NODE_ID, appendNode, createNode, summarizePrompt } from "./state/record.js";
import type { History, HistoryEntry, RunNode, RunRecord } from "./state/types.js";
import { buildCyclePrompt, formatScore } from "./workflow/prompt.js";
import type { CyclePrompt } from "./workflow/prompt.js";
import { summarizeFlowSpec } from "./workflow/synthesizer.js";
import type { Evaluation, FlowSpec, FlowSummary } from "./workflow/types.js";

export interface ExecutePromptParams {
  gateway: AgentGateway;
  prompt: string;
  recordId: string;
  recordPath: string;
  summary?: string;
  requestAfl?: boolean;
  now?: () => Date;
}

export interface ExecutionResult {
  record: RunRecord;
  recordPath: string;
  aflPath: string | null;
  flowSpec: FlowSpec | null;
  evaluation: Evaluation | null;
}

/**
 * Run the pipeline once and write its record (and AgentFlowLanguage file
 * when requested and available).
 */
export async function executePrompt(params: ExecutePromptParams): Promise<ExecutionResult> {
  const result = await runPipeline(
    {
      recordId: params.recordId,
      prompt: params.prompt,
      summary: params.summary,
      requestAfl: params.requestAfl,
    },
    { gateway: params.gateway, now: params.now }
  );

  const record = result.record;
  let aflPath: string | null = null;
  if (params.requestAfl && result.afl) {
    aflPath = aflPathFor(params.recordPath);
    await writeAfl(aflPath, result.afl);
    record.metadata.afl_path = aflPath;
  }

  await writeRunRecord(params.recordPath, record);

  return {
    record,
    recordPath: params.recordPath,
    aflPath,
    flowSpec: result.flowSpec,
    evaluation: result.evaluation,
  };
}

/**
 * UTC timestamp as YYYYMMDDHHMMSS.
 */
export function compactTimestamp(date: Date): string {
  return date.toISOString().replace(/[-:T]/g, "").slice(0, 14);
}

export interface RunOnceParams {
  gateway: AgentGateway;
  prompt: string;
  outDir: string;
  requestAfl?: boolean;
  now?: () => Date;
}

/**
 * Single ad-hoc run written to `<outDir>/agentflow-<timestamp>.yaml`.
 */
export async function runOnce(params: RunOnceParams): Promise<ExecutionResult> {
  const now = params.now ?? (() => new Date());
  await mkdir(params.outDir, { recursive: true });
  const recordPath = await resolveRecordPath(params.outDir, `agentflow-${compactTimestamp(now())}`);
  const stem = path.basename(recordPath, ".yaml");
  const recordId = `plan-${stem.slice(stem.indexOf("-") + 1)}`;

  return executePrompt({
    gateway: params.gateway,
    prompt: params.prompt,
    recordId,
    recordPath,
    requestAfl: params.requestAfl,
    now,
  });
}

export function sanitizeIdentifier(value: string): string {
  return value.replace(/[^A-Za-z0-9_-]+/g, "-").replace(/^-+|-+$/g, "");
}

export function determineWorkflowId(candidate: string | undefined, now: Date = new Date()): string {
  const sanitized = candidate ? sanitizeIdentifier(candidate) : "";
  return sanitized || `workflow-${compactTimestamp(now)}`;
}

export interface WorkflowParams {
  gateway: AgentGateway;
  basePrompt: string;
  cycles: number;
  workflowId: string;
  historyRoot: string;
  requestAfl?: boolean;
  now?: () => Date;
}

export interface WorkflowOutcome {
  workflowId: string;
  historyPath: string;
  runs: HistoryEntry[];
  failedCycle: number | null;
}

function evaluationForHistory(execution: ExecutionResult): Evaluation {
  if (execution.evaluation) {
    return execution.evaluation;
  }
  return {
    score: null,
    justification: null,
    error: execution.record.error?.message ?? null,
  };
}

function buildReflectionNode(params: {
  cycle: number;
  record: RunRecord;
  cyclePrompt: CyclePrompt;
  evaluation: Evaluation;
  flowSummary: FlowSummary | null;
  finishedAt: string;
}): RunNode {
  const { evaluation } = params;
  return createNode({
    id: `workflow_reflection_cycle_${params.cycle}`,
    type: "reflection",
    summary: `Workflow reflection for cycle ${params.cycle}`,
    dependsOn: [PRIMARY_NODE_ID],
    status: "succeeded",
    window: { startedAt: params.record.finished_at, finishedAt: params.finishedAt },
    notes: params.cyclePrompt.adjustmentSummary,
    outputs: {
      adjustment_summary: params.cyclePrompt.adjustmentSummary,
      reflection: params.cyclePrompt.reflection ?? {},
      evaluation_score: evaluation.score,
      evaluation_justification: evaluation.justification || evaluation.error,
      flow_summary: params.flowSummary ?? {},
    },
  });
}

/**
 * Run `cycles` pipeline passes under one workflow id. Stops at the first
 * cycle whose run failed; that cycle is reported as `failedCycle`.
 */
export async function runWorkflow(params: WorkflowParams): Promise<WorkflowOutcome> {
  if (!Number.isInteger(params.cycles) || params.cycles < 1) {
    throw new RangeError("cycles must be a positive integer");
  }

  const now = params.now ?? (() => new Date());
  const historyDir = path.join(params.historyRoot, params.workflowId);
  await mkdir(historyDir, { recursive: true });

  const createdAt = now().toISOString();
  const loaded = await loadHistory(historyDir);
  const history: History = {
    workflow_id: loaded?.workflow_id || params.workflowId,
    base_prompt: loaded?.base_prompt || params.basePrompt,
    created_at: loaded?.created_at || createdAt,
    last_updated: loaded?.last_updated || createdAt,
    runs: loaded?.runs ?? [],
  };

  const runs = [...history.runs];
  const startingCycle = runs.reduce((highest, entry) => Math.max(highest, entry.cycle), runs.length) + 1;
  const baseSummary = summarizePrompt(params.basePrompt, "Workflow cycle");
  let failedCycle: number | null = null;
  let historyPath = historyPathFor(historyDir);

  for (let offset = 0; offset < params.cycles; offset++) {
    const cycle = startingCycle + offset;
    const cyclePrompt = buildCyclePrompt(params.basePrompt, runs);
    const recordId = `${params.workflowId}-cycle${String(cycle).padStart(2, "0")}`;

    const execution = await executePrompt({
      gateway: params.gateway,
      prompt: cyclePrompt.prompt,
      recordId,
      recordPath: path.join(historyDir, `${recordId}.yaml`),
      summary: `${baseSummary} (cycle ${cycle})`,
      requestAfl: params.requestAfl,
      now,
    });

    const evaluation = evaluationForHistory(execution);
    const flowSummary = execution.flowSpec ? summarizeFlowSpec(execution.flowSpec) : null;
    const reflection = buildReflectionNode({
      cycle,
      record: execution.record,
      cyclePrompt,
      evaluation,
      flowSummary,
      finishedAt: now().toISOString(),
    });
    const record = appendNode(execution.record, reflection);
    await writeRunRecord(execution.recordPath, record);

    const entry: HistoryEntry = {
      cycle,
      prompt: cyclePrompt.prompt,
      prompt_adjustment: cyclePrompt.adjustmentSummary,
      record_path: execution.recordPath,
      evaluation,
      flow_summary: flowSummary,
      record_status: record.status,
      created_at: now().toISOString(),
    };
    if (execution.aflPath) {
      entry.afl_path = execution.aflPath;
    }
    runs.push(entry);
    history.runs = runs;
    history.last_updated = now().toISOString();
    historyPath = await saveHistory(historyDir, history);

    if (record.status === "failed") {
      failedCycle = cycle;
      console.log(`[cycle ${cycle}] Run failed: ${execution.recordPath}`);
      break;
    }

    console.log(
      `[cycle ${cycle}] Wrote run record: ${execution.recordPath} (score: ${formatScore(evaluation.score)})`
    );
    if (execution.aflPath) {
      console.log(`[cycle ${cycle}] Wrote AgentFlowLanguage artifact: ${execution.aflPath}`);
    }
  }

  return {
    workflowId: params.workflowId,
    historyPath,
    runs,
    failedCycle,
  };
}
