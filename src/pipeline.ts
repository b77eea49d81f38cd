/**
 * Run pipeline.
 *
 * One run is an explicit state object threaded through ordered stages:
 *
 *   initialize → invoke_agent → extract_flow_spec → maybe_compile
 *     → self_evaluate → synthesize_nodes → finalize
 *
 * Each stage returns a partial patch merged by key. A failed primary
 * invocation routes straight to finalize.
 */

import { AgentInvocationError } from "./adapters/types.js";
import type { AgentGateway, AgentResult } from "./adapters/types.js";
import {
  PRIMARY_NODE_ID,
  assembleRunRecord,
  createNode,
  failedRunRecord,
  laterTimestamp,
  summarizePrompt,
} from "./state/record.js";
import type { TimeWindow } from "./state/record.js";
import type { RunNode, RunRecord } from "./state/types.js";
import { compileFlowSpec } from "./workflow/compiler.js";
import { evaluateAnswer } from "./workflow/evaluator.js";
import { extractAfl, extractFlowSpec } from "./workflow/extractor.js";
import { synthesizeNodes } from "./workflow/synthesizer.js";
import type { CompileResult, Evaluation, EvaluationResult, FlowSpec } from "./workflow/types.js";

export type Invocation =
  | { kind: "success"; result: AgentResult; window: TimeWindow }
  | { kind: "failure"; error: string; window: TimeWindow };

export type PipelineState = {
  recordId: string;
  prompt: string;
  summary: string;
  requestAfl: boolean;
  startedAt?: string;
  finishedAt?: string;
  invocation?: Invocation;
  flowSpec?: FlowSpec | null;
  flowSpecSource?: "response" | "compiler";
  afl?: string | null;
  compilation?: CompileResult;
  evaluation?: EvaluationResult;
  synthesizedNodes?: RunNode[];
  record?: RunRecord;
};

export type StatePatch = Partial<Omit<PipelineState, "recordId" | "prompt">>;

export type StageName =
  | "initialize"
  | "invoke_agent"
  | "extract_flow_spec"
  | "maybe_compile"
  | "self_evaluate"
  | "synthesize_nodes"
  | "finalize";

export interface StageContext {
  gateway: AgentGateway;
  now: () => Date;
}

export type Stage = (state: PipelineState, context: StageContext) => Promise<StatePatch>;

export interface PipelineRequest {
  recordId: string;
  prompt: string;
  summary?: string;
  requestAfl?: boolean;
}

export interface PipelineOptions {
  gateway: AgentGateway;
  now?: () => Date;
}

export interface PipelineResult {
  record: RunRecord;
  flowSpec: FlowSpec | null;
  afl: string | null;
  evaluation: Evaluation | null;
}

/**
 * Apply a patch; undefined values never clear an existing field.
 */
export function mergeState(state: PipelineState, patch: StatePatch): PipelineState {
  const next: PipelineState = { ...state };
  for (const [key, value] of Object.entries(patch)) {
    if (value !== undefined) {
      Object.assign(next, { [key]: value });
    }
  }
  return next;
}

function successfulInvocation(state: PipelineState): Extract<Invocation, { kind: "success" }> | null {
  return state.invocation?.kind === "success" ? state.invocation : null;
}

export function needsCompilation(state: PipelineState): boolean {
  return !state.flowSpec || (state.requestAfl && !state.afl);
}

const initialize: Stage = async (state, { now }) => ({
  startedAt: state.startedAt ?? now().toISOString(),
  summary: state.summary || summarizePrompt(state.prompt),
});

const invokeAgent: Stage = async (state, { gateway, now }) => {
  const startedAt = now().toISOString();
  try {
    const result = await gateway.invoke(state.prompt);
    return {
      invocation: { kind: "success", result, window: { startedAt, finishedAt: now().toISOString() } },
    };
  } catch (error) {
    if (!(error instanceof AgentInvocationError)) throw error;
    return {
      invocation: {
        kind: "failure",
        error: error.message,
        window: { startedAt, finishedAt: now().toISOString() },
      },
    };
  }
};

const extractFlow: Stage = async (state) => {
  const invocation = successfulInvocation(state);
  if (!invocation) return {};
  const flowSpec = extractFlowSpec(invocation.result.message);
  return {
    flowSpec,
    flowSpecSource: flowSpec ? "response" : undefined,
    afl: extractAfl(invocation.result.message),
  };
};

const maybeCompile: Stage = async (state, { gateway }) => {
  if (!successfulInvocation(state) || !needsCompilation(state)) return {};
  const compilation = await compileFlowSpec(gateway, state.prompt);
  const patch: StatePatch = { compilation };
  if (!state.flowSpec && compilation.flowSpec) {
    patch.flowSpec = compilation.flowSpec;
    patch.flowSpecSource = "compiler";
  }
  if (!state.afl && compilation.afl) {
    patch.afl = compilation.afl;
  }
  return patch;
};

const selfEvaluate: Stage = async (state, { gateway }) => {
  const invocation = successfulInvocation(state);
  if (!invocation) return {};
  return { evaluation: await evaluateAnswer(gateway, state.prompt, invocation.result.message) };
};

const synthesize: Stage = async (state, { now }) => {
  if (!successfulInvocation(state) || !state.flowSpec || !state.startedAt) return {};
  const window = { startedAt: state.startedAt, finishedAt: now().toISOString() };
  return { synthesizedNodes: synthesizeNodes(state.flowSpec, window, PRIMARY_NODE_ID) };
};

function buildPrimaryNode(state: PipelineState, invocation: Invocation): RunNode {
  const summary = state.summary || summarizePrompt(state.prompt);
  const inputs = { prompt: state.prompt };

  if (invocation.kind === "failure") {
    return createNode({
      id: PRIMARY_NODE_ID,
      type: "agent",
      summary,
      dependsOn: [],
      status: "failed",
      window: invocation.window,
      notes: `Agent invocation failed: ${invocation.error}`,
      inputs,
      outputs: { events: [] },
      metrics: { usage: {} },
      error: invocation.error,
    });
  }

  const { result } = invocation;
  const outputs: Record<string, unknown> = { message: result.message, events: result.events };
  const metrics: Record<string, unknown> = { usage: result.usage };

  if (state.flowSpec) {
    outputs.flow_spec = state.flowSpec;
    outputs.flow_spec_source = state.flowSpecSource;
  }
  if (state.afl) {
    outputs.afl = state.afl;
  }
  if (state.compilation) {
    outputs.compilation = {
      message: state.compilation.message,
      error: state.compilation.error,
    };
    metrics.compilation_usage = state.compilation.usage;
  }
  if (state.evaluation) {
    const { evaluation, usage } = state.evaluation;
    outputs.evaluation = evaluation;
    metrics.evaluation_score = evaluation.score;
    metrics.evaluation_usage = usage;
    if (evaluation.error) {
      metrics.evaluation_error = evaluation.error;
    }
  }

  return createNode({
    id: PRIMARY_NODE_ID,
    type: "agent",
    summary,
    dependsOn: [],
    status: "succeeded",
    window: invocation.window,
    notes: "Agent invocation succeeded.",
    inputs,
    outputs,
    metrics,
  });
}

const finalize: Stage = async (state, { now }) => {
  const finishedAt = laterTimestamp(state.finishedAt, now().toISOString());
  const startedAt = state.startedAt ?? finishedAt;
  if (!state.invocation) {
    return { finishedAt };
  }

  const primary = buildPrimaryNode(state, state.invocation);
  const nodes = [primary, ...(state.synthesizedNodes ?? [])];
  const record = assembleRunRecord({
    id: state.recordId,
    prompt: state.prompt,
    summary: state.summary,
    window: { startedAt, finishedAt },
    nodes,
    eventsCount: state.invocation.kind === "success" ? state.invocation.result.events.length : 0,
    error: state.invocation.kind === "failure" ? state.invocation.error : undefined,
  });
  return { finishedAt, record };
};

export const PIPELINE_STAGES: ReadonlyArray<readonly [StageName, Stage]> = [
  ["initialize", initialize],
  ["invoke_agent", invokeAgent],
  ["extract_flow_spec", extractFlow],
  ["maybe_compile", maybeCompile],
  ["self_evaluate", selfEvaluate],
  ["synthesize_nodes", synthesize],
  ["finalize", finalize],
];

export function getStage(name: StageName): Stage {
  const entry = PIPELINE_STAGES.find(([stageName]) => stageName === name);
  if (!entry) {
    throw new Error(`Unknown pipeline stage: ${name}`);
  }
  return entry[1];
}

/**
 * Next stage to run after `current`: linear, except that a failed primary
 * invocation jumps to finalize.
 */
export function nextStage(current: StageName, state: PipelineState): StageName | null {
  if (current === "finalize") return null;
  if (current === "invoke_agent" && state.invocation?.kind === "failure") {
    return "finalize";
  }
  const index = PIPELINE_STAGES.findIndex(([name]) => name === current);
  return PIPELINE_STAGES[index + 1]?.[0] ?? null;
}

/**
 * Drive the stages from `initialize` to `finalize`. Exceptions propagate.
 */
export async function runStages(initial: PipelineState, context: StageContext): Promise<PipelineState> {
  let state = initial;
  let current: StageName | null = "initialize";
  while (current) {
    const patch = await getStage(current)(state, context);
    state = mergeState(state, patch);
    current = nextStage(current, state);
  }
  return state;
}

function describeUnexpected(error: unknown): string {
  if (error instanceof Error) {
    return `Unexpected error: ${error.name}: ${error.message}`;
  }
  return `Unexpected error: ${String(error)}`;
}

/**
 * Execute one run. Never throws: anything unexpected becomes a failed
 * record carrying a generic diagnostic.
 */
export async function runPipeline(request: PipelineRequest, options: PipelineOptions): Promise<PipelineResult> {
  const now = options.now ?? (() => new Date());
  const summary = request.summary || summarizePrompt(request.prompt);
  const initial: PipelineState = {
    recordId: request.recordId,
    prompt: request.prompt,
    summary,
    requestAfl: request.requestAfl ?? false,
    startedAt: now().toISOString(),
  };

  try {
    const state = await runStages(initial, { gateway: options.gateway, now });
    if (!state.record) {
      throw new Error("Pipeline finished without a run record");
    }
    return {
      record: state.record,
      flowSpec: state.flowSpec ?? null,
      afl: state.afl ?? null,
      evaluation: state.evaluation?.evaluation ?? null,
    };
  } catch (error) {
    const startedAt = initial.startedAt ?? now().toISOString();
    return {
      record: failedRunRecord({
        id: request.recordId,
        prompt: request.prompt,
        summary,
        window: { startedAt, finishedAt: laterTimestamp(startedAt, now().toISOString()) },
        message: describeUnexpected(error),
      }),
      flowSpec: null,
      afl: null,
      evaluation: null,
    };
  }
}
