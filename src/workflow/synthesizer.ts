/**
 * Turn a validated flow spec into run nodes.
 */

import { createNode } from "../state/record.js";
import type { TimeWindow } from "../state/record.js";
import type { RunNode } from "../state/types.js";
import type { FlowSpec, FlowSummary } from "./types.js";

export const FLOW_NODE_PREFIX = "flow::";
const DEFAULT_FLOW_NODE_TYPE = "task";

export function flowNodeId(specId: string): string {
  return `${FLOW_NODE_PREFIX}${specId}`;
}

/**
 * Map each target id to its source ids, in edge order.
 * Edges without a source or target are dropped.
 */
export function buildPredecessorMap(spec: FlowSpec): Map<string, string[]> {
  const predecessors = new Map<string, string[]>();
  for (const edge of spec.edges) {
    const source = edge.source?.trim();
    const target = edge.target?.trim();
    if (!source || !target) continue;
    const list = predecessors.get(target) ?? [];
    list.push(source);
    predecessors.set(target, list);
  }
  return predecessors;
}

/**
 * Dependencies for one flow node: the primary node first, then its flow
 * predecessors, without duplicates. Only predecessors already in `earlier`
 * are kept, so loop back-edges and unknown ids never become dependencies.
 */
export function resolveDependencies(
  specId: string,
  predecessors: Map<string, string[]>,
  earlier: Set<string>,
  primaryId: string
): string[] {
  const deps = [primaryId];
  for (const source of predecessors.get(specId) ?? []) {
    if (earlier.has(source)) {
      deps.push(flowNodeId(source));
    }
  }
  return [...new Set(deps)];
}

export function synthesizeNodes(spec: FlowSpec, window: TimeWindow, primaryId: string): RunNode[] {
  const predecessors = buildPredecessorMap(spec);
  const earlier = new Set<string>();

  return spec.nodes.map((specNode) => {
    const dependsOn = resolveDependencies(specNode.id, predecessors, earlier, primaryId);
    earlier.add(specNode.id);
    const outputs: Record<string, unknown> = {};
    if (specNode.on_true) outputs.on_true = specNode.on_true;
    if (specNode.on_false) outputs.on_false = specNode.on_false;

    return createNode({
      id: flowNodeId(specNode.id),
      type: specNode.type?.trim() || DEFAULT_FLOW_NODE_TYPE,
      summary: specNode.label?.trim() || specNode.id,
      dependsOn,
      status: "succeeded",
      window,
      notes: "Synthesized from flow specification.",
      inputs: {
        flow_node_id: specNode.id,
        predecessors: dependsOn.slice(1),
      },
      outputs,
    });
  });
}

export function summarizeFlowSpec(spec: FlowSpec): FlowSummary {
  let branchNodes = 0;
  let loopNodes = 0;
  let evaluationNodes = 0;

  for (const node of spec.nodes) {
    if (node.on_true || node.on_false) branchNodes++;
    if (node.type === "loop") loopNodes++;
    if (node.type === "evaluation") evaluationNodes++;
  }

  return {
    node_count: spec.nodes.length,
    edge_count: spec.edges.length,
    branch_nodes: branchNodes,
    loop_nodes: loopNodes,
    evaluation_nodes: evaluationNodes,
  };
}
