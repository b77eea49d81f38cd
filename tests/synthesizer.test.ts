import { describe, it } from "node:test";
import assert from "node:assert";
import {
  buildPredecessorMap,
  flowNodeId,
  summarizeFlowSpec,
  synthesizeNodes,
} from "../src/workflow/synthesizer.js";
import { coerceFlowSpec } from "../src/workflow/extractor.js";
import { PRIMARY_NODE_ID } from "../src/state/record.js";
import type { FlowSpec } from "../src/workflow/types.js";

const window = {
  startedAt: "2026-01-01T00:00:00.000Z",
  finishedAt: "2026-01-01T00:00:02.500Z",
};

function spec(value: unknown): FlowSpec {
  const parsed = coerceFlowSpec(value);
  assert.ok(parsed, "fixture must be a valid flow spec");
  return parsed;
}

describe("synthesizeNodes", () => {
  it("depends on the primary node and flow predecessors in order", () => {
    const nodes = synthesizeNodes(
      spec({ nodes: [{ id: "a" }, { id: "b" }], edges: [{ source: "a", target: "b" }] }),
      window,
      PRIMARY_NODE_ID
    );

    assert.deepStrictEqual(
      nodes.map((node) => node.id),
      ["flow::a", "flow::b"]
    );
    assert.deepStrictEqual(nodes[0].depends_on, ["agent_execution"]);
    assert.deepStrictEqual(nodes[1].depends_on, ["agent_execution", "flow::a"]);
    assert.deepStrictEqual(nodes[1].inputs, { flow_node_id: "b", predecessors: ["flow::a"] });
  });

  it("links numeric node ids", () => {
    const nodes = synthesizeNodes(
      spec({ nodes: [{ id: 1 }, { id: 2 }], edges: [{ source: 1, target: 2 }] }),
      window,
      PRIMARY_NODE_ID
    );
    assert.deepStrictEqual(nodes[1].depends_on, ["agent_execution", "flow::1"]);
  });

  it("removes duplicate dependencies", () => {
    const nodes = synthesizeNodes(
      spec({
        nodes: [{ id: "a" }, { id: "b" }],
        edges: [
          { source: "a", target: "b" },
          { source: "a", target: "b", label: "again" },
        ],
      }),
      window,
      PRIMARY_NODE_ID
    );
    assert.deepStrictEqual(nodes[1].depends_on, ["agent_execution", "flow::a"]);
  });

  it("drops edges to unknown nodes and back-edges", () => {
    const nodes = synthesizeNodes(
      spec({
        nodes: [{ id: "start" }, { id: "work", type: "loop" }],
        edges: [
          { source: "ghost", target: "start" },
          { source: "start", target: "work" },
          { source: "work", target: "start" },
          { source: "work", target: "nowhere" },
          { target: "work" },
        ],
      }),
      window,
      PRIMARY_NODE_ID
    );

    assert.deepStrictEqual(nodes[0].depends_on, ["agent_execution"]);
    assert.deepStrictEqual(nodes[1].depends_on, ["agent_execution", "flow::start"]);
  });

  it("fills node metadata from the flow spec", () => {
    const [node] = synthesizeNodes(
      spec({
        nodes: [{ id: "check", label: "Check inputs", type: "branch", on_true: "go", on_false: "stop" }],
      }),
      window,
      PRIMARY_NODE_ID
    );

    assert.strictEqual(node.type, "branch");
    assert.strictEqual(node.summary, "Check inputs");
    assert.strictEqual(node.status, "succeeded");
    assert.deepStrictEqual(node.outputs, { on_true: "go", on_false: "stop" });
    assert.deepStrictEqual(node.timeline, {
      queued_at: window.startedAt,
      started_at: window.startedAt,
      ended_at: window.finishedAt,
      duration_seconds: 2.5,
    });
    assert.strictEqual(node.history[0].notes, "Synthesized from flow specification.");
  });

  it("defaults type to task and summary to the id", () => {
    const [node] = synthesizeNodes(spec({ nodes: [{ id: "plain" }] }), window, PRIMARY_NODE_ID);
    assert.strictEqual(node.type, "task");
    assert.strictEqual(node.summary, "plain");
  });
});

describe("buildPredecessorMap", () => {
  it("groups sources by target", () => {
    const map = buildPredecessorMap(
      spec({
        nodes: [{ id: "a" }, { id: "b" }, { id: "c" }],
        edges: [
          { source: "a", target: "c" },
          { source: " b ", target: "c" },
        ],
      })
    );
    assert.deepStrictEqual([...map.entries()], [["c", ["a", "b"]]]);
  });
});

describe("summarizeFlowSpec", () => {
  it("counts branches, loops and evaluations", () => {
    const summary = summarizeFlowSpec(
      spec({
        nodes: [
          { id: "a", type: "branch", on_true: "b" },
          { id: "b", type: "loop" },
          { id: "c", type: "evaluation" },
          { id: "d" },
        ],
        edges: [
          { source: "a", target: "b" },
          { source: "b", target: "c" },
        ],
      })
    );
    assert.deepStrictEqual(summary, {
      node_count: 4,
      edge_count: 2,
      branch_nodes: 1,
      loop_nodes: 1,
      evaluation_nodes: 1,
    });
  });

  it("prefixes flow node ids", () => {
    assert.strictEqual(flowNodeId("x"), "flow::x");
  });
});
