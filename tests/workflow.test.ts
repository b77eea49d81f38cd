import { describe, it } from "node:test";
import assert from "node:assert";
import { access, mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { MockAdapter } from "../src/adapters/mock.js";
import {
  compactTimestamp,
  determineWorkflowId,
  runOnce,
  runWorkflow,
  sanitizeIdentifier,
} from "../src/runner.js";
import { loadHistory, readRunRecord, resolveRecordPath, saveHistory } from "../src/state/artifacts.js";
import { isPlainObject } from "../src/utils/json.js";
import type { MockResponse } from "../src/adapters/mock.js";

const fence = "```";

function flowResponse(extra: Record<string, unknown> = {}): MockResponse {
  return {
    message: `Plan:\n${fence}json\n${JSON.stringify({
      flow_spec: {
        nodes: [{ id: "a" }, { id: "b", type: "evaluation" }],
        edges: [{ source: "a", target: "b" }],
      },
      ...extra,
    })}\n${fence}`,
  };
}

function verdict(score: number, justification: string): MockResponse {
  return { message: JSON.stringify({ score, justification }) };
}

async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await mkdtemp(path.join(os.tmpdir(), "agentflow-workflow-"));
  try {
    return await fn(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

async function readRecord(filePath: string): Promise<Record<string, unknown>> {
  const data = await readRunRecord(filePath);
  assert.ok(isPlainObject(data));
  return data;
}

function nodeIds(record: Record<string, unknown>): unknown[] {
  assert.ok(Array.isArray(record.nodes));
  return record.nodes.map((node: unknown) => (isPlainObject(node) ? node.id : undefined));
}

const fixedClock = () => new Date("2026-03-01T10:00:00.000Z");

describe("runWorkflow", () => {
  it("runs one cycle end to end", async () => {
    await withTempDir(async (dir) => {
      const gateway = new MockAdapter([flowResponse(), verdict(0.75, "Handles the main path")]);
      const outcome = await runWorkflow({
        gateway,
        basePrompt: "X",
        cycles: 1,
        workflowId: "demo",
        historyRoot: dir,
        now: fixedClock,
      });

      assert.strictEqual(outcome.failedCycle, null);
      assert.strictEqual(outcome.historyPath, path.join(dir, "demo", "history.yaml"));
      assert.strictEqual(outcome.runs.length, 1);

      const recordPath = path.join(dir, "demo", "demo-cycle01.yaml");
      const record = await readRecord(recordPath);
      assert.strictEqual(record.status, "completed");
      assert.strictEqual(record.summary, "X (cycle 1)");
      assert.deepStrictEqual(nodeIds(record), [
        "agent_execution",
        "flow::a",
        "flow::b",
        "workflow_reflection_cycle_1",
      ]);
      assert.deepStrictEqual(record.rollup, { completion_percentage: 100, counts: { succeeded: 4, failed: 0 } });

      const history = await loadHistory(path.join(dir, "demo"));
      assert.ok(history);
      assert.strictEqual(history.workflow_id, "demo");
      assert.strictEqual(history.base_prompt, "X");
      assert.strictEqual(history.runs.length, 1);
      const [entry] = history.runs;
      assert.strictEqual(entry.cycle, 1);
      assert.strictEqual(entry.prompt, "X");
      assert.strictEqual(entry.prompt_adjustment, "Initial cycle prompt with no adjustments.");
      assert.strictEqual(entry.record_path, recordPath);
      assert.strictEqual(entry.record_status, "completed");
      assert.strictEqual(entry.evaluation.score, 0.75);
      assert.strictEqual(entry.evaluation.justification, "Handles the main path");
      assert.deepStrictEqual(entry.flow_summary, {
        node_count: 2,
        edge_count: 1,
        branch_nodes: 0,
        loop_nodes: 0,
        evaluation_nodes: 1,
      });
    });
  });

  it("halts at the first failed cycle", async () => {
    await withTempDir(async (dir) => {
      const gateway = new MockAdapter([
        flowResponse(),
        verdict(0.4, "Missing loop handling"),
        { error: "codex exited with code 1" },
      ]);
      const outcome = await runWorkflow({
        gateway,
        basePrompt: "Build a triage flow",
        cycles: 3,
        workflowId: "halting",
        historyRoot: dir,
        now: fixedClock,
      });

      assert.strictEqual(outcome.failedCycle, 2);
      assert.strictEqual(outcome.runs.length, 2);
      assert.strictEqual(gateway.calls.length, 3);
      assert.ok(gateway.calls[2].includes("- Cycle 1 | score=0.400 | feedback=Missing loop handling | nodes=2"));
      assert.ok(
        gateway.calls[2].includes("- Refine loop nodes with clearer exit criteria and tracking of iterations.")
      );

      const history = await loadHistory(path.join(dir, "halting"));
      assert.ok(history);
      assert.strictEqual(history.runs.length, 2);
      assert.strictEqual(history.runs[1].record_status, "failed");
      assert.strictEqual(history.runs[1].evaluation.error, "codex exited with code 1");
      assert.strictEqual(history.runs[1].flow_summary, null);

      const failed = await readRecord(path.join(dir, "halting", "halting-cycle02.yaml"));
      assert.strictEqual(failed.status, "failed");
      assert.deepStrictEqual(nodeIds(failed), ["agent_execution", "workflow_reflection_cycle_2"]);
    });
  });

  it("resumes numbering from an existing history", async () => {
    await withTempDir(async (dir) => {
      const params = { basePrompt: "Resume me", cycles: 1, workflowId: "resume", historyRoot: dir, now: fixedClock };
      await runWorkflow({ ...params, gateway: new MockAdapter([flowResponse(), verdict(0.5, "ok")]) });
      const outcome = await runWorkflow({
        ...params,
        gateway: new MockAdapter([flowResponse(), verdict(0.6, "better")]),
      });

      assert.deepStrictEqual(
        outcome.runs.map((run) => run.cycle),
        [1, 2]
      );
      assert.strictEqual(outcome.runs[1].record_path, path.join(dir, "resume", "resume-cycle02.yaml"));
      assert.strictEqual(outcome.runs[1].prompt_adjustment, "Injected reflective context from previous cycles and targeted improvements.");
    });
  });

  it("keeps readable history entries when one is malformed", async () => {
    await withTempDir(async (dir) => {
      const historyDir = path.join(dir, "ledger");
      await mkdir(historyDir, { recursive: true });
      await writeFile(
        path.join(historyDir, "history.yaml"),
        [
          "workflow_id: ledger",
          "base_prompt: Keep me",
          'created_at: "2026-01-01T00:00:00.000Z"',
          'last_updated: "2026-01-01T00:00:00.000Z"',
          "runs:",
          "  - cycle: 1",
          "    prompt: Keep me",
          "    prompt_adjustment: Initial cycle prompt with no adjustments.",
          "    record_path: ledger-cycle01.yaml",
          "    evaluation:",
          "      score: 0.5",
          "      justification: needs work",
          "      error: null",
          "    flow_summary: null",
          "    record_status: completed",
          '    created_at: "2026-01-01T00:00:00.000Z"',
          "  - cycle: 4",
          "    record_status: completed",
          "    evaluation:",
          "      score: 0.6",
          "      justification: loop added",
          "      error: null",
          "  - note: not a cycle entry",
          "",
        ].join("\n"),
        "utf8"
      );

      const gateway = new MockAdapter([flowResponse(), verdict(0.7, "fine")]);
      const outcome = await runWorkflow({
        gateway,
        basePrompt: "Keep me",
        cycles: 1,
        workflowId: "ledger",
        historyRoot: dir,
        now: fixedClock,
      });

      assert.deepStrictEqual(
        outcome.runs.map((run) => run.cycle),
        [1, 4, 5]
      );
      assert.strictEqual(outcome.runs[2].record_path, path.join(historyDir, "ledger-cycle05.yaml"));
      assert.ok(gateway.calls[0].includes("- Cycle 4 | score=0.600 | feedback=loop added"));

      const history = await loadHistory(historyDir);
      assert.ok(history);
      assert.strictEqual(history.base_prompt, "Keep me");
      assert.strictEqual(history.created_at, "2026-01-01T00:00:00.000Z");
      assert.deepStrictEqual(
        history.runs.map((run) => run.cycle),
        [1, 4, 5]
      );
      assert.strictEqual(history.runs[0].evaluation.justification, "needs work");
      assert.strictEqual(history.runs[1].prompt, "");
      assert.strictEqual(history.runs[1].flow_summary, null);
    });
  });

  it("writes AgentFlowLanguage artifacts when requested", async () => {
    await withTempDir(async (dir) => {
      const gateway = new MockAdapter([flowResponse({ afl: "flow main { a -> b }" }), verdict(0.9, "good")]);
      const outcome = await runWorkflow({
        gateway,
        basePrompt: "Render it",
        cycles: 1,
        workflowId: "afl",
        historyRoot: dir,
        requestAfl: true,
        now: fixedClock,
      });

      const aflPath = path.join(dir, "afl", "afl-cycle01.afl");
      assert.strictEqual(outcome.runs[0].afl_path, aflPath);
      assert.strictEqual(await readFile(aflPath, "utf8"), "flow main { a -> b }\n");

      const record = await readRecord(path.join(dir, "afl", "afl-cycle01.yaml"));
      assert.deepStrictEqual(record.metadata, { events_count: 1, afl_path: aflPath });
    });
  });

  it("rejects a non-positive cycle count", async () => {
    await assert.rejects(
      runWorkflow({
        gateway: new MockAdapter(),
        basePrompt: "x",
        cycles: 0,
        workflowId: "zero",
        historyRoot: os.tmpdir(),
      }),
      RangeError
    );
  });
});

describe("runOnce", () => {
  it("names records by timestamp and avoids collisions", async () => {
    await withTempDir(async (dir) => {
      const first = await runOnce({ gateway: new MockAdapter([flowResponse()]), prompt: "one", outDir: dir, now: fixedClock });
      const second = await runOnce({ gateway: new MockAdapter([flowResponse()]), prompt: "two", outDir: dir, now: fixedClock });

      assert.strictEqual(first.recordPath, path.join(dir, "agentflow-20260301100000.yaml"));
      assert.strictEqual(first.record.id, "plan-20260301100000");
      assert.strictEqual(second.recordPath, path.join(dir, "agentflow-20260301100000-1.yaml"));
      assert.strictEqual(second.record.id, "plan-20260301100000-1");
      await access(second.recordPath);
    });
  });
});

describe("workflow identifiers", () => {
  it("sanitizes identifiers", () => {
    assert.strictEqual(sanitizeIdentifier(" my flow/v2! "), "my-flow-v2");
  });

  it("generates a timestamped id when none is usable", () => {
    const now = new Date("2026-03-01T10:00:00.000Z");
    assert.strictEqual(determineWorkflowId(undefined, now), "workflow-20260301100000");
    assert.strictEqual(determineWorkflowId("///", now), "workflow-20260301100000");
    assert.strictEqual(determineWorkflowId("nightly", now), "nightly");
  });

  it("formats compact timestamps in UTC", () => {
    assert.strictEqual(compactTimestamp(new Date("2026-12-31T23:59:58.900Z")), "20261231235958");
  });
});

describe("history persistence", () => {
  it("treats malformed history as absent", async () => {
    await withTempDir(async (dir) => {
      assert.strictEqual(await loadHistory(dir), null);
      await writeFile(path.join(dir, "history.yaml"), "just a string\n", "utf8");
      assert.strictEqual(await loadHistory(dir), null);
      await saveHistory(dir, {
        workflow_id: "w",
        base_prompt: "p",
        created_at: "2026-01-01T00:00:00.000Z",
        last_updated: "2026-01-01T00:00:00.000Z",
        runs: [],
      });
      const loaded = await loadHistory(dir);
      assert.ok(loaded);
      assert.deepStrictEqual(loaded.runs, []);
    });
  });

  it("keeps the plain record name when it is free", async () => {
    await withTempDir(async (dir) => {
      assert.strictEqual(await resolveRecordPath(dir, "agentflow-x"), path.join(dir, "agentflow-x.yaml"));
    });
  });
});
