import { afterEach, beforeEach, describe, it, mock } from "node:test";
import assert from "node:assert";
import { access, mkdtemp, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { main, parseArgs } from "../src/index.js";
import { MockAdapter } from "../src/adapters/mock.js";
import type { MockResponse } from "../src/adapters/mock.js";

const fence = "```";
const fixedClock = () => new Date("2026-03-01T10:00:00.000Z");

const flowResponse: MockResponse = {
  message: `${fence}json\n${JSON.stringify({ nodes: [{ id: "a" }, { id: "b" }], edges: [{ source: "a", target: "b" }] })}\n${fence}`,
};
const verdict: MockResponse = { message: '{"score": 0.8, "justification": "fine"}' };

function scripted(responses: MockResponse[]) {
  return async () => new MockAdapter(responses);
}

describe("parseArgs", () => {
  it("treats free arguments as a prompt", () => {
    assert.deepStrictEqual(parseArgs(["hello", "world"]), {
      kind: "run",
      prompt: "hello world",
      adapter: "codex",
      output: "yaml",
      outDir: ".",
    });
  });

  it("reads run flags in both forms", () => {
    assert.deepStrictEqual(parseArgs(["--output=afl", "-a", "claude", "-o", "out", "x"]), {
      kind: "run",
      prompt: "x",
      adapter: "claude",
      output: "afl",
      outDir: "out",
    });
  });

  it("parses workflow options", () => {
    assert.deepStrictEqual(parseArgs(["workflow", "--cycles=2", "--workflow-id", "w", "--history-root", "h", "go"]), {
      kind: "workflow",
      prompt: "go",
      adapter: "codex",
      output: "yaml",
      cycles: 2,
      workflowId: "w",
      historyRoot: "h",
    });
  });

  it("parses view options with defaults", () => {
    assert.deepStrictEqual(parseArgs(["view"]), {
      kind: "view",
      directory: ".",
      host: "127.0.0.1",
      port: 5050,
    });
    assert.deepStrictEqual(parseArgs(["view", "-d", "runs", "--port=8080"]), {
      kind: "view",
      directory: "runs",
      host: "127.0.0.1",
      port: 8080,
    });
  });

  it("rejects invalid input", () => {
    assert.strictEqual(parseArgs([]), null);
    assert.strictEqual(parseArgs(["--output", "json", "x"]), null);
    assert.strictEqual(parseArgs(["workflow", "--cycles", "0", "x"]), null);
    assert.strictEqual(parseArgs(["workflow", "--out-dir", "d", "x"]), null);
    assert.strictEqual(parseArgs(["view", "--port", "99999"]), null);
    assert.strictEqual(parseArgs(["--unknown", "x"]), null);
    assert.strictEqual(parseArgs(["workflow"]), null);
  });

  it("recognises help", () => {
    assert.deepStrictEqual(parseArgs(["--help"]), { kind: "help" });
    assert.deepStrictEqual(parseArgs(["view", "-h"]), { kind: "help" });
  });
});

describe("main", () => {
  let logs: string[];
  let errors: string[];

  beforeEach(() => {
    logs = [];
    errors = [];
    mock.method(console, "log", (...args: unknown[]) => {
      logs.push(args.map(String).join(" "));
    });
    mock.method(console, "error", (...args: unknown[]) => {
      errors.push(args.map(String).join(" "));
    });
  });

  afterEach(() => {
    mock.restoreAll();
  });

  it("writes a run record and exits 0", async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), "agentflow-cli-"));
    try {
      const code = await main(["--adapter", "mock", "--out-dir", dir, "Plan", "it"], {
        createGateway: scripted([flowResponse, verdict]),
        now: fixedClock,
      });

      const recordPath = path.join(dir, "agentflow-20260301100000.yaml");
      assert.strictEqual(code, 0);
      await access(recordPath);
      assert.deepStrictEqual(logs, [`[agentflow] Wrote run record: ${recordPath}`]);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it("exits 1 when the run fails", async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), "agentflow-cli-"));
    try {
      const code = await main(["-a", "mock", "-o", dir, "Plan"], {
        createGateway: scripted([{ error: "agent offline" }]),
        now: fixedClock,
      });

      assert.strictEqual(code, 1);
      assert.deepStrictEqual(errors, ["[agentflow] Run failed: agent offline"]);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it("reports configuration errors without running", async () => {
    let created = false;
    const code = await main(["--adapter", "codex", "Plan"], {
      env: {},
      createGateway: async (settings) => {
        created = true;
        return new MockAdapter([{ message: settings.adapter }]);
      },
    });

    assert.strictEqual(code, 1);
    assert.strictEqual(created, false);
    assert.deepStrictEqual(errors, ["Configuration error: OPENAI_API_KEY must be set to use the codex adapter."]);
  });

  it("rejects unknown adapters", async () => {
    const code = await main(["--adapter", "copilot", "Plan"]);

    assert.strictEqual(code, 1);
    assert.deepStrictEqual(errors, ["Unknown adapter 'copilot'. Use 'codex', 'claude', or 'mock'."]);
  });

  it("reports a halted workflow", async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), "agentflow-cli-"));
    try {
      const code = await main(
        ["workflow", "--adapter", "mock", "--cycles", "3", "--workflow-id", "cli run", "--history-root", dir, "Go"],
        {
          createGateway: scripted([flowResponse, verdict, { error: "quota exceeded" }]),
          now: fixedClock,
        }
      );

      assert.strictEqual(code, 1);
      const historyDir = path.join(dir, "cli-run");
      assert.deepStrictEqual(logs, [
        `[cycle 1] Wrote run record: ${path.join(historyDir, "cli-run-cycle01.yaml")} (score: 0.800)`,
        `[cycle 2] Run failed: ${path.join(historyDir, "cli-run-cycle02.yaml")}`,
        `[agentflow] Workflow history written to: ${path.join(historyDir, "history.yaml")}`,
        "[agentflow] Workflow halted after cycle 2; inspect per-cycle artifacts for details.",
      ]);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it("fails when the viewer directory is missing", async () => {
    const missing = path.join(os.tmpdir(), "agentflow-missing-viewer-dir");
    const code = await main(["view", "--directory", missing]);

    assert.strictEqual(code, 1);
    assert.deepStrictEqual(errors, [`Directory not found: ${missing}`]);
  });

  it("prints usage for invalid input", async () => {
    const code = await main([]);
    assert.strictEqual(code, 1);
    assert.strictEqual(logs.length, 1);
    assert.ok(logs[0].startsWith("Usage:"));
  });
});
