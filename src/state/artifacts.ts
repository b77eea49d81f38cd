/**
 * YAML artifact writing: run records, AgentFlowLanguage files and the
 * per-workflow history ledger.
 */

import { access, mkdir, readFile, rename, writeFile } from "node:fs/promises";
import path from "node:path";
import { parse, stringify } from "yaml";
import { z } from "zod";
import type { History, HistoryEntry, RunRecord } from "./types.js";

export const HISTORY_FILENAME = "history.yaml";

/**
 * Whole-file overwrite through a sibling temp file, so readers never see a
 * partially written document.
 */
async function writeFileAtomic(filePath: string, contents: string): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });
  const tempPath = `${filePath}.tmp-${process.pid}`;
  await writeFile(tempPath, contents, "utf8");
  await rename(tempPath, filePath);
}

export function toYaml(document: unknown): string {
  return stringify(document, { aliasDuplicateObjects: false, lineWidth: 0 });
}

export async function writeRunRecord(filePath: string, record: RunRecord): Promise<void> {
  await writeFileAtomic(filePath, toYaml(record));
}

export async function writeAfl(filePath: string, afl: string): Promise<void> {
  await writeFileAtomic(filePath, afl.endsWith("\n") ? afl : `${afl}\n`);
}

export async function readRunRecord(filePath: string): Promise<unknown> {
  return parse(await readFile(filePath, "utf8"));
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Pick `<dir>/<baseName>.yaml`, adding `-1`, `-2`, ... until the name is
 * free.
 */
export async function resolveRecordPath(dir: string, baseName: string): Promise<string> {
  let candidate = path.join(dir, `${baseName}.yaml`);
  let suffix = 1;
  while (await exists(candidate)) {
    candidate = path.join(dir, `${baseName}-${suffix}.yaml`);
    suffix++;
  }
  return candidate;
}

export function aflPathFor(recordPath: string): string {
  return recordPath.replace(/\.ya?ml$/, "") + ".afl";
}

const evaluationSchema = z
  .object({
    score: z.number().nullable().catch(null),
    justification: z.string().nullable().catch(null),
    error: z.string().nullable().catch(null),
    raw_message: z.string().optional().catch(undefined),
  })
  .catch({ score: null, justification: null, error: null });

const flowSummarySchema = z
  .object({
    node_count: z.number(),
    edge_count: z.number(),
    branch_nodes: z.number(),
    loop_nodes: z.number(),
    evaluation_nodes: z.number(),
  })
  .nullable()
  .catch(null);

const historyEntrySchema = z.object({
  cycle: z.number().int().positive(),
  prompt: z.string().catch(""),
  prompt_adjustment: z.string().catch(""),
  record_path: z.string().catch(""),
  afl_path: z.string().optional().catch(undefined),
  evaluation: evaluationSchema,
  flow_summary: flowSummarySchema,
  record_status: z.enum(["pending", "completed", "failed"]).catch("pending"),
  created_at: z.string().catch(""),
});

const historySchema = z.object({
  workflow_id: z.string().catch(""),
  base_prompt: z.string().catch(""),
  created_at: z.string().catch(""),
  last_updated: z.string().catch(""),
  runs: z.array(z.unknown()).catch([]),
});

export function historyPathFor(historyDir: string): string {
  return path.join(historyDir, HISTORY_FILENAME);
}

/**
 * Load `history.yaml` from the workflow directory. Missing, unreadable or
 * non-mapping files yield null. Entries without a usable cycle number are
 * skipped; the rest are kept, with unreadable fields defaulted.
 */
export async function loadHistory(historyDir: string): Promise<History | null> {
  let text: string;
  try {
    text = await readFile(historyPathFor(historyDir), "utf8");
  } catch {
    return null;
  }

  let data: unknown;
  try {
    data = parse(text);
  } catch {
    return null;
  }

  const result = historySchema.safeParse(data);
  if (!result.success) return null;

  const runs: HistoryEntry[] = [];
  for (const raw of result.data.runs) {
    const entry = historyEntrySchema.safeParse(raw);
    if (!entry.success) continue;
    const { afl_path, ...rest } = entry.data;
    runs.push(afl_path ? { ...rest, afl_path } : rest);
  }
  return { ...result.data, runs };
}

export async function saveHistory(historyDir: string, history: History): Promise<string> {
  const historyPath = historyPathFor(historyDir);
  await writeFileAtomic(historyPath, toYaml(history));
  return historyPath;
}
