/**
 * Pull structured output (flow specs, AgentFlowLanguage text) out of
 * free-form agent messages.
 *
 * Nothing here throws: malformed or missing blocks mean "not found".
 */

import { isPlainObject, tryParseJson } from "../utils/json.js";
import { flowSpecSchema } from "./schema.js";
import type { FlowSpec } from "./types.js";

const FENCE_PATTERN = /```[ \t]*([^\n`]*)\n([\s\S]*?)```/g;

type FencedBlock = {
  tags: string[];
  body: string;
};

function findFencedBlocks(text: string): FencedBlock[] {
  const blocks: FencedBlock[] = [];
  for (const match of text.matchAll(FENCE_PATTERN)) {
    const tags = match[1]
      .trim()
      .toLowerCase()
      .split(/[\s:,]+/)
      .filter(Boolean);
    blocks.push({ tags, body: match[2].trim() });
  }
  return blocks;
}

/**
 * Parsed objects from every ```json block, in order of appearance.
 * The info string may carry a `flow_spec` hint after the language tag.
 */
export function findJsonObjects(text: string): Record<string, unknown>[] {
  const objects: Record<string, unknown>[] = [];
  for (const block of findFencedBlocks(text)) {
    if (!block.tags.includes("json")) continue;
    const parsed = tryParseJson(block.body);
    if (isPlainObject(parsed)) {
      objects.push(parsed);
    }
  }
  return objects;
}

/**
 * Accept either `{ "flow_spec": {...} }` or the flow spec object itself.
 */
export function coerceFlowSpec(value: unknown): FlowSpec | null {
  if (!isPlainObject(value)) return null;
  const candidate = isPlainObject(value.flow_spec) ? value.flow_spec : value;
  const result = flowSpecSchema.safeParse(candidate);
  return result.success ? result.data : null;
}

export function extractFlowSpec(text: string): FlowSpec | null {
  for (const candidate of findJsonObjects(text)) {
    const spec = coerceFlowSpec(candidate);
    if (spec) return spec;
  }
  return null;
}

/**
 * AgentFlowLanguage rendering: an `afl` string inside a JSON block, or a
 * fenced block tagged `afl`.
 */
export function extractAfl(text: string): string | null {
  for (const candidate of findJsonObjects(text)) {
    if (typeof candidate.afl === "string" && candidate.afl.trim()) {
      return candidate.afl.trim();
    }
  }
  for (const block of findFencedBlocks(text)) {
    if (block.tags[0] === "afl" && block.body) {
      return block.body;
    }
  }
  return null;
}
