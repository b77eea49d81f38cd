/**
 * Artifact viewer.
 *
 * - Read-only HTTP front end over a directory of run-record YAML files.
 * - Serves a server-rendered HTML index, a per-record page and JSON APIs.
 *
 * Gotchas:
 * - This serves local files; keep it bound to localhost when possible.
 * - Files that do not parse as run records (history.yaml, stray YAML) are
 *   left out of the index.
 */
import { readdir, realpath, stat } from "node:fs/promises";
import http from "node:http";
import path from "node:path";
import { URL } from "node:url";
import { readRunRecord } from "./state/artifacts.js";
import { isPlainObject } from "./utils/json.js";

export const DEFAULT_VIEWER_PORT = 5050;
export const DEFAULT_VIEWER_HOST = "127.0.0.1";

export type RecordListing = {
  name: string;
  id: string;
  status: string;
  started_at: string;
};

type RecordNodeView = {
  id: string;
  type: string;
  status: string;
  summary: string;
  depends_on: string[];
};

export function isSafeRecordName(name: string): boolean {
  return /^[A-Za-z0-9._-]+\.ya?ml$/.test(name) && !name.startsWith(".");
}

function isWithin(root: string, target: string): boolean {
  const relative = path.relative(root, target);
  if (!relative) return false;
  return !relative.startsWith("..") && !path.isAbsolute(relative);
}

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

function asText(value: unknown): string {
  return typeof value === "string" ? value : "";
}

/**
 * Read and parse `<directory>/<name>` if it is a run record inside the
 * directory; null otherwise.
 */
export async function loadRecord(
  directory: string,
  name: string
): Promise<Record<string, unknown> | null> {
  if (!isSafeRecordName(name)) return null;
  let root: string;
  let filePath: string;
  try {
    root = await realpath(directory);
    filePath = await realpath(path.join(root, name));
  } catch {
    return null;
  }
  if (!isWithin(root, filePath)) return null;

  try {
    const stats = await stat(filePath);
    if (!stats.isFile()) return null;
    const data = await readRunRecord(filePath);
    if (!isPlainObject(data) || !Array.isArray(data.nodes)) return null;
    return data;
  } catch {
    return null;
  }
}

/**
 * Run records in the directory, newest first.
 */
export async function listRecords(directory: string): Promise<RecordListing[]> {
  let names: string[];
  try {
    names = (await readdir(directory, { withFileTypes: true }))
      .filter((entry) => entry.isFile() && isSafeRecordName(entry.name))
      .map((entry) => entry.name);
  } catch {
    return [];
  }

  const listings: RecordListing[] = [];
  await Promise.all(
    names.map(async (name) => {
      const record = await loadRecord(directory, name);
      if (!record) return;
      listings.push({
        name,
        id: asText(record.id) || name,
        status: asText(record.status) || "unknown",
        started_at: asText(record.started_at),
      });
    })
  );
  return listings.sort((a, b) => (a.started_at < b.started_at ? 1 : a.started_at > b.started_at ? -1 : 0));
}

function nodeViews(record: Record<string, unknown>): RecordNodeView[] {
  const nodes = Array.isArray(record.nodes) ? record.nodes : [];
  return nodes.filter(isPlainObject).map((node) => ({
    id: asText(node.id),
    type: asText(node.type),
    status: asText(node.status),
    summary: asText(node.summary),
    depends_on: Array.isArray(node.depends_on) ? node.depends_on.map(String) : [],
  }));
}

function page(title: string, body: string): string {
  return [
    "<!doctype html>",
    '<html lang="en">',
    "<head>",
    '<meta charset="utf-8">',
    `<title>${escapeHtml(title)}</title>`,
    "</head>",
    "<body>",
    body,
    "</body>",
    "</html>",
  ].join("\n");
}

export function renderIndex(listings: RecordListing[]): string {
  if (listings.length === 0) {
    return page("AgentFlow runs", "<h1>AgentFlow runs</h1>\n<p>No run records found.</p>");
  }
  const rows = listings.map(
    (item) =>
      `<tr><td><a href="/records/${encodeURIComponent(item.name)}">${escapeHtml(item.id)}</a></td>` +
      `<td>${escapeHtml(item.status)}</td><td>${escapeHtml(item.started_at)}</td></tr>`
  );
  return page(
    "AgentFlow runs",
    ["<h1>AgentFlow runs</h1>", "<table>", "<tr><th>Run</th><th>Status</th><th>Started</th></tr>", ...rows, "</table>"].join("\n")
  );
}

export function renderRecord(record: Record<string, unknown>): string {
  const id = asText(record.id) || "run";
  const rows = nodeViews(record).map(
    (node) =>
      `<tr><td>${escapeHtml(node.id)}</td><td>${escapeHtml(node.type)}</td>` +
      `<td>${escapeHtml(node.status)}</td><td>${escapeHtml(node.summary)}</td>` +
      `<td>${escapeHtml(node.depends_on.join(", "))}</td></tr>`
  );
  const error = isPlainObject(record.error) ? asText(record.error.message) : "";
  return page(
    id,
    [
      `<h1>${escapeHtml(id)}</h1>`,
      `<p>Status: ${escapeHtml(asText(record.status))}</p>`,
      `<p>Prompt: ${escapeHtml(asText(record.prompt))}</p>`,
      error ? `<p>Error: ${escapeHtml(error)}</p>` : "",
      "<table>",
      "<tr><th>Node</th><th>Type</th><th>Status</th><th>Summary</th><th>Depends on</th></tr>",
      ...rows,
      "</table>",
      '<p><a href="/">All runs</a></p>',
    ]
      .filter(Boolean)
      .join("\n")
  );
}

function sendJson(res: http.ServerResponse, statusCode: number, payload: unknown): void {
  res.writeHead(statusCode, { "content-type": "application/json; charset=utf-8" });
  res.end(JSON.stringify(payload));
}

function sendHtml(res: http.ServerResponse, statusCode: number, html: string): void {
  res.writeHead(statusCode, { "content-type": "text/html; charset=utf-8" });
  res.end(html);
}

/**
 * Path segments, percent-decoded; null when an escape is malformed.
 */
function decodeSegments(pathname: string): string[] | null {
  try {
    return pathname.split("/").filter(Boolean).map(decodeURIComponent);
  } catch {
    return null;
  }
}

export async function routeRequest(
  req: http.IncomingMessage,
  res: http.ServerResponse,
  directory: string
): Promise<void> {
  applySecurityHeaders(res);
  if (!req.url || (req.method && req.method !== "GET")) {
    res.writeHead(req.url ? 405 : 400, { "content-type": "text/plain; charset=utf-8" });
    res.end(req.url ? "Method not allowed" : "Bad request");
    return;
  }

  const url = new URL(req.url, `http://${req.headers.host ?? "localhost"}`);
  const segments = decodeSegments(url.pathname);
  if (!segments) {
    sendJson(res, 400, { error: "invalid_path" });
    return;
  }

  if (segments.length === 0) {
    sendHtml(res, 200, renderIndex(await listRecords(directory)));
    return;
  }

  if (segments.length === 2 && segments[0] === "api" && segments[1] === "records") {
    sendJson(res, 200, await listRecords(directory));
    return;
  }

  if (segments.length === 3 && segments[0] === "api" && segments[1] === "records") {
    if (!isSafeRecordName(segments[2])) {
      sendJson(res, 400, { error: "invalid_record_name" });
      return;
    }
    const record = await loadRecord(directory, segments[2]);
    if (!record) {
      sendJson(res, 404, { error: "record_not_found" });
      return;
    }
    sendJson(res, 200, record);
    return;
  }

  if (segments.length === 2 && segments[0] === "records") {
    const record = isSafeRecordName(segments[1]) ? await loadRecord(directory, segments[1]) : null;
    if (!record) {
      sendHtml(res, 404, page("Not found", "<h1>Run record not found</h1>"));
      return;
    }
    sendHtml(res, 200, renderRecord(record));
    return;
  }

  res.writeHead(404, { "content-type": "text/plain; charset=utf-8" });
  res.end("Not found");
}

export function createViewerServer(directory: string): http.Server {
  return http.createServer(async (req, res) => {
    try {
      await routeRequest(req, res, directory);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      sendJson(res, 500, { error: "internal_error", message });
    }
  });
}

/**
 * Start the viewer and resolve once it is listening.
 */
export async function runViewer(options: {
  directory: string;
  host: string;
  port: number;
}): Promise<http.Server> {
  const server = createViewerServer(options.directory);
  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(options.port, options.host, () => resolve());
  });
  console.log(`[viewer] Listening on http://${options.host}:${options.port}`);
  console.log(`[viewer] Records dir: ${options.directory}`);
  return server;
}

function applySecurityHeaders(res: http.ServerResponse): void {
  res.setHeader("cache-control", "no-store");
  res.setHeader("x-content-type-options", "nosniff");
  res.setHeader("referrer-policy", "no-referrer");
  res.setHeader("cross-origin-resource-policy", "same-origin");
  res.setHeader(
    "content-security-policy",
    ["default-src 'none'", "base-uri 'none'", "form-action 'none'", "frame-ancestors 'none'", "style-src 'self'"].join(
      "; "
    )
  );
}
