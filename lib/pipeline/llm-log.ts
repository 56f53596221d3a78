import fs from "node:fs";
import path from "node:path";
import type { BackendMode, TokenUsage } from "./core/types";
import type { FailureKind } from "./core/classify";

export interface LlmLogEntry {
  timestamp: string;
  taskType: string;
  promptName: string;
  modelId: string;
  backendMode: BackendMode;
  /** 1-based position of the strategy in the backend's order */
  attempt: number;
  durationMs: number;
  usage?: TokenUsage;
  error?: {
    kind: FailureKind;
    message: string;
    statusCode?: number;
  };
  system?: string;
  messages: LlmLogMessage[];
}

export interface LlmLogMessage {
  role: string;
  content: string;
}

/** Longest message text kept verbatim in a log entry */
export const MAX_LOGGED_CHARS = 2_000;

/**
 * Keep the head and tail of `text`, replacing the middle with a marker
 * that records how much was dropped.
 */
export function elide(text: string, maxChars = MAX_LOGGED_CHARS): string {
  if (text.length <= maxChars) return text;
  const half = Math.floor(maxChars / 2);
  const omitted = text.length - half * 2;
  return `${text.slice(0, half)}\n…[${omitted} chars omitted]…\n${text.slice(-half)}`;
}

/**
 * Shorten message bodies (which carry whole PDF texts) so log lines
 * stay bounded.
 */
export function sanitizeMessages(
  messages: { role: string; content: string }[]
): LlmLogMessage[] {
  return messages.map((m) => ({ role: m.role, content: elide(m.content) }));
}

const MAX_LOG_ENTRIES = 250;

/**
 * Append a log entry to a JSONL log file, keeping at most
 * MAX_LOG_ENTRIES entries (oldest are dropped).
 */
export function appendLogEntry(filePath: string, entry: LlmLogEntry): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.appendFileSync(filePath, JSON.stringify(entry) + "\n");

  // Trim if over limit
  const content = fs.readFileSync(filePath, "utf-8");
  const lines = content.split("\n").filter(Boolean);
  if (lines.length > MAX_LOG_ENTRIES) {
    fs.writeFileSync(filePath, lines.slice(lines.length - MAX_LOG_ENTRIES).join("\n") + "\n");
  }
}
