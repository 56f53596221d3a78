import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import {
  appendLogEntry,
  elide,
  sanitizeMessages,
  type LlmLogEntry,
} from "../llm-log";

function entry(attempt: number): LlmLogEntry {
  return {
    timestamp: "2026-01-01T00:00:00.000Z",
    taskType: "notes",
    promptName: "study_notes",
    modelId: "gpt-4o-mini",
    backendMode: "primary",
    attempt,
    durationMs: 10,
    messages: [{ role: "user", content: "hello" }],
  };
}

describe("elide", () => {
  it("keeps short text", () => {
    expect(elide("abc", 10)).toBe("abc");
  });

  it("keeps the head and tail of long text", () => {
    expect(elide("abcdefghijkl", 6)).toBe("abc\n…[6 chars omitted]…\njkl");
  });
});

describe("sanitizeMessages", () => {
  it("elides long message content", () => {
    const [message] = sanitizeMessages([{ role: "user", content: "x".repeat(3000) }]);
    expect(message.role).toBe("user");
    expect(message.content).toBe(
      `${"x".repeat(1000)}\n…[1000 chars omitted]…\n${"x".repeat(1000)}`
    );
  });
});

describe("appendLogEntry", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "llm-log-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("creates the directory and appends JSON lines", () => {
    const file = path.join(dir, "logs", "llm.jsonl");

    appendLogEntry(file, entry(1));
    appendLogEntry(file, entry(2));

    const lines = fs.readFileSync(file, "utf-8").trim().split("\n");
    expect(lines.map((l) => JSON.parse(l).attempt)).toEqual([1, 2]);
  });

  it("keeps only the newest 250 entries", () => {
    const file = path.join(dir, "llm.jsonl");

    for (let i = 1; i <= 252; i++) appendLogEntry(file, entry(i));

    const lines = fs.readFileSync(file, "utf-8").trim().split("\n");
    expect(lines).toHaveLength(250);
    expect(JSON.parse(lines[0]).attempt).toBe(3);
    expect(JSON.parse(lines[249]).attempt).toBe(252);
  });
});
