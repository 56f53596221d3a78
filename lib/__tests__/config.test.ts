import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import {
  DEFAULT_MAX_SOURCE_CHARS,
  deepMerge,
  loadConfig,
} from "../config";

describe("config", () => {
  it("loads the project config.yaml", () => {
    const config = loadConfig();
    expect(config.model).toBe("gpt-4o-mini");
    expect(config.max_source_chars).toBe(DEFAULT_MAX_SOURCE_CHARS);
    expect(config.prompt).toBe("study_notes");
  });

  it("has guidance for all three styles", () => {
    const config = loadConfig();
    for (const style of ["bulleted", "outline", "summary"] as const) {
      expect(config.notes_styles[style].length).toBeGreaterThan(0);
    }
    expect(config.notes_styles.outline).toContain("I., A., 1., a.");
  });
});

describe("loadConfig with files", () => {
  let dir: string;

  function write(name: string, content: string): string {
    const file = path.join(dir, name);
    fs.writeFileSync(file, content);
    return file;
  }

  const styles = `notes_styles:
  bulleted: bullets
  outline: outline
  summary: summary
`;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "notes-config-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("fills defaults for omitted keys", () => {
    const config = loadConfig(write("config.yaml", styles));
    expect(config).toMatchObject({
      model: "gpt-4o-mini",
      temperature: 0.2,
      max_retries: 0,
      request_timeout_ms: 60_000,
      connect_timeout_ms: 10_000,
      max_source_chars: DEFAULT_MAX_SOURCE_CHARS,
    });
    expect(config.base_url).toBeUndefined();
    expect(config.llm_log).toBeUndefined();
  });

  it("applies an override file on top of the base", () => {
    const base = write("config.yaml", `model: gpt-4o\n${styles}`);
    const override = write(
      "override.yaml",
      "max_source_chars: 2000\nnotes_styles:\n  summary: short summary\n"
    );

    const config = loadConfig(base, override);

    expect(config.model).toBe("gpt-4o");
    expect(config.max_source_chars).toBe(2000);
    expect(config.notes_styles).toEqual({
      bulleted: "bullets",
      outline: "outline",
      summary: "short summary",
    });
  });

  it("rejects a budget below the minimum", () => {
    const file = write("config.yaml", `max_source_chars: 10\n${styles}`);
    expect(() => loadConfig(file)).toThrow();
  });

  it("rejects a config missing a style", () => {
    const file = write("config.yaml", "notes_styles:\n  bulleted: bullets\n");
    expect(() => loadConfig(file)).toThrow();
  });

  it("rejects a file that is not a mapping", () => {
    const file = write("config.yaml", "- just\n- a list\n");
    expect(() => loadConfig(file)).toThrow();
  });
});

describe("deepMerge", () => {
  it("merges nested objects and lets overrides win", () => {
    expect(
      deepMerge(
        { a: 1, nested: { x: 1, y: 2 }, list: [1, 2] },
        { b: 2, nested: { y: 3 }, list: [3] }
      )
    ).toEqual({ a: 1, b: 2, nested: { x: 1, y: 3 }, list: [3] });
  });

  it("does not mutate its inputs", () => {
    const base = { nested: { x: 1 } };
    deepMerge(base, { nested: { x: 2 } });
    expect(base).toEqual({ nested: { x: 1 } });
  });
});
