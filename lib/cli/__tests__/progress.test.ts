import { describe, it, expect } from "vitest";
import { concat, EMPTY, of, throwError } from "rxjs";
import { formatDuration, runWithProgress, type ProgressStream } from "../progress";

const CLEAR_LINE = "\x1b[2K";

function memoryStream() {
  const chunks: string[] = [];
  const stream: ProgressStream = {
    write(chunk: string) {
      chunks.push(chunk);
      return true;
    },
  };
  return { stream, output: () => chunks.join("") };
}

describe("runWithProgress", () => {
  it("resolves with the last value and prints the final step", async () => {
    const { stream, output } = memoryStream();

    const last = await runWithProgress(of("extracting", "generating", "done"), (s) => s, {
      label: "notes",
      stream,
      now: () => 0,
    });

    expect(last).toBe("done");
    expect(output()).toBe(`\r${CLEAR_LINE}✔ notes  done  0s\n`);
  });

  it("resolves undefined for an empty source", async () => {
    const { stream, output } = memoryStream();

    const last = await runWithProgress(EMPTY, (s: string) => s, {
      label: "notes",
      stream,
      now: () => 0,
    });

    expect(last).toBeUndefined();
    expect(output()).toBe(`\r${CLEAR_LINE}✔ notes  starting  0s\n`);
  });

  it("rejects with the source error and prints it", async () => {
    const { stream, output } = memoryStream();
    const source = concat(of("extracting"), throwError(() => new Error("no text")));

    await expect(
      runWithProgress(source, (s) => s, { label: "notes", stream })
    ).rejects.toThrow("no text");
    expect(output()).toBe(`\r${CLEAR_LINE}✗ notes  no text\n`);
  });
});

describe("formatDuration", () => {
  it.each([
    [0, "0s"],
    [59_999, "59s"],
    [61_000, "1m 1s"],
    [3_726_000, "1h 2m"],
  ])("formats %i ms as %s", (ms, expected) => {
    expect(formatDuration(ms)).toBe(expected);
  });
});
