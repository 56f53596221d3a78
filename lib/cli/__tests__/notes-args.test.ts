import { describe, it, expect } from "vitest";
import { parseNotesArgs } from "../notes";

describe("parseNotesArgs", () => {
  it("parses a full command line", () => {
    expect(
      parseNotesArgs([
        "handout.pdf",
        "--topic",
        "Photosynthesis",
        "--student",
        "Ana",
        "--style",
        "outline",
        "--config",
        "custom.yaml",
      ])
    ).toEqual({
      ok: true,
      args: {
        pdfPath: "handout.pdf",
        topic: "Photosynthesis",
        studentName: "Ana",
        style: "outline",
        configPath: "custom.yaml",
      },
    });
  });

  it("accepts flags before the path", () => {
    const parsed = parseNotesArgs(["--topic", "Cells", "handout.pdf"]);
    expect(parsed).toEqual({
      ok: true,
      args: {
        pdfPath: "handout.pdf",
        topic: "Cells",
        studentName: undefined,
        style: undefined,
        configPath: undefined,
      },
    });
  });

  it("requires a topic", () => {
    expect(parseNotesArgs(["handout.pdf"])).toEqual({
      ok: false,
      error: "Missing --topic",
    });
  });

  it("requires a path", () => {
    expect(parseNotesArgs(["--topic", "Cells"])).toEqual({
      ok: false,
      error: "Missing <pdf_path>",
    });
  });

  it("rejects a flag without a value", () => {
    expect(parseNotesArgs(["handout.pdf", "--topic"])).toEqual({
      ok: false,
      error: "--topic requires a value",
    });
  });

  it("rejects unknown options", () => {
    expect(parseNotesArgs(["handout.pdf", "--topic", "Cells", "--verbose"])).toEqual({
      ok: false,
      error: "Unknown option: --verbose",
    });
  });

  it("rejects extra arguments", () => {
    expect(parseNotesArgs(["a.pdf", "b.pdf", "--topic", "Cells"])).toEqual({
      ok: false,
      error: "Unexpected argument: b.pdf",
    });
  });
});
