import { describe, it, expect } from "vitest";
import {
  describeIssues,
  isNotesStyle,
  notesRequestSchema,
  notesStyleSchema,
} from "../notes-schema";

const pdfBytes = new Uint8Array([0x25, 0x50, 0x44, 0x46]);

const validInput = {
  topic: "Photosynthesis",
  pdfBytes,
  apiKey: "test-secret",
};

describe("notesStyleSchema", () => {
  it("accepts the three styles", () => {
    for (const style of ["bulleted", "outline", "summary"]) {
      expect(notesStyleSchema.safeParse(style).success).toBe(true);
    }
  });

  it("rejects other values with a readable message", () => {
    const result = notesStyleSchema.safeParse("haiku");
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].message).toBe(
        "notes_style must be one of bulleted, outline, summary"
      );
    }
  });

  it("isNotesStyle narrows strings", () => {
    expect(isNotesStyle("outline")).toBe(true);
    expect(isNotesStyle("Outline")).toBe(false);
  });
});

describe("notesRequestSchema", () => {
  it("defaults the style to bulleted", () => {
    const parsed = notesRequestSchema.parse(validInput);
    expect(parsed.notesStyle).toBe("bulleted");
    expect(parsed.studentName).toBeUndefined();
  });

  it("trims text fields", () => {
    const parsed = notesRequestSchema.parse({
      ...validInput,
      topic: "  Cells  ",
      studentName: " Ana ",
      notesStyle: " outline ",
      apiKey: " test-secret ",
    });
    expect(parsed).toMatchObject({
      topic: "Cells",
      studentName: "Ana",
      notesStyle: "outline",
      apiKey: "test-secret",
    });
  });

  it("treats a blank student name as absent", () => {
    const parsed = notesRequestSchema.parse({ ...validInput, studentName: "   " });
    expect(parsed.studentName).toBeUndefined();
  });

  it("requires a topic", () => {
    const result = notesRequestSchema.safeParse({ ...validInput, topic: "  " });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(describeIssues(result.error)).toBe("topic: topic is required");
    }
  });

  it("requires a non-empty pdf", () => {
    const result = notesRequestSchema.safeParse({
      ...validInput,
      pdfBytes: new Uint8Array(),
    });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(describeIssues(result.error)).toBe("pdfBytes: pdf is empty");
    }
  });

  it("reports every invalid field", () => {
    const result = notesRequestSchema.safeParse({
      ...validInput,
      topic: "",
      notesStyle: "haiku",
      apiKey: "",
    });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(describeIssues(result.error)).toBe(
        [
          "topic: topic is required",
          "notesStyle: notes_style must be one of bulleted, outline, summary",
          "apiKey: an OpenAI API key is required",
        ].join("; ")
      );
    }
  });

  it("rejects an over-long topic", () => {
    const result = notesRequestSchema.safeParse({
      ...validInput,
      topic: "x".repeat(201),
    });
    expect(result.success).toBe(false);
  });
});
