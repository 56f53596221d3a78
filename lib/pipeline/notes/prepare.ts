import { DEFAULT_MAX_SOURCE_CHARS } from "../../config";
import { ValidationError } from "../errors";
import { renderPrompt } from "../prompt";
import { isNotesStyle, NOTES_STYLES, type NotesStyle } from "./notes-schema";

export const DEFAULT_PROMPT_NAME = "study_notes";

// A whitespace cut closer to the start than this is worse than a hard cut.
const MIN_BOUNDARY_RATIO = 0.8;

export interface PreparedPrompt {
  system: string;
  instruction: string;
  style: NotesStyle;
  truncated: boolean;
  /** Length of the normalized extracted text */
  sourceChars: number;
  /** Length of the part actually placed in the instruction */
  includedChars: number;
}

export interface PrepareNotesPromptOptions {
  text: string;
  topic: string;
  studentName?: string;
  style: string;
  styleGuidance: Record<NotesStyle, string>;
  maxSourceChars?: number;
  promptName?: string;
}

export function normalizeText(text: string): string {
  return text
    .replace(/\r\n?/g, "\n")
    .replace(/[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F]/g, "")
    .replace(/[ \t]+$/gm, "")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}

/**
 * Cut `text` to at most `maxChars`, preferring the last whitespace at or
 * after 80% of the budget.
 */
export function truncateText(
  text: string,
  maxChars: number
): { text: string; truncated: boolean } {
  if (text.length <= maxChars) return { text, truncated: false };

  // One extra char so a space right at the budget counts as a boundary
  const window = text.slice(0, maxChars + 1);
  const boundary = window.search(/\s\S*$/);
  let cut =
    boundary >= Math.floor(maxChars * MIN_BOUNDARY_RATIO) ? boundary : maxChars;
  // Never split a surrogate pair
  if (isHighSurrogate(text.charCodeAt(cut - 1))) cut--;

  return { text: text.slice(0, cut).trimEnd(), truncated: true };
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

export async function prepareNotesPrompt(
  options: PrepareNotesPromptOptions
): Promise<PreparedPrompt> {
  const { style } = options;
  if (!isNotesStyle(style)) {
    throw new ValidationError(
      "unknown_style",
      `Unknown notes style "${style}". Choose one of: ${NOTES_STYLES.join(", ")}`,
      "notes_style"
    );
  }

  const normalized = normalizeText(options.text);
  const budget = options.maxSourceChars ?? DEFAULT_MAX_SOURCE_CHARS;
  const { text: sourceText, truncated } = truncateText(normalized, budget);

  const promptName = options.promptName ?? DEFAULT_PROMPT_NAME;
  const messages = await renderPrompt(promptName, {
    topic: options.topic,
    student_name: options.studentName,
    style,
    style_guidance: options.styleGuidance[style],
    truncated,
    source_chars: normalized.length,
    included_chars: sourceText.length,
    source_text: sourceText,
  });

  const system = messages.find((m) => m.role === "system")?.content;
  const instruction = messages.find((m) => m.role === "user")?.content;
  if (!system || !instruction) {
    throw new Error(
      `Prompt "${promptName}" must define a system and a user {% chat %} block`
    );
  }

  return {
    system,
    instruction,
    style,
    truncated,
    sourceChars: normalized.length,
    includedChars: sourceText.length,
  };
}
