import { z } from "zod/v4";

export const NOTES_STYLES = ["bulleted", "outline", "summary"] as const;

export const notesStyleSchema = z.enum(NOTES_STYLES, {
  error: `notes_style must be one of ${NOTES_STYLES.join(", ")}`,
});

export type NotesStyle = z.infer<typeof notesStyleSchema>;

export function isNotesStyle(value: string): value is NotesStyle {
  return notesStyleSchema.safeParse(value).success;
}

export const MAX_TOPIC_CHARS = 200;
export const MAX_STUDENT_NAME_CHARS = 120;

export const notesRequestSchema = z.object({
  topic: z
    .string()
    .trim()
    .min(1, "topic is required")
    .max(MAX_TOPIC_CHARS, `topic must be at most ${MAX_TOPIC_CHARS} characters`),
  studentName: z
    .string()
    .trim()
    .max(
      MAX_STUDENT_NAME_CHARS,
      `student_name must be at most ${MAX_STUDENT_NAME_CHARS} characters`
    )
    .optional()
    .transform((name) => (name ? name : undefined)),
  notesStyle: z.string().trim().default("bulleted").pipe(notesStyleSchema),
  pdfBytes: z
    .instanceof(Uint8Array)
    .refine((bytes) => bytes.byteLength > 0, "pdf is empty"),
  apiKey: z.string().trim().min(1, "an OpenAI API key is required"),
});

export type NotesRequestInput = z.input<typeof notesRequestSchema>;
export type NotesRequest = z.output<typeof notesRequestSchema>;

/** One line per issue: "field: message". */
export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const field = issue.path.map(String).join(".");
      return field ? `${field}: ${issue.message}` : issue.message;
    })
    .join("; ");
}
