"use client";

import { useRef, useState } from "react";
import { z } from "zod/v4";
import { formStyles } from "./ui/form-styles";

const notesResponseSchema = z.object({
  notes: z.string(),
  style: z.string(),
  backendMode: z.string(),
  modelId: z.string(),
  truncated: z.boolean(),
  sourceChars: z.number(),
  includedChars: z.number(),
  pageCount: z.number(),
  documentTitle: z.string().optional(),
});

const errorResponseSchema = z.object({
  error: z.string(),
  detail: z.string(),
});

type NotesResponse = z.infer<typeof notesResponseSchema>;

export default function NotesForm() {
  const formRef = useRef<HTMLFormElement>(null);
  const [submitting, setSubmitting] = useState(false);
  const [result, setResult] = useState<NotesResponse | null>(null);
  const [error, setError] = useState("");

  async function handleSubmit(e: React.FormEvent<HTMLFormElement>) {
    e.preventDefault();
    if (!formRef.current) return;

    setSubmitting(true);
    setResult(null);
    setError("");

    try {
      const res = await fetch("/api/notes", {
        method: "POST",
        body: new FormData(formRef.current),
      });
      const body: unknown = await res.json().catch(() => null);

      if (!res.ok) {
        const parsed = errorResponseSchema.safeParse(body);
        setError(
          parsed.success
            ? `${parsed.data.error}: ${parsed.data.detail}`
            : `Request failed (${res.status})`
        );
        return;
      }

      const parsed = notesResponseSchema.safeParse(body);
      if (!parsed.success) {
        setError("Unexpected response from the server.");
        return;
      }
      setResult(parsed.data);
    } catch (err) {
      setError(err instanceof Error ? err.message : String(err));
    } finally {
      setSubmitting(false);
    }
  }

  return (
    <>
      <form ref={formRef} onSubmit={handleSubmit} className={formStyles.card}>
        <div className={formStyles.body}>
          <label className={formStyles.label}>
            Topic
            <input name="topic" required maxLength={200} className={formStyles.input} />
          </label>
          <label className={formStyles.label}>
            Student name <span className={formStyles.hint}>(optional)</span>
            <input name="student_name" maxLength={120} className={formStyles.input} />
          </label>
          <label className={formStyles.label}>
            Notes style
            <select name="notes_style" defaultValue="bulleted" className={formStyles.input}>
              <option value="bulleted">Bulleted</option>
              <option value="outline">Outline</option>
              <option value="summary">Summary</option>
            </select>
          </label>
          <label className={formStyles.label}>
            PDF
            <input
              name="pdf"
              type="file"
              accept="application/pdf,.pdf"
              required
              className={formStyles.input}
            />
          </label>
          <label className={formStyles.label}>
            OpenAI API key
            <input
              name="openai_key"
              type="password"
              autoComplete="off"
              required
              className={formStyles.input}
            />
          </label>
        </div>
        <div className={formStyles.footer}>
          <button type="submit" disabled={submitting} className={formStyles.primaryBtn}>
            {submitting ? "Generating…" : "Generate notes"}
          </button>
        </div>
      </form>

      {error && <div className={formStyles.error}>{error}</div>}

      {result && (
        <section>
          <pre className={formStyles.notes}>{result.notes}</pre>
          <p className={`mt-2 ${formStyles.notice}`}>
            {result.pageCount} page{result.pageCount === 1 ? "" : "s"},{" "}
            {result.style} style, {result.modelId} ({result.backendMode} API)
            {result.truncated &&
              ` · only the first ${result.includedChars} of ${result.sourceChars} characters were used`}
          </p>
        </section>
      )}
    </>
  );
}
