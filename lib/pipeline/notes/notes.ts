import { Observable } from "rxjs";
import type { AppConfig } from "../../config";
import { extractText, type ExtractedDocument } from "../../pdf/extract";
import {
  createNotesBackend,
  type CreateNotesBackendOptions,
} from "../core/llm";
import { createTransportConfig } from "../core/transport";
import type { BackendMode, BackendResult, NotesBackend, TokenUsage } from "../core/types";
import {
  BackendError,
  ExtractionError,
  PipelineError,
  ValidationError,
} from "../errors";
import type { LlmLogEntry } from "../llm-log";
import {
  describeIssues,
  notesRequestSchema,
  type NotesRequest,
  type NotesRequestInput,
  type NotesStyle,
} from "./notes-schema";
import { prepareNotesPrompt, type PreparedPrompt } from "./prepare";

export interface NotesResult {
  notes: string;
  styleUsed: NotesStyle;
  backendMode: BackendMode;
  modelId: string;
  truncated: boolean;
  sourceChars: number;
  includedChars: number;
  pageCount: number;
  documentTitle?: string;
  usage?: TokenUsage;
}

export type NotesPhase =
  | "validating"
  | "extracting"
  | "preparing"
  | "generating"
  | "done";

export interface NotesProgress {
  phase: NotesPhase;
}

export interface GenerateNotesOptions {
  config: AppConfig;
  /** Builds the per-request backend; defaults to the OpenAI backend */
  createBackend?: (options: CreateNotesBackendOptions) => NotesBackend;
  onProgress?: (progress: NotesProgress) => void;
  onLog?: (entry: LlmLogEntry) => void;
}

export const NO_TEXT_MESSAGE =
  "No extractable text found in the PDF (scanned document?). Run it through OCR and upload it again.";

/**
 * Validate → extract → prepare → invoke. Every failure leaves as a
 * PipelineError; nothing here retries.
 */
export async function generateNotes(
  input: NotesRequestInput,
  options: GenerateNotesOptions
): Promise<NotesResult> {
  const { config } = options;
  const report = (phase: NotesPhase) => options.onProgress?.({ phase });

  report("validating");
  const request = validateRequest(input);

  report("extracting");
  const doc = extractDocument(request.pdfBytes);
  if (!doc.hasText) {
    throw new PipelineError("no_extractable_text", NO_TEXT_MESSAGE);
  }

  report("preparing");
  const prompt = await preparePrompt(doc, request, config);

  report("generating");
  const createBackend = options.createBackend ?? createNotesBackend;
  const backend = createBackend({
    apiKey: request.apiKey,
    modelId: config.model,
    temperature: config.temperature,
    maxRetries: config.max_retries,
    baseURL: config.base_url,
    transportConfig: createTransportConfig({
      timeoutMs: config.request_timeout_ms,
      connectTimeoutMs: config.connect_timeout_ms,
    }),
    promptName: config.prompt,
    onLog: options.onLog,
  });

  let generated: BackendResult;
  try {
    generated = await backend.generate(prompt);
  } catch (err) {
    throw toPipelineError(err);
  } finally {
    await backend.close();
  }

  report("done");
  return {
    notes: generated.text,
    styleUsed: prompt.style,
    backendMode: generated.backendMode,
    modelId: generated.modelId,
    truncated: prompt.truncated,
    sourceChars: prompt.sourceChars,
    includedChars: prompt.includedChars,
    pageCount: doc.pageCount,
    documentTitle: doc.pdfMetadata.title,
    usage: generated.usage,
  };
}

export type NotesEvent =
  | NotesProgress
  | { phase: "result"; result: NotesResult };

/**
 * The same run as generateNotes, as a stream of progress events that
 * ends with the result.
 */
export function notesProgress$(
  input: NotesRequestInput,
  options: GenerateNotesOptions
): Observable<NotesEvent> {
  return new Observable<NotesEvent>((subscriber) => {
    void (async () => {
      try {
        const result = await generateNotes(input, {
          ...options,
          onProgress: (progress) => {
            options.onProgress?.(progress);
            subscriber.next(progress);
          },
        });
        subscriber.next({ phase: "result", result });
        subscriber.complete();
      } catch (err) {
        subscriber.error(err);
      }
    })();
  });
}

// ============================================================================
// Stages
// ============================================================================

function validateRequest(input: NotesRequestInput): NotesRequest {
  const parsed = notesRequestSchema.safeParse(input);
  if (!parsed.success) {
    throw new PipelineError("invalid_input", describeIssues(parsed.error), {
      cause: parsed.error,
    });
  }
  return parsed.data;
}

function extractDocument(pdfBytes: Uint8Array): ExtractedDocument {
  try {
    return extractText(pdfBytes);
  } catch (err) {
    if (err instanceof ExtractionError) {
      throw new PipelineError(
        "invalid_input",
        `PDF text extraction failed: ${err.message}`,
        { cause: err }
      );
    }
    throw err;
  }
}

async function preparePrompt(
  doc: ExtractedDocument,
  request: NotesRequest,
  config: AppConfig
): Promise<PreparedPrompt> {
  try {
    return await prepareNotesPrompt({
      text: doc.rawText,
      topic: request.topic,
      studentName: request.studentName,
      style: request.notesStyle,
      styleGuidance: config.notes_styles,
      maxSourceChars: config.max_source_chars,
      promptName: config.prompt,
    });
  } catch (err) {
    if (err instanceof ValidationError) {
      throw new PipelineError("invalid_input", err.message, { cause: err });
    }
    throw err;
  }
}

function toPipelineError(err: unknown): PipelineError {
  if (!(err instanceof BackendError)) {
    const message = err instanceof Error ? err.message : String(err);
    return new PipelineError("backend_failure", message, { cause: err });
  }
  switch (err.kind) {
    case "auth":
      return new PipelineError(
        "auth",
        `The provider rejected the API key: ${err.message}`,
        { cause: err }
      );
    case "rate_limit":
      return new PipelineError(
        "rate_limited",
        `The provider is rate limiting this key or its quota is used up: ${err.message}`,
        { cause: err }
      );
    case "fallback_exhausted":
      return new PipelineError("capability_fallback_exhausted", err.message, {
        cause: err,
      });
    case "transport":
      return new PipelineError(
        "backend_failure",
        `Could not reach the provider: ${err.message}`,
        { cause: err }
      );
    default:
      return new PipelineError(
        "backend_failure",
        `The provider failed to generate notes: ${err.message}`,
        { cause: err }
      );
  }
}
