import { loadConfig, type AppConfig } from "../config";
import { httpStatusFor, PipelineError } from "../pipeline/errors";
import { generateNotes, type GenerateNotesOptions } from "../pipeline/notes/notes";

const ACCEPTED_CONTENT_TYPES = new Set([
  "application/pdf",
  "application/octet-stream",
  "",
]);

export interface NotesHandlerDeps {
  /** Defaults to config.yaml in the working directory, read once */
  getConfig?: () => AppConfig;
  createBackend?: GenerateNotesOptions["createBackend"];
  onLog?: GenerateNotesOptions["onLog"];
}

export interface NotesResponseBody {
  notes: string;
  style: string;
  backendMode: string;
  modelId: string;
  truncated: boolean;
  sourceChars: number;
  includedChars: number;
  pageCount: number;
  documentTitle?: string;
  received: {
    filename: string;
    bytes: number;
    contentType: string;
  };
}

function jsonError(status: number, error: string, detail: string): Response {
  return Response.json({ error, detail }, { status });
}

function textField(formData: FormData, name: string): string | undefined {
  const value = formData.get(name);
  return typeof value === "string" ? value : undefined;
}

function cachedConfigLoader(): () => AppConfig {
  let config: AppConfig | undefined;
  return () => {
    config ??= loadConfig();
    return config;
  };
}

/**
 * POST handler for multipart notes requests: form fields in, notes JSON
 * out, or `{ error, detail }` with the status of the failure's category.
 */
export function createNotesHandler(
  deps: NotesHandlerDeps = {}
): (request: Request) => Promise<Response> {
  const getConfig = deps.getConfig ?? cachedConfigLoader();

  return async function POST(request: Request): Promise<Response> {
    let formData: FormData;
    try {
      formData = await request.formData();
    } catch {
      return jsonError(400, "invalid_input", "Expected a multipart form body");
    }

    const file = formData.get("pdf");
    if (!(file instanceof Blob)) {
      return jsonError(400, "invalid_input", "pdf: a PDF file is required");
    }
    if (!ACCEPTED_CONTENT_TYPES.has(file.type)) {
      return jsonError(
        400,
        "invalid_input",
        `pdf: unsupported content type "${file.type}"`
      );
    }
    const filename = file instanceof File ? file.name : "upload.pdf";

    try {
      const pdfBytes = new Uint8Array(await file.arrayBuffer());
      const result = await generateNotes(
        {
          topic: textField(formData, "topic") ?? "",
          studentName: textField(formData, "student_name"),
          notesStyle: textField(formData, "notes_style") || undefined,
          pdfBytes,
          apiKey: textField(formData, "openai_key") ?? "",
        },
        {
          config: getConfig(),
          createBackend: deps.createBackend,
          onLog: deps.onLog,
        }
      );

      const body: NotesResponseBody = {
        notes: result.notes,
        style: result.styleUsed,
        backendMode: result.backendMode,
        modelId: result.modelId,
        truncated: result.truncated,
        sourceChars: result.sourceChars,
        includedChars: result.includedChars,
        pageCount: result.pageCount,
        documentTitle: result.documentTitle,
        received: {
          filename,
          bytes: pdfBytes.byteLength,
          contentType: file.type,
        },
      };
      return Response.json(body);
    } catch (err) {
      if (err instanceof PipelineError) {
        return jsonError(httpStatusFor(err.category), err.category, err.message);
      }
      console.error("Notes request failed:", err);
      return jsonError(500, "server_error", "Unexpected error while generating notes");
    }
  };
}
