#!/usr/bin/env node
/**
 * Notes CLI
 *
 * Generate study notes for a PDF from the command line.
 *
 * Usage:
 *   npm run notes -- <pdf_path> --topic <topic> [options]
 */

import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { loadConfig } from "../config";
import { PipelineError } from "../pipeline/errors";
import { appendLogEntry } from "../pipeline/llm-log";
import { notesProgress$, type NotesEvent } from "../pipeline/notes/notes";
import { runWithProgress } from "./progress";

const USAGE = `Usage: npm run notes -- <pdf_path> --topic <topic> [options]

Options:
  --topic <text>        Topic the notes should focus on (required)
  --student <name>      Student name to address the notes to
  --style <style>       bulleted | outline | summary (default: bulleted)
  --config <path>       Config file (default: ./config.yaml)

The OpenAI API key is read from OPENAI_API_KEY.`;

export interface NotesCliArgs {
  pdfPath: string;
  topic: string;
  studentName?: string;
  style?: string;
  configPath?: string;
}

const VALUE_FLAGS = new Set(["--topic", "--student", "--style", "--config"]);

/**
 * Parse argv (without the node and script entries). Returns an error
 * string instead of args when the command line is unusable.
 */
export function parseNotesArgs(
  argv: string[]
): { ok: true; args: NotesCliArgs } | { ok: false; error: string } {
  const values = new Map<string, string>();
  const positional: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (VALUE_FLAGS.has(arg)) {
      const value = argv[i + 1];
      if (value === undefined || value.startsWith("--")) {
        return { ok: false, error: `${arg} requires a value` };
      }
      values.set(arg, value);
      i++;
    } else if (arg.startsWith("--")) {
      return { ok: false, error: `Unknown option: ${arg}` };
    } else {
      positional.push(arg);
    }
  }

  const [pdfPath] = positional;
  if (!pdfPath) return { ok: false, error: "Missing <pdf_path>" };
  if (positional.length > 1) {
    return { ok: false, error: `Unexpected argument: ${positional[1]}` };
  }
  const topic = values.get("--topic");
  if (!topic) return { ok: false, error: "Missing --topic" };

  return {
    ok: true,
    args: {
      pdfPath,
      topic,
      studentName: values.get("--student"),
      style: values.get("--style"),
      configPath: values.get("--config"),
    },
  };
}

function describeEvent(event: NotesEvent): string {
  return event.phase === "result" ? "done" : event.phase;
}

async function main() {
  const argv = process.argv.slice(2);
  if (argv.length === 0 || argv.includes("--help") || argv.includes("-h")) {
    console.log(USAGE);
    process.exit(0);
  }

  const parsed = parseNotesArgs(argv);
  if (!parsed.ok) {
    console.error(parsed.error);
    console.error(USAGE);
    process.exit(1);
  }
  const { args } = parsed;

  if (!fs.existsSync(args.pdfPath)) {
    console.error(`PDF not found: ${args.pdfPath}`);
    process.exit(1);
  }

  const config = loadConfig(args.configPath && path.resolve(args.configPath));
  const logPath = config.llm_log && path.resolve(config.llm_log);

  const last = await runWithProgress(
    notesProgress$(
      {
        topic: args.topic,
        studentName: args.studentName,
        notesStyle: args.style,
        pdfBytes: new Uint8Array(fs.readFileSync(args.pdfPath)),
        apiKey: process.env.OPENAI_API_KEY ?? "",
      },
      {
        config,
        onLog: logPath ? (entry) => appendLogEntry(logPath, entry) : undefined,
      }
    ),
    describeEvent,
    { label: path.basename(args.pdfPath) }
  );

  if (last?.phase !== "result") {
    throw new Error("Notes pipeline finished without a result");
  }
  const { result } = last;
  if (result.truncated) {
    console.error(
      `Note: only the first ${result.includedChars} of ${result.sourceChars} characters were used.`
    );
  }
  console.error(`Generated with ${result.modelId} (${result.backendMode} API)`);
  console.log(result.notes);
}

// Only run when executed directly, not when imported by tests
const entry = process.argv[1];
if (entry && path.resolve(entry) === fileURLToPath(import.meta.url)) {
  main().catch((err: unknown) => {
    if (err instanceof PipelineError) {
      console.error(`${err.category}: ${err.message}`);
    } else {
      console.error(err);
    }
    process.exit(1);
  });
}
