import fs from "node:fs";
import path from "node:path";
import yaml from "js-yaml";
import { z } from "zod/v4";

/** Characters of extracted text sent to the model when config is silent. */
export const DEFAULT_MAX_SOURCE_CHARS = 48_000;

const configSchema = z.object({
  model: z.string().min(1).default("gpt-4o-mini"),
  base_url: z.url().optional(),
  temperature: z.number().min(0).max(2).default(0.2),
  max_retries: z.number().int().min(0).default(0),
  request_timeout_ms: z.number().int().positive().default(60_000),
  connect_timeout_ms: z.number().int().positive().default(10_000),
  max_source_chars: z
    .number()
    .int()
    .min(1_000)
    .default(DEFAULT_MAX_SOURCE_CHARS),
  prompt: z.string().min(1).default("study_notes"),
  notes_styles: z.object({
    bulleted: z.string().min(1),
    outline: z.string().min(1),
    summary: z.string().min(1),
  }),
  llm_log: z.string().optional(),
});

export type AppConfig = z.infer<typeof configSchema>;

const yamlMappingSchema = z.record(z.string(), z.unknown());

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Deep-merge two plain objects. Plain objects recurse;
 * arrays and primitives: override wins.
 */
export function deepMerge(
  base: Record<string, unknown>,
  overrides: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };
  for (const key of Object.keys(overrides)) {
    const baseVal = result[key];
    const overVal = overrides[key];
    if (isPlainObject(baseVal) && isPlainObject(overVal)) {
      result[key] = deepMerge(baseVal, overVal);
    } else {
      result[key] = overVal;
    }
  }
  return result;
}

function readYamlMapping(file: string): Record<string, unknown> {
  const raw = yaml.load(fs.readFileSync(file, "utf-8"));
  return yamlMappingSchema.parse(raw ?? {});
}

/**
 * Load config.yaml (default: the working directory's) and apply the
 * override file named by NOTES_CONFIG, if any.
 */
export function loadConfig(
  configPath?: string,
  overridePath: string | undefined = process.env.NOTES_CONFIG
): AppConfig {
  const resolved = configPath ?? path.resolve(process.cwd(), "config.yaml");
  const base = readYamlMapping(resolved);
  if (!overridePath) return configSchema.parse(base);

  const overrides = readYamlMapping(path.resolve(overridePath));
  return configSchema.parse(deepMerge(base, overrides));
}
