/**
 * Core types for the notes backend.
 *
 * These types describe how a prepared prompt becomes generated text.
 * They are independent of the PDF layer and of any hosting surface.
 */

import type { PreparedPrompt } from "../notes/prepare";

// ============================================================================
// Strategies - one per provider API shape
// ============================================================================

/** Which API shape produced the notes */
export type BackendMode = "primary" | "fallback";

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

export interface GeneratedText {
  text: string;
  usage?: TokenUsage;
}

export interface NotesStrategy {
  /** Human-readable API name, e.g. "responses" */
  readonly name: string;
  readonly mode: BackendMode;
  readonly modelId: string;
  generate(prompt: PreparedPrompt): Promise<GeneratedText>;
}

// ============================================================================
// Backend - ordered strategies behind one call
// ============================================================================

export interface BackendResult {
  text: string;
  backendMode: BackendMode;
  modelId: string;
  usage?: TokenUsage;
  /** Strategies tried, in order, including the successful one */
  attempts: number;
}

export interface NotesBackend {
  generate(prompt: PreparedPrompt): Promise<BackendResult>;
  close(): Promise<void>;
}
