import type { TranslationError } from "./errors";
import type { ConnectorHandle } from "./schema/connector";

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

export type Speaker = "user" | "assistant";

export type ChatEntry = {
  speaker: Speaker;
  text: string;
};

export type QueryResult =
  | { kind: "rows"; text: string }
  | { kind: "error"; error: TranslationError; text: string };

export type Phase = "idle" | "translating" | "synthesizing" | "terminated";

export type SessionState = {
  id: string;
  connected: boolean;
  connectionError?: string;
  handle?: ConnectorHandle;
  history: ChatEntry[];
  phase: Phase;
  // Question picked from the sample list, consumed by the next empty submission
  presetQuestion?: string;
  startedAt: Date;
};

export type Outcome =
  | { status: "answered"; answer: string }
  | { status: "terminated"; message: string }
  | { status: "rejected"; reason: "not_ready" | "busy"; message: string };
