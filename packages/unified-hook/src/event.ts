import { DEFAULT_EVENT_TYPE, type Source } from "./sources.js";

/**
 * Every assistant sends its own payload shape:
 *  - Claude:   { tool_name, tool_input: { command }, cwd, session_id }
 *  - Gemini:   { tool, args: { command }, working_directory }
 *  - Cursor:   { cwd, tool_input | args }
 *  - OpenCode: cwd nested in tool_input
 *
 * The shape sniffing stays in this module; everything downstream works on
 * CanonicalEvent.
 */

export type RawPayload = Record<string, unknown>;

export type CanonicalEvent = Readonly<{
  eventType: string;
  source: Source;
  sessionId: string;
  cwd: string;
  toolName: string;
  toolInput: Record<string, unknown>;
  timestamp: string;
  // The payload exactly as received, kept for auditing.
  rawPayload: RawPayload;
}>;

// Wire form handed to handlers and printed by --normalize-only.
export type SerializedEvent = {
  event_type: string;
  source: Source;
  session_id: string;
  cwd: string;
  tool_name: string;
  tool_input: Record<string, unknown>;
  timestamp: string;
  raw_payload: RawPayload;
};

export type PayloadParseResult =
  | { ok: true; payload: RawPayload }
  | { ok: false; error: string };

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stringField(obj: Record<string, unknown>, key: string): string | null {
  const v = obj[key];
  return typeof v === "string" ? v : null;
}

function recordField(obj: Record<string, unknown>, key: string): Record<string, unknown> | null {
  const v = obj[key];
  return isRecord(v) ? v : null;
}

export function parsePayload(text: string): PayloadParseResult {
  const trimmed = text.trim();
  if (!trimmed) return { ok: true, payload: {} };

  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed);
  } catch (error) {
    return { ok: false, error: error instanceof Error ? error.message : String(error) };
  }

  if (!isRecord(parsed)) {
    return { ok: false, error: `expected a JSON object, got ${Array.isArray(parsed) ? "array" : typeof parsed}` };
  }
  return { ok: true, payload: parsed };
}

/**
 * cwd, then working_directory (Gemini), then tool_input.cwd.
 * A present string wins even when empty.
 */
export function extractCwd(payload: RawPayload): string {
  const direct = stringField(payload, "cwd");
  if (direct !== null) return direct;

  const workingDirectory = stringField(payload, "working_directory");
  if (workingDirectory !== null) return workingDirectory;

  const toolInput = recordField(payload, "tool_input");
  return (toolInput && stringField(toolInput, "cwd")) ?? "";
}

/** tool_input.command (Claude/Gemini), then args.command (Cursor). */
export function extractCommand(payload: RawPayload): string {
  for (const key of ["tool_input", "args"]) {
    const nested = recordField(payload, key);
    const cmd = nested ? stringField(nested, "command") : null;
    if (cmd) return cmd;
  }
  return "";
}

export function normalizeEvent(
  source: Source,
  payload: RawPayload,
  eventType: string = DEFAULT_EVENT_TYPE
): CanonicalEvent {
  return Object.freeze({
    eventType,
    source,
    sessionId: stringField(payload, "session_id") ?? "",
    cwd: extractCwd(payload),
    toolName: stringField(payload, "tool_name") ?? stringField(payload, "tool") ?? "",
    toolInput: recordField(payload, "tool_input") ?? recordField(payload, "args") ?? {},
    timestamp: stringField(payload, "timestamp") ?? "",
    rawPayload: payload,
  });
}

export function serializeEvent(event: CanonicalEvent): SerializedEvent {
  return {
    event_type: event.eventType,
    source: event.source,
    session_id: event.sessionId,
    cwd: event.cwd,
    tool_name: event.toolName,
    tool_input: event.toolInput,
    timestamp: event.timestamp,
    raw_payload: event.rawPayload,
  };
}
