import path from "node:path";
import { spawnSync } from "node:child_process";
import { serializeEvent, type CanonicalEvent } from "./event.js";
import { parseResponse, type Verdict } from "./responses.js";
import { DEFAULT_HANDLER_TIMEOUT_MS } from "./sources.js";
import { preview, silentTracer, type Tracer } from "./trace.js";

/**
 * External policy handler.
 *
 * The handler gets the serialized CanonicalEvent on stdin and answers with a
 * response JSON on stdout. A broken or slow handler must never block the
 * assistant: every failure below resolves to allow.
 */

export type HandlerFailure = "spawn" | "timeout" | "exit" | "empty" | "malformed";

export type HandlerOutcome =
  | { ok: true; verdict: Verdict }
  | { ok: false; failure: HandlerFailure; detail: string };

export type HandlerOptions = {
  timeoutMs?: number;
  trace?: Tracer;
};

const NODE_SCRIPT_EXTENSIONS = new Set([".js", ".mjs", ".cjs"]);

function handlerCommand(handlerPath: string): { command: string; args: string[] } {
  if (NODE_SCRIPT_EXTENSIONS.has(path.extname(handlerPath).toLowerCase())) {
    return { command: process.execPath, args: [handlerPath] };
  }
  return { command: handlerPath, args: [] };
}

function errorCode(error: Error): unknown {
  return "code" in error ? error.code : undefined;
}

export function invokeHandler(
  handlerPath: string,
  event: CanonicalEvent,
  timeoutMs: number = DEFAULT_HANDLER_TIMEOUT_MS
): HandlerOutcome {
  const { command, args } = handlerCommand(handlerPath);
  const res = spawnSync(command, args, {
    input: JSON.stringify(serializeEvent(event)),
    encoding: "utf8",
    timeout: timeoutMs,
    // A handler that traps SIGTERM must not outlive the timeout.
    killSignal: "SIGKILL",
    stdio: ["pipe", "pipe", "pipe"],
  });

  if (res.error) {
    const code = errorCode(res.error);
    if (code === "ETIMEDOUT") {
      return { ok: false, failure: "timeout", detail: `no response within ${timeoutMs}ms` };
    }
    // EPIPE: the handler answered without reading all of stdin. Its exit status and output still count.
    if (code !== "EPIPE") return { ok: false, failure: "spawn", detail: res.error.message };
  }

  if (res.status !== 0) {
    const how = res.status === null ? `signal ${res.signal ?? "unknown"}` : `exit ${res.status}`;
    return { ok: false, failure: "exit", detail: `${how}: ${res.stderr.trim()}` };
  }

  const out = res.stdout.trim();
  if (!out) return { ok: false, failure: "empty", detail: "handler wrote nothing to stdout" };

  const verdict = parseResponse(out);
  if (!verdict) return { ok: false, failure: "malformed", detail: `unrecognized response: ${preview(out)}` };

  return { ok: true, verdict };
}

export function runHandler(handlerPath: string, event: CanonicalEvent, options: HandlerOptions = {}): Verdict {
  const trace = options.trace ?? silentTracer;
  const outcome = invokeHandler(handlerPath, event, options.timeoutMs);
  if (outcome.ok) return outcome.verdict;

  trace(`Handler ${outcome.failure}: ${outcome.detail}`);
  return { decision: "allow" };
}
