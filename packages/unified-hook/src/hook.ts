import { minimatch } from "minimatch";
import type { HookOptions } from "./config.js";
import { detectParentSource } from "./detect.js";
import { normalizeEvent, parsePayload, serializeEvent, type CanonicalEvent, type SerializedEvent } from "./event.js";
import { shouldDrop } from "./filter.js";
import { runHandler } from "./handler.js";
import { allowResponse, toResponse, type HookResponse, type Verdict } from "./responses.js";
import type { DetectableTool } from "./sources.js";
import { preview, silentTracer, type Tracer } from "./trace.js";

export type HookOutput =
  | { kind: "response"; response: HookResponse }
  | { kind: "event"; event: SerializedEvent };

export type HookDeps = {
  detectSource: (maxDepth: number) => DetectableTool | null;
  runHandler: (handlerPath: string, event: CanonicalEvent, timeoutMs: number) => Verdict;
  trace: Tracer;
};

export function defaultDeps(trace: Tracer = silentTracer): HookDeps {
  return {
    detectSource: (maxDepth) => detectParentSource({ maxDepth }),
    runHandler: (handlerPath, event, timeoutMs) => runHandler(handlerPath, event, { timeoutMs, trace }),
    trace,
  };
}

function allow(): HookOutput {
  return { kind: "response", response: allowResponse() };
}

function matchesTool(pattern: string, toolName: string): boolean {
  return minimatch(toolName, pattern, { nocase: true, dot: true });
}

/**
 * One hook invocation: stdin text in, exactly one stdout document out.
 *
 * payload -> effective source -> drop rules -> canonical event -> handler.
 * Malformed input, drops, non-matching tools and handler failures all end in allow.
 */
export function runHook(rawInput: string, options: HookOptions, deps: HookDeps): HookOutput {
  const { trace } = deps;

  const parsed = parsePayload(rawInput);
  if (!parsed.ok) {
    trace(`Invalid input JSON: ${parsed.error}`);
    return allow();
  }
  const payload = parsed.payload;
  trace(`Received payload: ${preview(payload)}`);

  let source = options.source;
  if (options.detect) {
    const inferred = deps.detectSource(options.maxDepth);
    if (inferred && inferred !== source) {
      trace(`Source override: ${source} -> ${inferred}`);
      source = inferred;
    }
  }
  trace(`Effective source: ${source}`);

  if (options.filter) {
    const { drop, reason } = shouldDrop(source, payload);
    if (drop) {
      trace(`Event dropped: ${reason}`);
      return allow();
    }
  }

  const event = normalizeEvent(source, payload, options.eventType);
  trace(`Normalized event: ${preview(serializeEvent(event))}`);

  if (options.normalizeOnly) {
    return { kind: "event", event: serializeEvent(event) };
  }

  if (!options.handler) return allow();

  if (options.match && !matchesTool(options.match, event.toolName)) {
    trace(`Tool ${event.toolName || "(none)"} does not match ${options.match}; handler skipped`);
    return allow();
  }

  const verdict = deps.runHandler(options.handler, event, options.handlerTimeoutMs);
  return { kind: "response", response: toResponse(verdict) };
}

export function renderOutput(output: HookOutput): string {
  return output.kind === "event" ? JSON.stringify(output.event, null, 2) : JSON.stringify(output.response);
}
