export { ConfigError, loadOptions, loadTreeOptions, type HookEnv, type HookOptions } from "./config.js";
export { describeProcessTree, detectParentSource, type ProcessTreeEntry, type WalkOptions } from "./detect.js";
export {
  extractCommand,
  extractCwd,
  normalizeEvent,
  parsePayload,
  serializeEvent,
  type CanonicalEvent,
  type RawPayload,
  type SerializedEvent,
} from "./event.js";
export { shouldDrop, type DropDecision } from "./filter.js";
export { invokeHandler, runHandler, type HandlerFailure, type HandlerOutcome } from "./handler.js";
export { defaultDeps, renderOutput, runHook, type HookDeps, type HookOutput } from "./hook.js";
export { readCommandLine, readParentPid, systemInspector, type ProcessInspector, type ProcessNode } from "./process.js";
export {
  allowResponse,
  denyResponse,
  parseResponse,
  toResponse,
  type HookResponse,
  type Verdict,
} from "./responses.js";
export {
  KNOWN_SOURCES,
  TOOL_SIGNATURES,
  matchSignature,
  type DetectableTool,
  type Source,
  type ToolSignature,
} from "./sources.js";
export { createTracer, type Tracer } from "./trace.js";
