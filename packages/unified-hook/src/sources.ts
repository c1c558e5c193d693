export const KNOWN_SOURCES = ["claude", "cursor", "opencode", "gemini", "windsurf", "zed"] as const;

export type Source = (typeof KNOWN_SOURCES)[number];

// Claude is the default claimed source; it has no signature of its own.
export type DetectableTool = Exclude<Source, "claude">;

export type ToolSignature = {
  readonly tool: DetectableTool;
  // Lowercase substrings searched for in an ancestor's command line.
  readonly signatures: readonly string[];
};

/**
 * Known tool signatures, in matching order.
 *
 * The first tool whose list contains a substring of the command line wins,
 * so an ancestor like `/opt/cursor/opencode-bridge` resolves to cursor.
 */
function signature(tool: DetectableTool, ...signatures: string[]): ToolSignature {
  return Object.freeze({ tool, signatures: Object.freeze(signatures) });
}

export const TOOL_SIGNATURES: readonly ToolSignature[] = Object.freeze([
  signature("cursor", "cursor", "/cursor/"),
  signature("opencode", "opencode", "/opencode/"),
  signature("gemini", "gemini", "/gemini/"),
  signature("windsurf", "windsurf", "/windsurf/"),
  signature("zed", "/zed/", "zed.app"),
]);

export const DEFAULT_SOURCE: Source = "claude";
export const DEFAULT_EVENT_TYPE = "PreToolUse";
export const DEFAULT_MAX_DEPTH = 8;
export const DEFAULT_HANDLER_TIMEOUT_MS = 30_000;

export function matchSignature(commandLine: string): DetectableTool | null {
  const lower = commandLine.toLowerCase();
  for (const { tool, signatures } of TOOL_SIGNATURES) {
    if (signatures.some((sig) => lower.includes(sig))) return tool;
  }
  return null;
}
