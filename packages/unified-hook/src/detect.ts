import { systemInspector, type ProcessInspector, type ProcessNode } from "./process.js";
import { DEFAULT_MAX_DEPTH, matchSignature, type DetectableTool } from "./sources.js";

/**
 * Parent-process source detection.
 *
 * Cursor and OpenCode read ~/.claude/settings.json, so Claude's hooks fire for
 * actions they perform and the claimed --source is wrong. The process tree is
 * the only signal that survives that indirection: climb from our parent and
 * look for a known tool in each ancestor's command line.
 */

export type WalkOptions = {
  maxDepth?: number;
  // Defaults to the immediate parent of this process.
  startPid?: number;
  inspector?: ProcessInspector;
};

export type ProcessTreeEntry = ProcessNode & {
  detected: DetectableTool | null;
};

const TREE_CMDLINE_CHARS = 100;

export function detectParentSource(options: WalkOptions = {}): DetectableTool | null {
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  const inspector = options.inspector ?? systemInspector;
  let pid: number | null = options.startPid ?? process.ppid;

  for (let depth = 0; depth < maxDepth; depth += 1) {
    if (pid === null || pid <= 1) break;

    const cmd = inspector.commandLine(pid);
    // An opaque ancestor hides everything above it; give up rather than skip it.
    if (!cmd) break;

    const tool = matchSignature(cmd);
    if (tool) return tool;

    pid = inspector.parentPid(pid);
  }

  return null;
}

/**
 * Same walk as detectParentSource, but records every generation it visits
 * instead of stopping at the first match. Used by `unified-hook tree`.
 */
export function describeProcessTree(options: WalkOptions = {}): ProcessTreeEntry[] {
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  const inspector = options.inspector ?? systemInspector;
  const entries: ProcessTreeEntry[] = [];
  let pid: number | null = options.startPid ?? process.ppid;

  for (let depth = 0; depth < maxDepth; depth += 1) {
    if (pid === null || pid <= 1) break;

    const cmd = inspector.commandLine(pid);
    entries.push({
      pid,
      commandLine: cmd.slice(0, TREE_CMDLINE_CHARS),
      detected: cmd ? matchSignature(cmd) : null,
    });

    pid = inspector.parentPid(pid);
  }

  return entries;
}
