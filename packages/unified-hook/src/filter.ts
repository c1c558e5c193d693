import { extractCommand, extractCwd, type RawPayload } from "./event.js";
import type { Source } from "./sources.js";

export type DropDecision = {
  drop: boolean;
  reason: string;
};

// Another assistant's private config directory. Cursor walking into it, or
// running a command against it, fires Claude's hooks without any real user
// action behind it.
const FOREIGN_CONFIG_MARKERS: Readonly<Partial<Record<Source, readonly string[]>>> = {
  cursor: [".claude"],
};

function label(source: Source): string {
  if (source === "opencode") return "OpenCode";
  return source.charAt(0).toUpperCase() + source.slice(1);
}

export function shouldDrop(source: Source, payload: RawPayload): DropDecision {
  // OpenCode's own plugin already reports these; handling them here duplicates every event.
  if (source === "opencode") {
    return { drop: true, reason: "OpenCode events handled by dedicated plugin" };
  }

  const markers = FOREIGN_CONFIG_MARKERS[source] ?? [];
  if (markers.length === 0) return { drop: false, reason: "" };

  const cwd = extractCwd(payload);
  const cmd = extractCommand(payload);
  for (const marker of markers) {
    if (cwd.includes(marker)) {
      return { drop: true, reason: `${label(source)} reading ${marker} directory` };
    }
    if (cmd.includes(marker)) {
      return { drop: true, reason: `${label(source)} command accessing ${marker}` };
    }
  }

  return { drop: false, reason: "" };
}
