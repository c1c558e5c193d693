import { describe, it, expect, vi } from "vitest";
import path from "node:path";
import os from "node:os";
import fs from "node:fs/promises";
import type { HookOptions } from "../src/config.js";
import { defaultDeps, renderOutput, runHook, type HookDeps } from "../src/hook.js";
import type { DetectableTool } from "../src/sources.js";
import type { Verdict } from "../src/responses.js";

const ALLOW = { kind: "response", response: { hookSpecificOutput: { permissionDecision: "allow" }, continue: true } };

function options(overrides: Partial<HookOptions> = {}): HookOptions {
  return {
    source: "claude",
    eventType: "PreToolUse",
    handlerTimeoutMs: 30000,
    maxDepth: 8,
    detect: true,
    filter: true,
    normalizeOnly: false,
    ...overrides,
  };
}

function fakeDeps(detected: DetectableTool | null = null, verdict: Verdict = { decision: "allow" }) {
  const traces: string[] = [];
  const detectSource = vi.fn((_maxDepth: number) => detected);
  const runHandler = vi.fn((..._args: Parameters<HookDeps["runHandler"]>) => verdict);
  const deps: HookDeps = { detectSource, runHandler, trace: (m) => traces.push(m) };
  return { deps, traces, detectSource, runHandler };
}

const claudePayload = {
  tool_name: "Bash",
  tool_input: { command: "npm test" },
  cwd: "/proj",
  session_id: "abc",
  timestamp: "T",
};

describe("runHook", () => {
  it("normalizes a Claude payload", () => {
    const { deps } = fakeDeps();
    const out = runHook(JSON.stringify(claudePayload), options({ normalizeOnly: true, detect: false }), deps);
    expect(out).toEqual({
      kind: "event",
      event: {
        event_type: "PreToolUse",
        source: "claude",
        session_id: "abc",
        cwd: "/proj",
        tool_name: "Bash",
        tool_input: { command: "npm test" },
        timestamp: "T",
        raw_payload: claudePayload,
      },
    });
  });

  it("normalizes a Gemini payload", () => {
    const { deps } = fakeDeps();
    const payload = { tool: "run_shell_command", args: { command: "git status" }, working_directory: "/proj" };
    const out = runHook(
      JSON.stringify(payload),
      options({ source: "gemini", eventType: "BeforeTool", normalizeOnly: true, detect: false }),
      deps
    );
    expect(out).toMatchObject({
      kind: "event",
      event: {
        event_type: "BeforeTool",
        source: "gemini",
        tool_name: "run_shell_command",
        tool_input: { command: "git status" },
        cwd: "/proj",
      },
    });
  });

  it("re-attributes to cursor and drops .claude noise as allow", () => {
    const { deps, traces, runHandler } = fakeDeps("cursor", { decision: "deny", reason: "should not run" });
    const payload = { ...claudePayload, cwd: "/Users/me/.claude/hooks" };
    const out = runHook(JSON.stringify(payload), options({ handler: "/opt/policy.mjs" }), deps);
    expect(out).toEqual(ALLOW);
    expect(runHandler).not.toHaveBeenCalled();
    expect(traces).toContain("Source override: claude -> cursor");
    expect(traces).toContain("Event dropped: Cursor reading .claude directory");
  });

  it("keeps the claimed source when detection agrees or finds nothing", () => {
    const agreeing = fakeDeps("cursor");
    runHook("{}", options({ source: "cursor" }), agreeing.deps);
    expect(agreeing.traces.some((t) => t.startsWith("Source override"))).toBe(false);

    const none = fakeDeps(null);
    const out = runHook(JSON.stringify(claudePayload), options({ normalizeOnly: true }), none.deps);
    expect(out.kind === "event" && out.event.source).toBe("claude");
  });

  it("passes maxDepth to detection and skips it with --no-detect", () => {
    const on = fakeDeps();
    runHook("{}", options({ maxDepth: 3 }), on.deps);
    expect(on.detectSource).toHaveBeenCalledWith(3);

    const off = fakeDeps("cursor");
    runHook("{}", options({ detect: false }), off.deps);
    expect(off.detectSource).not.toHaveBeenCalled();
  });

  it("drops detected opencode events", () => {
    const { deps, traces } = fakeDeps("opencode");
    expect(runHook(JSON.stringify(claudePayload), options({ normalizeOnly: true }), deps)).toEqual(ALLOW);
    expect(traces).toContain("Event dropped: OpenCode events handled by dedicated plugin");
  });

  it("keeps noise when filtering is off", () => {
    const { deps } = fakeDeps("opencode");
    const out = runHook(JSON.stringify(claudePayload), options({ filter: false, normalizeOnly: true }), deps);
    expect(out.kind === "event" && out.event.source).toBe("opencode");
  });

  it("allows malformed input without further work", () => {
    const { deps, traces, detectSource } = fakeDeps("cursor");
    expect(runHook("{oops", options({ handler: "/opt/policy.mjs" }), deps)).toEqual(ALLOW);
    expect(runHook("[1,2,3]", options(), deps)).toEqual(ALLOW);
    expect(detectSource).not.toHaveBeenCalled();
    expect(traces[0]?.startsWith("Invalid input JSON:")).toBe(true);
  });

  it("allows when no handler is configured", () => {
    const { deps, runHandler } = fakeDeps();
    expect(runHook(JSON.stringify(claudePayload), options(), deps)).toEqual(ALLOW);
    expect(runHandler).not.toHaveBeenCalled();
  });

  it("relays the handler verdict", () => {
    const { deps, runHandler } = fakeDeps(null, { decision: "deny", reason: "no npm today" });
    const out = runHook(JSON.stringify(claudePayload), options({ handler: "/opt/policy.mjs", handlerTimeoutMs: 500 }), deps);
    expect(out).toEqual({
      kind: "response",
      response: {
        hookSpecificOutput: { permissionDecision: "deny", permissionDecisionReason: "no npm today" },
        continue: false,
      },
    });
    expect(runHandler).toHaveBeenCalledTimes(1);
    const [handlerPath, event, timeoutMs] = runHandler.mock.calls[0] ?? [];
    expect(handlerPath).toBe("/opt/policy.mjs");
    expect(event?.toolName).toBe("Bash");
    expect(timeoutMs).toBe(500);
  });

  it("only sends matching tools to the handler", () => {
    const skipped = fakeDeps(null, { decision: "deny", reason: "x" });
    const write = { tool_name: "Write", tool_input: { file_path: "a.ts" } };
    expect(runHook(JSON.stringify(write), options({ handler: "/h.mjs", match: "Bash" }), skipped.deps)).toEqual(ALLOW);
    expect(skipped.runHandler).not.toHaveBeenCalled();
    expect(skipped.traces).toContain("Tool Write does not match Bash; handler skipped");

    const matched = fakeDeps(null, { decision: "deny", reason: "x" });
    runHook(JSON.stringify(claudePayload), options({ handler: "/h.mjs", match: "{bash,edit}" }), matched.deps);
    expect(matched.runHandler).toHaveBeenCalledTimes(1);
  });

  it("fails open when the real handler times out", async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "unified-hook-e2e-"));
    const handler = path.join(dir, "hang.mjs");
    await fs.writeFile(handler, "process.stdin.resume(); setTimeout(() => {}, 10000);", "utf8");

    const traces: string[] = [];
    const deps = defaultDeps((m) => traces.push(m));
    const out = runHook(
      JSON.stringify(claudePayload),
      options({ detect: false, handler, handlerTimeoutMs: 300 }),
      deps
    );
    expect(out).toEqual(ALLOW);
    expect(traces).toContain("Handler timeout: no response within 300ms");
  });
});

describe("renderOutput", () => {
  it("prints responses compactly and events indented", () => {
    const { deps } = fakeDeps();
    expect(renderOutput(runHook("{}", options(), deps))).toBe(
      '{"hookSpecificOutput":{"permissionDecision":"allow"},"continue":true}'
    );

    const event = runHook('{"tool_name":"Bash"}', options({ normalizeOnly: true, detect: false }), deps);
    expect(renderOutput(event).split("\n").slice(0, 3)).toEqual(["{", '  "event_type": "PreToolUse",', '  "source": "claude",']);
  });
});
