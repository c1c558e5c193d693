#!/usr/bin/env node
import { ConfigError, loadOptions, loadTreeOptions } from "./config.js";
import { describeProcessTree, detectParentSource } from "./detect.js";
import { defaultDeps, renderOutput, runHook } from "./hook.js";
import { createTracer } from "./trace.js";

/**
 * Unified hook entry point.
 *
 * Claude, Gemini and Cursor hooks send one JSON payload via stdin and read one
 * JSON document from stdout. Source detection, drop rules, normalization and
 * the optional handler all run between the two.
 *
 * IMPORTANT:
 *  - Do NOT write anything to stdout except that document.
 *  - Use stderr (or HOOK_LOG_FILE) for diagnostics.
 */

async function readAllStdin(): Promise<string> {
  if (process.stdin.isTTY) return "";
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  return Buffer.concat(chunks).toString("utf8");
}

function printTree(argv: string[]): void {
  const { maxDepth } = loadTreeOptions(argv);

  const lines = ["Process tree detection debug:", `  Current PID: ${process.pid}`, `  Parent PID: ${process.ppid}`, ""];
  describeProcessTree({ maxDepth }).forEach((entry, i) => {
    const marker = entry.detected ? " <--" : "";
    lines.push(`  [${i}] PID ${entry.pid}: ${entry.commandLine.slice(0, 60)}...${marker}`);
    if (entry.detected) lines.push(`      Detected: ${entry.detected}`);
  });
  lines.push("");

  const detected = detectParentSource({ maxDepth });
  lines.push(`Final detection: ${detected ?? "none (defaults to claude)"}`);
  process.stdout.write(lines.join("\n") + "\n");
}

async function main(): Promise<void> {
  const argv = process.argv.slice(2);
  if (argv[0] === "tree") {
    printTree(argv.slice(1));
    return;
  }

  const options = loadOptions(argv);
  const trace = createTracer();
  const raw = await readAllStdin();
  const output = runHook(raw, options, defaultDeps(trace));
  process.stdout.write(renderOutput(output) + "\n");
}

main().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    console.error(`[unified-hook] config error: ${error.message}`);
  } else {
    console.error(`[unified-hook] fatal: ${error instanceof Error ? error.stack ?? error.message : String(error)}`);
  }
  process.exit(2);
});
