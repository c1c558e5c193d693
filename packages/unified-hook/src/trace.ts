import fs from "node:fs";

/**
 * Debug tracing.
 *
 *   HOOK_DEBUG=1       enable
 *   HOOK_LOG_FILE=...  append to this file instead of stderr
 *
 * Stdout belongs to the hook response, so traces never go there.
 */

export type Tracer = (message: string) => void;

export type TraceEnv = {
  HOOK_DEBUG?: string;
  HOOK_LOG_FILE?: string;
};

const PREFIX = "[unified-hook]";

export const silentTracer: Tracer = () => undefined;

export function createTracer(env: TraceEnv = process.env): Tracer {
  if (env.HOOK_DEBUG !== "1") return silentTracer;

  const logFile = env.HOOK_LOG_FILE?.trim();
  return (message) => {
    const line = `${PREFIX} ${message}\n`;
    if (!logFile) {
      process.stderr.write(line);
      return;
    }
    try {
      fs.appendFileSync(logFile, line, "utf8");
    } catch (error) {
      process.stderr.write(`${PREFIX} cannot write ${logFile}: ${String(error)}\n`);
      process.stderr.write(line);
    }
  };
}

// Payloads can be large; traces only need the head.
export function preview(value: unknown, max = 200): string {
  const text = JSON.stringify(value) ?? String(value);
  return text.length > max ? `${text.slice(0, max)}...` : text;
}
