import fs from "node:fs";
import { spawnSync } from "node:child_process";

/**
 * Process table lookups used by the ancestry walk.
 *
 * Lookups are best-effort. Whatever goes wrong comes back as "" or null,
 * never as a thrown error.
 */

export type ProcessNode = {
  pid: number;
  commandLine: string;
};

export interface ProcessInspector {
  commandLine(pid: number): string;
  parentPid(pid: number): number | null;
}

const PS_TIMEOUT_MS = 1_000;

function runPs(pid: number, column: "command" | "ppid"): string | null {
  if (process.platform === "win32") return null;
  const res = spawnSync("ps", ["-p", String(pid), "-o", `${column}=`], {
    encoding: "utf8",
    timeout: PS_TIMEOUT_MS,
    stdio: ["ignore", "pipe", "ignore"],
  });
  if (res.error || res.status !== 0) return null;
  return res.stdout.trim();
}

function readProcFile(pid: number, name: "cmdline" | "stat"): string | null {
  try {
    return fs.readFileSync(`/proc/${pid}/${name}`, "utf8");
  } catch {
    return null;
  }
}

export function readCommandLine(pid: number): string {
  if (!Number.isInteger(pid) || pid <= 0) return "";

  // /proc/<pid>/cmdline separates argv entries with NUL bytes.
  const cmd = (readProcFile(pid, "cmdline") ?? "").replace(/\0/g, " ").trim();
  if (cmd) return cmd;

  return runPs(pid, "command") ?? "";
}

function parseStatParent(stat: string): number | null {
  // Format: pid (comm) state ppid ... where comm may contain spaces and ')'.
  const lastParen = stat.lastIndexOf(")");
  if (lastParen <= 0) return null;
  const fields = stat.slice(lastParen + 1).trim().split(/\s+/);
  const ppid = Number.parseInt(fields[1] ?? "", 10);
  return Number.isFinite(ppid) ? ppid : null;
}

export function readParentPid(pid: number): number | null {
  if (!Number.isInteger(pid) || pid <= 1) return null;

  const stat = readProcFile(pid, "stat");
  let ppid = stat ? parseStatParent(stat) : null;

  if (ppid === null) {
    const out = runPs(pid, "ppid");
    const parsed = out ? Number.parseInt(out, 10) : Number.NaN;
    ppid = Number.isFinite(parsed) ? parsed : null;
  }

  // pid 0/1 is the kernel or init/launchd: the walk ends there.
  return ppid !== null && ppid > 1 ? ppid : null;
}

export const systemInspector: ProcessInspector = {
  commandLine: readCommandLine,
  parentPid: readParentPid,
};
