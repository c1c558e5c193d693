import { z } from "zod";
import {
  DEFAULT_EVENT_TYPE,
  DEFAULT_HANDLER_TIMEOUT_MS,
  DEFAULT_MAX_DEPTH,
  DEFAULT_SOURCE,
  KNOWN_SOURCES,
  type Source,
} from "./sources.js";

export type HookOptions = {
  // Claimed source; ancestry detection may override it.
  source: Source;
  eventType: string;
  handler?: string;
  handlerTimeoutMs: number;
  maxDepth: number;
  // Tool-name glob; events that don't match skip the handler.
  match?: string;
  detect: boolean;
  filter: boolean;
  normalizeOnly: boolean;
};

export type HookEnv = {
  UNIFIED_HOOK_HANDLER?: string;
};

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(issues.join("; "));
    this.name = "ConfigError";
  }
}

const VALUE_FLAGS = {
  "--source": "source",
  "--event-type": "eventType",
  "--handler": "handler",
  "--handler-timeout": "handlerTimeoutMs",
  "--max-depth": "maxDepth",
  "--match": "match",
} as const;

const SWITCH_FLAGS = {
  "--no-detect": "noDetect",
  "--no-filter": "noFilter",
  "--normalize-only": "normalizeOnly",
} as const;

type ValueKey = (typeof VALUE_FLAGS)[keyof typeof VALUE_FLAGS];
type SwitchKey = (typeof SWITCH_FLAGS)[keyof typeof SWITCH_FLAGS];

function isValueFlag(flag: string): flag is keyof typeof VALUE_FLAGS {
  return Object.prototype.hasOwnProperty.call(VALUE_FLAGS, flag);
}

function isSwitchFlag(flag: string): flag is keyof typeof SWITCH_FLAGS {
  return Object.prototype.hasOwnProperty.call(SWITCH_FLAGS, flag);
}

function positiveInt(name: string, fallback: number) {
  const message = `${name} must be a positive integer`;
  return z.coerce.number({ invalid_type_error: message }).int(message).positive(message).default(fallback);
}

const optionsSchema = z.object({
  source: z
    .enum(KNOWN_SOURCES, {
      errorMap: () => ({ message: `--source must be one of: ${KNOWN_SOURCES.join(", ")}` }),
    })
    .default(DEFAULT_SOURCE),
  eventType: z.string().trim().min(1, "--event-type must not be empty").default(DEFAULT_EVENT_TYPE),
  handler: z.string().trim().min(1, "--handler must not be empty").optional(),
  handlerTimeoutMs: positiveInt("--handler-timeout", DEFAULT_HANDLER_TIMEOUT_MS),
  maxDepth: positiveInt("--max-depth", DEFAULT_MAX_DEPTH),
  match: z.string().trim().min(1, "--match must not be empty").optional(),
  noDetect: z.boolean(),
  noFilter: z.boolean(),
  normalizeOnly: z.boolean(),
});

/**
 * Parse hook flags (everything after the script path).
 * Throws ConfigError before any stdin is read, so a misconfigured hook fails loudly.
 */
export function loadOptions(argv: string[], env: HookEnv = process.env): HookOptions {
  const values: Partial<Record<ValueKey, string>> = {};
  const switches: Record<SwitchKey, boolean> = { noDetect: false, noFilter: false, normalizeOnly: false };
  const issues: string[] = [];

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i] ?? "";
    const eq = arg.indexOf("=");
    const flag = arg.startsWith("--") && eq > 0 ? arg.slice(0, eq) : arg;

    if (isSwitchFlag(flag)) {
      switches[SWITCH_FLAGS[flag]] = true;
      continue;
    }

    if (isValueFlag(flag)) {
      let value: string | undefined;
      if (flag !== arg) {
        value = arg.slice(eq + 1);
      } else {
        const next = argv[i + 1];
        if (next !== undefined && !next.startsWith("--")) {
          value = next;
          i += 1;
        }
      }
      if (value === undefined) {
        issues.push(`${flag} requires a value`);
      } else {
        values[VALUE_FLAGS[flag]] = value;
      }
      continue;
    }

    issues.push(`unknown option: ${arg}`);
  }

  if (values.handler === undefined && env.UNIFIED_HOOK_HANDLER?.trim()) {
    values.handler = env.UNIFIED_HOOK_HANDLER;
  }

  if (issues.length > 0) throw new ConfigError(issues);

  const parsed = optionsSchema.safeParse({ ...values, ...switches });
  if (!parsed.success) {
    throw new ConfigError([...new Set(parsed.error.issues.map((issue) => issue.message))]);
  }

  const { noDetect, noFilter, ...rest } = parsed.data;
  return { ...rest, detect: !noDetect, filter: !noFilter };
}

/**
 * Flags of the `tree` sub-command. Only --max-depth applies; it is validated
 * the same way as for the hook itself.
 */
export function loadTreeOptions(argv: string[]): { maxDepth: number } {
  const unknown = argv.filter((arg) => arg.startsWith("--") && arg.split("=")[0] !== "--max-depth");
  if (unknown.length > 0) throw new ConfigError(unknown.map((arg) => `unknown option: ${arg}`));
  return { maxDepth: loadOptions(argv, {}).maxDepth };
}
