import { z } from "zod";

export type Verdict = { decision: "allow" } | { decision: "deny"; reason: string };

export type AllowResponse = {
  hookSpecificOutput: { permissionDecision: "allow" };
  continue: true;
};

export type DenyResponse = {
  hookSpecificOutput: { permissionDecision: "deny"; permissionDecisionReason: string };
  continue: false;
};

export type HookResponse = AllowResponse | DenyResponse;

export const DEFAULT_DENY_REASON = "Blocked by hook handler";

export function allowResponse(): AllowResponse {
  return { hookSpecificOutput: { permissionDecision: "allow" }, continue: true };
}

export function denyResponse(reason: string): DenyResponse {
  return {
    hookSpecificOutput: { permissionDecision: "deny", permissionDecisionReason: reason },
    continue: false,
  };
}

export function toResponse(verdict: Verdict): HookResponse {
  return verdict.decision === "deny" ? denyResponse(verdict.reason) : allowResponse();
}

// Handlers may add their own fields (systemMessage, hookEventName, ...); only the decision matters here.
const responseSchema = z.object({
  hookSpecificOutput: z.object({
    permissionDecision: z.enum(["allow", "deny"]),
    permissionDecisionReason: z.string().optional(),
  }),
  continue: z.boolean().optional(),
});

/**
 * Recognize a response in the canonical shape, either as JSON text or an
 * already-parsed value. Anything else yields null.
 */
export function parseResponse(input: unknown): Verdict | null {
  let value = input;
  if (typeof input === "string") {
    try {
      value = JSON.parse(input);
    } catch {
      return null;
    }
  }

  const parsed = responseSchema.safeParse(value);
  if (!parsed.success) return null;

  const { permissionDecision, permissionDecisionReason } = parsed.data.hookSpecificOutput;
  if (permissionDecision === "allow") return { decision: "allow" };
  return { decision: "deny", reason: permissionDecisionReason ?? DEFAULT_DENY_REASON };
}
