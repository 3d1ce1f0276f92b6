import { z } from "zod";
import { isCommandKind } from "../probes/types.js";
import type { DiagnosticCommand } from "../probes/types.js";

const envelopeSchema = z.object({ type: z.string() }).passthrough();

const commandMessageSchema = z.object({
  type: z.literal("command"),
  command: z.string(),
  target: z.unknown(),
});

export const MAX_TARGET_LENGTH = 253;

const targetSchema = z
  .string()
  .trim()
  .min(1, "empty")
  .max(MAX_TARGET_LENGTH, `longer than ${MAX_TARGET_LENGTH} characters`)
  .regex(/^[A-Za-z0-9._:-]+$/, "contains characters other than letters, digits, '.', ':', '_' and '-'")
  .refine((target) => !target.startsWith("-"), "starts with '-'");

/**
 * `command.target` is the target as the server sent it and is what results
 * echo back. `target` on an accepted command is the trimmed value to run.
 */
export type InboundMessage =
  | { readonly type: "command"; readonly command: DiagnosticCommand; readonly target: string }
  | { readonly type: "rejected"; readonly command: DiagnosticCommand; readonly reason: string }
  | { readonly type: "ignored"; readonly reason: string };

export interface AgentIdentity {
  readonly agreementId: string;
  readonly city: string;
  readonly os: string;
  readonly hostname: string;
}

export interface RegistrationMessage {
  readonly type: "registration";
  readonly data: {
    readonly agreement_id: string;
    readonly city: string;
    readonly os: string;
    readonly hostname: string;
  };
}

export interface ResultMessage {
  readonly type: "result";
  readonly agreement: string;
  readonly city: string;
  readonly command: string;
  readonly target: string;
  readonly result: string;
}

export type OutboundMessage = RegistrationMessage | ResultMessage;

/** Throws a SyntaxError when the frame is not JSON. */
export function decodeFrame(raw: string): unknown {
  return JSON.parse(raw);
}

export function interpretMessage(payload: unknown): InboundMessage {
  const envelope = envelopeSchema.safeParse(payload);
  if (!envelope.success) {
    return { type: "ignored", reason: "message is not an object with a type" };
  }

  if (envelope.data.type !== "command") {
    return { type: "ignored", reason: `unknown message type: ${envelope.data.type}` };
  }

  const parsed = commandMessageSchema.safeParse(payload);
  if (!parsed.success) {
    return { type: "ignored", reason: "command message has no command name" };
  }

  const { command: kind, target: rawTarget } = parsed.data;
  if (!isCommandKind(kind)) {
    return { type: "ignored", reason: `unsupported command: ${kind}` };
  }

  const command: DiagnosticCommand = { kind, target: typeof rawTarget === "string" ? rawTarget : "" };
  if (rawTarget === undefined) {
    return { type: "rejected", command, reason: "missing" };
  }

  const target = targetSchema.safeParse(rawTarget);
  if (!target.success) {
    return { type: "rejected", command, reason: target.error.issues[0]?.message ?? "invalid" };
  }

  return { type: "command", command, target: target.data };
}

export function buildRegistrationMessage(identity: AgentIdentity): RegistrationMessage {
  return {
    type: "registration",
    data: {
      agreement_id: identity.agreementId,
      city: identity.city,
      os: identity.os,
      hostname: identity.hostname,
    },
  };
}

export function buildResultMessage(
  identity: Pick<AgentIdentity, "agreementId" | "city">,
  command: DiagnosticCommand,
  result: string,
): ResultMessage {
  return {
    type: "result",
    agreement: identity.agreementId,
    city: identity.city,
    command: command.kind,
    target: command.target,
    result,
  };
}
