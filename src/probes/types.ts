export const COMMAND_KINDS = ["ping", "tracert"] as const;

export type CommandKind = (typeof COMMAND_KINDS)[number];

export function isCommandKind(value: unknown): value is CommandKind {
  return COMMAND_KINDS.some((kind) => kind === value);
}

/** Marks a hop statistic or address that could not be measured. */
export const WILDCARD = "*";
export type Wildcard = typeof WILDCARD;

export interface DiagnosticCommand {
  readonly kind: CommandKind;
  readonly target: string;
}

export interface LatencyResult {
  readonly packetLossPercent: number;
  readonly minRttMs: number;
  readonly avgRttMs: number;
  readonly maxRttMs: number;
}

export interface RouteHop {
  readonly hopIndex: number;
  readonly address: string;
  readonly minRttMs: number | Wildcard;
  readonly avgRttMs: number | Wildcard;
  readonly maxRttMs: number | Wildcard;
}

export interface ParseFailure {
  readonly reason: string;
  readonly raw: string;
}

export type ParseOutcome<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly failure: ParseFailure };

export type ProbeErrorKind = "unsupported-command" | "launch-failed" | "stderr-output" | "parse-failed";

export interface ProbeError {
  readonly kind: ProbeErrorKind;
  readonly message: string;
}

export type ProbeOutcome =
  | { readonly ok: true; readonly kind: "ping"; readonly value: LatencyResult }
  | { readonly ok: true; readonly kind: "tracert"; readonly value: readonly RouteHop[] }
  | { readonly ok: false; readonly error: ProbeError };

export interface ProbeInvocation {
  readonly command: string;
  readonly args: readonly string[];
}

export interface ProcessOutput {
  readonly stdout: Buffer;
  readonly stderr: Buffer;
  readonly exitCode: number | null;
}

export interface ProcessExecutor {
  exec(invocation: ProbeInvocation): Promise<ProcessOutput>;
}

export interface ProbeRunner {
  execute(kind: string, target: string): Promise<ProbeOutcome>;
  run(kind: string, target: string): Promise<string>;
}
