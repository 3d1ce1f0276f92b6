import { spawn } from "node:child_process";
import type { Logger } from "../logger.js";
import { buildInvocation, getProbeDefinition } from "./definitions.js";
import { decodeOutput } from "./decoder.js";
import { parseLatencyOutput, parseRouteTraceOutput, DEFAULT_TRACE_HEADER_LINES } from "./parsers.js";
import { serializeOutcome } from "./serialize.js";
import { isCommandKind } from "./types.js";
import type {
  CommandKind,
  ProbeError,
  ProbeInvocation,
  ProbeOutcome,
  ProbeRunner,
  ProcessExecutor,
  ProcessOutput,
} from "./types.js";

export class SpawnProcessExecutor implements ProcessExecutor {
  async exec(invocation: ProbeInvocation): Promise<ProcessOutput> {
    return new Promise((resolve, reject) => {
      const child = spawn(invocation.command, [...invocation.args], {
        stdio: ["ignore", "pipe", "pipe"],
        windowsHide: true,
      });

      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];

      child.stdout.on("data", (data: Buffer) => {
        stdout.push(data);
      });

      child.stderr.on("data", (data: Buffer) => {
        stderr.push(data);
      });

      child.on("close", (code) => {
        resolve({
          stdout: Buffer.concat(stdout),
          stderr: Buffer.concat(stderr),
          exitCode: code,
        });
      });

      child.on("error", (err) => {
        reject(new Error(`Failed to start ${invocation.command}: ${err.message}`));
      });
    });
  }
}

export interface DiagnosticProbeRunnerDeps {
  readonly logger: Logger;
  readonly executor?: ProcessExecutor;
  /** Encoding probe output is decoded with, see resolveConsoleEncoding. Defaults to utf-8. */
  readonly encoding?: string;
  readonly traceHeaderLines?: number;
}

export class DiagnosticProbeRunner implements ProbeRunner {
  private readonly logger: Logger;
  private readonly executor: ProcessExecutor;
  private readonly encoding: string;
  private readonly traceHeaderLines: number;

  constructor(deps: DiagnosticProbeRunnerDeps) {
    this.logger = deps.logger.child({ component: "probe-runner" });
    this.executor = deps.executor ?? new SpawnProcessExecutor();
    this.encoding = deps.encoding ?? "utf-8";
    this.traceHeaderLines = deps.traceHeaderLines ?? DEFAULT_TRACE_HEADER_LINES;
  }

  async run(kind: string, target: string): Promise<string> {
    return serializeOutcome(await this.execute(kind, target));
  }

  async execute(kind: string, target: string): Promise<ProbeOutcome> {
    if (!isCommandKind(kind)) {
      return this.fail({ kind: "unsupported-command", message: `Unsupported command: ${kind}` }, target);
    }

    const invocation = buildInvocation(kind, target);
    this.logger.info(
      { command: kind, target, args: invocation.args },
      `${getProbeDefinition(kind).title} started`,
    );

    let stdout: string;
    let stderr: string;
    try {
      const output = await this.executor.exec(invocation);
      stdout = decodeOutput(output.stdout, this.encoding);
      stderr = decodeOutput(output.stderr, this.encoding);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      return this.fail({ kind: "launch-failed", message }, target);
    }

    if (stderr.length > 0) {
      return this.fail({ kind: "stderr-output", message: stderr }, target);
    }

    this.logger.info({ command: kind, target }, "Probe finished");
    return this.parse(kind, stdout, target);
  }

  private parse(kind: CommandKind, stdout: string, target: string): ProbeOutcome {
    if (kind === "ping") {
      const parsed = parseLatencyOutput(stdout);
      if (parsed.ok) {
        return { ok: true, kind, value: parsed.value };
      }
      this.logger.warn({ target, reason: parsed.failure.reason, raw: parsed.failure.raw }, "Could not parse ping output");
      return this.fail({ kind: "parse-failed", message: "Could not parse ping output" }, target);
    }

    const parsed = parseRouteTraceOutput(stdout, { headerLines: this.traceHeaderLines });
    if (parsed.ok) {
      return { ok: true, kind, value: parsed.value };
    }
    this.logger.error({ target, reason: parsed.failure.reason, raw: parsed.failure.raw }, "Could not parse tracert output");
    return this.fail({ kind: "parse-failed", message: "Could not parse tracert output" }, target);
  }

  private fail(error: ProbeError, target: string): ProbeOutcome {
    this.logger.error({ target, errorKind: error.kind, error: error.message }, "Probe failed");
    return { ok: false, error };
  }
}
