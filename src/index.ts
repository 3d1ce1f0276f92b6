#!/usr/bin/env node
import { resolve } from "node:path";
import { loadConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { WindowsAutostartRegistrar } from "./autostart/registrar.js";
import { resolveConsoleEncoding } from "./probes/decoder.js";
import { DiagnosticProbeRunner } from "./probes/runner.js";
import { AgentSession } from "./session/agent-session.js";

async function main(): Promise<void> {
  const config = loadConfig({ configPath: process.argv[2] ? resolve(process.argv[2]) : undefined });
  const logger = createLogger(config);

  logger.info({ agreementId: config.agreementId, city: config.city, serverUrl: config.serverUrl }, "Agent starting");

  if (config.autostart) {
    const script = process.argv[1] ?? "";
    const registrar = new WindowsAutostartRegistrar({ logger });
    await registrar.register(`"${process.execPath}" "${resolve(script)}"`);
  }

  const encoding = await resolveConsoleEncoding({ logger });
  logger.debug({ encoding }, "Console encoding resolved");
  const runner = new DiagnosticProbeRunner({ logger, encoding, traceHeaderLines: config.traceHeaderLines });
  const session = new AgentSession({ config, runner, logger });

  const shutdown = (signal: NodeJS.Signals): void => {
    logger.info({ signal }, "Shutting down");
    session
      .stop()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.error({ error: err instanceof Error ? err.message : String(err) }, "Failed to stop session");
        process.exit(1);
      });
  };

  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);

  session.start();
}

main().catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  console.error(`[netprobe-agent] failed to start: ${message}`);
  process.exit(1);
});
