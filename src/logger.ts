import pino from "pino";
import type { AgentConfig } from "./config.js";

export type Logger = pino.Logger;

export function createLogger(config: Pick<AgentConfig, "logLevel" | "logFile">): Logger {
  const targets: pino.TransportTargetOptions[] = [
    {
      target: "pino-pretty",
      level: config.logLevel,
      options: {
        colorize: true,
        translateTime: "HH:MM:ss",
        ignore: "pid,hostname",
      },
    },
  ];

  if (config.logFile) {
    targets.push({
      target: "pino/file",
      level: config.logLevel,
      options: { destination: config.logFile, mkdir: true },
    });
  }

  return pino({ level: config.logLevel }, pino.transport({ targets }));
}
