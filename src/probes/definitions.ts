import type { CommandKind, ProbeInvocation } from "./types.js";

// Packet count and size are fixed: the latency parser expects the summary
// block Windows ping prints for this exact invocation.
export const PING_PACKET_COUNT = 30;
export const PING_PACKET_SIZE = 1200;

interface ProbeDefinition {
  readonly kind: CommandKind;
  readonly title: string;
  readonly build: (target: string) => ProbeInvocation;
}

const probeDefinitions: Record<CommandKind, ProbeDefinition> = {
  ping: {
    kind: "ping",
    title: "Latency probe",
    build: (target) => ({
      command: "ping",
      args: ["-n", String(PING_PACKET_COUNT), "-l", String(PING_PACKET_SIZE), target],
    }),
  },
  tracert: {
    kind: "tracert",
    title: "Route trace",
    build: (target) => ({
      command: "tracert",
      args: ["/4", target],
    }),
  },
};

export function getProbeDefinition(kind: CommandKind): ProbeDefinition {
  return probeDefinitions[kind];
}

export function buildInvocation(kind: CommandKind, target: string): ProbeInvocation {
  return probeDefinitions[kind].build(target);
}
