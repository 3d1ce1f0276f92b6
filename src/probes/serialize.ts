import type { LatencyResult, ProbeError, ProbeOutcome, RouteHop, Wildcard } from "./types.js";

export const ERROR_PREFIX = "Error:";

export interface WireLatencyResult {
  readonly packet_loss: number;
  readonly min_rtt: number;
  readonly avg_rtt: number;
  readonly max_rtt: number;
}

export interface WireRouteHop {
  readonly hop: number;
  readonly ip: string;
  readonly min_rtt: number | Wildcard;
  readonly avg_rtt: number | Wildcard;
  readonly max_rtt: number | Wildcard;
}

export function toWireLatency(result: LatencyResult): WireLatencyResult {
  return {
    packet_loss: result.packetLossPercent,
    min_rtt: result.minRttMs,
    avg_rtt: result.avgRttMs,
    max_rtt: result.maxRttMs,
  };
}

export function toWireHop(hop: RouteHop): WireRouteHop {
  return {
    hop: hop.hopIndex,
    ip: hop.address,
    min_rtt: hop.minRttMs,
    avg_rtt: hop.avgRttMs,
    max_rtt: hop.maxRttMs,
  };
}

export function formatError(error: ProbeError): string {
  return `${ERROR_PREFIX} ${error.message}`;
}

/** Encodes an outcome as the string carried in a result message's `result` field. */
export function serializeOutcome(outcome: ProbeOutcome): string {
  if (!outcome.ok) {
    return formatError(outcome.error);
  }

  if (outcome.kind === "ping") {
    return JSON.stringify(toWireLatency(outcome.value));
  }

  return JSON.stringify(outcome.value.map(toWireHop));
}
