import { WILDCARD } from "./types.js";
import type { LatencyResult, ParseOutcome, RouteHop } from "./types.js";

type LatencyField = "packetLoss" | "min" | "avg" | "max";

interface LatencyProfile {
  readonly locale: string;
  readonly patterns: Readonly<Record<LatencyField, RegExp>>;
}

// Summary lines of Windows ping, per display language.
const LATENCY_PROFILES: readonly LatencyProfile[] = [
  {
    locale: "en",
    patterns: {
      packetLoss: /\((\d+)%\s*loss\)/i,
      min: /Minimum\s*=\s*(\d+)\s*ms/i,
      avg: /Average\s*=\s*(\d+)\s*ms/i,
      max: /Maximum\s*=\s*(\d+)\s*ms/i,
    },
  },
  {
    locale: "ru",
    patterns: {
      packetLoss: /\((\d+)%\s*потерь\)/i,
      min: /Минимальное\s*=\s*(\d+)\s*мсек/i,
      avg: /Среднее\s*=\s*(\d+)\s*мсек/i,
      max: /Максимальное\s*=\s*(\d+)\s*мсек/i,
    },
  },
];

const LATENCY_FIELDS: readonly LatencyField[] = ["packetLoss", "min", "avg", "max"];

export const DEFAULT_TRACE_HEADER_LINES = 3;

export interface RouteTraceParseOptions {
  /** Banner lines dropped before hop lines are matched. */
  readonly headerLines?: number;
}

// hop index, then one or more "N ms" / "<N ms" / "*" samples, then the rest of the line
const HOP_LINE_PATTERN = /^\s*(\d+)((?:\s+(?:<?\d+\s*(?:ms|мс)|\*))+)(.*)$/i;
const RTT_SAMPLE_PATTERN = /<?(\d+)\s*(?:ms|мс)|\*/gi;
const BRACKETED_ADDRESS_PATTERN = /\[([0-9a-f.:]+)\]/i;
const IPV4_PATTERN = /^(?:\d{1,3}\.){3}\d{1,3}$/;
const IPV6_PATTERN = /^[0-9a-f]{0,4}(?::[0-9a-f]{0,4}){2,7}$/i;
const HOSTNAME_PATTERN = /^(?:[a-z0-9](?:[a-z0-9-]*[a-z0-9])?\.)+[a-z0-9](?:[a-z0-9-]*[a-z0-9])?$/i;

function extractInteger(pattern: RegExp, text: string): number | null {
  const match = text.match(pattern);
  return match?.[1] !== undefined ? Number.parseInt(match[1], 10) : null;
}

export function parseLatencyOutput(text: string): ParseOutcome<LatencyResult> {
  let bestMissing: LatencyField[] = [...LATENCY_FIELDS];

  for (const profile of LATENCY_PROFILES) {
    const values = {
      packetLoss: extractInteger(profile.patterns.packetLoss, text),
      min: extractInteger(profile.patterns.min, text),
      avg: extractInteger(profile.patterns.avg, text),
      max: extractInteger(profile.patterns.max, text),
    };

    if (values.packetLoss !== null && values.min !== null && values.avg !== null && values.max !== null) {
      return {
        ok: true,
        value: {
          packetLossPercent: values.packetLoss,
          minRttMs: values.min,
          avgRttMs: values.avg,
          maxRttMs: values.max,
        },
      };
    }

    const missing = LATENCY_FIELDS.filter((field) => values[field] === null);
    if (missing.length < bestMissing.length) {
      bestMissing = missing;
    }
  }

  return {
    ok: false,
    failure: {
      reason: `Missing latency fields: ${bestMissing.join(", ")}`,
      raw: text,
    },
  };
}

export function isAddressToken(token: string): boolean {
  return IPV4_PATTERN.test(token) || IPV6_PATTERN.test(token) || HOSTNAME_PATTERN.test(token);
}

function resolveHopAddress(rest: string): string {
  const bracketed = rest.match(BRACKETED_ADDRESS_PATTERN);
  if (bracketed?.[1] !== undefined) {
    return bracketed[1];
  }

  const [first] = rest.trim().split(/\s+/);
  return first !== undefined && isAddressToken(first) ? first : WILDCARD;
}

function parseHopLine(line: string): RouteHop | null {
  const match = line.match(HOP_LINE_PATTERN);
  if (!match) {
    return null;
  }

  const [, index = "", rttField = "", rest = ""] = match;
  const samples: number[] = [];
  for (const sample of rttField.matchAll(RTT_SAMPLE_PATTERN)) {
    if (sample[1] !== undefined) {
      samples.push(Number.parseInt(sample[1], 10));
    }
  }

  const address = resolveHopAddress(rest);
  const hopIndex = Number.parseInt(index, 10);

  if (samples.length === 0) {
    return { hopIndex, address, minRttMs: WILDCARD, avgRttMs: WILDCARD, maxRttMs: WILDCARD };
  }

  const total = samples.reduce((sum, value) => sum + value, 0);
  return {
    hopIndex,
    address,
    minRttMs: Math.min(...samples),
    avgRttMs: total / samples.length,
    maxRttMs: Math.max(...samples),
  };
}

export function parseRouteTraceOutput(
  text: string,
  options: RouteTraceParseOptions = {},
): ParseOutcome<RouteHop[]> {
  const headerLines = options.headerLines ?? DEFAULT_TRACE_HEADER_LINES;

  try {
    const lines = text.trim().split(/\r?\n/);
    const hops: RouteHop[] = [];

    for (const line of lines.slice(headerLines)) {
      const hop = parseHopLine(line);
      if (hop) {
        hops.push(hop);
      }
    }

    return { ok: true, value: hops };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return { ok: false, failure: { reason: message, raw: text } };
  }
}
