import os from "node:os";
import type { HostInfo } from "./types.js";

const OS_NAMES: Readonly<Record<string, string>> = {
  Windows_NT: "Windows",
  Linux: "Linux",
  Darwin: "Darwin",
};

export function describeOs(osType: string = os.type()): string {
  return OS_NAMES[osType] ?? osType;
}

export function currentHost(): HostInfo {
  return { os: describeOs(), hostname: os.hostname() };
}
