import type WebSocket from "ws";

export type SessionState = "disconnected" | "connecting" | "registering" | "active";

export type SessionStateHandler = (state: SessionState) => void;

export interface AgentSessionConfig {
  readonly agreementId: string;
  readonly city: string;
  readonly serverUrl: string;
  readonly reconnectDelayMs: number;
  readonly handshakeTimeoutMs: number;
  readonly heartbeatIntervalMs: number;
  readonly maxConcurrentProbes: number;
}

export interface HostInfo {
  readonly os: string;
  readonly hostname: string;
}

export type SocketFactory = (url: string) => WebSocket;
