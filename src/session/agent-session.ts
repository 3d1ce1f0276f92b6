import { EventEmitter } from "node:events";
import WebSocket, { type RawData } from "ws";
import type { Logger } from "../logger.js";
import { ERROR_PREFIX } from "../probes/serialize.js";
import type { DiagnosticCommand, ProbeRunner } from "../probes/types.js";
import { currentHost } from "./host.js";
import {
  buildRegistrationMessage,
  buildResultMessage,
  decodeFrame,
  interpretMessage,
  type OutboundMessage,
} from "./messages.js";
import { Semaphore } from "./semaphore.js";
import type { AgentSessionConfig, HostInfo, SessionState, SessionStateHandler, SocketFactory } from "./types.js";

export interface AgentSessionDeps {
  readonly config: AgentSessionConfig;
  readonly runner: ProbeRunner;
  readonly logger: Logger;
  readonly host?: HostInfo;
  /** Called when the agent cannot run with its configuration. Defaults to process.exit. */
  readonly exit?: (code: number) => void;
  readonly createSocket?: SocketFactory;
}

function rawDataToString(data: RawData): string {
  if (Buffer.isBuffer(data)) {
    return data.toString("utf8");
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString("utf8");
  }
  return Buffer.from(data).toString("utf8");
}

/**
 * Keeps one connection to the control server open, registers the agent on
 * every connect and runs incoming commands without blocking the receive loop.
 */
export class AgentSession extends EventEmitter {
  private readonly config: AgentSessionConfig;
  private readonly runner: ProbeRunner;
  private readonly logger: Logger;
  private readonly host: HostInfo;
  private readonly exit: (code: number) => void;
  private readonly createSocket: SocketFactory;
  private readonly probeSlots: Semaphore;

  private socket: WebSocket | null = null;
  private running = false;
  private reconnectTimer: NodeJS.Timeout | null = null;
  private heartbeatTimer: NodeJS.Timeout | null = null;
  private currentState: SessionState = "disconnected";
  private inFlight = 0;

  constructor(deps: AgentSessionDeps) {
    super();
    this.config = deps.config;
    this.runner = deps.runner;
    this.logger = deps.logger.child({ component: "session" });
    this.host = deps.host ?? currentHost();
    this.exit = deps.exit ?? ((code: number) => process.exit(code));
    this.createSocket =
      deps.createSocket ??
      ((url: string) => new WebSocket(url, { handshakeTimeout: deps.config.handshakeTimeoutMs }));
    this.probeSlots = new Semaphore(deps.config.maxConcurrentProbes);
  }

  get state(): SessionState {
    return this.currentState;
  }

  get pendingProbes(): number {
    return this.inFlight;
  }

  onStateChange(handler: SessionStateHandler): void {
    this.on("state", handler);
  }

  start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    this.connect();
  }

  async stop(): Promise<void> {
    this.running = false;
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
    this.stopHeartbeat();

    const socket = this.socket;
    if (!socket || socket.readyState === WebSocket.CLOSED) {
      this.setState("disconnected");
      return;
    }

    await new Promise<void>((resolve) => {
      socket.once("close", () => resolve());
      socket.close();
    });
  }

  private setState(state: SessionState): void {
    if (this.currentState === state) {
      return;
    }
    this.currentState = state;
    this.logger.debug({ state }, "Session state changed");
    this.emit("state", state);
  }

  private connect(): void {
    this.reconnectTimer = null;
    if (!this.running) {
      return;
    }

    this.setState("connecting");
    this.logger.info({ serverUrl: this.config.serverUrl }, "Connecting to control server");

    let socket: WebSocket;
    try {
      socket = this.createSocket(this.config.serverUrl);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.error({ error: message }, "Failed to open connection");
      this.setState("disconnected");
      this.scheduleReconnect();
      return;
    }

    this.socket = socket;

    socket.on("open", () => {
      this.startHeartbeat(socket);
      this.register(socket);
    });

    socket.on("message", (data) => {
      this.handleFrame(data);
    });

    socket.on("error", (error) => {
      this.logger.error({ error: error.message }, "Connection error");
    });

    socket.on("close", (code, reason) => {
      if (this.socket === socket) {
        this.socket = null;
        this.stopHeartbeat();
      }
      this.logger.warn({ code, reason: reason.toString("utf8") || undefined }, "Connection lost");
      this.setState("disconnected");
      this.scheduleReconnect();
    });
  }

  private scheduleReconnect(): void {
    if (!this.running || this.reconnectTimer) {
      return;
    }

    this.logger.info({ delayMs: this.config.reconnectDelayMs }, "Reconnecting after delay");
    this.reconnectTimer = setTimeout(() => this.connect(), this.config.reconnectDelayMs);
  }

  private startHeartbeat(socket: WebSocket): void {
    this.stopHeartbeat();
    let alive = true;
    socket.on("pong", () => {
      alive = true;
    });

    this.heartbeatTimer = setInterval(() => {
      if (!alive) {
        this.logger.warn({ intervalMs: this.config.heartbeatIntervalMs }, "No pong from control server, dropping connection");
        this.stopHeartbeat();
        socket.terminate();
        return;
      }
      alive = false;
      socket.ping();
    }, this.config.heartbeatIntervalMs);
  }

  private stopHeartbeat(): void {
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }
  }

  private register(socket: WebSocket): void {
    this.setState("registering");

    if (!this.config.agreementId) {
      this.logger.fatal("Agreement id is not set in the configuration");
      this.running = false;
      socket.close();
      this.exit(1);
      return;
    }

    this.send(
      buildRegistrationMessage({
        agreementId: this.config.agreementId,
        city: this.config.city,
        os: this.host.os,
        hostname: this.host.hostname,
      }),
    );
    this.setState("active");
    this.logger.info({ agreementId: this.config.agreementId, city: this.config.city }, "Registered with control server");
  }

  private handleFrame(data: RawData): void {
    if (this.currentState !== "active") {
      this.logger.debug({ state: this.currentState }, "Ignoring message received before registration");
      return;
    }

    let payload: unknown;
    try {
      payload = decodeFrame(rawDataToString(data));
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.error({ error: message }, "Received malformed message");
      return;
    }

    const message = interpretMessage(payload);
    if (message.type === "ignored") {
      this.logger.debug({ reason: message.reason }, "Ignoring message");
      return;
    }

    if (message.type === "rejected") {
      this.logger.warn({ command: message.command.kind, target: message.command.target, reason: message.reason }, "Rejecting command");
      this.send(buildResultMessage(this.config, message.command, `${ERROR_PREFIX} Invalid target: ${message.reason}`));
      return;
    }

    this.dispatch(message.command, message.target).catch((err: unknown) => {
      const reason = err instanceof Error ? err.message : String(err);
      this.logger.error({ command: message.command.kind, target: message.command.target, error: reason }, "Failed to deliver result");
    });
  }

  private async dispatch(command: DiagnosticCommand, target: string): Promise<void> {
    this.inFlight++;
    this.logger.info({ command: command.kind, target, inFlight: this.inFlight }, "Command received");

    let result: string;
    try {
      result = await this.probeSlots.run(() => this.runner.run(command.kind, target));
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      result = `${ERROR_PREFIX} ${message}`;
    } finally {
      this.inFlight--;
    }

    this.send(buildResultMessage(this.config, command, result));
  }

  private send(message: OutboundMessage): boolean {
    const socket = this.socket;
    if (!socket || socket.readyState !== WebSocket.OPEN) {
      this.logger.warn({ type: message.type }, "Connection is not open, dropping message");
      return false;
    }

    socket.send(JSON.stringify(message));
    return true;
  }
}
