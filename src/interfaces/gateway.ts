import { timingSafeEqual } from "node:crypto";
import type { IncomingMessage } from "node:http";
import type { Duplex } from "node:stream";
import Fastify from "fastify";
import helmet from "@fastify/helmet";
import rateLimit from "@fastify/rate-limit";
import { WebSocket, WebSocketServer } from "ws";
import type { RawData } from "ws";
import type { Logger } from "../utils/logger.js";
import type { SessionManager } from "../core/session-manager.js";
import type { PendingConfirmations } from "../core/pending-confirmations.js";
import type { GenerativeClient } from "../core/llm/client.js";
import type { OutboundMessage, ProtocolLimits } from "../core/protocol.js";
import { parseInboundFrame } from "../core/protocol.js";

export interface GatewayDeps {
  sessions: SessionManager;
  confirmations: PendingConfirmations;
  llm: GenerativeClient;
}

export interface GatewayOptions {
  port: number;
  host: string;
  wsPath: string;
  apiKey?: string;
  /** Empty means any origin. */
  allowedOrigins: string[];
  maxContentLength: number;
  sessionIdPattern: string;
  httpRateLimit: { max: number; timeWindow: string };
}

const MAX_FRAME_BYTES = 64 * 1024;

/**
 * HTTP and WebSocket front door. The HTTP side serves health and usage;
 * the WebSocket side speaks the session protocol. Both share one server
 * and one bearer token.
 */
export class Gateway {
  private app = Fastify({ logger: false });
  private wss = new WebSocketServer({ noServer: true, maxPayload: MAX_FRAME_BYTES });
  private startTime = Date.now();
  private limits: ProtocolLimits;
  private connections = 0;

  constructor(
    private deps: GatewayDeps,
    private options: GatewayOptions,
    private logger: Logger
  ) {
    this.limits = {
      maxContentLength: options.maxContentLength,
      sessionIdPattern: new RegExp(options.sessionIdPattern),
    };
  }

  async start(): Promise<number> {
    await this.app.register(helmet);
    await this.app.register(rateLimit, {
      max: this.options.httpRateLimit.max,
      timeWindow: this.options.httpRateLimit.timeWindow,
    });
    this.setupAuth();
    this.setupRoutes();

    this.app.server.on("upgrade", (request: IncomingMessage, socket: Duplex, head: Buffer) => {
      this.handleUpgrade(request, socket, head);
    });
    this.wss.on("connection", (socket: WebSocket) => {
      this.handleConnection(socket);
    });

    await this.app.listen({ port: this.options.port, host: this.options.host });
    const address = this.app.server.address();
    const port = typeof address === "object" && address !== null ? address.port : this.options.port;
    this.logger.info({ port, host: this.options.host, wsPath: this.options.wsPath }, "Gateway started");
    return port;
  }

  async stop(): Promise<void> {
    for (const client of this.wss.clients) {
      client.close(1001, "Server shutting down");
    }
    await new Promise<void>((resolve, reject) => {
      this.wss.close((err?: Error) => (err ? reject(err) : resolve()));
    });
    await this.app.close();
    this.logger.info("Gateway stopped");
  }

  private setupAuth(): void {
    const { apiKey } = this.options;
    if (!apiKey) return;

    this.app.addHook("onRequest", async (request, reply) => {
      if (request.url === "/health") return;
      if (!tokenMatches(bearerToken(request.headers.authorization), apiKey)) {
        return reply.code(401).send({ error: "Unauthorized" });
      }
    });
  }

  private setupRoutes(): void {
    this.app.get("/health", async () => {
      const providers = this.deps.llm.getProviderHealth();
      const states = Object.values(providers);
      const available = states.filter((s) => s !== "open").length;

      return {
        status: states.length > 0 && available === 0 ? "degraded" : "ok",
        uptime: (Date.now() - this.startTime) / 1000,
        sessions: this.deps.sessions.size(),
        connections: this.connections,
        pending_confirmations: this.deps.confirmations.size(),
        providers,
      };
    });

    this.app.get<{ Params: { id: string } }>("/sessions/:id/usage", async (request, reply) => {
      const { id } = request.params;
      if (!this.limits.sessionIdPattern.test(id)) {
        return reply.code(400).send({ error: "Invalid session id" });
      }
      if (!this.deps.sessions.has(id)) {
        return reply.code(404).send({ error: "Session not found" });
      }
      return { session_id: id, usage: this.deps.llm.usage.getSessionUsage(id) };
    });
  }

  private handleUpgrade(request: IncomingMessage, socket: Duplex, head: Buffer): void {
    const url = new URL(request.url ?? "/", "http://localhost");
    if (url.pathname !== this.options.wsPath) {
      reject(socket, 404, "Not Found");
      return;
    }

    const origin = request.headers.origin;
    if (origin && this.options.allowedOrigins.length > 0 && !this.options.allowedOrigins.includes(origin)) {
      this.logger.warn({ origin }, "WebSocket origin rejected");
      reject(socket, 403, "Forbidden");
      return;
    }

    if (this.options.apiKey) {
      const token = bearerToken(request.headers.authorization) ?? url.searchParams.get("token") ?? undefined;
      if (!tokenMatches(token, this.options.apiKey)) {
        this.logger.warn("WebSocket authentication failed");
        reject(socket, 401, "Unauthorized");
        return;
      }
    }

    this.wss.handleUpgrade(request, socket, head, (ws) => {
      this.wss.emit("connection", ws, request);
    });
  }

  private handleConnection(socket: WebSocket): void {
    const owned = new Set<string>();
    let lastSession: string | undefined;
    this.connections++;
    this.logger.info({ connections: this.connections }, "WebSocket client connected");

    const send = (message: OutboundMessage): void => {
      if (socket.readyState === WebSocket.OPEN) {
        socket.send(JSON.stringify(message));
      }
    };

    socket.on("message", (data: RawData) => {
      const parsed = parseInboundFrame(rawDataToString(data), this.limits);
      if (!parsed.ok) {
        send({ type: "error", code: parsed.code, message: parsed.message });
        return;
      }

      const frame = parsed.frame;
      switch (frame.type) {
        case "message": {
          const result = this.deps.sessions.submit(frame.session_id, frame.content, send);
          owned.add(result.sessionId);
          lastSession = result.sessionId;
          if (!result.accepted) {
            send({ type: "error", code: result.code, message: result.message, session_id: result.sessionId });
          }
          break;
        }
        case "confirm_response": {
          const outcome = this.deps.confirmations.signal(
            frame.request_id,
            { approved: frame.approved, confirmationText: frame.confirmation_text },
            owned
          );
          this.logger.debug({ outcome }, "Confirmation response handled");
          break;
        }
        case "cancel": {
          const sessionId = frame.session_id ?? lastSession;
          if (sessionId && owned.has(sessionId)) {
            this.deps.sessions.cancel(sessionId);
          }
          break;
        }
        case "ping":
          send({ type: "pong" });
          break;
      }
    });

    socket.on("close", () => {
      this.connections--;
      this.logger.info({ connections: this.connections, sessions: owned.size }, "WebSocket client disconnected");
    });

    socket.on("error", (err: Error) => {
      this.logger.warn({ error: err }, "WebSocket error");
    });
  }
}

function rawDataToString(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf-8");
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString("utf-8");
  return data.toString("utf-8");
}

function bearerToken(header: string | undefined): string | undefined {
  if (!header?.startsWith("Bearer ")) return undefined;
  return header.slice("Bearer ".length);
}

function tokenMatches(candidate: string | undefined, expected: string): boolean {
  if (candidate === undefined) return false;
  const a = Buffer.from(candidate);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

function reject(socket: Duplex, status: number, text: string): void {
  socket.write(`HTTP/1.1 ${status} ${text}\r\nConnection: close\r\n\r\n`);
  socket.destroy();
}
