import type { DecodeFailure } from "./frame-codec";
import {
  asRecord,
  errorResponse,
  ErrorCode,
  idFromUnknown,
  isNotification,
  jsonRpcError,
  okResponse,
  parseRequest,
  ProtocolError,
  type JsonRpcErrorPayload,
  type JsonRpcRequest,
  type JsonRpcResponse,
} from "./json-rpc";
import { logLevelFromSyslog, type Logger } from "./logger";
import type { ToolRegistry } from "./tool-registry";

export const SUPPORTED_PROTOCOL_VERSIONS = ["2024-11-05", "2025-03-26", "2025-06-18"] as const;
export const LATEST_PROTOCOL_VERSION = "2025-06-18";

export type DispatcherState = "uninitialized" | "ready" | "draining" | "terminated";
export type HandshakePolicy = "permissive" | "strict";

export interface ServerInfo {
  name: string;
  version: string;
}

export interface DispatcherOptions {
  registry: ToolRegistry;
  serverInfo: ServerInfo;
  logger: Logger;
  handshakePolicy?: HandshakePolicy;
  instructions?: string;
}

const DEFAULT_INSTRUCTIONS =
  "Deterministic brand-presence audits. Call tools/list for the catalogue; every tool returns a score, " +
  "findings and recommendations in structuredContent plus a Markdown report.";

// Served in any state; everything else waits for `initialize` under the strict policy.
const ALWAYS_ALLOWED = new Set(["initialize", "notifications/initialized", "ping", "tools/list", "exit"]);

export function negotiateProtocolVersion(requested: unknown): string {
  if (typeof requested === "string" && SUPPORTED_PROTOCOL_VERSIONS.some((version) => version === requested)) {
    return requested;
  }
  return LATEST_PROTOCOL_VERSION;
}

export class Dispatcher {
  private current: DispatcherState = "uninitialized";
  private readonly registry: ToolRegistry;
  private readonly serverInfo: ServerInfo;
  private readonly logger: Logger;
  private readonly handshakePolicy: HandshakePolicy;
  private readonly instructions: string;

  constructor(options: DispatcherOptions) {
    this.registry = options.registry;
    this.serverInfo = options.serverInfo;
    this.logger = options.logger;
    this.handshakePolicy = options.handshakePolicy ?? "permissive";
    this.instructions = options.instructions ?? DEFAULT_INSTRUCTIONS;
  }

  get state(): DispatcherState {
    return this.current;
  }

  /** Input closed: finish what is buffered, accept nothing new after that. */
  beginDraining(): void {
    if (this.current !== "terminated") {
      this.current = "draining";
    }
  }

  terminate(): void {
    this.current = "terminated";
  }

  /**
   * Entry point for one decoded JSON value. Arrays are batches; their
   * replies come back in element order.
   */
  dispatch(payload: unknown): JsonRpcResponse[] {
    if (Array.isArray(payload)) {
      if (payload.length === 0) {
        return [errorResponse(null, jsonRpcError(ErrorCode.InvalidRequest, "Invalid Request: empty batch", { reason: "empty_batch" }))];
      }
      const out: JsonRpcResponse[] = [];
      for (const entry of payload) {
        out.push(...this.dispatchOne(entry));
      }
      return out;
    }
    return this.dispatchOne(payload);
  }

  /** Reply for a frame the codec could not decode, or null when there is no id to answer. */
  decodeFailure(failure: DecodeFailure): JsonRpcResponse | null {
    this.logger.warn("undecodable frame", {
      reason: failure.reason,
      id: failure.recoveredId,
      preview: failure.preview,
    });
    if (failure.recoveredId === null) {
      return null;
    }
    return errorResponse(failure.recoveredId, jsonRpcError(ErrorCode.DecodeError, "Parse error", { reason: failure.reason }));
  }

  handle(request: JsonRpcRequest): JsonRpcResponse | null {
    const id = request.id ?? null;
    this.logger.debug("request", { method: request.method, id });
    try {
      const result = this.route(request);
      return isNotification(request) ? null : okResponse(id, result);
    } catch (error) {
      const payload = this.toErrorPayload(error, request);
      if (isNotification(request)) {
        this.logger.debug("notification failed", { method: request.method, message: payload.message });
        return null;
      }
      return errorResponse(id, payload);
    }
  }

  private dispatchOne(value: unknown): JsonRpcResponse[] {
    let request: JsonRpcRequest;
    try {
      request = parseRequest(value);
    } catch (error) {
      const payload = this.toErrorPayload(error, null);
      return [errorResponse(idFromUnknown(value), payload)];
    }
    const response = this.handle(request);
    return response ? [response] : [];
  }

  private toErrorPayload(error: unknown, request: JsonRpcRequest | null): JsonRpcErrorPayload {
    if (error instanceof ProtocolError) {
      return error.toPayload();
    }
    const message = error instanceof Error ? error.message : String(error);
    this.logger.error("unexpected dispatcher failure", { method: request?.method ?? null, message });
    return jsonRpcError(ErrorCode.InternalError, "Internal error", { reason: message });
  }

  private route(request: JsonRpcRequest): Record<string, unknown> {
    const { method } = request;
    const params = request.params ?? {};

    if (this.current === "draining" && method !== "exit" && method !== "ping") {
      throw new ProtocolError("InvalidRequest", "Invalid Request: server is shutting down", { reason: "shutting_down" });
    }
    if (this.current === "terminated") {
      throw new ProtocolError("InvalidRequest", "Invalid Request: server has terminated", { reason: "terminated" });
    }
    if (this.current === "uninitialized" && this.handshakePolicy === "strict" && !ALWAYS_ALLOWED.has(method)) {
      throw new ProtocolError("NotInitialized", `Server not initialized: send initialize before ${method}`, { method });
    }

    switch (method) {
      case "initialize":
        return this.initialize(params, !isNotification(request));
      case "notifications/initialized":
      case "ping":
        return {};
      case "tools/list":
        return { tools: this.registry.list() };
      case "tools/call":
        return this.callTool(params);
      case "logging/setLevel":
        return this.setLogLevel(params);
      case "resources/list":
        return { resources: [] };
      case "prompts/list":
        return { prompts: [] };
      case "shutdown":
        this.current = "draining";
        this.logger.info("shutdown requested");
        return {};
      case "exit":
        this.current = "terminated";
        return {};
      default:
        if (isNotification(request)) {
          this.logger.debug("ignored notification", { method });
          return {};
        }
        throw new ProtocolError("MethodNotFound", `Method not found: ${method}`, { method });
    }
  }

  private initialize(params: Record<string, unknown>, answered: boolean): Record<string, unknown> {
    const protocolVersion = negotiateProtocolVersion(params.protocolVersion);
    const client = asRecord(params.clientInfo);
    this.logger.info("initialize", {
      protocolVersion,
      client: client && typeof client.name === "string" ? client.name : null,
    });
    // Only an answered handshake counts; a notification gets no reply.
    if (answered) {
      this.current = "ready";
    }
    return {
      protocolVersion,
      capabilities: {
        tools: { listChanged: false },
        logging: {},
      },
      serverInfo: { name: this.serverInfo.name, version: this.serverInfo.version },
      instructions: this.instructions,
      availableTools: this.registry.names(),
    };
  }

  private callTool(params: Record<string, unknown>): Record<string, unknown> {
    const name = typeof params.name === "string" ? params.name.trim() : "";
    if (!name) {
      throw new ProtocolError("InvalidParameters", "Invalid params: \"name\" is required", { field: "name" });
    }

    const tool = this.registry.resolve(name);
    if (!tool) {
      throw new ProtocolError("UnknownTool", `Unknown tool: ${name}`, { tool: name });
    }

    const args = params.arguments === undefined || params.arguments === null ? {} : asRecord(params.arguments);
    if (!args) {
      throw new ProtocolError("InvalidParameters", "Invalid params: \"arguments\" must be an object", {
        field: "arguments",
        tool: name,
      });
    }

    const prepared = tool.prepare(args);
    if (!prepared.ok) {
      throw new ProtocolError("InvalidParameters", `Invalid params for ${name}: ${prepared.issue.message}`, {
        field: prepared.issue.field,
        tool: name,
      });
    }

    try {
      const output = prepared.run();
      return {
        content: [{ type: "text", text: output.text }],
        structuredContent: output.structured,
        isError: false,
      };
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.error("tool failed", { tool: name, reason });
      throw new ProtocolError("InternalError", `Tool ${name} failed`, { tool: name, reason });
    }
  }

  private setLogLevel(params: Record<string, unknown>): Record<string, unknown> {
    const level = typeof params.level === "string" ? logLevelFromSyslog(params.level) : null;
    if (!level) {
      throw new ProtocolError("InvalidParameters", "Invalid params: \"level\" must be a log level", { field: "level" });
    }
    this.logger.level = level;
    return {};
  }
}
