import type { ToolOutput } from "../../src/lib/audit-result";
import { Dispatcher, type HandshakePolicy } from "../../src/lib/dispatcher";
import type { JsonRpcErrorPayload, JsonRpcResponse } from "../../src/lib/json-rpc";
import { createLogger, type Logger } from "../../src/lib/logger";
import { createToolRegistry } from "../../src/tools";

export interface CapturedLogger {
  logger: Logger;
  lines: string[];
}

export function captureLogger(level: Logger["level"] = "debug"): CapturedLogger {
  const lines: string[] = [];
  const logger = createLogger({
    level,
    prefix: "test",
    sink: {
      write(chunk: string) {
        lines.push(chunk);
        return true;
      },
    },
  });
  return { logger, lines };
}

export function createDispatcher(
  handshakePolicy: HandshakePolicy = "permissive",
  logger: Logger = captureLogger("silent").logger,
): Dispatcher {
  return new Dispatcher({
    registry: createToolRegistry(),
    serverInfo: { name: "ai-presence-mcp", version: "0.0.0-test" },
    logger,
    handshakePolicy,
  });
}

export function callRequest(id: number | string, name: string, args: Record<string, unknown>) {
  return { jsonrpc: "2.0", id, method: "tools/call", params: { name, arguments: args } };
}

export function resultOf(response: JsonRpcResponse | undefined): Record<string, unknown> {
  if (!response || !("result" in response)) {
    throw new Error(`expected a result, got ${JSON.stringify(response)}`);
  }
  return response.result;
}

export function errorOf(response: JsonRpcResponse | undefined): JsonRpcErrorPayload {
  if (!response || !("error" in response)) {
    throw new Error(`expected an error, got ${JSON.stringify(response)}`);
  }
  return response.error;
}

/** Runs a tool the way tools/call does: validate, normalize, handle. */
export function runTool(name: string, args: Record<string, unknown>): ToolOutput {
  const tool = createToolRegistry().resolve(name);
  if (!tool) {
    throw new Error(`unknown tool ${name}`);
  }
  const prepared = tool.prepare(args);
  if (!prepared.ok) {
    throw new Error(`invalid arguments: ${prepared.issue.message}`);
  }
  return prepared.run();
}
