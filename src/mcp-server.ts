import { stdin, stdout } from "node:process";
import packageJson from "../package.json";
import { Dispatcher, type ServerInfo } from "./lib/dispatcher";
import { createLogger, type Logger } from "./lib/logger";
import { runSession, type SessionSummary } from "./lib/session";
import type { ToolRegistry } from "./lib/tool-registry";
import { DEFAULT_SERVER_SETTINGS, type ServerSettings } from "./settings-store";
import { createToolRegistry } from "./tools";

export const SERVER_INFO: ServerInfo = Object.freeze({
  name: "ai-presence-mcp",
  version: packageJson.version,
});

export interface PresenceMcpServerOptions {
  settings?: Partial<ServerSettings>;
  registry?: ToolRegistry;
  logger?: Logger;
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

export class PresenceMcpServer {
  readonly settings: ServerSettings;
  readonly registry: ToolRegistry;
  readonly dispatcher: Dispatcher;
  readonly logger: Logger;
  private readonly input: NodeJS.ReadableStream;
  private readonly output: NodeJS.WritableStream;

  constructor(options: PresenceMcpServerOptions = {}) {
    this.settings = { ...DEFAULT_SERVER_SETTINGS, ...(options.settings ?? {}) };
    this.logger = options.logger ?? createLogger({ level: this.settings.logLevel });
    this.registry = options.registry ?? createToolRegistry();
    this.dispatcher = new Dispatcher({
      registry: this.registry,
      serverInfo: SERVER_INFO,
      logger: this.logger,
      handshakePolicy: this.settings.handshakePolicy,
    });
    this.input = options.input ?? stdin;
    this.output = options.output ?? stdout;
  }

  async start(): Promise<SessionSummary> {
    this.logger.info("stdio server started", {
      pid: process.pid,
      tools: this.registry.size,
      framing: this.settings.framing,
      handshakePolicy: this.settings.handshakePolicy,
    });
    const summary = await runSession({
      input: this.input,
      output: this.output,
      dispatcher: this.dispatcher,
      logger: this.logger,
      framing: this.settings.framing,
      maxFrameBytes: this.settings.maxFrameBytes,
    });
    this.logger.info("stdio server stopped", { ...summary });
    return summary;
  }
}

export async function startPresenceMcpServer(options: PresenceMcpServerOptions = {}): Promise<SessionSummary> {
  const server = new PresenceMcpServer(options);
  return server.start();
}
