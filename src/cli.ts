import { startPresenceMcpServer, SERVER_INFO } from "./mcp-server";
import {
  normalizeFraming,
  normalizeHandshakePolicy,
  normalizeLogLevel,
  normalizeMaxFrameBytes,
  parseBooleanWord,
  resolveServerSettings,
  type Env,
  type ServerSettings,
} from "./settings-store";
import { createToolRegistry } from "./tools";

export type Flags = Record<string, string | boolean>;

// Never take a value from the following token.
const BOOLEAN_FLAGS = new Set(["help", "debug", "json"]);

export interface CliIo {
  stdout: { write(chunk: string): unknown };
  env: Env;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export interface ParsedArgs {
  positionals: string[];
  flags: Flags;
}

/**
 * `--key value`, `--key=value`, `--no-key` and `-h`. A flag takes the next
 * token as its value unless it is boolean or that token is another flag.
 */
export function parseArgs(args: readonly string[]): ParsedArgs {
  const parsed: ParsedArgs = { positionals: [], flags: {} };
  let awaitingValue: string | null = null;

  for (const token of args) {
    if (awaitingValue !== null && token.length > 0 && !token.startsWith("--")) {
      parsed.flags[awaitingValue] = token;
      awaitingValue = null;
      continue;
    }
    awaitingValue = null;

    if (token === "-h") {
      parsed.flags.help = true;
    } else if (!token.startsWith("--")) {
      parsed.positionals.push(token);
    } else {
      const body = token.slice(2);
      const eq = body.indexOf("=");
      if (eq >= 0) {
        parsed.flags[body.slice(0, eq)] = body.slice(eq + 1) || true;
      } else if (body.startsWith("no-")) {
        parsed.flags[body.slice(3)] = false;
      } else {
        parsed.flags[body] = true;
        awaitingValue = BOOLEAN_FLAGS.has(body) ? null : body;
      }
    }
  }

  return parsed;
}

export function getStringFlag(flags: Flags, key: string): string | undefined {
  const value = flags[key];
  return typeof value === "string" ? value : undefined;
}

export function getBooleanFlag(flags: Flags, key: string, fallback: boolean): boolean {
  const value = flags[key];
  if (typeof value === "boolean") {
    return value;
  }
  return (value === undefined ? null : parseBooleanWord(value)) ?? fallback;
}

function checkedFlag<T>(flags: Flags, key: string, normalize: (value: unknown) => T | null, expected: string): T | undefined {
  if (!(key in flags)) {
    return undefined;
  }
  const value = normalize(getStringFlag(flags, key));
  if (value === null) {
    throw new UsageError(`--${key} expects ${expected}`);
  }
  return value;
}

/** Settings named on the command line; only flags that were given appear. */
export function settingsFromFlags(flags: Flags): Partial<ServerSettings> {
  const out: Partial<ServerSettings> = {};
  const framing = checkedFlag(flags, "framing", normalizeFraming, "auto, plain or framed");
  const handshakePolicy = checkedFlag(flags, "handshake", normalizeHandshakePolicy, "permissive or strict");
  const logLevel = checkedFlag(flags, "log-level", normalizeLogLevel, "debug, info, warn, error or silent");
  const maxFrameBytes = checkedFlag(flags, "max-frame-bytes", normalizeMaxFrameBytes, "a byte count of at least 1024");
  if (framing !== undefined) {
    out.framing = framing;
  }
  if (handshakePolicy !== undefined) {
    out.handshakePolicy = handshakePolicy;
  }
  if (logLevel !== undefined) {
    out.logLevel = logLevel;
  }
  if (getBooleanFlag(flags, "debug", false)) {
    out.logLevel = "debug";
  }
  if (maxFrameBytes !== undefined) {
    out.maxFrameBytes = maxFrameBytes;
  }
  return out;
}

export function help(): string {
  return [
    `${SERVER_INFO.name} ${SERVER_INFO.version} (MCP server: AI brand-presence audits over stdio)`,
    "",
    "Usage:",
    "  ai-presence-mcp [serve] [options]      run the stdio server (default)",
    "  ai-presence-mcp tools [--json]         print the tool catalogue",
    "",
    "Options:",
    "  --framing auto|plain|framed            stdio framing (default: auto-detect)",
    "  --handshake permissive|strict          allow tools/call before initialize (default: permissive)",
    "  --log-level debug|info|warn|error|silent",
    "  --debug                                same as --log-level debug",
    "  --max-frame-bytes <n>                  largest accepted frame",
    "  --settings <path>                      settings JSON (default: ~/.ai-presence-mcp/settings.json)",
    "",
    "Register `ai-presence-mcp serve` as a stdio server with your MCP host.",
  ].join("\n");
}

function printTools(io: CliIo, asJson: boolean): void {
  const registry = createToolRegistry();
  if (asJson) {
    io.stdout.write(`${JSON.stringify({ tools: registry.list() }, null, 2)}\n`);
    return;
  }
  const lines = registry.list().map((tool) => {
    const required = tool.inputSchema.required ?? [];
    const params = Object.keys(tool.inputSchema.properties)
      .map((name) => (required.includes(name) ? name : `[${name}]`))
      .join(" ");
    return `${tool.name} ${params}\n  ${tool.description}`;
  });
  io.stdout.write(`${lines.join("\n\n")}\n`);
}

export async function runCli(argv: string[], io: CliIo): Promise<number> {
  const { positionals, flags } = parseArgs(argv);
  const [cmd = "serve", ...rest] = positionals;

  if (getBooleanFlag(flags, "help", false) || cmd === "help") {
    io.stdout.write(`${help()}\n`);
    return 0;
  }
  if (rest.length > 0) {
    throw new UsageError(`Unexpected argument: ${rest[0]}`);
  }

  if (cmd === "tools") {
    printTools(io, getBooleanFlag(flags, "json", false));
    return 0;
  }

  if (cmd === "serve") {
    const settings = resolveServerSettings({
      settingsPath: getStringFlag(flags, "settings"),
      env: io.env,
      overrides: settingsFromFlags(flags),
    });
    await startPresenceMcpServer({ settings });
    return 0;
  }

  throw new UsageError(`Unknown command: ${cmd}`);
}
