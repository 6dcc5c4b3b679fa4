import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join, resolve } from "node:path";
import type { HandshakePolicy } from "./lib/dispatcher";
import { DEFAULT_MAX_FRAME_BYTES, type FramingMode } from "./lib/frame-codec";
import { isLogLevel, type LogLevel } from "./lib/logger";

export interface ServerSettings {
  framing: FramingMode;
  handshakePolicy: HandshakePolicy;
  logLevel: LogLevel;
  maxFrameBytes: number;
}

export type Env = Record<string, string | undefined>;

export const DEFAULT_SERVER_SETTINGS: Readonly<ServerSettings> = Object.freeze({
  framing: "auto",
  handshakePolicy: "permissive",
  logLevel: "warn",
  maxFrameBytes: DEFAULT_MAX_FRAME_BYTES,
});

const MIN_FRAME_BYTES = 1024;

export class SettingsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SettingsError";
  }
}

function asString(value: unknown): string | null {
  if (typeof value !== "string") {
    return null;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

export function normalizeFraming(value: unknown): FramingMode | null {
  const raw = asString(value)?.toLowerCase();
  return raw === "auto" || raw === "plain" || raw === "framed" ? raw : null;
}

export function normalizeHandshakePolicy(value: unknown): HandshakePolicy | null {
  const raw = asString(value)?.toLowerCase();
  return raw === "permissive" || raw === "strict" ? raw : null;
}

export function normalizeLogLevel(value: unknown): LogLevel | null {
  const raw = asString(value)?.toLowerCase();
  return isLogLevel(raw) ? raw : null;
}

export function normalizeMaxFrameBytes(value: unknown): number | null {
  const parsed = typeof value === "number" ? value : typeof value === "string" ? Number(value.trim()) : Number.NaN;
  if (!Number.isFinite(parsed) || parsed < MIN_FRAME_BYTES) {
    return null;
  }
  return Math.trunc(parsed);
}

const TRUE_WORDS = new Set(["1", "true", "yes", "on"]);
const FALSE_WORDS = new Set(["0", "false", "no", "off"]);

/** Reads a switch written as a word; null when it is neither on nor off. */
export function parseBooleanWord(value: string): boolean | null {
  const word = value.trim().toLowerCase();
  if (TRUE_WORDS.has(word)) {
    return true;
  }
  return FALSE_WORDS.has(word) ? false : null;
}

/** Keeps only the recognized, well-formed keys of a settings object. */
export function normalizeServerSettings(raw: unknown): Partial<ServerSettings> {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    return {};
  }
  const record = Object.fromEntries(Object.entries(raw));
  const out: Partial<ServerSettings> = {};
  const framing = normalizeFraming(record.framing);
  const handshakePolicy = normalizeHandshakePolicy(record.handshakePolicy);
  const logLevel = normalizeLogLevel(record.logLevel);
  const maxFrameBytes = normalizeMaxFrameBytes(record.maxFrameBytes);
  if (framing) {
    out.framing = framing;
  }
  if (handshakePolicy) {
    out.handshakePolicy = handshakePolicy;
  }
  if (logLevel) {
    out.logLevel = logLevel;
  }
  if (maxFrameBytes !== null) {
    out.maxFrameBytes = maxFrameBytes;
  }
  return out;
}

export function getDefaultSettingsPath(): string {
  return join(homedir(), ".ai-presence-mcp", "settings.json");
}

/**
 * Reads a settings file. A file the caller named explicitly must exist and
 * parse; the default location is optional.
 */
export function loadSettingsFile(path: string, required: boolean): Partial<ServerSettings> {
  const fullPath = resolve(path);
  if (!existsSync(fullPath)) {
    if (required) {
      throw new SettingsError(`Settings file not found: ${fullPath}`);
    }
    return {};
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(fullPath, "utf8"));
  } catch (error) {
    throw new SettingsError(`Invalid settings file ${fullPath}: ${error instanceof Error ? error.message : String(error)}`);
  }
  return normalizeServerSettings(parsed);
}

export function settingsFromEnv(env: Env): Partial<ServerSettings> {
  const out: Partial<ServerSettings> = {};
  const logLevel = normalizeLogLevel(env.AI_PRESENCE_MCP_LOG_LEVEL);
  if (logLevel) {
    out.logLevel = logLevel;
  }
  if (parseBooleanWord(env.AI_PRESENCE_MCP_DEBUG ?? "") === true) {
    out.logLevel = "debug";
  }
  return out;
}

export interface ResolveSettingsOptions {
  settingsPath?: string;
  env?: Env;
  overrides?: Partial<ServerSettings>;
}

/** defaults, then settings file, then environment, then explicit overrides. */
export function resolveServerSettings(options: ResolveSettingsOptions = {}): ServerSettings {
  const env = options.env ?? process.env;
  const explicitPath = options.settingsPath ?? asString(env.AI_PRESENCE_MCP_SETTINGS) ?? undefined;
  const fromFile = explicitPath
    ? loadSettingsFile(explicitPath, true)
    : loadSettingsFile(getDefaultSettingsPath(), false);
  return {
    ...DEFAULT_SERVER_SETTINGS,
    ...fromFile,
    ...settingsFromEnv(env),
    ...(options.overrides ?? {}),
  };
}
