import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join, resolve } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  DEFAULT_SERVER_SETTINGS,
  normalizeMaxFrameBytes,
  normalizeServerSettings,
  resolveServerSettings,
  settingsFromEnv,
  SettingsError,
} from "../src/settings-store";

let dir = "";

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), "ai-presence-settings-"));
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

function writeSettings(name: string, content: string): string {
  const path = join(dir, name);
  writeFileSync(path, content, "utf8");
  return path;
}

describe("settings normalization", () => {
  it("keeps recognized well-formed keys only", () => {
    expect(
      normalizeServerSettings({
        framing: "FRAMED",
        handshakePolicy: " strict ",
        logLevel: "loud",
        maxFrameBytes: 512,
        unrelated: true,
      }),
    ).toEqual({ framing: "framed", handshakePolicy: "strict" });
    expect(normalizeServerSettings(["framed"])).toEqual({});
  });

  it("accepts frame limits from 1024 bytes up", () => {
    expect(normalizeMaxFrameBytes("2048")).toBe(2048);
    expect(normalizeMaxFrameBytes(4096.7)).toBe(4096);
    expect(normalizeMaxFrameBytes(1023)).toBeNull();
    expect(normalizeMaxFrameBytes("lots")).toBeNull();
  });

  it("reads log level switches from the environment", () => {
    expect(settingsFromEnv({ AI_PRESENCE_MCP_LOG_LEVEL: "info" })).toEqual({ logLevel: "info" });
    expect(settingsFromEnv({ AI_PRESENCE_MCP_LOG_LEVEL: "info", AI_PRESENCE_MCP_DEBUG: "yes" })).toEqual({ logLevel: "debug" });
    expect(settingsFromEnv({})).toEqual({});
  });
});

describe("resolveServerSettings", () => {
  it("layers file, environment and overrides over the defaults", () => {
    const settingsPath = writeSettings("settings.json", JSON.stringify({ logLevel: "info", maxFrameBytes: 2048 }));
    expect(
      resolveServerSettings({
        settingsPath,
        env: { AI_PRESENCE_MCP_DEBUG: "1" },
        overrides: { framing: "plain" },
      }),
    ).toEqual({ framing: "plain", handshakePolicy: "permissive", logLevel: "debug", maxFrameBytes: 2048 });
  });

  it("finds the settings file through the environment", () => {
    const settingsPath = writeSettings("env.json", JSON.stringify({ handshakePolicy: "strict" }));
    const settings = resolveServerSettings({ env: { AI_PRESENCE_MCP_SETTINGS: settingsPath } });
    expect(settings).toEqual({ ...DEFAULT_SERVER_SETTINGS, handshakePolicy: "strict" });
  });

  it("requires an explicitly named file to exist", () => {
    const missing = join(dir, "missing.json");
    expect(() => resolveServerSettings({ settingsPath: missing, env: {} })).toThrow(
      new SettingsError(`Settings file not found: ${resolve(missing)}`),
    );
  });

  it("rejects a settings file that is not JSON", () => {
    const settingsPath = writeSettings("broken.json", "{ framing: ");
    expect(() => resolveServerSettings({ settingsPath, env: {} })).toThrow(SettingsError);
  });
});
