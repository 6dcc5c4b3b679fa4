import { describe, expect, it, vi } from "vitest";
import { z } from "zod";
import type { AuditResult } from "../src/lib/audit-result";
import { Dispatcher, LATEST_PROTOCOL_VERSION } from "../src/lib/dispatcher";
import { ErrorCode } from "../src/lib/json-rpc";
import { defineTool, ToolRegistry } from "../src/lib/tool-registry";
import { callRequest, captureLogger, createDispatcher, errorOf, resultOf } from "./helpers/fixtures";

type ProbeHandler = (params: { x: string }) => AuditResult;

function probeRegistry(handler: ProbeHandler) {
  return new ToolRegistry([
    defineTool({
      name: "probe",
      description: "test tool",
      inputSchema: {
        type: "object",
        additionalProperties: false,
        required: ["x"],
        properties: { x: { type: "string" } },
      },
      params: z.object({ x: z.string() }).strict(),
      handler,
      render: () => "probe report",
    }),
  ]);
}

function probeDispatcher(handler: ProbeHandler) {
  return new Dispatcher({
    registry: probeRegistry(handler),
    serverInfo: { name: "probe-server", version: "1.2.3" },
    logger: captureLogger("silent").logger,
  });
}

describe("dispatcher handshake", () => {
  it("advertises the same tool names as tools/list", () => {
    const dispatcher = createDispatcher();
    const init = resultOf(
      dispatcher.dispatch({ jsonrpc: "2.0", id: 1, method: "initialize", params: { protocolVersion: "2024-11-05" } })[0],
    );
    const listed = resultOf(dispatcher.dispatch({ jsonrpc: "2.0", id: 2, method: "tools/list" })[0]);

    const tools = z.array(z.object({ name: z.string() }).passthrough()).parse(listed.tools);
    const advertised = z.array(z.string()).parse(init.availableTools);
    expect(new Set(advertised)).toEqual(new Set(tools.map((tool) => tool.name)));
    expect(tools.map((tool) => tool.name)).toEqual([
      "brand_perception_audit",
      "citation_check",
      "competitor_comparison",
      "entity_clarity_score",
      "geo_recommendations",
    ]);
    expect(init.protocolVersion).toBe("2024-11-05");
    expect(init.serverInfo).toEqual({ name: "ai-presence-mcp", version: "0.0.0-test" });
    expect(dispatcher.state).toBe("ready");
  });

  it("answers unknown protocol versions with the latest supported one", () => {
    const dispatcher = createDispatcher();
    const init = resultOf(
      dispatcher.dispatch({ jsonrpc: "2.0", id: "a", method: "initialize", params: { protocolVersion: "1999-01-01" } })[0],
    );
    expect(init.protocolVersion).toBe(LATEST_PROTOCOL_VERSION);
  });

  it("serves tools/call before initialize under the permissive policy", () => {
    const dispatcher = createDispatcher("permissive");
    const response = dispatcher.dispatch(callRequest(7, "entity_clarity_score", { brand_name: "Acme Corp" }))[0];
    expect(resultOf(response).isError).toBe(false);
    expect(dispatcher.state).toBe("uninitialized");
  });

  it("stays uninitialized after an initialize sent as a notification", () => {
    const dispatcher = createDispatcher("strict");
    expect(dispatcher.dispatch({ jsonrpc: "2.0", method: "initialize", params: {} })).toEqual([]);
    expect(dispatcher.state).toBe("uninitialized");

    const call = dispatcher.dispatch(callRequest(1, "entity_clarity_score", { brand_name: "Acme Corp" }))[0];
    expect(errorOf(call).code).toBe(ErrorCode.NotInitialized);
  });

  it("rejects tools/call before initialize under the strict policy", () => {
    const dispatcher = createDispatcher("strict");
    const early = dispatcher.dispatch(callRequest(1, "entity_clarity_score", { brand_name: "Acme Corp" }))[0];
    expect(early.id).toBe(1);
    expect(errorOf(early).code).toBe(ErrorCode.NotInitialized);
    expect(errorOf(early).data).toEqual({ method: "tools/call" });

    expect(resultOf(dispatcher.dispatch({ jsonrpc: "2.0", id: 2, method: "tools/list" })[0]).tools).toHaveLength(5);

    dispatcher.dispatch({ jsonrpc: "2.0", id: 3, method: "initialize", params: {} });
    const later = dispatcher.dispatch(callRequest(4, "entity_clarity_score", { brand_name: "Acme Corp" }))[0];
    expect(resultOf(later).isError).toBe(false);
  });
});

describe("dispatcher tools/call", () => {
  it("wraps the audit result and keeps the request id", () => {
    const dispatcher = createDispatcher();
    const response = dispatcher.dispatch(callRequest("req-9", "citation_check", { brand_name: "Acme Corp", topics: ["pricing"] }))[0];

    expect(response.id).toBe("req-9");
    const result = resultOf(response);
    const content = z.array(z.object({ type: z.string(), text: z.string() })).parse(result.content);
    expect(content[0].type).toBe("text");
    expect(content[0].text.startsWith("# Citation Check: Acme Corp\n")).toBe(true);
    expect(result.structuredContent).toMatchObject({ tool: "citation_check", brand: "Acme Corp", score: 100 });
  });

  it("returns identical results for identical calls", () => {
    const dispatcher = createDispatcher();
    const args = { brand_name: "Acme Corp", competitors: ["Globex", "Initech"], category: "project management" };
    const first = resultOf(dispatcher.dispatch(callRequest(1, "competitor_comparison", args))[0]);
    const second = resultOf(dispatcher.dispatch(callRequest(1, "competitor_comparison", args))[0]);
    expect(second).toEqual(first);
  });

  it("reports unknown tools without invoking any handler", () => {
    const handler = vi.fn(
      (params: { x: string }): AuditResult => ({
        tool: "probe",
        brand: params.x,
        score: 0,
        rating: "weak",
        findings: [],
        recommendations: [],
      }),
    );
    const dispatcher = probeDispatcher(handler);

    const response = dispatcher.dispatch(callRequest(3, "nope", { x: "y" }))[0];
    expect(response.id).toBe(3);
    expect(errorOf(response)).toEqual({ code: ErrorCode.UnknownTool, message: "Unknown tool: nope", data: { tool: "nope" } });
    expect(handler).not.toHaveBeenCalled();
  });

  it("names the missing required parameter", () => {
    const dispatcher = createDispatcher();
    const error = errorOf(dispatcher.dispatch(callRequest(4, "citation_check", { brand_name: "Acme Corp" }))[0]);
    expect(error.code).toBe(ErrorCode.InvalidParameters);
    expect(error.message).toBe('Invalid params for citation_check: "topics" is required');
    expect(error.data).toEqual({ field: "topics", tool: "citation_check" });
  });

  it("names mistyped, blank and unknown parameters", () => {
    const dispatcher = createDispatcher();
    const mistyped = errorOf(dispatcher.dispatch(callRequest(5, "citation_check", { brand_name: "Acme", topics: "pricing" }))[0]);
    expect(mistyped.data).toEqual({ field: "topics", tool: "citation_check" });

    const badItem = errorOf(dispatcher.dispatch(callRequest(6, "citation_check", { brand_name: "Acme", topics: ["ok", 3] }))[0]);
    expect(badItem.data).toEqual({ field: "topics[1]", tool: "citation_check" });

    const blank = errorOf(dispatcher.dispatch(callRequest(7, "entity_clarity_score", { brand_name: "   " }))[0]);
    expect(blank.data).toEqual({ field: "brand_name", tool: "entity_clarity_score" });

    const unknown = errorOf(dispatcher.dispatch(callRequest(8, "entity_clarity_score", { brand_name: "Acme", slogan: "x" }))[0]);
    expect(unknown.message).toBe('Invalid params for entity_clarity_score: "slogan" is not a recognized parameter');
    expect(unknown.data).toEqual({ field: "slogan", tool: "entity_clarity_score" });
  });

  it("requires a tool name and object arguments", () => {
    const dispatcher = createDispatcher();
    const noName = errorOf(dispatcher.dispatch({ jsonrpc: "2.0", id: 1, method: "tools/call", params: {} })[0]);
    expect(noName).toEqual({ code: ErrorCode.InvalidParameters, message: 'Invalid params: "name" is required', data: { field: "name" } });

    const badArgs = errorOf(
      dispatcher.dispatch({ jsonrpc: "2.0", id: 2, method: "tools/call", params: { name: "citation_check", arguments: [1] } })[0],
    );
    expect(badArgs.data).toEqual({ field: "arguments", tool: "citation_check" });
  });

  it("turns handler failures into internal errors", () => {
    const dispatcher = probeDispatcher(() => {
      throw new Error("boom");
    });
    const response = dispatcher.dispatch(callRequest(11, "probe", { x: "y" }))[0];
    expect(response.id).toBe(11);
    expect(errorOf(response)).toEqual({
      code: ErrorCode.InternalError,
      message: "Tool probe failed",
      data: { tool: "probe", reason: "boom" },
    });

    const next = dispatcher.dispatch({ jsonrpc: "2.0", id: 12, method: "ping" })[0];
    expect(resultOf(next)).toEqual({});
  });
});

describe("dispatcher protocol surface", () => {
  it("rejects unknown methods", () => {
    const dispatcher = createDispatcher();
    const response = dispatcher.dispatch({ jsonrpc: "2.0", id: 9, method: "resources/read" })[0];
    expect(errorOf(response)).toEqual({
      code: ErrorCode.MethodNotFound,
      message: "Method not found: resources/read",
      data: { method: "resources/read" },
    });
  });

  it("never answers notifications", () => {
    const dispatcher = createDispatcher();
    expect(dispatcher.dispatch({ jsonrpc: "2.0", method: "notifications/initialized" })).toEqual([]);
    expect(dispatcher.dispatch({ jsonrpc: "2.0", method: "notifications/unknown" })).toEqual([]);
    expect(dispatcher.dispatch({ jsonrpc: "2.0", method: "tools/call", params: { name: "nope" } })).toEqual([]);
  });

  it("answers batches element by element in order", () => {
    const dispatcher = createDispatcher();
    const responses = dispatcher.dispatch([
      { jsonrpc: "2.0", id: "b1", method: "ping" },
      { jsonrpc: "2.0", method: "notifications/initialized" },
      { jsonrpc: "2.0", id: "b2", method: "tools/list" },
    ]);
    expect(responses.map((response) => response.id)).toEqual(["b1", "b2"]);

    const empty = dispatcher.dispatch([]);
    expect(empty).toHaveLength(1);
    expect(empty[0].id).toBeNull();
    expect(errorOf(empty[0]).code).toBe(ErrorCode.InvalidRequest);
  });

  it("keeps the id on malformed requests", () => {
    const dispatcher = createDispatcher();
    const response = dispatcher.dispatch({ jsonrpc: "2.0", id: 5, params: {} })[0];
    expect(response.id).toBe(5);
    expect(errorOf(response).code).toBe(ErrorCode.InvalidRequest);

    const notObject = dispatcher.dispatch("hello")[0];
    expect(notObject.id).toBeNull();
    expect(errorOf(notObject).data).toEqual({ reason: "not_an_object" });
  });

  it("answers decode failures only when an id was recovered", () => {
    const dispatcher = createDispatcher();
    const withId = dispatcher.decodeFailure({ reason: "Parse error: bad", recoveredId: 42, preview: "{" });
    expect(withId).toEqual({
      jsonrpc: "2.0",
      id: 42,
      error: { code: ErrorCode.DecodeError, message: "Parse error", data: { reason: "Parse error: bad" } },
    });
    expect(dispatcher.decodeFailure({ reason: "Parse error: bad", recoveredId: null, preview: "{" })).toBeNull();
  });

  it("refuses new work after shutdown but still answers ping", () => {
    const dispatcher = createDispatcher();
    expect(resultOf(dispatcher.dispatch({ jsonrpc: "2.0", id: 1, method: "shutdown" })[0])).toEqual({});
    expect(dispatcher.state).toBe("draining");

    const refused = errorOf(dispatcher.dispatch(callRequest(2, "entity_clarity_score", { brand_name: "Acme" }))[0]);
    expect(refused).toEqual({
      code: ErrorCode.InvalidRequest,
      message: "Invalid Request: server is shutting down",
      data: { reason: "shutting_down" },
    });
    expect(resultOf(dispatcher.dispatch({ jsonrpc: "2.0", id: 3, method: "ping" })[0])).toEqual({});

    dispatcher.dispatch({ jsonrpc: "2.0", method: "exit" });
    expect(dispatcher.state).toBe("terminated");
  });

  it("changes the log level through logging/setLevel", () => {
    const { logger } = captureLogger("warn");
    const dispatcher = new Dispatcher({
      registry: probeRegistry(() => {
        throw new Error("unused");
      }),
      serverInfo: { name: "probe-server", version: "1.2.3" },
      logger,
    });
    expect(resultOf(dispatcher.dispatch({ jsonrpc: "2.0", id: 1, method: "logging/setLevel", params: { level: "warning" } })[0])).toEqual({});
    expect(logger.level).toBe("warn");
    dispatcher.dispatch({ jsonrpc: "2.0", id: 2, method: "logging/setLevel", params: { level: "debug" } });
    expect(logger.level).toBe("debug");

    const bad = errorOf(dispatcher.dispatch({ jsonrpc: "2.0", id: 3, method: "logging/setLevel", params: { level: "loud" } })[0]);
    expect(bad.data).toEqual({ field: "level" });
  });
});
