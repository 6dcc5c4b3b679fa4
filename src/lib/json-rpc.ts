export type JsonRpcId = string | number;

export interface JsonRpcRequest {
  jsonrpc: "2.0";
  id?: JsonRpcId;
  method: string;
  params?: Record<string, unknown>;
}

export interface JsonRpcErrorPayload {
  code: number;
  message: string;
  data?: Record<string, unknown>;
}

export interface JsonRpcSuccess {
  jsonrpc: "2.0";
  id: JsonRpcId | null;
  result: Record<string, unknown>;
}

export interface JsonRpcFailure {
  jsonrpc: "2.0";
  id: JsonRpcId | null;
  error: JsonRpcErrorPayload;
}

export type JsonRpcResponse = JsonRpcSuccess | JsonRpcFailure;

export const ErrorCode = {
  DecodeError: -32700,
  InvalidRequest: -32600,
  MethodNotFound: -32601,
  InvalidParameters: -32602,
  InternalError: -32603,
  UnknownTool: -32001,
  NotInitialized: -32002,
} as const;

export type ErrorCodeName = keyof typeof ErrorCode;

/**
 * Raised anywhere inside request handling; the dispatcher turns it into an
 * error response carrying the request id.
 */
export class ProtocolError extends Error {
  readonly kind: ErrorCodeName;
  readonly code: number;
  readonly data?: Record<string, unknown>;

  constructor(kind: ErrorCodeName, message: string, data?: Record<string, unknown>) {
    super(message);
    this.name = "ProtocolError";
    this.kind = kind;
    this.code = ErrorCode[kind];
    this.data = data;
  }

  toPayload(): JsonRpcErrorPayload {
    return jsonRpcError(this.code, this.message, this.data);
  }
}

export function jsonRpcError(code: number, message: string, data?: Record<string, unknown>): JsonRpcErrorPayload {
  return data === undefined ? { code, message } : { code, message, data };
}

export function okResponse(id: JsonRpcId | null, result: Record<string, unknown>): JsonRpcSuccess {
  return { jsonrpc: "2.0", id, result };
}

export function errorResponse(id: JsonRpcId | null, error: JsonRpcErrorPayload): JsonRpcFailure {
  return { jsonrpc: "2.0", id, error };
}

export function isNotification(request: JsonRpcRequest): boolean {
  return request.id === undefined;
}

export function isJsonRpcId(value: unknown): value is JsonRpcId {
  return typeof value === "string" || (typeof value === "number" && Number.isFinite(value));
}

export function asRecord(value: unknown): Record<string, unknown> | null {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return null;
  }
  return Object.fromEntries(Object.entries(value));
}

/**
 * Narrows a decoded JSON value to a request. Anything that is not an object
 * with a string `method` is an InvalidRequest. Callers recover the id with
 * `idFromUnknown` so the reply stays correlated.
 */
export function parseRequest(value: unknown): JsonRpcRequest {
  const record = asRecord(value);
  if (!record) {
    throw new ProtocolError("InvalidRequest", "Invalid Request: expected a JSON object", { reason: "not_an_object" });
  }

  const rawId = record.id;
  if (rawId !== undefined && rawId !== null && !isJsonRpcId(rawId)) {
    throw new ProtocolError("InvalidRequest", "Invalid Request: id must be a string or number", { reason: "bad_id" });
  }
  const id = isJsonRpcId(rawId) ? rawId : undefined;

  if (typeof record.method !== "string" || record.method.length === 0) {
    throw new ProtocolError("InvalidRequest", "Invalid Request: method must be a string", { reason: "missing_method" });
  }

  if (record.params !== undefined && record.params !== null && !asRecord(record.params)) {
    throw new ProtocolError("InvalidRequest", "Invalid Request: params must be an object", { reason: "bad_params" });
  }

  const params = asRecord(record.params) ?? undefined;
  const request: JsonRpcRequest = { jsonrpc: "2.0", method: record.method };
  if (id !== undefined) {
    request.id = id;
  }
  if (params) {
    request.params = params;
  }
  return Object.freeze(request);
}

/** Best-effort id lookup used when a request was rejected before parsing finished. */
export function idFromUnknown(value: unknown): JsonRpcId | null {
  const record = asRecord(value);
  if (!record) {
    return null;
  }
  return isJsonRpcId(record.id) ? record.id : null;
}
