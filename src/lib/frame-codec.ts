import type { JsonRpcId } from "./json-rpc";

export type FramingMode = "auto" | "plain" | "framed";
export type WireFraming = Exclude<FramingMode, "auto">;

export const DEFAULT_MAX_FRAME_BYTES = 4 * 1024 * 1024;

export interface DecodeFailure {
  reason: string;
  recoveredId: JsonRpcId | null;
  preview: string;
}

export type DecodedFrame =
  | { kind: "message"; payload: unknown; framing: WireFraming }
  | { kind: "error"; error: DecodeFailure };

export interface FrameDecoderOptions {
  framing?: FramingMode;
  maxFrameBytes?: number;
}

const EMPTY = Buffer.alloc(0);
const PREVIEW_CHARS = 120;

function findHeaderEnd(buffer: Buffer): { index: number; delimiterLength: number } | null {
  const crlf = buffer.indexOf("\r\n\r\n");
  const lf = buffer.indexOf("\n\n");
  if (crlf >= 0 && (lf < 0 || crlf <= lf)) {
    return { index: crlf, delimiterLength: 4 };
  }
  if (lf >= 0) {
    return { index: lf, delimiterLength: 2 };
  }
  return null;
}

function parseContentLength(headerText: string): number {
  for (const line of headerText.split(/\r?\n/)) {
    const idx = line.indexOf(":");
    if (idx <= 0) {
      continue;
    }
    if (line.slice(0, idx).trim().toLowerCase() !== "content-length") {
      continue;
    }
    const value = line.slice(idx + 1).trim();
    const parsed = /^\d+$/.test(value) ? Number.parseInt(value, 10) : Number.NaN;
    if (!Number.isFinite(parsed)) {
      throw new Error(`Invalid Content-Length header: ${value}`);
    }
    return parsed;
  }
  throw new Error("Missing Content-Length header");
}

function preview(text: string): string {
  return text.slice(0, PREVIEW_CHARS).replace(/\r/g, "\\r").replace(/\n/g, "\\n");
}

/**
 * Pulls an `"id"` member out of text that failed to parse so the error reply
 * can still be correlated. Only ids at the top level of the first object are
 * trusted.
 */
export function recoverId(raw: string): JsonRpcId | null {
  const match = /^\s*\{\s*(?:"jsonrpc"\s*:\s*"[^"]*"\s*,\s*)?"id"\s*:\s*("(?:[^"\\]|\\.)*"|-?\d+(?:\.\d+)?)/.exec(raw);
  if (!match) {
    return null;
  }
  const token = match[1];
  if (token.startsWith("\"")) {
    try {
      const parsed: unknown = JSON.parse(token);
      return typeof parsed === "string" ? parsed : null;
    } catch {
      return null;
    }
  }
  const value = Number(token);
  return Number.isFinite(value) ? value : null;
}

function looksLikeHeader(buffer: Buffer): boolean {
  const head = buffer.toString("utf8", 0, Math.min(buffer.length, 32)).trimStart().toLowerCase();
  return head.length > 0 && "content-length".startsWith(head.slice(0, 14));
}

/**
 * Incremental decoder for the two stdio framings MCP clients use: one JSON
 * record per line, or `Content-Length` headers followed by a body. In auto
 * mode the first decoded line, or the first header block with a valid
 * `Content-Length`, fixes the mode for the rest of the stream.
 */
export class FrameDecoder {
  private buffer: Buffer = EMPTY;
  private mode: FramingMode;
  private readonly maxFrameBytes: number;

  constructor(options: FrameDecoderOptions = {}) {
    this.mode = options.framing ?? "auto";
    this.maxFrameBytes = options.maxFrameBytes ?? DEFAULT_MAX_FRAME_BYTES;
  }

  get framing(): FramingMode {
    return this.mode;
  }

  /** Framing replies should use; plain until the input says otherwise. */
  get replyFraming(): WireFraming {
    return this.mode === "framed" ? "framed" : "plain";
  }

  get bufferedBytes(): number {
    return this.buffer.length;
  }

  push(chunk: Buffer | string): void {
    const asBuffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk, "utf8");
    this.buffer = this.buffer.length === 0 ? asBuffer : Buffer.concat([this.buffer, asBuffer]);
  }

  /** Next complete frame, or null when more bytes are needed. */
  next(): DecodedFrame | null {
    for (;;) {
      if (this.buffer.length === 0) {
        return null;
      }

      const frame = this.mode === "plain"
        ? this.nextLine()
        : this.mode === "framed"
          ? this.nextHeaderFrame()
          : this.nextAuto();

      if (frame === "skip") {
        continue;
      }
      if (frame) {
        return frame;
      }
      if (this.buffer.length > this.maxFrameBytes) {
        const dropped = this.buffer;
        this.buffer = EMPTY;
        return this.failure(`frame exceeds ${this.maxFrameBytes} bytes`, dropped.toString("utf8", 0, PREVIEW_CHARS));
      }
      return null;
    }
  }

  /**
   * Called once the input closed. A trailing record without its newline is
   * still decoded; any other leftover bytes are reported as a failure.
   */
  end(): DecodedFrame | null {
    if (this.buffer.length === 0) {
      return null;
    }
    const rest = this.buffer.toString("utf8");
    this.buffer = EMPTY;
    if (rest.trim().length === 0) {
      return null;
    }
    if (this.mode !== "framed" && !looksLikeHeader(Buffer.from(rest, "utf8"))) {
      return this.parseBody(rest.trim(), "plain");
    }
    return this.failure("stream ended inside a frame", rest);
  }

  private nextAuto(): DecodedFrame | "skip" | null {
    const leading = this.buffer.toString("utf8", 0, Math.min(this.buffer.length, 64)).trimStart();
    if (leading.length === 0) {
      const newline = this.buffer.indexOf("\n");
      if (newline < 0) {
        return null;
      }
      this.buffer = this.buffer.subarray(newline + 1);
      return "skip";
    }
    if (looksLikeHeader(this.buffer)) {
      return this.nextHeaderFrame();
    }
    const frame = this.nextLine();
    if (frame && frame !== "skip" && frame.kind === "message") {
      this.mode = "plain";
    }
    return frame;
  }

  private nextLine(): DecodedFrame | "skip" | null {
    const newline = this.buffer.indexOf("\n");
    if (newline < 0) {
      return null;
    }
    const raw = this.buffer.subarray(0, newline);
    this.buffer = this.buffer.subarray(newline + 1);
    if (raw.length > this.maxFrameBytes) {
      return this.failure(`frame exceeds ${this.maxFrameBytes} bytes`, raw.toString("utf8", 0, PREVIEW_CHARS));
    }
    const line = raw.toString("utf8").trim();
    if (line.length === 0) {
      return "skip";
    }
    return this.parseBody(line, "plain");
  }

  private nextHeaderFrame(): DecodedFrame | "skip" | null {
    const headerEnd = findHeaderEnd(this.buffer);
    if (!headerEnd) {
      return null;
    }
    const headerText = this.buffer.toString("utf8", 0, headerEnd.index);
    let contentLength: number;
    try {
      contentLength = parseContentLength(headerText);
    } catch (error) {
      this.buffer = this.buffer.subarray(headerEnd.index + headerEnd.delimiterLength);
      return this.failure(error instanceof Error ? error.message : String(error), headerText);
    }
    // A valid header block settles the framing, whatever the body turns out to be.
    this.mode = "framed";
    if (contentLength > this.maxFrameBytes) {
      this.buffer = EMPTY;
      return this.failure(`frame exceeds ${this.maxFrameBytes} bytes`, headerText);
    }

    const bodyStart = headerEnd.index + headerEnd.delimiterLength;
    const bodyEnd = bodyStart + contentLength;
    if (this.buffer.length < bodyEnd) {
      return null;
    }
    const body = this.buffer.toString("utf8", bodyStart, bodyEnd);
    this.buffer = this.buffer.subarray(bodyEnd);
    return this.parseBody(body, "framed");
  }

  private parseBody(text: string, framing: WireFraming): DecodedFrame {
    try {
      const payload: unknown = JSON.parse(text);
      return { kind: "message", payload, framing };
    } catch (error) {
      return this.failure(`Parse error: ${error instanceof Error ? error.message : String(error)}`, text);
    }
  }

  private failure(reason: string, raw: string): DecodedFrame {
    return { kind: "error", error: { reason, recoveredId: recoverId(raw), preview: preview(raw) } };
  }
}

/** One buffer per message so a reply reaches the stream in a single write. */
export function encodeFrame(message: unknown, framing: WireFraming): Buffer {
  const body = Buffer.from(JSON.stringify(message), "utf8");
  if (framing === "plain") {
    return Buffer.concat([body, Buffer.from("\n", "utf8")]);
  }
  const header = Buffer.from(`Content-Length: ${body.length}\r\n\r\n`, "utf8");
  return Buffer.concat([header, body]);
}
