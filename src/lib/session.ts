import type { Dispatcher } from "./dispatcher";
import { encodeFrame, FrameDecoder, type DecodedFrame, type FramingMode, type WireFraming } from "./frame-codec";
import type { JsonRpcResponse } from "./json-rpc";
import type { Logger } from "./logger";

export interface SessionOptions {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
  dispatcher: Dispatcher;
  logger: Logger;
  framing?: FramingMode;
  maxFrameBytes?: number;
}

export interface SessionSummary {
  frames: number;
  responses: number;
  decodeFailures: number;
  reason: "end" | "exit" | "input_error" | "output_error";
}

/**
 * Drives one conversation: read frame, dispatch, write reply, strictly in
 * arrival order. Resolves once the input closes or the host sends `exit`.
 */
export function runSession(options: SessionOptions): Promise<SessionSummary> {
  const { input, output, dispatcher, logger } = options;
  const decoder = new FrameDecoder({ framing: options.framing, maxFrameBytes: options.maxFrameBytes });
  const summary: SessionSummary = { frames: 0, responses: 0, decodeFailures: 0, reason: "end" };

  return new Promise((resolveDone) => {
    let closed = false;

    const write = (response: JsonRpcResponse, framing: WireFraming) => {
      output.write(encodeFrame(response, framing));
      summary.responses += 1;
    };

    const handleFrame = (frame: DecodedFrame) => {
      summary.frames += 1;
      if (frame.kind === "error") {
        summary.decodeFailures += 1;
        const reply = dispatcher.decodeFailure(frame.error);
        if (reply) {
          write(reply, decoder.replyFraming);
        }
        return;
      }
      for (const response of dispatcher.dispatch(frame.payload)) {
        write(response, frame.framing);
      }
    };

    const drain = () => {
      for (let frame = decoder.next(); frame; frame = decoder.next()) {
        handleFrame(frame);
        if (dispatcher.state === "terminated") {
          finish("exit");
          return;
        }
      }
    };

    const onData = (chunk: Buffer | string) => {
      if (closed) {
        return;
      }
      decoder.push(chunk);
      drain();
    };

    const onEnd = () => {
      if (closed) {
        return;
      }
      drain();
      if (closed) {
        return;
      }
      // A last record without its newline is still a request.
      const trailing = decoder.end();
      if (trailing) {
        handleFrame(trailing);
      }
      dispatcher.beginDraining();
      finish("end");
    };

    const onInputError = (error: Error) => {
      logger.warn("stdin error", { message: error.message });
      finish("input_error");
    };

    const onOutputError = (error: Error) => {
      logger.warn("stdout error", { message: error.message });
      finish("output_error");
    };

    const finish = (reason: SessionSummary["reason"]) => {
      if (closed) {
        return;
      }
      closed = true;
      summary.reason = reason;
      dispatcher.terminate();
      input.off("data", onData);
      input.off("end", onEnd);
      input.off("error", onInputError);
      output.off("error", onOutputError);
      input.pause();
      logger.debug("session closed", { ...summary });
      resolveDone(summary);
    };

    input.on("data", onData);
    input.on("end", onEnd);
    input.on("error", onInputError);
    output.on("error", onOutputError);
    input.resume();
  });
}
