// ============================================================================
// Cash Logistics MCP Server — Serial Stdio Transport
// ============================================================================
//
// Newline-delimited JSON-RPC over a pair of streams, one request at a time.
//
//   idle ──frame──▶ reading ──request──▶ dispatching ──send()──▶ writing ──flushed──▶ idle
//                      │                                                      ▲
//                      └── notification / decode error ───────────────────────┘
//
// Input is paused while a request is in flight, so the next frame is not even
// read until the previous response has been flushed. `closed` is terminal.

import type { Readable, Writable } from "stream";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import {
  ErrorCode,
  JSONRPC_VERSION,
  JSONRPCMessageSchema,
  isJSONRPCError,
  isJSONRPCRequest,
  isJSONRPCResponse,
  type JSONRPCMessage,
  type RequestId,
} from "@modelcontextprotocol/sdk/types.js";
import { ProtocolDecodeError } from "../errors.js";
import { log } from "../logger.js";

export type TransportState = "idle" | "reading" | "dispatching" | "writing" | "closed";

const transportLog = log.child("transport");

const RAW_ID_RE = /"id"\s*:\s*("(?:[^"\\]|\\.)*"|-?\d+)/;

/**
 * Request id of a frame that parsed as JSON but is not a valid message.
 * Only a top-level id counts.
 */
export function requestIdOf(value: unknown): RequestId | null {
  if (typeof value !== "object" || value === null || !("id" in value)) return null;
  const id = value.id;
  if (typeof id === "string") return id;
  if (typeof id === "number" && Number.isFinite(id)) return id;
  return null;
}

/**
 * Best-effort request id from a frame that is not JSON at all.
 */
export function scanRequestId(line: string): RequestId | null {
  const match = RAW_ID_RE.exec(line);
  if (!match) return null;
  try {
    const id: unknown = JSON.parse(match[1]);
    return typeof id === "string" || typeof id === "number" ? id : null;
  } catch {
    return null;
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class SerialStdioTransport implements Transport {
  onclose?: () => void;
  onerror?: (error: Error) => void;
  onmessage?: (message: JSONRPCMessage) => void;

  private _state: TransportState = "idle";
  private buffer = "";
  private inFlight: RequestId | null = null;
  private inputEnded = false;
  private started = false;

  constructor(
    private readonly input: Readable = process.stdin,
    private readonly output: Writable = process.stdout
  ) { }

  get state(): TransportState {
    return this._state;
  }

  async start(): Promise<void> {
    if (this.started) {
      throw new Error("SerialStdioTransport already started");
    }
    this.started = true;
    this.input.setEncoding("utf8");
    this.input.on("data", this.onData);
    this.input.on("end", this.onEnd);
    this.input.on("error", this.onStreamError);
    this.output.on("error", this.onStreamError);
  }

  async send(message: JSONRPCMessage): Promise<void> {
    if (this._state === "closed") {
      throw new Error("Transport is closed");
    }

    const answersInFlight =
      this._state === "dispatching" &&
      (isJSONRPCResponse(message) || isJSONRPCError(message)) &&
      message.id === this.inFlight;

    if (!answersInFlight) {
      await this.write(message);
      return;
    }

    this._state = "writing";
    try {
      await this.write(message);
    } catch (err) {
      this.fail(err);
      throw err;
    }
    this.inFlight = null;
    this._state = "idle";
    if (!this.inputEnded) this.input.resume();
    this.pump();
  }

  async close(): Promise<void> {
    this.shutdown();
  }

  // ─── Read Loop ──────────────────────────────────────────────────────

  private onData = (chunk: string | Buffer): void => {
    this.buffer += typeof chunk === "string" ? chunk : chunk.toString("utf8");
    this.pump();
  };

  private onEnd = (): void => {
    this.inputEnded = true;
    this.pump();
  };

  private onStreamError = (err: Error): void => {
    this.fail(err);
  };

  /** Take frames while idle. Stops as soon as a frame leaves the loop busy. */
  private pump(): void {
    while (this._state === "idle") {
      const newline = this.buffer.indexOf("\n");
      let line: string;
      if (newline !== -1) {
        line = this.buffer.slice(0, newline);
        this.buffer = this.buffer.slice(newline + 1);
      } else if (this.inputEnded && this.buffer.trim() !== "") {
        line = this.buffer;
        this.buffer = "";
      } else {
        if (this.inputEnded) this.shutdown();
        return;
      }

      line = line.replace(/\r$/, "");
      if (line.trim() === "") continue;

      this._state = "reading";
      this.handleFrame(line);
    }
  }

  private handleFrame(line: string): void {
    let raw: unknown;
    try {
      raw = JSON.parse(line);
    } catch (err) {
      this.rejectFrame(scanRequestId(line), ErrorCode.ParseError, `Parse error: ${errorMessage(err)}`);
      return;
    }

    const parsed = JSONRPCMessageSchema.safeParse(raw);
    if (!parsed.success) {
      this.rejectFrame(requestIdOf(raw), ErrorCode.InvalidRequest, "Invalid JSON-RPC message");
      return;
    }

    const message = parsed.data;
    if (isJSONRPCRequest(message)) {
      this._state = "dispatching";
      this.inFlight = message.id;
      this.input.pause();
    } else {
      this._state = "idle";
    }
    this.deliver(message);
  }

  private deliver(message: JSONRPCMessage): void {
    try {
      this.onmessage?.(message);
    } catch (err) {
      this.onerror?.(err instanceof Error ? err : new Error(String(err)));
    }
  }

  /**
   * Answer an undecodable frame when its id is recoverable, otherwise close:
   * without an id there is no request to answer.
   */
  private rejectFrame(id: RequestId | null, code: number, message: string): void {
    const err = new ProtocolDecodeError(message);
    this.onerror?.(err);

    if (id === null) {
      transportLog.error("Malformed frame without a recoverable id; closing connection", { message });
      this.shutdown();
      return;
    }

    transportLog.warn("Malformed frame", { id, code, message });
    this._state = "writing";
    this.input.pause();
    this.write({
      jsonrpc: JSONRPC_VERSION,
      id,
      error: { code, message, data: { kind: err.kind } },
    }).then(
      () => {
        if (this._state !== "writing") return;
        this._state = "idle";
        if (!this.inputEnded) this.input.resume();
        this.pump();
      },
      (writeErr: unknown) => this.fail(writeErr)
    );
  }

  // ─── Output ─────────────────────────────────────────────────────────

  private write(message: JSONRPCMessage): Promise<void> {
    const frame = JSON.stringify(message) + "\n";
    return new Promise((resolve, reject) => {
      this.output.write(frame, (err) => (err ? reject(err) : resolve()));
    });
  }

  private fail(err: unknown): void {
    if (this._state === "closed") return;
    const e = err instanceof Error ? err : new Error(String(err));
    transportLog.error("I/O failure", { message: e.message });
    this.onerror?.(e);
    this.shutdown();
  }

  private shutdown(): void {
    if (this._state === "closed") return;
    this._state = "closed";
    this.inFlight = null;
    this.input.off("data", this.onData);
    this.input.off("end", this.onEnd);
    this.input.off("error", this.onStreamError);
    this.output.off("error", this.onStreamError);
    this.input.pause();
    this.onclose?.();
  }
}
