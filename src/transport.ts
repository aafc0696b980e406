import { Readable, Writable } from "stream";
import { z } from "zod";
import { toError } from "./errors";

// Only what the dispatcher needs is checked; `id` and `params` may be any JSON value.
export const jsonRpcRequestSchema = z.object({
  jsonrpc: z.string(),
  method: z.string(),
  params: z.unknown().optional(),
  id: z.unknown().optional(),
});

export type JsonRpcRequest = z.infer<typeof jsonRpcRequestSchema>;

export interface JsonRpcSuccessResponse {
  jsonrpc: "2.0";
  result: Record<string, unknown>;
  id: unknown;
}

export interface JsonRpcErrorResponse {
  jsonrpc: "2.0";
  error: {
    code: number;
    message: string;
    data?: unknown;
  };
  // null when the request had no id or could not be read far enough to find it
  id: unknown;
}

export type JsonRpcResponse = JsonRpcSuccessResponse | JsonRpcErrorResponse;

export class NotARequestError extends Error {
  constructor() {
    super("not a JSON-RPC 2.0 request");
    this.name = "NotARequestError";
  }
}

export function deserializeRequest(line: string): JsonRpcRequest {
  const parsed = jsonRpcRequestSchema.safeParse(JSON.parse(line));
  if (!parsed.success) {
    throw new NotARequestError();
  }
  return parsed.data;
}

/**
 * Accumulates stdin chunks and hands out complete lines.
 */
export class LineBuffer {
  private buffer?: Buffer;

  append(chunk: Buffer): void {
    this.buffer = this.buffer ? Buffer.concat([this.buffer, chunk]) : chunk;
  }

  readLine(): string | null {
    if (!this.buffer) {
      return null;
    }
    const index = this.buffer.indexOf("\n");
    if (index === -1) {
      return null;
    }
    const line = this.buffer.toString("utf8", 0, index).replace(/\r$/, "");
    this.buffer = this.buffer.subarray(index + 1);
    return line;
  }

  // whatever followed the last newline
  takeRemainder(): string | null {
    const rest = this.buffer && this.buffer.length > 0 ? this.buffer.toString("utf8").replace(/\r$/, "") : null;
    this.buffer = undefined;
    return rest;
  }

  clear(): void {
    this.buffer = undefined;
  }
}

/**
 * Newline-delimited JSON-RPC over a pair of streams. Each request line goes to
 * `onmessage`, each unreadable line to `onerror`. `onclose` fires once the
 * input ends.
 */
export class StdioJsonRpcTransport {
  private lineBuffer = new LineBuffer();
  private started = false;

  onmessage?: (request: JsonRpcRequest) => void;
  onerror?: (error: Error) => void;
  onclose?: () => void;

  constructor(
    private readonly stdin: Readable = process.stdin,
    private readonly stdout: Writable = process.stdout,
  ) { }

  private ondata = (chunk: Buffer) => {
    this.lineBuffer.append(chunk);
    let line: string | null;
    while ((line = this.lineBuffer.readLine()) !== null) {
      this.processLine(line);
    }
  };

  private onend = () => {
    // a last line without its newline still counts as a message
    const rest = this.lineBuffer.takeRemainder();
    if (rest !== null) {
      this.processLine(rest);
    }
    this.close();
  };

  private onstreamerror = (error: Error) => {
    this.onerror?.(error);
  };

  async start(): Promise<void> {
    if (this.started) {
      throw new Error("StdioJsonRpcTransport already started");
    }
    this.started = true;
    this.stdin.on("data", this.ondata);
    this.stdin.on("error", this.onstreamerror);
    this.stdin.on("end", this.onend);
  }

  private processLine(line: string) {
    let request: JsonRpcRequest;
    try {
      request = deserializeRequest(line);
    } catch (error) {
      this.onerror?.(toError(error));
      return;
    }
    this.onmessage?.(request);
  }

  close(): void {
    this.stdin.off("data", this.ondata);
    this.stdin.off("error", this.onstreamerror);
    this.stdin.off("end", this.onend);
    this.lineBuffer.clear();
    this.onclose?.();
  }

  send(message: JsonRpcResponse): Promise<void> {
    return new Promise((resolve) => {
      const json = JSON.stringify(message) + "\n";
      if (this.stdout.write(json)) {
        resolve();
      } else {
        this.stdout.once("drain", resolve);
      }
    });
  }
}
