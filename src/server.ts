import { ErrorCode } from "@modelcontextprotocol/sdk/types.js";
import { ServerConfig } from "./config";
import { Dispatcher, DispatchOutcome } from "./dispatcher";
import { APPLICATION_ERROR_CODE, TalosMcpError } from "./errors";
import {
  JsonRpcErrorResponse,
  JsonRpcRequest,
  JsonRpcResponse,
  NotARequestError,
  StdioJsonRpcTransport,
} from "./transport";
import { CommandRunner, TalosctlRunner } from "./utils/talosctl";

export function successResponse(id: unknown, result: Record<string, unknown>): JsonRpcResponse {
  return { jsonrpc: "2.0", result, id };
}

export function errorResponse(id: unknown, error: Error, code: number = APPLICATION_ERROR_CODE): JsonRpcErrorResponse {
  const data = error instanceof TalosMcpError ? error.data : undefined;
  return {
    jsonrpc: "2.0",
    error: data === undefined ? { code, message: error.message } : { code, message: error.message, data },
    id,
  };
}

export function toResponse(id: unknown, outcome: DispatchOutcome): JsonRpcResponse | undefined {
  switch (outcome.kind) {
    case "notify":
      return undefined;
    case "reply":
      return successResponse(id, outcome.result);
    case "fail":
      return errorResponse(id, outcome.error);
  }
}

/**
 * Serves one request at a time: a message is fully handled, talosctl included,
 * and its response written before the next message is looked at.
 */
export class TalosMcpServer {
  private queue: Promise<void> = Promise.resolve();

  constructor(private readonly dispatcher: Dispatcher) { }

  // Every request is dispatched; only notification methods go unanswered.
  async handleMessage(request: JsonRpcRequest): Promise<JsonRpcResponse | undefined> {
    const outcome = await this.dispatcher.dispatch(request.method, request.params);
    return toResponse(request.id ?? null, outcome);
  }

  /**
   * Attach to the transport and resolve once its input has ended and every
   * queued message has been answered.
   */
  connect(transport: StdioJsonRpcTransport): Promise<void> {
    return new Promise((resolve, reject) => {
      transport.onmessage = (request) => {
        this.enqueue(async () => {
          const response = await this.handleMessage(request);
          if (response) {
            await transport.send(response);
          }
        });
      };

      transport.onerror = (error) => {
        console.warn(`Unreadable message: ${error.message}`);
        this.enqueue(() =>
          transport.send(errorResponse(null, new Error(parseErrorMessage(error)), ErrorCode.ParseError)),
        );
      };

      transport.onclose = () => {
        this.queue.then(resolve, reject);
      };

      transport.start().catch(reject);
    });
  }

  private enqueue(task: () => Promise<void>) {
    this.queue = this.queue.then(task).catch((err) => {
      console.error("Failed to handle message:", err);
    });
  }
}

function parseErrorMessage(error: Error): string {
  return error instanceof NotARequestError
    ? "Parse error: not a JSON-RPC 2.0 message"
    : `Parse error: ${error.message}`;
}

export function createServer(config: ServerConfig, talosctl: CommandRunner = new TalosctlRunner(config)): TalosMcpServer {
  return new TalosMcpServer(new Dispatcher(talosctl));
}
