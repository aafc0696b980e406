import { ErrorCode } from "@modelcontextprotocol/sdk/types.js";

// Every application failure is reported with this one JSON-RPC code.
export const APPLICATION_ERROR_CODE: number = ErrorCode.InvalidRequest;

export type ErrorData = Record<string, string | number | boolean | null>;

export class TalosMcpError extends Error {
  readonly data?: ErrorData;

  constructor(message: string, data?: ErrorData) {
    super(message);
    this.name = new.target.name;
    this.data = data;
  }
}

export class ConfigurationMissingError extends TalosMcpError {
  constructor(variable: string) {
    super(`${variable} env var not set`, { variable });
  }
}

export class MissingParameterError extends TalosMcpError {
  readonly field: string;

  constructor(field: string) {
    super(`Missing ${field} param`, { field });
    this.field = field;
  }
}

export class MissingRequiredFieldError extends TalosMcpError {
  readonly fields: string[];

  constructor(fields: string[], message: string) {
    super(message, { missing: fields.join(",") });
    this.fields = fields;
  }
}

export class ValidationError extends TalosMcpError {}

export class SpawnError extends TalosMcpError {
  constructor(command: string, cause: Error) {
    super(`Failed to execute ${command}: ${cause.message}`);
  }
}

export class ExternalToolError extends TalosMcpError {
  readonly exitCode: number | null;
  readonly stderr: string;

  constructor(command: string, stderr: string, exitCode: number | null) {
    super(`${command} failed: ${stderr}`, { exitCode });
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

export class UnknownMethodError extends TalosMcpError {
  constructor(method: string) {
    super(`Unknown method: ${method}`, { method });
  }
}

export class UnknownToolError extends TalosMcpError {
  constructor(tool: string) {
    super(`Unknown tool: ${tool}`, { tool });
  }
}

export class ContextError extends TalosMcpError {
  readonly cause: Error;

  constructor(context: string, cause: Error) {
    super(`${context}: ${cause.message}`, cause instanceof TalosMcpError ? cause.data : undefined);
    this.cause = cause;
  }
}

// e.g. "Health check failed: talosctl failed: <stderr>"
export function withContext(error: unknown, context: string): ContextError {
  return new ContextError(context, toError(error));
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
