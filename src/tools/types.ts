import { z } from "zod";
import { zodToJsonSchema } from "zod-to-json-schema";
import { MissingParameterError, ValidationError } from "../errors";
import { CommandRunner } from "../utils/talosctl";

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

// Arguments of a request after the params object has been flattened into a map.
export type ParameterMap = Record<string, unknown>;

const inputSchemaShape = z
  .object({
    type: z.literal("object"),
    properties: z.record(z.unknown()),
    required: z.array(z.string()).optional(),
  })
  .passthrough();

export type InputSchema = z.infer<typeof inputSchemaShape>;

export interface ToolDescriptor {
  name: string;
  description: string;
  inputSchema: InputSchema;
}

export interface ToolDefinition extends ToolDescriptor {
  invoke(params: ParameterMap, talosctl: CommandRunner): Promise<JsonObject>;
}

export interface ToolOptions<Shape extends z.ZodRawShape> {
  name: string;
  description: string;
  args: Shape;
  run(args: z.output<z.ZodObject<Shape>>, talosctl: CommandRunner): Promise<JsonObject>;
}

/**
 * Bind a zod argument shape to a handler. The shape drives both the advertised
 * JSON Schema and the validation applied before the handler runs, so a missing
 * required argument never reaches talosctl.
 */
export function defineTool<Shape extends z.ZodRawShape>(options: ToolOptions<Shape>): ToolDefinition {
  const schema = z.object(options.args);
  const argumentSchema: ArgumentSchema = schema;
  return {
    name: options.name,
    description: options.description,
    inputSchema: toInputSchema(argumentSchema),
    invoke: async (params, talosctl) => options.run(parseArguments(schema, params), talosctl),
  };
}

export function parseArguments<T extends z.ZodTypeAny>(schema: T, params: ParameterMap): z.output<T> {
  const result = schema.safeParse(params);
  if (result.success) {
    return result.data;
  }

  const issue = result.error.issues[0];
  const field = issue.path.join(".");
  if (issue.code === z.ZodIssueCode.invalid_type && issue.received === z.ZodParsedType.undefined) {
    throw new MissingParameterError(field);
  }
  throw new ValidationError(`Invalid ${field} param: ${issue.message}`, { field });
}

// Not generic: zod-to-json-schema overflows the type checker on a generic shape.
type ArgumentSchema = z.AnyZodObject;

const jsonSchemaOptions = { $refStrategy: "none", target: "jsonSchema7" } as const;

export function toInputSchema(schema: ArgumentSchema): InputSchema {
  const generated: unknown = zodToJsonSchema<"jsonSchema7">(schema, jsonSchemaOptions);
  const { $schema, ...jsonSchema } = inputSchemaShape.parse(generated);
  return jsonSchema;
}

// Every node-scoped talosctl call starts with the target selector.
export function nodeArgs(node: string, ...args: string[]): string[] {
  return ["--nodes", node, ...args];
}

export const nodeArg = (description = "IP address or hostname of the Talos node to query") =>
  z.string().describe(description);

export const kubernetesNamespace = (kubernetes: boolean) => (kubernetes ? "k8s.io" : "system");
