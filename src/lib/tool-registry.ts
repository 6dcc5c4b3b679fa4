import { z } from "zod";
import type { AuditResult, ToolOutput } from "./audit-result";

export type JsonSchemaType = "string" | "number" | "integer" | "boolean" | "array" | "object";

export interface JsonSchemaProperty {
  type: JsonSchemaType;
  description?: string;
  items?: JsonSchemaProperty;
  minItems?: number;
  maxItems?: number;
  minLength?: number;
}

export interface ToolInputSchema {
  type: "object";
  properties: Record<string, JsonSchemaProperty>;
  required?: string[];
  additionalProperties: false;
}

export interface ToolDescriptor {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
}

/** A tool as authored: advertised schema, zod parser for the same shape, pure handler. */
export interface ToolDefinition<Shape extends z.ZodRawShape, Result extends AuditResult> {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
  params: z.ZodObject<Shape, "strict">;
  handler: (params: z.output<z.ZodObject<Shape, "strict">>) => Result;
  render: (result: Result) => string;
}

export interface ParameterIssue {
  field: string;
  message: string;
}

export type PreparedCall =
  | { ok: true; run: () => ToolOutput }
  | { ok: false; issue: ParameterIssue };

/** Registry entry with the per-tool types erased behind `prepare`. */
export interface RegisteredTool {
  readonly descriptor: ToolDescriptor;
  readonly parameterNames: readonly string[];
  prepare(args: Record<string, unknown>): PreparedCall;
}

export class RegistryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RegistryError";
  }
}

function formatPath(path: ReadonlyArray<string | number>): string {
  let out = "";
  for (const part of path) {
    out += typeof part === "number" ? `[${part}]` : out.length === 0 ? part : `.${part}`;
  }
  return out;
}

export function describeIssue(issue: z.ZodIssue): ParameterIssue {
  if (issue.code === "unrecognized_keys") {
    const field = issue.keys[0] ?? "arguments";
    return { field, message: `"${field}" is not a recognized parameter` };
  }
  const field = issue.path.length > 0 ? formatPath(issue.path) : "arguments";
  if (issue.code === "invalid_type" && issue.received === "undefined") {
    return { field, message: `"${field}" is required` };
  }
  return { field, message: `"${field}": ${issue.message}` };
}

export function defineTool<Shape extends z.ZodRawShape, Result extends AuditResult>(
  definition: ToolDefinition<Shape, Result>,
): RegisteredTool {
  const descriptor: ToolDescriptor = {
    name: definition.name,
    description: definition.description,
    inputSchema: definition.inputSchema,
  };
  return {
    descriptor,
    parameterNames: Object.keys(definition.params.shape),
    prepare(args) {
      const parsed = definition.params.safeParse(args);
      if (!parsed.success) {
        return { ok: false, issue: describeIssue(parsed.error.issues[0]) };
      }
      const params = parsed.data;
      return {
        ok: true,
        run: () => {
          const result = definition.handler(params);
          return { structured: result, text: definition.render(result) };
        },
      };
    },
  };
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

function checkEntry(tool: RegisteredTool): void {
  const { name, inputSchema } = tool.descriptor;
  if (!/^[A-Za-z0-9_.-]{1,64}$/.test(name)) {
    throw new RegistryError(`Invalid tool name: ${JSON.stringify(name)}`);
  }
  if (inputSchema.type !== "object") {
    throw new RegistryError(`Tool ${name}: input schema must describe an object`);
  }
  const declared = Object.keys(inputSchema.properties);
  for (const field of inputSchema.required ?? []) {
    if (!declared.includes(field)) {
      throw new RegistryError(`Tool ${name}: required parameter "${field}" is not declared`);
    }
  }
  const parsed = [...tool.parameterNames].sort();
  const advertised = [...declared].sort();
  if (parsed.join("\u0000") !== advertised.join("\u0000")) {
    throw new RegistryError(
      `Tool ${name}: advertised parameters (${advertised.join(", ")}) differ from validated parameters (${parsed.join(", ")})`,
    );
  }
}

/**
 * Fixed tool catalogue. Built once at start-up and frozen; lookups never
 * mutate it.
 */
export class ToolRegistry {
  private readonly entries: ReadonlyMap<string, RegisteredTool>;

  constructor(tools: readonly RegisteredTool[]) {
    const map = new Map<string, RegisteredTool>();
    for (const tool of tools) {
      checkEntry(tool);
      if (map.has(tool.descriptor.name)) {
        throw new RegistryError(`Duplicate tool name: ${tool.descriptor.name}`);
      }
      deepFreeze(tool.descriptor);
      map.set(tool.descriptor.name, Object.freeze(tool));
    }
    this.entries = map;
    Object.freeze(this);
  }

  get size(): number {
    return this.entries.size;
  }

  names(): string[] {
    return [...this.entries.keys()];
  }

  list(): ToolDescriptor[] {
    return [...this.entries.values()].map((tool) => tool.descriptor);
  }

  resolve(name: string): RegisteredTool | undefined {
    return this.entries.get(name);
  }
}
