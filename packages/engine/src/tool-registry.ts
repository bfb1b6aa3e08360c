import { zodToJsonSchema } from 'zod-to-json-schema';
import { logger, DuplicateToolError, ToolArgumentInvalidError, errorMessage } from '@tessera/shared';
import type { JsonObjectSchema, ToolDefinition } from '@tessera/shared';
import type { z } from 'zod';
import type { ToolSpec } from './types.js';

const log = logger.child({ module: 'tool-registry' });

/** JSON Schema for the model, derived from the tool's zod schema. */
function toInputSchema(name: string, schema: z.ZodTypeAny): JsonObjectSchema {
  const json = zodToJsonSchema(schema, { $refStrategy: 'none' });
  const inputSchema: JsonObjectSchema = { type: 'object' };
  let type: unknown;
  for (const [key, value] of Object.entries(json)) {
    if (key === 'type') type = value;
    else if (key !== '$schema') inputSchema[key] = value;
  }
  if (type !== 'object') {
    throw new TypeError(`tool '${name}' must take an object schema`);
  }
  return inputSchema;
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

/**
 * Name → tool lookup, built once at startup and frozen before the first run.
 */
export class ToolRegistry {
  private readonly tools = new Map<string, { spec: ToolSpec; definition: ToolDefinition }>();
  private frozen = false;

  static fromManifest(specs: readonly ToolSpec[]): ToolRegistry {
    const registry = new ToolRegistry();
    for (const spec of specs) registry.register(spec);
    registry.freeze();
    log.info({ tools: registry.names() }, 'tool registry built');
    return registry;
  }

  register(spec: ToolSpec): void {
    if (this.frozen) {
      throw new Error(`tool registry is frozen; cannot register '${spec.name}'`);
    }
    if (this.tools.has(spec.name)) {
      throw new DuplicateToolError(spec.name);
    }
    const definition: ToolDefinition = {
      name: spec.name,
      description: spec.description,
      inputSchema: toInputSchema(spec.name, spec.schema),
    };
    this.tools.set(spec.name, { spec, definition });
  }

  freeze(): void {
    this.frozen = true;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  get size(): number {
    return this.tools.size;
  }

  resolve(name: string): ToolSpec | undefined {
    return this.tools.get(name)?.spec;
  }

  names(): string[] {
    return [...this.tools.keys()];
  }

  list(): ToolSpec[] {
    return [...this.tools.values()].map((t) => t.spec);
  }

  definitions(): ToolDefinition[] {
    return [...this.tools.values()].map((t) => t.definition);
  }

  /**
   * Parse the accumulated argument text of a call and validate it.
   * Empty text means no arguments.
   */
  parseArguments<S extends z.ZodTypeAny>(spec: ToolSpec<S>, raw: string): z.infer<S> {
    let value: unknown = {};
    if (raw.trim() !== '') {
      try {
        value = JSON.parse(raw);
      } catch (err) {
        throw new ToolArgumentInvalidError(spec.name, `arguments are not valid JSON (${errorMessage(err)})`);
      }
    }
    const result = spec.schema.safeParse(value);
    if (!result.success) {
      throw new ToolArgumentInvalidError(spec.name, describeIssues(result.error));
    }
    return result.data;
  }
}
