import { z } from 'zod';
import type { IntentLifecycleEngine } from '../intents/intentLifecycle.engine';

export type ToolInputJsonSchema = {
  type: 'object';
  properties: Record<string, object>;
  required: string[];
  additionalProperties: false;
};

export type ToolDefinition = {
  name: string;
  description: string;
  inputSchema: ToolInputJsonSchema;
};

export const intentIdSchema = z.string().uuid().describe('Intent id (UUID) as returned by create_intent.');

/** One named operation of the toolset. Tools only validate and delegate; the engine owns transitions. */
export abstract class IntentTool<A extends z.ZodType = z.ZodType, R = unknown> {
  constructor(protected readonly engine: IntentLifecycleEngine) {}

  abstract get name(): string;
  abstract get description(): string;
  abstract get schema(): A;

  abstract execute(args: z.infer<A>): Promise<R>;

  definition(): ToolDefinition {
    const json = z.toJSONSchema(this.schema, { io: 'input' });
    const properties: Record<string, object> = {};
    for (const [key, value] of Object.entries(json.properties ?? {})) {
      if (typeof value === 'object') properties[key] = value;
    }
    return {
      name: this.name,
      description: this.description,
      inputSchema: { type: 'object', properties, required: json.required ?? [], additionalProperties: false },
    };
  }
}
