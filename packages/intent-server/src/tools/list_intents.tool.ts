import { z } from 'zod';
import { intentStateSchema, toSummary, type IntentSummary } from '../intents/intent.types';
import { IntentTool } from './base.tool';

const listIntentsSchema = z
  .object({
    state: z
      .union([intentStateSchema, z.array(intentStateSchema)])
      .optional()
      .describe('Only return intents in this state (or any of these states).'),
  })
  .strict();

export class ListIntentsTool extends IntentTool<typeof listIntentsSchema, IntentSummary[]> {
  get name() {
    return 'list_intents';
  }
  get description() {
    return 'List intents ordered by creation time, optionally filtered by state.';
  }
  get schema() {
    return listIntentsSchema;
  }

  async execute(args: z.infer<typeof listIntentsSchema>): Promise<IntentSummary[]> {
    const intents = await this.engine.list({ state: args.state });
    return intents.map(toSummary);
  }
}
