import { z } from 'zod';
import { toSummary, type IntentSummary } from '../intents/intent.types';
import { IntentTool } from './base.tool';

const createIntentSchema = z
  .object({
    name: z.string().min(1).describe('Human readable intent name.'),
    description: z.string().default('').describe('Free text description; may be empty.'),
    specification: z
      .record(z.string(), z.unknown())
      .describe(
        'Desired network behaviour as key/value pairs, e.g. intentType, participants, quality, serviceArea, deliveryExpectations.',
      ),
  })
  .strict();

export class CreateIntentTool extends IntentTool<typeof createIntentSchema, IntentSummary> {
  get name() {
    return 'create_intent';
  }
  get description() {
    return 'Create a new network intent in Draft state. Does not submit it to the network.';
  }
  get schema() {
    return createIntentSchema;
  }

  async execute(args: z.infer<typeof createIntentSchema>): Promise<IntentSummary> {
    const intent = await this.engine.create(args);
    return toSummary(intent);
  }
}
