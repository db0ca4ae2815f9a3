import { z } from 'zod';
import { toDetail, type IntentDetail } from '../intents/intent.types';
import { IntentTool, intentIdSchema } from './base.tool';

const updateIntentSchema = z
  .object({
    id: intentIdSchema,
    name: z.string().min(1).optional(),
    description: z.string().optional(),
    specification: z.record(z.string(), z.unknown()).optional().describe('Replaces the whole specification.'),
  })
  .strict();

export class UpdateIntentTool extends IntentTool<typeof updateIntentSchema, IntentDetail> {
  get name() {
    return 'update_intent';
  }
  get description() {
    return 'Change name, description or specification of a Draft intent. At least one field is required.';
  }
  get schema() {
    return updateIntentSchema;
  }

  async execute(args: z.infer<typeof updateIntentSchema>): Promise<IntentDetail> {
    const { id, ...fields } = args;
    return toDetail(await this.engine.update(id, fields));
  }
}
