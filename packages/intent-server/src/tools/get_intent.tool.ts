import { z } from 'zod';
import { toDetail, type IntentDetail } from '../intents/intent.types';
import { IntentTool, intentIdSchema } from './base.tool';

const getIntentSchema = z.object({ id: intentIdSchema }).strict();

export class GetIntentTool extends IntentTool<typeof getIntentSchema, IntentDetail> {
  get name() {
    return 'get_intent';
  }
  get description() {
    return 'Read one intent from the local store, including its specification. Does not contact the backend.';
  }
  get schema() {
    return getIntentSchema;
  }

  async execute(args: z.infer<typeof getIntentSchema>): Promise<IntentDetail> {
    return toDetail(await this.engine.get(args.id));
  }
}
