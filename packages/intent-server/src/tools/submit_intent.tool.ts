import { z } from 'zod';
import { toSummary, type IntentSummary } from '../intents/intent.types';
import { IntentTool, intentIdSchema } from './base.tool';

const submitIntentSchema = z.object({ id: intentIdSchema }).strict();

export class SubmitIntentTool extends IntentTool<typeof submitIntentSchema, IntentSummary> {
  get name() {
    return 'submit_intent';
  }
  get description() {
    return 'Submit a Draft intent to the network backend. Safe to repeat while the intent is Submitted without a backend reference.';
  }
  get schema() {
    return submitIntentSchema;
  }

  async execute(args: z.infer<typeof submitIntentSchema>): Promise<IntentSummary> {
    return toSummary(await this.engine.submit(args.id));
  }
}
