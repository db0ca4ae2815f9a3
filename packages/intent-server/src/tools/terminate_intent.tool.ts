import { z } from 'zod';
import { toSummary, type IntentSummary } from '../intents/intent.types';
import { IntentTool, intentIdSchema } from './base.tool';

const terminateIntentSchema = z.object({ id: intentIdSchema }).strict();

export class TerminateIntentTool extends IntentTool<typeof terminateIntentSchema, IntentSummary> {
  get name() {
    return 'terminate_intent';
  }
  get description() {
    return 'Terminate an Active intent. The intent ends Terminated even if the backend cancel fails; check lastError.';
  }
  get schema() {
    return terminateIntentSchema;
  }

  async execute(args: z.infer<typeof terminateIntentSchema>): Promise<IntentSummary> {
    return toSummary(await this.engine.terminate(args.id));
  }
}
