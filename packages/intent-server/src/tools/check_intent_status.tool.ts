import { z } from 'zod';
import { toDetail, type IntentDetail } from '../intents/intent.types';
import { IntentTool, intentIdSchema } from './base.tool';

const checkIntentStatusSchema = z.object({ id: intentIdSchema }).strict();

export class CheckIntentStatusTool extends IntentTool<typeof checkIntentStatusSchema, IntentDetail> {
  get name() {
    return 'check_intent_status';
  }
  get description() {
    return (
      'Fetch the current status from the network backend and reconcile the local intent with it. ' +
      'A Submitted intent without backendReference is returned unchanged: call submit_intent again to settle it ' +
      '(safe to repeat, the backend deduplicates by intent id).'
    );
  }
  get schema() {
    return checkIntentStatusSchema;
  }

  async execute(args: z.infer<typeof checkIntentStatusSchema>): Promise<IntentDetail> {
    return toDetail(await this.engine.checkStatus(args.id));
  }
}
