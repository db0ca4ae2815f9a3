import { z } from 'zod';
import { IntentTool, intentIdSchema } from './base.tool';

const deleteIntentSchema = z.object({ id: intentIdSchema }).strict();

export class DeleteIntentTool extends IntentTool<typeof deleteIntentSchema, { id: string; deleted: true }> {
  get name() {
    return 'delete_intent';
  }
  get description() {
    return 'Remove a Draft, Failed or Terminated intent from the store.';
  }
  get schema() {
    return deleteIntentSchema;
  }

  async execute(args: z.infer<typeof deleteIntentSchema>): Promise<{ id: string; deleted: true }> {
    return this.engine.delete(args.id);
  }
}
