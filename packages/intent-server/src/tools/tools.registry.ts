import { Inject, Injectable, Logger } from '@nestjs/common';
import { Errors, IntentError, isIntentError, type IntentErrorCode } from '../intents/errors';
import { IntentLifecycleEngine } from '../intents/intentLifecycle.engine';
import type { IntentTool, ToolDefinition } from './base.tool';
import { CheckIntentStatusTool } from './check_intent_status.tool';
import { CreateIntentTool } from './create_intent.tool';
import { DeleteIntentTool } from './delete_intent.tool';
import { GetIntentTool } from './get_intent.tool';
import { ListIntentsTool } from './list_intents.tool';
import { SubmitIntentTool } from './submit_intent.tool';
import { TerminateIntentTool } from './terminate_intent.tool';
import { UpdateIntentTool } from './update_intent.tool';

export type ToolCallContext = {
  // Raw Authorization header value of the incoming call
  authorization?: string;
};

export type ToolEnvelope =
  | { ok: true; tool: string; result: unknown }
  | { ok: false; tool: string; error: { code: IntentErrorCode; message: string; details?: Record<string, unknown> } };

const BEARER_PATTERN = /^Bearer\s+[A-Za-z0-9\-._~+/]+=*$/i;

export function hasBearerCredential(authorization: string | undefined): boolean {
  return typeof authorization === 'string' && BEARER_PATTERN.test(authorization.trim());
}

/** Fixed toolset; every call ends in an envelope, never in a thrown error. */
@Injectable()
export class ToolsRegistry {
  private readonly logger = new Logger(ToolsRegistry.name);
  private readonly tools = new Map<string, IntentTool>();

  constructor(@Inject(IntentLifecycleEngine) engine: IntentLifecycleEngine) {
    const toolset: IntentTool[] = [
      new CreateIntentTool(engine),
      new SubmitIntentTool(engine),
      new GetIntentTool(engine),
      new ListIntentsTool(engine),
      new UpdateIntentTool(engine),
      new TerminateIntentTool(engine),
      new DeleteIntentTool(engine),
      new CheckIntentStatusTool(engine),
    ];
    for (const tool of toolset) this.tools.set(tool.name, tool);
  }

  names(): string[] {
    return [...this.tools.keys()];
  }

  definitions(): ToolDefinition[] {
    return [...this.tools.values()].map((tool) => tool.definition());
  }

  async call(name: string, args: unknown, ctx: ToolCallContext = {}): Promise<ToolEnvelope> {
    if (!hasBearerCredential(ctx.authorization)) {
      this.logger.warn(`Tool call without valid bearer credential ${JSON.stringify({ tool: name })}`);
      return this.failure(name, Errors.unauthorized());
    }

    const tool = this.tools.get(name);
    if (!tool) return this.failure(name, Errors.validation(`Unknown tool: ${name}`, { tool: name }));

    const parsed = tool.schema.safeParse(args ?? {});
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => ({
        path: issue.path.map((p) => String(p)).join('.'),
        message: issue.message,
      }));
      return this.failure(name, Errors.validation(`Invalid arguments for ${name}`, { issues }));
    }

    try {
      const result = await tool.execute(parsed.data);
      this.logger.debug(`Tool call succeeded ${JSON.stringify({ tool: name })}`);
      return { ok: true, tool: name, result };
    } catch (err) {
      if (isIntentError(err)) return this.failure(name, err);
      this.logger.error(
        `Tool call failed unexpectedly ${JSON.stringify({ tool: name, error: err instanceof Error ? err.message : String(err) })}`,
        err instanceof Error ? err.stack : undefined,
      );
      return this.failure(name, Errors.internal(err));
    }
  }

  private failure(tool: string, error: IntentError): ToolEnvelope {
    if (error.code !== 'Unauthorized' && error.code !== 'InternalError') {
      this.logger.log(`Tool call refused ${JSON.stringify({ tool, code: error.code, message: error.message })}`);
    }
    return { ok: false, tool, error: error.toJSON() };
  }
}
