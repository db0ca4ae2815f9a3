import { Controller, Get, Inject, NotFoundException, Param, ParseUUIDPipe, Query, ValidationPipe } from '@nestjs/common';
import { ListIntentsQueryDto } from './dto/listIntents.query.dto';
import { isIntentError } from './errors';
import { IntentLifecycleEngine } from './intentLifecycle.engine';
import { toDetail, toSummary } from './intent.types';

// Read-only operator views; mutations go through the toolset only.
@Controller('api/intents')
export class IntentsController {
  constructor(@Inject(IntentLifecycleEngine) private readonly engine: IntentLifecycleEngine) {}

  @Get()
  async listIntents(
    @Query(new ValidationPipe({ whitelist: true, transform: true, expectedType: ListIntentsQueryDto }))
    query: ListIntentsQueryDto,
  ) {
    const intents = await this.engine.list({ state: query.state });
    return { items: intents.map(toSummary), count: intents.length };
  }

  @Get(':id')
  async getIntent(@Param('id', new ParseUUIDPipe()) id: string) {
    try {
      return toDetail(await this.engine.get(id));
    } catch (err) {
      if (isIntentError(err) && err.code === 'NotFound') {
        throw new NotFoundException({ error: 'intent_not_found' });
      }
      throw err;
    }
  }
}
