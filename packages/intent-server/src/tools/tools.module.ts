import { Module } from '@nestjs/common';
import { IntentsModule } from '../intents/intents.module';
import { ToolsRegistry } from './tools.registry';

@Module({
  imports: [IntentsModule],
  providers: [ToolsRegistry],
  exports: [ToolsRegistry],
})
export class ToolsModule {}
