import { Module } from '@nestjs/common';
import { Tmf921Module } from '../tmf921/tmf921.module';
import { ToolsModule } from '../tools/tools.module';
import { HealthController, ServiceInfoController } from './health/health.controller';

@Module({
  imports: [Tmf921Module, ToolsModule],
  controllers: [HealthController, ServiceInfoController],
})
export class InfraModule {}
