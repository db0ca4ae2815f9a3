import { Module } from '@nestjs/common';
import { ConfigService } from './services/config.service';

@Module({
  providers: [{ provide: ConfigService, useFactory: () => ConfigService.fromEnv() }],
  exports: [ConfigService],
})
export class CoreModule {}
