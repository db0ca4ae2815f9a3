import { Module } from '@nestjs/common';
import { CoreModule } from '../core/core.module';
import { ConfigService } from '../core/services/config.service';
import { Tmf921Module } from '../tmf921/tmf921.module';
import { IntentEventsBus } from './intentEvents.bus';
import { IntentLifecycleEngine } from './intentLifecycle.engine';
import { IntentLockService } from './intentLock.service';
import { IntentsController } from './intents.controller';
import { FsIntentStore } from './store/fsIntent.store';
import { IntentStore } from './store/intent.store';
import { MemoryIntentStore } from './store/memoryIntent.store';

@Module({
  imports: [CoreModule, Tmf921Module],
  controllers: [IntentsController],
  providers: [
    IntentLockService,
    IntentEventsBus,
    {
      provide: IntentStore,
      useFactory: async (config: ConfigService) => {
        const store = config.intentStore === 'fs' ? new FsIntentStore(config.intentStorePath) : new MemoryIntentStore();
        await store.initIfNeeded();
        return store;
      },
      inject: [ConfigService],
    },
    IntentLifecycleEngine,
  ],
  exports: [IntentLifecycleEngine, IntentEventsBus, IntentStore],
})
export class IntentsModule {}
