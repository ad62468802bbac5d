import { Logger, Module } from '@nestjs/common';
import { HatcheryConfigService } from '../config/hatchery-config.service.js';
import { DB, type DrizzleDB } from '../db/drizzle.module.js';
import { EffectsModule } from '../effects/effects.module.js';
import { EngineModule } from '../engine/engine.module.js';
import { EggsController } from './eggs.controller.js';
import { HatchService } from './hatch.service.js';
import { DrizzleHatchProgressStore } from './store/drizzle-hatch-progress-store.js';
import {
  HATCH_PROGRESS_STORE,
  type HatchProgressStore,
} from './store/hatch-progress-store.js';
import { InMemoryHatchProgressStore } from './store/in-memory-hatch-progress-store.js';

@Module({
  imports: [EngineModule, EffectsModule],
  controllers: [EggsController],
  providers: [
    HatchService,
    {
      provide: HATCH_PROGRESS_STORE,
      inject: [HatcheryConfigService, DB],
      useFactory: (config: HatcheryConfigService, db: DrizzleDB): HatchProgressStore => {
        if (config.get().databaseUrl) return new DrizzleHatchProgressStore(db);
        new Logger('EggsModule').warn(
          'DATABASE_URL not set, hatch progress is kept in memory only',
        );
        return new InMemoryHatchProgressStore();
      },
    },
  ],
  exports: [HatchService],
})
export class EggsModule {}
