import { Logger, Module } from '@nestjs/common';
import { HatcheryConfigService } from '../config/hatchery-config.service.js';
import { DB, type DrizzleDB } from '../db/drizzle.module.js';
import { EngineModule } from '../engine/engine.module.js';
import { EffectsController } from './effects.controller.js';
import { GlobalEffectsService } from './global-effects.service.js';
import { PlayerEffectsService } from './player-effects.service.js';
import { DrizzleModifierStore } from './store/drizzle-modifier-store.js';
import { InMemoryModifierStore } from './store/in-memory-modifier-store.js';
import { MODIFIER_STORE, type ModifierStore } from './store/modifier-store.js';

@Module({
  imports: [EngineModule],
  controllers: [EffectsController],
  providers: [
    PlayerEffectsService,
    GlobalEffectsService,
    {
      provide: MODIFIER_STORE,
      inject: [HatcheryConfigService, DB],
      useFactory: (config: HatcheryConfigService, db: DrizzleDB): ModifierStore => {
        if (config.get().databaseUrl) return new DrizzleModifierStore(db);
        new Logger('EffectsModule').warn(
          'DATABASE_URL not set, effects are kept in memory only',
        );
        return new InMemoryModifierStore();
      },
    },
  ],
  exports: [PlayerEffectsService, GlobalEffectsService],
})
export class EffectsModule {}
