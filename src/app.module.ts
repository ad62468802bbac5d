import { Module } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { JwtModule } from '@nestjs/jwt';
import { ConfigModule } from './config/config.module.js';
import { HatcheryConfigService } from './config/hatchery-config.service.js';
import { DrizzleModule } from './db/drizzle.module.js';
import { GameExceptionFilter } from './common/filters/game-exception.filter.js';
import { ContentModule } from './content/content.module.js';
import { EngineModule } from './engine/engine.module.js';
import { EffectsModule } from './effects/effects.module.js';
import { EggsModule } from './eggs/eggs.module.js';

@Module({
  imports: [
    ConfigModule,
    JwtModule.registerAsync({
      global: true,
      inject: [HatcheryConfigService],
      useFactory: (config: HatcheryConfigService) => ({
        secret: config.get().jwtSecret,
      }),
    }),
    DrizzleModule,
    ContentModule,
    EngineModule,
    EffectsModule,
    EggsModule,
  ],
  providers: [
    {
      provide: APP_FILTER,
      useClass: GameExceptionFilter,
    },
  ],
})
export class AppModule {}
