import { Module } from '@nestjs/common';
import { ClockService } from './clock/clock.service.js';
import { RngService } from './rng/rng.service.js';
import { EffectAggregationService } from './effects/effect-aggregation.service.js';
import { RewardResolverService } from './rewards/reward-resolver.service.js';
import { PetCatalogService } from './hatching/pet-catalog.service.js';

const providers = [
  // 기반
  ClockService,
  RngService,
  // 순수 코어
  EffectAggregationService,
  RewardResolverService,
  // 콘텐츠 조회
  PetCatalogService,
];

@Module({
  providers,
  exports: providers,
})
export class EngineModule {}
