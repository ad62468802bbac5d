import { Global, Module } from '@nestjs/common';
import { HatcheryConfigService } from './hatchery-config.service.js';

@Global()
@Module({
  providers: [HatcheryConfigService],
  exports: [HatcheryConfigService],
})
export class ConfigModule {}
