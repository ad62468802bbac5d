import { Global, Module } from '@nestjs/common';
import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';
import { Pool } from 'pg';
import { HatcheryConfigService } from '../config/hatchery-config.service.js';
import * as schema from './schema/index.js';

export const DB = Symbol('DB');
export type DrizzleDB = NodePgDatabase<typeof schema>;

@Global()
@Module({
  providers: [
    {
      provide: DB,
      inject: [HatcheryConfigService],
      useFactory: (config: HatcheryConfigService) => {
        const pool = new Pool({
          connectionString: config.get().databaseUrl,
        });
        return drizzle(pool, { schema });
      },
    },
  ],
  exports: [DB],
})
export class DrizzleModule {}
