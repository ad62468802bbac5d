// 서버 설정: .env 값을 zod로 강제 변환 + 기본값

import { Injectable, Logger, type LogLevel } from '@nestjs/common';
import { join } from 'path';
import { z } from 'zod';
import { ConfigValidationError } from '../common/errors/game-errors.js';
import { formatZodIssues } from '../common/pipes/zod-validation.pipe.js';

const NEST_LOG_LEVELS = ['log', 'error', 'warn', 'debug', 'verbose', 'fatal'] as const;

export const HatcheryEnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  CONTENT_DIR: z.string().min(1).optional(),
  EFFECT_SWEEP_INTERVAL_MS: z.coerce.number().int().positive().default(1000),
  EFFECT_SAVE_INTERVAL_S: z.coerce.number().positive().default(30),
  HATCH_COOLDOWN_S: z.coerce.number().min(0).default(3),
  HATCH_MAX_BATCH: z.coerce.number().int().min(1).default(3),
  PREVIEW_MIN_CHANCE: z.coerce.number().min(0).max(1).default(0.001),
  PREVIEW_PRECISION: z.coerce.number().int().min(0).max(6).default(2),
  PREVIEW_MAX_ENTRIES: z.coerce.number().int().min(1).default(8),
  LOG_LEVELS: z
    .string()
    .default('log,warn,error')
    .transform((raw) => raw.split(',').map((s) => s.trim()).filter(Boolean))
    .pipe(z.array(z.enum(NEST_LOG_LEVELS)).min(1)),
  DATABASE_URL: z.string().optional(),
  JWT_SECRET: z.string().min(1).default('dev-secret'),
});

export interface HatcheryConfig {
  port: number;
  contentDir: string;
  effectSweepIntervalMs: number;
  effectSaveIntervalS: number;
  hatchCooldownS: number;
  hatchMaxBatch: number;
  previewMinChance: number;
  previewPrecision: number;
  previewMaxEntries: number;
  logLevels: LogLevel[];
  databaseUrl?: string;
  jwtSecret: string;
}

/** env 객체 → HatcheryConfig. 잘못된 값은 기동 시점에 실패 */
export function parseHatcheryConfig(
  env: Record<string, string | undefined>,
): HatcheryConfig {
  const result = HatcheryEnvSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigValidationError('Invalid server configuration', {
      issues: formatZodIssues(result.error.issues),
    });
  }
  const e = result.data;
  return {
    port: e.PORT,
    contentDir: e.CONTENT_DIR ?? join(process.cwd(), 'content', 'hatchery_v1'),
    effectSweepIntervalMs: e.EFFECT_SWEEP_INTERVAL_MS,
    effectSaveIntervalS: e.EFFECT_SAVE_INTERVAL_S,
    hatchCooldownS: e.HATCH_COOLDOWN_S,
    hatchMaxBatch: e.HATCH_MAX_BATCH,
    previewMinChance: e.PREVIEW_MIN_CHANCE,
    previewPrecision: e.PREVIEW_PRECISION,
    previewMaxEntries: e.PREVIEW_MAX_ENTRIES,
    logLevels: e.LOG_LEVELS,
    databaseUrl: e.DATABASE_URL,
    jwtSecret: e.JWT_SECRET,
  };
}

@Injectable()
export class HatcheryConfigService {
  private readonly logger = new Logger(HatcheryConfigService.name);
  private config: HatcheryConfig;

  constructor() {
    this.config = parseHatcheryConfig(process.env);
    this.logger.log(
      `Config loaded (contentDir=${this.config.contentDir}, cooldown=${this.config.hatchCooldownS}s)`,
    );
  }

  get(): HatcheryConfig {
    return this.config;
  }

  /** 런타임 설정 변경: 다음 sweep / 요청부터 반영 */
  update(patch: Partial<HatcheryConfig>): HatcheryConfig {
    this.config = { ...this.config, ...patch };
    this.logger.log(`Config updated: ${JSON.stringify(patch)}`);
    return this.config;
  }
}
