import {
  doublePrecision,
  index,
  pgTable,
  text,
  timestamp,
  uuid,
} from 'drizzle-orm/pg-core';
import { STACKING_POLICY } from '../types/index.js';

// subject별 활성 modifier: 만료 시각이 아니라 저장 시점 기준 남은 시간
export const subjectModifiers = pgTable(
  'subject_modifiers',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    subjectId: text('subject_id').notNull(),
    sourceId: text('source_id').notNull(),
    statKey: text('stat_key').notNull(),
    value: doublePrecision('value').notNull(),
    // null = 영구
    remainingSeconds: doublePrecision('remaining_seconds'),
    stacking: text('stacking', { enum: STACKING_POLICY }).notNull(),
    savedAt: timestamp('saved_at').defaultNow().notNull(),
  },
  (table) => [index('subject_modifiers_subject_idx').on(table.subjectId)],
);
