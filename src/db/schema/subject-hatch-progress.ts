import { integer, pgTable, text, timestamp } from 'drizzle-orm/pg-core';

// subject별 누적 부화 수: 알 해금과 부화 luck 보너스에 쓴다
export const subjectHatchProgress = pgTable('subject_hatch_progress', {
  subjectId: text('subject_id').primaryKey(),
  petsHatched: integer('pets_hatched').notNull().default(0),
  updatedAt: timestamp('updated_at').defaultNow().notNull(),
});
