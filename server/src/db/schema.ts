/**
 * Database Schema - Drizzle ORM
 * Append-only history of detected opportunities and execution state transitions
 */

import {
  pgTable,
  uuid,
  varchar,
  timestamp,
  jsonb,
  doublePrecision,
  bigint,
  index,
} from 'drizzle-orm/pg-core';
import type { ExecutionOutcome, ExecutionState, OpportunityKind } from '../../../shared/schema.js';

// Opportunities as they entered the book
export const opportunityHistory = pgTable('opportunity_history', {
  id: uuid('id').primaryKey(),
  kind: varchar('kind', { length: 20 }).notNull().$type<OpportunityKind>(),
  resourceKey: varchar('resource_key', { length: 100 }).notNull(),
  token: varchar('token', { length: 42 }).notNull(),
  expectedValue: doublePrecision('expected_value').notNull(),
  riskScore: doublePrecision('risk_score').notNull(),
  confidence: doublePrecision('confidence').notNull(),
  detectedAt: timestamp('detected_at').notNull(),
  expiresAt: timestamp('expires_at').notNull(),
  inputs: jsonb('inputs').notNull(),
}, (table) => ({
  resourceKeyIdx: index('opportunity_history_resource_key_idx').on(table.resourceKey),
  detectedAtIdx: index('opportunity_history_detected_at_idx').on(table.detectedAt),
}));

// One row per execution record transition
export const executionEvents = pgTable('execution_events', {
  id: bigint('id', { mode: 'number' }).primaryKey().generatedAlwaysAsIdentity(),
  recordId: uuid('record_id').notNull(),
  opportunityId: uuid('opportunity_id').notNull(),
  resourceKey: varchar('resource_key', { length: 100 }).notNull(),
  kind: varchar('kind', { length: 20 }).notNull().$type<OpportunityKind>(),
  state: varchar('state', { length: 20 }).notNull().$type<ExecutionState>(),
  txHash: varchar('tx_hash', { length: 66 }),
  outcome: jsonb('outcome').$type<ExecutionOutcome>(),
  recordedAt: timestamp('recorded_at').defaultNow().notNull(),
}, (table) => ({
  recordIdIdx: index('execution_events_record_id_idx').on(table.recordId),
  resourceKeyIdx: index('execution_events_resource_key_idx').on(table.resourceKey),
}));

export type OpportunityHistoryRow = typeof opportunityHistory.$inferInsert;
export type ExecutionEventRow = typeof executionEvents.$inferInsert;
