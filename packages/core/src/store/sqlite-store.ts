/**
 * RegistryStore over SQLite using Drizzle ORM.
 * Each table is queried on its own; nothing joins across them.
 */

import { eq, asc } from 'drizzle-orm';
import type { PledgeDb } from '../db.js';
import { getRawDb } from '../db.js';
import { objectives } from '../schema/objectives.js';
import { priorities } from '../schema/priorities.js';
import { deadlines } from '../schema/deadlines.js';
import type { Address, ObjectiveRecord, PriorityRecord, DeadlineRecord } from '../types/records.js';
import type { KeyedTable, RegistryStore } from './types.js';

function objectiveTable(db: PledgeDb): KeyedTable<ObjectiveRecord> {
  return {
    get(address) {
      const row = db.select().from(objectives).where(eq(objectives.address, address)).get();
      return row ? { description: row.description, completed: row.completed } : null;
    },

    put(address, value) {
      db.insert(objectives)
        .values({ address, description: value.description, completed: value.completed })
        .onConflictDoUpdate({
          target: objectives.address,
          set: { description: value.description, completed: value.completed },
        })
        .run();
    },

    remove(address) {
      return db.delete(objectives).where(eq(objectives.address, address)).run().changes > 0;
    },

    addresses() {
      const rows = db.select({ address: objectives.address }).from(objectives).orderBy(asc(objectives.address)).all();
      return rows.map(r => r.address);
    },

    entries() {
      const rows = db.select().from(objectives).orderBy(asc(objectives.address)).all();
      return rows.map((r): [Address, ObjectiveRecord] => [r.address, { description: r.description, completed: r.completed }]);
    },
  };
}

function priorityTable(db: PledgeDb): KeyedTable<PriorityRecord> {
  return {
    get(address) {
      const row = db.select().from(priorities).where(eq(priorities.address, address)).get();
      return row ? { urgency: row.urgency } : null;
    },

    put(address, value) {
      db.insert(priorities)
        .values({ address, urgency: value.urgency })
        .onConflictDoUpdate({ target: priorities.address, set: { urgency: value.urgency } })
        .run();
    },

    remove(address) {
      return db.delete(priorities).where(eq(priorities.address, address)).run().changes > 0;
    },

    addresses() {
      const rows = db.select({ address: priorities.address }).from(priorities).orderBy(asc(priorities.address)).all();
      return rows.map(r => r.address);
    },

    entries() {
      const rows = db.select().from(priorities).orderBy(asc(priorities.address)).all();
      return rows.map((r): [Address, PriorityRecord] => [r.address, { urgency: r.urgency }]);
    },
  };
}

function deadlineTable(db: PledgeDb): KeyedTable<DeadlineRecord> {
  return {
    get(address) {
      const row = db.select().from(deadlines).where(eq(deadlines.address, address)).get();
      return row ? { targetPoint: row.targetPoint, alertActivated: row.alertActivated } : null;
    },

    put(address, value) {
      db.insert(deadlines)
        .values({ address, targetPoint: value.targetPoint, alertActivated: value.alertActivated })
        .onConflictDoUpdate({
          target: deadlines.address,
          set: { targetPoint: value.targetPoint, alertActivated: value.alertActivated },
        })
        .run();
    },

    remove(address) {
      return db.delete(deadlines).where(eq(deadlines.address, address)).run().changes > 0;
    },

    addresses() {
      const rows = db.select({ address: deadlines.address }).from(deadlines).orderBy(asc(deadlines.address)).all();
      return rows.map(r => r.address);
    },

    entries() {
      const rows = db.select().from(deadlines).orderBy(asc(deadlines.address)).all();
      return rows.map((r): [Address, DeadlineRecord] => [r.address, { targetPoint: r.targetPoint, alertActivated: r.alertActivated }]);
    },
  };
}

export function createSqliteStore(db: PledgeDb): RegistryStore {
  const raw = getRawDb(db);

  return {
    objectives: objectiveTable(db),
    priorities: priorityTable(db),
    deadlines: deadlineTable(db),

    transaction<T>(fn: () => T): T {
      // better-sqlite3 turns nested calls into savepoints
      return raw.transaction(fn)();
    },
  };
}
