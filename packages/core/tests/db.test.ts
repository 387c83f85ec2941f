import { describe, it, expect, afterEach } from 'vitest';
import { mkdtempSync, rmSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  createDb, createTestDb, getRawDb, getDbPath, getDefaultDbPath, CREATE_SCHEMA_SQL,
} from '../src/db.js';

describe('createDb', () => {
  let tmpDir: string | null = null;

  afterEach(() => {
    if (tmpDir) {
      rmSync(tmpDir, { recursive: true, force: true });
      tmpDir = null;
    }
  });

  it('creates an in-memory database', () => {
    const db = createDb(':memory:');
    const raw = getRawDb(db);
    expect(raw.name).toBe(':memory:');
    raw.close();
  });

  it('creates a file-based database and parent directories', () => {
    tmpDir = mkdtempSync(join(tmpdir(), 'pledge-db-test-'));
    const dbPath = join(tmpDir, 'nested', 'dir', 'pledge.db');

    const db = createDb(dbPath);
    const raw = getRawDb(db);

    expect(existsSync(dbPath)).toBe(true);
    expect(raw.pragma('journal_mode', { simple: true })).toBe('wal');
    expect(getDbPath(db)).toBe(dbPath);
    raw.close();
  });
});

describe('createTestDb', () => {
  it('creates the record and config tables', () => {
    const db = createTestDb();
    const raw = getRawDb(db);

    const tables = raw.prepare(
      "SELECT name FROM sqlite_master WHERE type='table' AND name NOT LIKE 'sqlite_%' ORDER BY name",
    ).all() as Array<{ name: string }>;

    expect(tables.map(t => t.name)).toEqual(['config', 'deadlines', 'objectives', 'priorities']);
  });

  it('declares no foreign keys between record tables', () => {
    const db = createTestDb();
    const raw = getRawDb(db);
    for (const table of ['priorities', 'deadlines']) {
      expect(raw.pragma(`foreign_key_list(${table})`)).toEqual([]);
    }
  });

  it('rejects out-of-range urgency at the storage level', () => {
    const db = createTestDb();
    const raw = getRawDb(db);
    expect(() => raw.prepare('INSERT INTO priorities (address, urgency) VALUES (?, ?)').run('alice', 4))
      .toThrow(/CHECK constraint failed/);
  });
});

describe('getDefaultDbPath', () => {
  const saved = process.env['PLEDGE_DB'];

  afterEach(() => {
    if (saved === undefined) delete process.env['PLEDGE_DB'];
    else process.env['PLEDGE_DB'] = saved;
  });

  it('honours PLEDGE_DB', () => {
    process.env['PLEDGE_DB'] = '/tmp/custom/pledge.db';
    expect(getDefaultDbPath()).toBe('/tmp/custom/pledge.db');
  });

  it('ends in pledge.db otherwise', () => {
    delete process.env['PLEDGE_DB'];
    expect(getDefaultDbPath().endsWith('pledge.db')).toBe(true);
  });
});

describe('CREATE_SCHEMA_SQL', () => {
  it('is idempotent (can run twice without error)', () => {
    const db = createTestDb();
    const raw = getRawDb(db);
    expect(() => raw.exec(CREATE_SCHEMA_SQL)).not.toThrow();
  });
});
