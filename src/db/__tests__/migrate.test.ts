import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { runMigrations } from '../migrate.js';

let db: Database.Database;

beforeEach(() => {
  db = new Database(':memory:');
  db.pragma('foreign_keys = ON');
});

afterEach(() => {
  db.close();
});

describe('runMigrations', () => {
  it('creates all tables from 001_initial.sql', () => {
    const { applied } = runMigrations(db);
    expect(applied).toContain('001_initial.sql');

    const tables = db
      .prepare("SELECT name FROM sqlite_master WHERE type='table' ORDER BY name")
      .all() as Array<{ name: string }>;

    const tableNames = tables.map((t) => t.name);
    expect(tableNames).toContain('sources');
    expect(tableNames).toContain('items');
    expect(tableNames).toContain('assets');
    expect(tableNames).toContain('_migrations');
  });

  it('is idempotent (second run applies nothing)', () => {
    const first = runMigrations(db);
    expect(first.applied.length).toBeGreaterThan(0);

    const second = runMigrations(db);
    expect(second.applied).toHaveLength(0);
    expect(second.skipped).toContain('001_initial.sql');
  });

  it('enforces uniqueness of (source_id, external_id)', () => {
    runMigrations(db);
    db.prepare("INSERT INTO sources (kind, name, url) VALUES ('Blog', 'A', 'https://a.example')").run();

    const insert = db.prepare(
      "INSERT INTO items (id, source_id, external_id, title, fetched_at) VALUES (?, 1, 'x', 't', '2024-01-01')",
    );
    insert.run('i1');
    expect(() => insert.run('i2')).toThrow(/UNIQUE/);
  });

  it('rejects unknown source kinds', () => {
    runMigrations(db);
    expect(() =>
      db.prepare("INSERT INTO sources (kind, name, url) VALUES ('Podcast', 'P', 'https://p.example')").run(),
    ).toThrow(/CHECK/);
  });

  it('applies migrations from a custom directory in lexical order', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'feedpulse-mig-'));
    try {
      fs.writeFileSync(path.join(dir, '002_b.sql'), 'CREATE TABLE b (id INTEGER);');
      fs.writeFileSync(path.join(dir, '001_a.sql'), 'CREATE TABLE a (id INTEGER);');
      fs.writeFileSync(path.join(dir, 'notes.txt'), 'ignored');

      const { applied } = runMigrations(db, dir);
      expect(applied).toEqual(['001_a.sql', '002_b.sql']);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it('wraps SQL failures in DbError', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'feedpulse-mig-'));
    try {
      fs.writeFileSync(path.join(dir, '001_bad.sql'), 'CREATE TABLE (;');
      expect(() => runMigrations(db, dir)).toThrow('Migration failed: 001_bad.sql');
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
