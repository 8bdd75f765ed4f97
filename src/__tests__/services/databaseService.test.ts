/**
 * Database Service Tests
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import { z } from 'zod';
import { openDatabase } from '../../services/databaseService';

describe('databaseService', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'campaign-db-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('writes the database file on close and loads it again', async () => {
    const file = path.join(dir, 'nested', 'campaigns.db');
    const first = await openDatabase(file);
    const id = first.insert('INSERT INTO subscribers (email, status, subscribed_at) VALUES (?, ?, ?)', [
      'jane@example.com',
      'active',
      '2026-01-01T00:00:00.000Z',
    ]);
    first.close();

    const reopened = await openDatabase(file);
    const row = reopened.get(z.object({ id: z.number(), email: z.string() }), 'SELECT id, email FROM subscribers');
    reopened.close();

    expect(row).toEqual({ id, email: 'jane@example.com' });
  });

  it('reports changed rows and counts', async () => {
    const db = await openDatabase(':memory:');
    db.insert('INSERT INTO subscribers (email, status, subscribed_at) VALUES (?, ?, ?)', ['a@example.com', 'active', 'x']);
    db.insert('INSERT INTO subscribers (email, status, subscribed_at) VALUES (?, ?, ?)', ['b@example.com', 'active', 'x']);

    expect(db.run("UPDATE subscribers SET status = 'bounced' WHERE email = ?", ['a@example.com'])).toBe(1);
    expect(db.run("UPDATE subscribers SET status = 'bounced' WHERE email = ?", ['nobody@example.com'])).toBe(0);
    expect(db.count("SELECT COUNT(*) AS count FROM subscribers WHERE status = 'active'")).toBe(1);
    db.close();
  });

  it('matches emails without regard to case', async () => {
    const db = await openDatabase(':memory:');
    db.insert('INSERT INTO subscribers (email, status, subscribed_at) VALUES (?, ?, ?)', ['jane@example.com', 'active', 'x']);

    expect(db.count('SELECT COUNT(*) AS count FROM subscribers WHERE email = ?', ['JANE@example.com'])).toBe(1);
    db.close();
  });

  it('keeps foreign keys enforced after writing the file', async () => {
    const db = await openDatabase(path.join(dir, 'campaigns.db'));
    db.save();

    expect(() =>
      db.insert(
        `INSERT INTO admin_sessions (admin_id, token_hash, expires_at, created_at, last_used_at)
         VALUES (?, ?, ?, ?, ?)`,
        [999, 'hash', 'x', 'x', 'x']
      )
    ).toThrow(/FOREIGN KEY/);
    db.close();
  });

  it('rejects rows that do not match the expected shape', async () => {
    const db = await openDatabase(':memory:');
    db.insert('INSERT INTO subscribers (email, status, subscribed_at) VALUES (?, ?, ?)', ['jane@example.com', 'active', 'x']);

    expect(() => db.get(z.object({ email: z.number() }), 'SELECT email FROM subscribers')).toThrow(z.ZodError);
    db.close();
  });
});
