/**
 * Player-level CSV export.
 *
 * Run: node --import tsx --test src/tests/export.test.ts
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import fs from 'fs';
import os from 'os';
import path from 'path';
import type { DatabaseHandle } from '../db/index.js';
import { countPlayerLevels, createLevel, createPlayer } from '../engine/store.js';
import { completeLevelAndGrantPrizes, recordLevelResult } from '../engine/progression.js';
import {
  csvField,
  exportPlayerLevels,
  exportPlayerLevelsToFile,
  scanExportBatches,
} from '../engine/export.js';
import { buildFixture, freshDatabase, type Fixture } from './helpers.js';

const HEADER = 'player_id,level_title,completed,prize_title\r\n';
const NOW = new Date('2026-03-01T12:00:00.000Z');

let handle: DatabaseHandle;
let fx: Fixture;

beforeEach(() => {
  handle = freshDatabase();
  fx = buildFixture(handle);
});

afterEach(() => {
  handle.sqlite.close();
});

async function collect(batchSize?: number): Promise<{ text: string; chunks: string[]; rows: number }> {
  const chunks: string[] = [];
  const rows = await exportPlayerLevels(handle.db, (chunk) => {
    chunks.push(chunk);
  }, { batchSize });
  return { text: chunks.join(''), chunks, rows };
}

describe('exportPlayerLevels', () => {
  it('writes only the header for an empty ledger', async () => {
    const { text, rows } = await collect();
    assert.equal(text, HEADER);
    assert.equal(rows, 0);
  });

  it('reports the first attached prize of a completed level', async () => {
    recordLevelResult(handle.db, fx.player.id, fx.level.id, { completed: NOW, score: 100 });
    completeLevelAndGrantPrizes(handle.db, fx.player.id, fx.level.id, NOW);

    const { text } = await collect();
    assert.equal(text, `${HEADER}${fx.player.id},Level One,true,Prize X\r\n`);
  });

  it('leaves prize_title empty for a level without prizes', async () => {
    const bare = createLevel(handle.db, 'Bonus Stage', 5);
    recordLevelResult(handle.db, fx.player.id, bare.id, { completed: null, score: 0 });

    const { text } = await collect();
    assert.equal(text, `${HEADER}${fx.player.id},Bonus Stage,false,\r\n`);
  });

  it('quotes fields that need it', async () => {
    const tricky = createLevel(handle.db, 'Level, "Quoted"', 6);
    recordLevelResult(handle.db, fx.player.id, tricky.id, { completed: NOW, score: 1 });

    const { text } = await collect();
    assert.equal(text, `${HEADER}${fx.player.id},"Level, ""Quoted""",true,\r\n`);
  });

  it('emits one row per player level in storage order', async () => {
    const second = createLevel(handle.db, 'Level Two', 2);
    const other = createPlayer(handle.db);

    recordLevelResult(handle.db, fx.player.id, fx.level.id, { completed: null, score: 10 });
    recordLevelResult(handle.db, other.id, second.id, { completed: NOW, score: 20 });
    recordLevelResult(handle.db, fx.player.id, second.id, { completed: null, score: 30 });
    // resubmission updates in place and keeps its position
    recordLevelResult(handle.db, fx.player.id, fx.level.id, { completed: NOW, score: 40 });

    const { text, rows } = await collect();
    assert.equal(rows, countPlayerLevels(handle.db));
    assert.equal(
      text,
      HEADER +
        `${fx.player.id},Level One,true,Prize X\r\n` +
        `${other.id},Level Two,true,\r\n` +
        `${fx.player.id},Level Two,false,\r\n`,
    );
  });

  it('writes one chunk per batch', async () => {
    for (let i = 0; i < 5; i++) {
      const level = createLevel(handle.db, `Stage ${i}`, i);
      recordLevelResult(handle.db, fx.player.id, level.id, { completed: null, score: i });
    }

    const { chunks, rows } = await collect(2);
    assert.equal(rows, 5);
    assert.equal(chunks.length, 4); // header + 2 + 2 + 1
    assert.equal(chunks[3], `${fx.player.id},Stage 4,false,\r\n`);
  });
});

describe('scanExportBatches', () => {
  it('stops after an exactly full last batch', () => {
    const second = createLevel(handle.db, 'Level Two', 2);
    recordLevelResult(handle.db, fx.player.id, fx.level.id, { completed: null, score: 1 });
    recordLevelResult(handle.db, fx.player.id, second.id, { completed: null, score: 2 });

    const batches = Array.from(scanExportBatches(handle.db, 2));
    assert.equal(batches.length, 1);
    assert.deepEqual(batches[0].map((r) => r.levelTitle), ['Level One', 'Level Two']);
  });
});

describe('csvField', () => {
  it('passes plain values through', () => {
    assert.equal(csvField('Prize X'), 'Prize X');
    assert.equal(csvField(''), '');
  });

  it('quotes separators, quotes and line breaks', () => {
    assert.equal(csvField('a,b'), '"a,b"');
    assert.equal(csvField('say "hi"'), '"say ""hi"""');
    assert.equal(csvField('two\nlines'), '"two\nlines"');
  });
});

describe('exportPlayerLevelsToFile', () => {
  it('writes the report to disk', async () => {
    recordLevelResult(handle.db, fx.player.id, fx.level.id, { completed: NOW, score: 100 });
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'ledger-export-'));
    const file = path.join(dir, 'report.csv');

    try {
      const rows = await exportPlayerLevelsToFile(handle.db, file);
      assert.equal(rows, 1);
      assert.equal(fs.readFileSync(file, 'utf-8'), `${HEADER}${fx.player.id},Level One,true,Prize X\r\n`);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
