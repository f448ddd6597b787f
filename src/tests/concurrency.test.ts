/**
 * Two connections on one database file, taking turns on the same keys.
 *
 * Run: node --import tsx --test src/tests/concurrency.test.ts
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { openDatabase, type DatabaseHandle } from '../db/index.js';
import { getPlayerBoost, scanPlayerBoosts, scanPlayerPrizes } from '../engine/store.js';
import { addBoost, completeLevelAndGrantPrizes, login, recordLevelResult } from '../engine/progression.js';
import { buildFixture, type Fixture } from './helpers.js';

let dir: string;
let first: DatabaseHandle;
let second: DatabaseHandle;
let fx: Fixture;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'ledger-shared-'));
  const file = path.join(dir, 'ledger.db');
  first = openDatabase(file);
  second = openDatabase(file);
  fx = buildFixture(first);
});

afterEach(() => {
  first.sqlite.close();
  second.sqlite.close();
  fs.rmSync(dir, { recursive: true, force: true });
});

describe('shared database file', () => {
  it('sums boost additions from both connections into one row', () => {
    addBoost(first.db, fx.player.id, fx.boosts.SPEED.id, 2);
    addBoost(second.db, fx.player.id, fx.boosts.SPEED.id, 3);
    addBoost(first.db, fx.player.id, fx.boosts.SPEED.id, 4);
    addBoost(second.db, fx.player.id, fx.boosts.SPEED.id);

    assert.equal(getPlayerBoost(first.db, fx.player.id, fx.boosts.SPEED.id)?.amount, 10);
    assert.equal(Array.from(scanPlayerBoosts(second.db, fx.player.id)).length, 1);
  });

  it('grants each prize once whichever connection asks', () => {
    const now = new Date('2026-03-01T12:00:00.000Z');
    recordLevelResult(first.db, fx.player.id, fx.level.id, { completed: now, score: 100 });

    assert.equal(completeLevelAndGrantPrizes(second.db, fx.player.id, fx.level.id, now).length, 2);
    assert.deepEqual(completeLevelAndGrantPrizes(first.db, fx.player.id, fx.level.id, now), []);
    assert.deepEqual(completeLevelAndGrantPrizes(second.db, fx.player.id, fx.level.id, now), []);

    assert.deepEqual(
      Array.from(scanPlayerPrizes(first.db, fx.player.id), (pp) => pp.prizeId),
      [fx.prizeX.id, fx.prizeY.id],
    );
  });

  it('credits one login per day when an earlier login commits last', () => {
    login(first.db, fx.player.id, new Date('2026-03-02T00:00:00.001Z'));
    login(second.db, fx.player.id, new Date('2026-03-01T23:59:59.999Z'));
    const again = login(first.db, fx.player.id, new Date('2026-03-02T10:00:00.000Z'));

    assert.equal(again.credited, false);
    assert.equal(again.player.points, 10);
  });
});
