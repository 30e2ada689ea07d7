import test from 'node:test';
import assert from 'node:assert/strict';

import { NotFoundError, SeedMismatchError } from '../errors.js';
import { toErrorPayload, toEventPayload, toSnapshotPayload, toStatsPayload, toUpdatePayload } from './serializers.js';

test('toEventPayload writes snake_case fields per event type', () => {
  const actor = { playerId: 'p1', name: 'Ann', team: 1 };

  assert.deepEqual(toEventPayload({ type: 'guess', ...actor, index: 4, number: 1 }), {
    number: 1,
    type: 'guess',
    team: 1,
    player_id: 'p1',
    name: 'Ann',
    index: 4
  });
  assert.deepEqual(toEventPayload({ type: 'chat', ...actor, message: 'hi', number: 2 }), {
    number: 2,
    type: 'chat',
    team: 1,
    player_id: 'p1',
    name: 'Ann',
    message: 'hi'
  });
  assert.deepEqual(toEventPayload({ type: 'end_turn', ...actor, number: 3 }), {
    number: 3,
    type: 'end_turn',
    team: 1,
    player_id: 'p1',
    name: 'Ann'
  });
});

test('toSnapshotPayload renames fields for the wire', () => {
  const payload = toSnapshotPayload({
    seed: '99',
    createdAt: 123,
    tiles: [{ word: 'PINE', color: 'green/neutral', revealed: true }],
    players: [{ id: 'p1', name: 'Ann', team: null, lastSeen: 456 }]
  });

  assert.deepEqual(payload, {
    seed: '99',
    created_at: 123,
    tiles: [{ word: 'PINE', color: 'green/neutral', revealed: true }],
    players: [{ id: 'p1', name: 'Ann', team: null, last_seen: 456 }]
  });
});

test('toUpdatePayload keeps the seed with the events', () => {
  assert.deepEqual(toUpdatePayload({ seed: '5', events: [] }), { seed: '5', events: [] });
});

test('toStatsPayload renames counters', () => {
  assert.deepEqual(toStatsPayload({ activeGames: 2, activePlayers: 7 }), { active_games: 2, active_players: 7 });
});

test('toErrorPayload adds the live seed only for seed mismatches', () => {
  assert.deepEqual(toErrorPayload(new SeedMismatchError('42')), {
    code: 'bad_seed',
    message: 'Request intended for a different game seed.',
    seed: '42'
  });
  assert.deepEqual(toErrorPayload(new NotFoundError('lost-room')), {
    code: 'not_found',
    message: 'Game not found'
  });
});
