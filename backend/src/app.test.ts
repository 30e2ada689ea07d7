import test from 'node:test';
import assert from 'node:assert/strict';
import { pino } from 'pino';

import { createApp } from './app.js';
import { GameRegistry, GameService } from './game/index.js';

const VOCABULARY = Array.from({ length: 40 }, (_, i) => `WORD${i}`);

interface Api {
  post(path: string, body?: unknown): Promise<{ status: number; data: unknown }>;
  raw(path: string, init: RequestInit): Promise<Response>;
}

const withServer = async (run: (api: Api) => Promise<void>) => {
  const logger = pino({ level: 'silent' });
  let seeds = 0;
  const registry = new GameRegistry({
    vocabulary: VOCABULARY,
    logger,
    playerIdleMs: 60_000,
    gameRetentionMs: 24 * 60 * 60_000,
    nextSeed: () => {
      seeds += 1;
      return String(seeds);
    }
  });
  const service = new GameService(registry, { pollTimeoutMs: 50, logger });
  const app = createApp({ service, logger, corsOrigin: '*' });

  const server = app.listen(0, '127.0.0.1');
  await new Promise<void>((resolve) => server.once('listening', () => resolve()));
  const address = server.address();
  assert.ok(address && typeof address === 'object');
  const baseUrl = `http://127.0.0.1:${address.port}`;

  const api: Api = {
    async post(path, body) {
      const response = await fetch(`${baseUrl}${path}`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: body === undefined ? undefined : JSON.stringify(body)
      });
      return { status: response.status, data: await response.json() };
    },
    raw(path, init) {
      return fetch(`${baseUrl}${path}`, init);
    }
  };

  try {
    await run(api);
  } finally {
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  }
};

const action = { session_id: 'room', seed: '1', player_id: 'p1', name: 'Ann', team: 1 };

test('POST /new-game returns a snapshot with the seed and 25 tiles', async () => {
  await withServer(async (api) => {
    const { status, data } = await api.post('/new-game', { session_id: 'room' });

    assert.equal(status, 200);
    assert.ok(data && typeof data === 'object' && 'seed' in data && 'tiles' in data);
    assert.equal(data.seed, '1');
    assert.ok(Array.isArray(data.tiles));
    assert.equal(data.tiles.length, 25);
  });
});

test('POST /new-game without session_id is a malformed body', async () => {
  await withServer(async (api) => {
    const { status, data } = await api.post('/new-game', {});

    assert.equal(status, 400);
    assert.deepEqual(data, { code: 'malformed_body', message: 'Unable to parse request body.' });
  });
});

test('a body that is not JSON is a malformed body', async () => {
  await withServer(async (api) => {
    const response = await api.raw('/guess', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{not json'
    });

    assert.equal(response.status, 400);
    assert.deepEqual(await response.json(), { code: 'malformed_body', message: 'Unable to parse request body.' });
  });
});

test('POST /new-game with too few custom words is refused', async () => {
  await withServer(async (api) => {
    const { status, data } = await api.post('/new-game', { session_id: 'room', words: ['ONE', 'TWO'] });

    assert.equal(status, 400);
    assert.deepEqual(data, { code: 'too_few_words', message: 'A word list must have at least 25 words.' });
  });
});

test('POST /guess validates team, session and seed', async () => {
  await withServer(async (api) => {
    await api.post('/new-game', { session_id: 'room' });

    const teamZero = await api.post('/guess', { ...action, team: 0, index: 0 });
    assert.equal(teamZero.status, 400);
    assert.deepEqual(teamZero.data, { code: 'malformed_body', message: 'Unable to parse request body.' });

    const unknown = await api.post('/guess', { ...action, session_id: 'elsewhere', index: 0 });
    assert.equal(unknown.status, 404);
    assert.deepEqual(unknown.data, { code: 'not_found', message: 'Game not found' });

    const stale = await api.post('/guess', { ...action, seed: '0', index: 0 });
    assert.equal(stale.status, 409);
    assert.deepEqual(stale.data, {
      code: 'bad_seed',
      message: 'Request intended for a different game seed.',
      seed: '1'
    });

    const outOfBounds = await api.post('/guess', { ...action, index: 25 });
    assert.equal(outOfBounds.status, 400);
    assert.deepEqual(outOfBounds.data, { code: 'invalid_index', message: 'Tile index 25 is out of bounds.' });
  });
});

test('actions show up in /events in order', async () => {
  await withServer(async (api) => {
    await api.post('/new-game', { session_id: 'room' });

    assert.deepEqual((await api.post('/guess', { ...action, index: 4 })).data, { status: 'ok' });
    assert.deepEqual((await api.post('/chat', { ...action, message: 'again?' })).data, { status: 'ok' });
    assert.deepEqual((await api.post('/end-turn', action)).data, { status: 'ok' });

    const { status, data } = await api.post('/events', { session_id: 'room', seed: '1', player_id: 'p2', last_event: 1 });

    assert.equal(status, 200);
    assert.deepEqual(data, {
      seed: '1',
      events: [
        { number: 2, type: 'chat', team: 1, player_id: 'p1', name: 'Ann', message: 'again?' },
        { number: 3, type: 'end_turn', team: 1, player_id: 'p1', name: 'Ann' }
      ]
    });
  });
});

test('POST /chat requires a message', async () => {
  await withServer(async (api) => {
    await api.post('/new-game', { session_id: 'room' });

    const { status, data } = await api.post('/chat', { ...action, message: '' });

    assert.equal(status, 400);
    assert.deepEqual(data, { code: 'malformed_body', message: 'Unable to parse request body.' });
  });
});

test('POST /events times out with an empty list and the current seed', async () => {
  await withServer(async (api) => {
    await api.post('/new-game', { session_id: 'room' });

    const { status, data } = await api.post('/events', { session_id: 'room', seed: '1', player_id: 'p1' });

    assert.equal(status, 200);
    assert.deepEqual(data, { seed: '1', events: [] });
  });
});

test('POST /ping updates presence that /stats reports', async () => {
  await withServer(async (api) => {
    await api.post('/new-game', { session_id: 'room' });
    await api.post('/new-game', { session_id: 'quiet' });

    assert.deepEqual((await api.post('/ping', { session_id: 'room', seed: '1', player_id: 'p1' })).data, {
      status: 'ok'
    });
    const stats = await api.raw('/stats', { method: 'GET' });

    assert.deepEqual(await stats.json(), { active_games: 1, active_players: 1 });
  });
});

test('POST /index suggests a two-word session id', async () => {
  await withServer(async (api) => {
    const { status, data } = await api.post('/index');

    assert.equal(status, 200);
    assert.ok(data && typeof data === 'object' && 'autogenerated_id' in data);
    assert.match(String(data.autogenerated_id), /^word\d+-word\d+$/);
  });
});

test('preflight requests get permissive CORS headers', async () => {
  await withServer(async (api) => {
    const response = await api.raw('/guess', {
      method: 'OPTIONS',
      headers: {
        Origin: 'http://localhost:5173',
        'Access-Control-Request-Method': 'POST',
        'Access-Control-Request-Headers': 'Content-Type'
      }
    });

    assert.equal(response.status, 204);
    assert.equal(response.headers.get('access-control-allow-origin'), '*');
    assert.equal(response.headers.get('access-control-allow-methods'), '*');
    assert.equal(response.headers.get('access-control-allow-headers'), 'Content-Type');
    assert.equal(response.headers.get('access-control-max-age'), '1728000');
  });
});

test('GET /health answers ok', async () => {
  await withServer(async (api) => {
    const response = await api.raw('/health', { method: 'GET' });

    assert.equal(response.status, 200);
    assert.deepEqual(await response.json(), { status: 'ok' });
  });
});
