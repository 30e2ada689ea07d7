import {
  GameErrorSchema,
  GameEventSchema,
  GameSnapshotSchema,
  GameUpdateSchema,
  StatsSchema,
  type GameErrorPayload,
  type GameEventPayload,
  type GameSnapshotPayload,
  type GameUpdatePayload,
  type StatsPayload
} from '@duetwords/shared';
import { type GameApiError, SeedMismatchError } from '../errors.js';
import type { GameEvent, GameSnapshot, GameStats, GameUpdate } from './types.js';

const toEventBase = (event: GameEvent) => ({
  number: event.number,
  type: event.type,
  team: event.team,
  player_id: event.playerId,
  name: event.name
});

export const toEventPayload = (event: GameEvent): GameEventPayload => {
  switch (event.type) {
    case 'guess':
      return GameEventSchema.parse({ ...toEventBase(event), index: event.index });
    case 'chat':
      return GameEventSchema.parse({ ...toEventBase(event), message: event.message });
    case 'end_turn':
      return GameEventSchema.parse(toEventBase(event));
  }
};

export const toSnapshotPayload = (snapshot: GameSnapshot): GameSnapshotPayload =>
  GameSnapshotSchema.parse({
    seed: snapshot.seed,
    created_at: snapshot.createdAt,
    tiles: snapshot.tiles.map((tile) => ({
      word: tile.word,
      color: tile.color,
      revealed: tile.revealed
    })),
    players: snapshot.players.map((player) => ({
      id: player.id,
      name: player.name,
      team: player.team,
      last_seen: player.lastSeen
    }))
  });

export const toUpdatePayload = (update: GameUpdate): GameUpdatePayload =>
  GameUpdateSchema.parse({
    seed: update.seed,
    events: update.events.map(toEventPayload)
  });

export const toStatsPayload = (stats: GameStats): StatsPayload =>
  StatsSchema.parse({
    active_games: stats.activeGames,
    active_players: stats.activePlayers
  });

export const toErrorPayload = (error: GameApiError): GameErrorPayload =>
  GameErrorSchema.parse({
    code: error.code,
    message: error.message,
    ...(error instanceof SeedMismatchError ? { seed: error.seed } : {})
  });
