export { DEFAULT_COLOR_DISTRIBUTION, createRandom, generateBoard, hashSeed } from './board.js';
export { Game } from './game.js';
export { Mutex } from './mutex.js';
export { GameRegistry } from './registry.js';
export type { GameRegistryOptions, SweepResult } from './registry.js';
export { toErrorPayload, toEventPayload, toSnapshotPayload, toStatsPayload, toUpdatePayload } from './serializers.js';
export { GameService } from './service.js';
export type { GameServiceOptions } from './service.js';
export { Signal, waitForSignal } from './signal.js';
export type { WaitOptions, WakeReason } from './signal.js';
export type {
  ActorInput,
  Agent,
  ChatInput,
  CreateGameInput,
  EndTurnInput,
  EventType,
  GameEvent,
  GameEventInput,
  GameSnapshot,
  GameStats,
  GameTimings,
  GameUpdate,
  GuessInput,
  KeyColor,
  PingInput,
  Player,
  PollInput,
  Seed,
  Team,
  Tile
} from './types.js';
