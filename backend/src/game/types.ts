export type Seed = string;

/** Positive team number; 0 and negatives are rejected before reaching the core. */
export type Team = number;

export type Agent = 'green' | 'neutral' | 'assassin';

/** Two-sided key colour: team 1 reads the first side, team 2 the second. */
export type KeyColor = `${Agent}/${Agent}`;

export interface Tile<C extends string = KeyColor> {
  word: string;
  readonly color: C;
  revealed: boolean;
}

export interface Player {
  id: string;
  name: string;
  team: Team | null;
  lastSeen: number;
}

export type EventType = 'guess' | 'end_turn' | 'chat';

export interface ActorInput {
  playerId: string;
  name: string;
  team: Team;
}

export type GameEventInput =
  | (ActorInput & { type: 'guess'; index: number })
  | (ActorInput & { type: 'end_turn' })
  | (ActorInput & { type: 'chat'; message: string });

export type GameEvent = GameEventInput & { readonly number: number };

export interface GameSnapshot {
  seed: Seed;
  createdAt: number;
  tiles: Tile[];
  players: Player[];
}

export interface GameUpdate {
  seed: Seed;
  events: GameEvent[];
}

export interface CreateGameInput {
  sessionId: string;
  words?: string[];
  prevSeed?: Seed;
}

export interface GuessInput extends ActorInput {
  sessionId: string;
  seed: Seed;
  index: number;
}

export interface EndTurnInput extends ActorInput {
  sessionId: string;
  seed: Seed;
}

export interface ChatInput extends ActorInput {
  sessionId: string;
  seed: Seed;
  message: string;
}

export interface PingInput {
  sessionId: string;
  seed: Seed;
  playerId: string;
  name: string;
  team: Team | null;
}

export interface PollInput extends PingInput {
  lastEvent: number;
}

export interface GameStats {
  activeGames: number;
  activePlayers: number;
}

export interface GameTimings {
  pollTimeoutMs: number;
  playerIdleMs: number;
  gameRetentionMs: number;
}
