import { MalformedInputError } from '../errors.js';
import { DEFAULT_COLOR_DISTRIBUTION, generateBoard } from './board.js';
import { Mutex } from './mutex.js';
import { Signal } from './signal.js';
import type {
  ActorInput,
  GameEvent,
  GameEventInput,
  GameSnapshot,
  KeyColor,
  Player,
  Seed,
  Team,
  Tile
} from './types.js';

const actorOf = ({ playerId, name, team }: ActorInput): ActorInput => ({ playerId, name, team });

/**
 * State of one session generation.
 *
 * Every method below assumes the caller holds `lock`. The registry and the
 * service are the only callers and always go through `lock.runExclusive`.
 */
export class Game {
  readonly lock = new Mutex();
  private readonly players = new Map<string, Player>();
  private readonly events: GameEvent[] = [];
  private signal = new Signal();

  constructor(
    readonly seed: Seed,
    readonly tiles: Tile[],
    readonly createdAt: number
  ) {}

  static create(
    seed: Seed,
    words: readonly string[],
    createdAt: number,
    distribution: readonly KeyColor[] = DEFAULT_COLOR_DISTRIBUTION
  ): Game {
    return new Game(seed, generateBoard(seed, words, distribution), createdAt);
  }

  get playerCount(): number {
    return this.players.size;
  }

  get lastEventNumber(): number {
    return this.events.length;
  }

  markSeen(playerId: string, name: string, team: Team | null, now: number): void {
    this.players.set(playerId, { id: playerId, name, team, lastSeen: now });
  }

  guess(actor: ActorInput, index: number, now: number): GameEvent {
    const tile = Number.isInteger(index) ? this.tiles[index] : undefined;
    if (!tile) {
      throw new MalformedInputError(`Tile index ${index} is out of bounds.`, 'invalid_index');
    }

    this.markSeen(actor.playerId, actor.name, actor.team, now);
    // Repeat guesses still produce an event: clients render from the log.
    tile.revealed = true;
    return this.addEvent({ type: 'guess', ...actorOf(actor), index });
  }

  endTurn(actor: ActorInput, now: number): GameEvent {
    this.markSeen(actor.playerId, actor.name, actor.team, now);
    return this.addEvent({ type: 'end_turn', ...actorOf(actor) });
  }

  chat(actor: ActorInput, message: string, now: number): GameEvent {
    if (!message) {
      throw new MalformedInputError('A chat message cannot be empty.');
    }

    this.markSeen(actor.playerId, actor.name, actor.team, now);
    return this.addEvent({ type: 'chat', ...actorOf(actor), message });
  }

  addEvent(input: GameEventInput): GameEvent {
    const event: GameEvent = { ...input, number: this.events.length + 1 };
    this.events.push(event);
    this.notifyAll();
    return event;
  }

  /**
   * Events numbered above `lastEvent` together with the signal that the next
   * append will fire. Callers that find no events must capture the signal
   * before releasing the lock.
   */
  eventsSince(lastEvent: number): { events: GameEvent[]; signal: Signal } {
    return {
      events: this.events.slice(Math.max(0, lastEvent)),
      signal: this.signal
    };
  }

  /** Wakes every current waiter and installs a fresh signal for the next ones. */
  notifyAll(): void {
    const previous = this.signal;
    this.signal = new Signal();
    previous.fire();
  }

  pruneOldPlayers(now: number, idleMs: number): number {
    for (const [id, player] of this.players) {
      if (now - player.lastSeen > idleMs) {
        this.players.delete(id);
      }
    }
    return this.players.size;
  }

  /** Copies player identities from a previous generation, dropping their teams. */
  adoptPlayers(previous: Game): void {
    for (const player of previous.players.values()) {
      this.players.set(player.id, { ...player, team: null });
    }
  }

  snapshot(): GameSnapshot {
    return {
      seed: this.seed,
      createdAt: this.createdAt,
      tiles: this.tiles.map((tile) => ({ ...tile })),
      players: [...this.players.values()].map((player) => ({ ...player }))
    };
  }
}
