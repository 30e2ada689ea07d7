import type { Logger } from 'pino';
import { SeedMismatchError } from '../errors.js';
import type { Game } from './game.js';
import type { GameRegistry } from './registry.js';
import { waitForSignal } from './signal.js';
import type {
  ChatInput,
  CreateGameInput,
  EndTurnInput,
  GameSnapshot,
  GameStats,
  GameUpdate,
  GuessInput,
  PingInput,
  PollInput,
  Seed
} from './types.js';

export interface GameServiceOptions {
  pollTimeoutMs: number;
  logger: Logger;
  now?: () => number;
}

const requireSeed = (game: Game, seed: Seed) => {
  if (seed !== game.seed) {
    throw new SeedMismatchError(game.seed);
  }
};

/**
 * Request-level operations. Each resolves the game from the registry, then does
 * all of its reading and writing inside one hold of that game's lock.
 */
export class GameService {
  private readonly pollTimeoutMs: number;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(
    private readonly registry: GameRegistry,
    options: GameServiceOptions
  ) {
    this.pollTimeoutMs = options.pollTimeoutMs;
    this.logger = options.logger;
    this.now = options.now ?? Date.now;
  }

  createGame(input: CreateGameInput): Promise<GameSnapshot> {
    return this.registry.createOrReset(input);
  }

  suggestSessionId(): Promise<string> {
    return this.registry.suggestSessionId();
  }

  stats(): Promise<GameStats> {
    return this.registry.stats();
  }

  async guess(input: GuessInput): Promise<void> {
    const game = await this.registry.require(input.sessionId);
    await game.lock.runExclusive(() => {
      requireSeed(game, input.seed);
      game.guess(input, input.index, this.now());
    });
  }

  async endTurn(input: EndTurnInput): Promise<void> {
    const game = await this.registry.require(input.sessionId);
    await game.lock.runExclusive(() => {
      requireSeed(game, input.seed);
      game.endTurn(input, this.now());
    });
  }

  async chat(input: ChatInput): Promise<void> {
    const game = await this.registry.require(input.sessionId);
    await game.lock.runExclusive(() => {
      requireSeed(game, input.seed);
      game.chat(input, input.message, this.now());
    });
  }

  /** Presence only: records the player as seen, appends nothing. */
  async ping(input: PingInput): Promise<void> {
    const game = await this.registry.require(input.sessionId);
    await game.lock.runExclusive(() => {
      requireSeed(game, input.seed);
      game.markSeen(input.playerId, input.name, input.team, this.now());
    });
  }

  /**
   * Long-poll for events numbered above `lastEvent`.
   *
   * Answers at once when there is something to send or the caller's seed is
   * stale. Otherwise the signal is captured in the same lock hold that found
   * nothing, then awaited outside the lock until it fires, the timeout passes,
   * or `abortSignal` aborts. A timeout or abort answers with the empty list and
   * is not an error. After a wake-up the game is looked up again, since a reset
   * may have replaced it.
   */
  async pollEvents(input: PollInput, abortSignal?: AbortSignal): Promise<GameUpdate> {
    const game = await this.registry.require(input.sessionId);
    const first = await game.lock.runExclusive(() => {
      if (input.seed !== game.seed) {
        return { update: { seed: game.seed, events: game.eventsSince(input.lastEvent).events }, signal: undefined };
      }

      game.markSeen(input.playerId, input.name, input.team, this.now());
      const { events, signal } = game.eventsSince(input.lastEvent);
      return { update: { seed: game.seed, events }, signal };
    });

    if (!first.signal || first.update.events.length > 0) {
      return first.update;
    }

    const reason = await waitForSignal(first.signal, { timeoutMs: this.pollTimeoutMs, abortSignal });
    if (reason !== 'signaled') {
      this.logger.debug({ sessionId: input.sessionId, playerId: input.playerId, reason }, 'long-poll ended empty');
      return first.update;
    }

    const current = await this.registry.require(input.sessionId);
    return current.lock.runExclusive(() => ({
      seed: current.seed,
      events: current.eventsSince(input.lastEvent).events
    }));
  }
}
