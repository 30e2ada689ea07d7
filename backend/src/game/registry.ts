import { randomInt } from 'node:crypto';
import type { Logger } from 'pino';
import { NotFoundError, TooFewWordsError } from '../errors.js';
import { normalizeWords } from '../wordlists.js';
import { DEFAULT_COLOR_DISTRIBUTION } from './board.js';
import { Game } from './game.js';
import { Mutex } from './mutex.js';
import type { CreateGameInput, GameSnapshot, GameStats, KeyColor, Seed } from './types.js';

const SEED_LIMIT = 2 ** 48;
const SUGGESTION_ATTEMPTS = 100;

export interface GameRegistryOptions {
  /** Default word list for new games and the source of suggested session ids. */
  vocabulary: readonly string[];
  logger: Logger;
  playerIdleMs: number;
  gameRetentionMs: number;
  distribution?: readonly KeyColor[];
  now?: () => number;
  nextSeed?: () => Seed;
  randomIndex?: (size: number) => number;
}

export interface SweepResult {
  checked: number;
  removed: string[];
}

/**
 * Directory of live games keyed by session id.
 *
 * `lock` guards the map only. Lock order is always registry first, then a
 * game, so the two never deadlock.
 */
export class GameRegistry {
  private readonly games = new Map<string, Game>();
  private readonly lock = new Mutex();
  private readonly vocabulary: readonly string[];
  private readonly distribution: readonly KeyColor[];
  private readonly logger: Logger;
  private readonly playerIdleMs: number;
  private readonly gameRetentionMs: number;
  private readonly now: () => number;
  private readonly nextSeed: () => Seed;
  private readonly randomIndex: (size: number) => number;
  private sweepTimer: NodeJS.Timeout | undefined;

  constructor(options: GameRegistryOptions) {
    this.vocabulary = options.vocabulary;
    this.distribution = options.distribution ?? DEFAULT_COLOR_DISTRIBUTION;
    this.logger = options.logger;
    this.playerIdleMs = options.playerIdleMs;
    this.gameRetentionMs = options.gameRetentionMs;
    this.now = options.now ?? Date.now;
    this.nextSeed = options.nextSeed ?? (() => String(randomInt(0, SEED_LIMIT)));
    this.randomIndex = options.randomIndex ?? ((size) => randomInt(0, size));

    if (this.vocabulary.length < this.distribution.length) {
      throw new TooFewWordsError(this.distribution.length);
    }
  }

  get(sessionId: string): Promise<Game | undefined> {
    return this.lock.runExclusive(() => this.games.get(sessionId));
  }

  async require(sessionId: string): Promise<Game> {
    const game = await this.get(sessionId);
    if (!game) {
      throw new NotFoundError(sessionId);
    }
    return game;
  }

  sessionIds(): Promise<string[]> {
    return this.lock.runExclusive(() => [...this.games.keys()]);
  }

  /**
   * Creates the session, or resets it when the caller proves it saw the live
   * generation by sending its seed as `prevSeed`. Any other request for an
   * existing session gets the live game back untouched, so a late or repeated
   * create cannot wipe a match in progress.
   */
  createOrReset(input: CreateGameInput): Promise<GameSnapshot> {
    return this.lock.runExclusive(async () => {
      const existing = this.games.get(input.sessionId);
      if (!existing) {
        return this.install(input, undefined).snapshot();
      }

      return existing.lock.runExclusive(() => {
        if (input.prevSeed === undefined || input.prevSeed !== existing.seed) {
          return existing.snapshot();
        }
        return this.install(input, existing).snapshot();
      });
    });
  }

  // Caller holds the registry lock, and the previous game's lock if there is one.
  private install(input: CreateGameInput, previous: Game | undefined): Game {
    const custom = normalizeWords(input.words ?? []);
    const words = custom.length > 0 ? custom : this.vocabulary;
    const game = Game.create(this.nextSeed(), words, this.now(), this.distribution);

    if (previous) {
      game.adoptPlayers(previous);
      previous.notifyAll();
    }

    this.games.set(input.sessionId, game);
    this.logger.info(
      { sessionId: input.sessionId, seed: game.seed, reset: previous !== undefined, words: words.length },
      previous ? 'game reset' : 'game created'
    );
    return game;
  }

  /** Two random vocabulary words joined with a dash, not used by any live session. */
  suggestSessionId(): Promise<string> {
    return this.lock.runExclusive(() => {
      for (let attempt = 0; attempt < SUGGESTION_ATTEMPTS; attempt += 1) {
        const id = `${this.randomWord()}-${this.randomWord()}`;
        if (!this.games.has(id)) {
          return id;
        }
      }
      throw new Error('Unable to suggest an unused session id');
    });
  }

  private randomWord(): string {
    const word = this.vocabulary[this.randomIndex(this.vocabulary.length)] ?? '';
    return word.toLowerCase().replace(/\s+/g, '-');
  }

  stats(): Promise<GameStats> {
    return this.lock.runExclusive(async () => {
      let activeGames = 0;
      let activePlayers = 0;
      for (const game of this.games.values()) {
        const players = await game.lock.runExclusive(() => game.playerCount);
        activePlayers += players;
        if (players > 0) {
          activeGames += 1;
        }
      }
      return { activeGames, activePlayers };
    });
  }

  /**
   * Prunes idle players everywhere, then drops sessions that have nobody left
   * and are older than the retention window. Both conditions must hold.
   */
  async sweep(): Promise<SweepResult> {
    const now = this.now();
    const entries = await this.lock.runExclusive(() => [...this.games.entries()]);
    const removed: string[] = [];

    for (const [sessionId, game] of entries) {
      const remaining = await game.lock.runExclusive(() => game.pruneOldPlayers(now, this.playerIdleMs));
      if (remaining > 0 || now - game.createdAt <= this.gameRetentionMs) {
        continue;
      }

      const deleted = await this.lock.runExclusive(async () => {
        if (this.games.get(sessionId) !== game) {
          return false;
        }
        const idle = await game.lock.runExclusive(() => game.playerCount === 0);
        return idle && this.games.delete(sessionId);
      });
      if (deleted) {
        removed.push(sessionId);
      }
    }

    this.logger.info({ checked: entries.length, removed: removed.length }, 'idle session sweep finished');
    return { checked: entries.length, removed };
  }

  startSweeping(intervalMs: number): void {
    this.stopSweeping();
    this.sweepTimer = setInterval(() => {
      this.sweep().catch((error: unknown) => {
        this.logger.error({ err: error }, 'idle session sweep failed');
      });
    }, intervalMs);
    this.sweepTimer.unref();
  }

  stopSweeping(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = undefined;
    }
  }

  /** Stops the sweep and wakes every parked long-poll. */
  async close(): Promise<void> {
    this.stopSweeping();
    await this.lock.runExclusive(async () => {
      for (const game of this.games.values()) {
        await game.lock.runExclusive(() => game.notifyAll());
      }
    });
  }
}
