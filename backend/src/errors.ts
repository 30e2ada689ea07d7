import type { ErrorCode } from '@duetwords/shared';
import type { Seed } from './game/types.js';

export class GameApiError extends Error {
  constructor(
    readonly code: ErrorCode,
    message: string,
    readonly status: number
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class MalformedInputError extends GameApiError {
  constructor(message = 'Unable to parse request body.', code: 'malformed_body' | 'invalid_index' = 'malformed_body') {
    super(code, message, 400);
  }
}

export class NotFoundError extends GameApiError {
  constructor(readonly sessionId: string) {
    super('not_found', 'Game not found', 404);
  }
}

/** The caller holds a board from an older generation; `seed` is the live one. */
export class SeedMismatchError extends GameApiError {
  constructor(readonly seed: Seed) {
    super('bad_seed', 'Request intended for a different game seed.', 409);
  }
}

export class TooFewWordsError extends GameApiError {
  constructor(readonly required: number) {
    super('too_few_words', `A word list must have at least ${required} words.`, 400);
  }
}
