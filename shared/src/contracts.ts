import { z } from 'zod';

export const Routes = {
  index: '/index',
  newGame: '/new-game',
  guess: '/guess',
  endTurn: '/end-turn',
  chat: '/chat',
  events: '/events',
  ping: '/ping',
  stats: '/stats',
  health: '/health'
} as const;

export const EventTypeSchema = z.enum(['guess', 'end_turn', 'chat']);

export const ErrorCodeSchema = z.enum([
  'malformed_body',
  'invalid_index',
  'not_found',
  'bad_seed',
  'too_few_words',
  'internal_error'
]);

const RequiredString = z.string().min(1);

export const TeamSchema = z.number().int().positive();
export const SeedSchema = z.string();

export const NewGameRequestSchema = z.object({
  session_id: RequiredString,
  words: z.array(z.string()).optional(),
  prev_seed: SeedSchema.optional()
});

const PlayerActionSchema = z.object({
  session_id: RequiredString,
  seed: RequiredString,
  player_id: RequiredString,
  name: z.string().default(''),
  team: TeamSchema
});

export const GuessRequestSchema = PlayerActionSchema.extend({
  index: z.number().int()
});

export const EndTurnRequestSchema = PlayerActionSchema;

export const ChatRequestSchema = PlayerActionSchema.extend({
  message: RequiredString
});

export const PingRequestSchema = z.object({
  session_id: RequiredString,
  seed: SeedSchema.default(''),
  player_id: RequiredString,
  name: z.string().default(''),
  team: TeamSchema.optional()
});

export const EventsRequestSchema = PingRequestSchema.extend({
  last_event: z.number().int().nonnegative().default(0)
});

export const TileSchema = z.object({
  word: z.string(),
  color: z.string(),
  revealed: z.boolean()
});

export const PlayerSchema = z.object({
  id: z.string(),
  name: z.string(),
  team: TeamSchema.nullable(),
  last_seen: z.number()
});

const EventBaseSchema = z.object({
  number: z.number().int().positive(),
  team: TeamSchema,
  player_id: z.string(),
  name: z.string()
});

export const GameEventSchema = z.discriminatedUnion('type', [
  EventBaseSchema.extend({ type: z.literal('guess'), index: z.number().int().nonnegative() }),
  EventBaseSchema.extend({ type: z.literal('end_turn') }),
  EventBaseSchema.extend({ type: z.literal('chat'), message: z.string() })
]);

export const GameSnapshotSchema = z.object({
  seed: SeedSchema,
  created_at: z.number(),
  tiles: z.array(TileSchema),
  players: z.array(PlayerSchema)
});

export const GameUpdateSchema = z.object({
  seed: SeedSchema,
  events: z.array(GameEventSchema)
});

export const StatusOkSchema = z.object({
  status: z.literal('ok')
});

export const StatsSchema = z.object({
  active_games: z.number().int().nonnegative(),
  active_players: z.number().int().nonnegative()
});

export const IndexResponseSchema = z.object({
  autogenerated_id: z.string()
});

export const GameErrorSchema = z.object({
  code: ErrorCodeSchema,
  message: z.string(),
  seed: SeedSchema.optional()
});

export type EventType = z.infer<typeof EventTypeSchema>;
export type ErrorCode = z.infer<typeof ErrorCodeSchema>;
export type NewGameRequest = z.infer<typeof NewGameRequestSchema>;
export type GuessRequest = z.infer<typeof GuessRequestSchema>;
export type EndTurnRequest = z.infer<typeof EndTurnRequestSchema>;
export type ChatRequest = z.infer<typeof ChatRequestSchema>;
export type PingRequest = z.infer<typeof PingRequestSchema>;
export type EventsRequest = z.infer<typeof EventsRequestSchema>;
export type TilePayload = z.infer<typeof TileSchema>;
export type PlayerPayload = z.infer<typeof PlayerSchema>;
export type GameEventPayload = z.infer<typeof GameEventSchema>;
export type GameSnapshotPayload = z.infer<typeof GameSnapshotSchema>;
export type GameUpdatePayload = z.infer<typeof GameUpdateSchema>;
export type StatusOkPayload = z.infer<typeof StatusOkSchema>;
export type StatsPayload = z.infer<typeof StatsSchema>;
export type IndexResponsePayload = z.infer<typeof IndexResponseSchema>;
export type GameErrorPayload = z.infer<typeof GameErrorSchema>;
