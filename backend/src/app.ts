import cors from 'cors';
import express, {
  type ErrorRequestHandler,
  type Express,
  type NextFunction,
  type Request,
  type Response
} from 'express';
import {
  ChatRequestSchema,
  EndTurnRequestSchema,
  EventsRequestSchema,
  GameErrorSchema,
  GuessRequestSchema,
  IndexResponseSchema,
  NewGameRequestSchema,
  PingRequestSchema,
  Routes,
  StatusOkSchema
} from '@duetwords/shared';
import type { Logger } from 'pino';
import { ZodError } from 'zod';
import { GameApiError, MalformedInputError } from './errors.js';
import {
  type GameService,
  toErrorPayload,
  toSnapshotPayload,
  toStatsPayload,
  toUpdatePayload
} from './game/index.js';

export interface AppDependencies {
  service: GameService;
  logger: Logger;
  corsOrigin: string;
}

const ok = () => StatusOkSchema.parse({ status: 'ok' });

type AsyncRoute = (req: Request, res: Response) => Promise<void>;

// express 4 does not forward rejected promises on its own.
const route =
  (handler: AsyncRoute) =>
  (req: Request, res: Response, next: NextFunction): void => {
    handler(req, res).catch(next);
  };

const isBodyParseError = (error: unknown): boolean =>
  error instanceof SyntaxError || (error instanceof Error && 'type' in error && error.type === 'entity.parse.failed');

export const createApp = ({ service, logger, corsOrigin }: AppDependencies): Express => {
  const app = express();
  app.use(
    cors({
      origin: corsOrigin,
      methods: '*',
      allowedHeaders: ['Content-Type'],
      maxAge: 1_728_000
    })
  );
  app.use(express.json());

  app.get(Routes.health, (_req, res) => {
    res.json({ status: 'ok' });
  });

  app.post(
    Routes.index,
    route(async (_req, res) => {
      const id = await service.suggestSessionId();
      res.json(IndexResponseSchema.parse({ autogenerated_id: id }));
    })
  );

  app.post(
    Routes.newGame,
    route(async (req, res) => {
      const body = NewGameRequestSchema.parse(req.body);
      const snapshot = await service.createGame({
        sessionId: body.session_id,
        words: body.words,
        prevSeed: body.prev_seed
      });
      res.json(toSnapshotPayload(snapshot));
    })
  );

  app.post(
    Routes.guess,
    route(async (req, res) => {
      const body = GuessRequestSchema.parse(req.body);
      await service.guess({
        sessionId: body.session_id,
        seed: body.seed,
        playerId: body.player_id,
        name: body.name,
        team: body.team,
        index: body.index
      });
      res.json(ok());
    })
  );

  app.post(
    Routes.endTurn,
    route(async (req, res) => {
      const body = EndTurnRequestSchema.parse(req.body);
      await service.endTurn({
        sessionId: body.session_id,
        seed: body.seed,
        playerId: body.player_id,
        name: body.name,
        team: body.team
      });
      res.json(ok());
    })
  );

  app.post(
    Routes.chat,
    route(async (req, res) => {
      const body = ChatRequestSchema.parse(req.body);
      await service.chat({
        sessionId: body.session_id,
        seed: body.seed,
        playerId: body.player_id,
        name: body.name,
        team: body.team,
        message: body.message
      });
      res.json(ok());
    })
  );

  app.post(
    Routes.ping,
    route(async (req, res) => {
      const body = PingRequestSchema.parse(req.body);
      await service.ping({
        sessionId: body.session_id,
        seed: body.seed,
        playerId: body.player_id,
        name: body.name,
        team: body.team ?? null
      });
      res.json(ok());
    })
  );

  app.post(
    Routes.events,
    route(async (req, res) => {
      const body = EventsRequestSchema.parse(req.body);
      const disconnected = new AbortController();
      res.on('close', () => disconnected.abort());

      const update = await service.pollEvents(
        {
          sessionId: body.session_id,
          seed: body.seed,
          playerId: body.player_id,
          name: body.name,
          team: body.team ?? null,
          lastEvent: body.last_event
        },
        disconnected.signal
      );
      res.json(toUpdatePayload(update));
    })
  );

  app.all(
    Routes.stats,
    route(async (_req, res) => {
      res.json(toStatsPayload(await service.stats()));
    })
  );

  const handleError: ErrorRequestHandler = (error: unknown, req, res, _next) => {
    if (error instanceof GameApiError) {
      res.status(error.status).json(toErrorPayload(error));
      return;
    }

    if (error instanceof ZodError || isBodyParseError(error)) {
      res.status(400).json(toErrorPayload(new MalformedInputError()));
      return;
    }

    logger.error({ err: error, path: req.path }, 'request failed');
    res.status(500).json(GameErrorSchema.parse({ code: 'internal_error', message: 'Internal server error' }));
  };
  app.use(handleError);

  return app;
};
