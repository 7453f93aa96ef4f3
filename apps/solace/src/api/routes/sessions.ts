import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { SessionStats, TurnResult } from '../../orchestrator/types';
import { Turn } from '../../conversation/types';
import { SessionRegistry } from '../../sessions/registry';
import { CONFIG } from '../../utils/config';
import { createLogger } from '../../utils/logger';
import { ApiResponse, apiResponse } from '../middleware/response';

const logger = createLogger('SessionRoutes');

export const turnRequestSchema = z.object({
  text: z
    .string({ required_error: 'text is required', invalid_type_error: 'text must be a string' })
    .min(1, 'text cannot be empty')
    .max(CONFIG.api.maxMessageLength, `text must be at most ${CONFIG.api.maxMessageLength} characters`)
    .refine((text) => text.trim().length > 0, 'text cannot be blank'),
});

interface SessionCreatedResponse {
  sessionId: string;
  createdAt: string;
}

interface TurnResponse extends TurnResult {
  sessionId: string;
}

interface SessionDetailResponse {
  sessionId: string;
  createdAt: string;
  history: readonly Turn[];
  stats: SessionStats;
}

interface SessionResetResponse {
  sessionId: string;
  stats: SessionStats;
}

/**
 * Session routes, mounted at /api/v1/sessions
 */
export function createSessionsRouter(registry: SessionRegistry): Router {
  const router = Router();

  /**
   * POST /api/v1/sessions
   * Open a new, empty conversation
   */
  router.post('/', (req: Request, res: Response<ApiResponse<SessionCreatedResponse>>) => {
    const session = registry.create();
    res.status(201).json(apiResponse({
      sessionId: session.id,
      createdAt: session.createdAt.toISOString(),
    }));
  });

  /**
   * POST /api/v1/sessions/:sessionId/turns
   * Send one user message and receive the detected emotion and a reply
   *
   * Request body: { text: string }
   */
  router.post(
    '/:sessionId/turns',
    async (req: Request, res: Response<ApiResponse<TurnResponse>>, next: NextFunction) => {
      try {
        const session = registry.get(req.params.sessionId);
        const { text } = turnRequestSchema.parse(req.body);

        // Abandon the turn if the client goes away before the reply is sent
        const controller = new AbortController();
        res.on('close', () => {
          if (!res.writableEnded) {
            controller.abort();
          }
        });

        const result = await session.processTurn(text, { signal: controller.signal });

        logger.debug('Turn served', {
          sessionId: session.id,
          turnId: result.turnId,
          sourceTier: result.suggestion.sourceTier,
        });

        res.json(apiResponse({ sessionId: session.id, ...result }));
      } catch (error) {
        next(error);
      }
    }
  );

  /**
   * GET /api/v1/sessions/:sessionId
   * Conversation history and statistics
   */
  router.get(
    '/:sessionId',
    (req: Request, res: Response<ApiResponse<SessionDetailResponse>>, next: NextFunction) => {
      try {
        const session = registry.get(req.params.sessionId);
        const snapshot = session.snapshot();
        res.json(apiResponse({
          sessionId: session.id,
          createdAt: session.createdAt.toISOString(),
          history: snapshot.history,
          stats: snapshot.stats,
        }));
      } catch (error) {
        next(error);
      }
    }
  );

  /**
   * POST /api/v1/sessions/:sessionId/reset
   * Clear history and statistics, keeping the session id
   */
  router.post(
    '/:sessionId/reset',
    async (req: Request, res: Response<ApiResponse<SessionResetResponse>>, next: NextFunction) => {
      try {
        const session = registry.get(req.params.sessionId);
        await session.resetSession();
        res.json(apiResponse({ sessionId: session.id, stats: session.getStats() }));
      } catch (error) {
        next(error);
      }
    }
  );

  /**
   * DELETE /api/v1/sessions/:sessionId
   */
  router.delete('/:sessionId', (req: Request, res: Response, next: NextFunction) => {
    try {
      const session = registry.get(req.params.sessionId);
      registry.delete(session.id);
      res.status(204).send();
    } catch (error) {
      next(error);
    }
  });

  return router;
}
