import express from 'express';
import { UserService } from '../../application/users/userService.js';
import { UserStore } from '../../application/userStore.js';
import { RateLimitConfig } from '../../config.js';
import { createUserRoutes } from './routes/users.js';
import { createSwaggerRoutes } from './routes/swagger.js';
import { errorHandler } from './middleware/errorHandler.js';
import { createApiRateLimiter } from './middleware/rateLimit.js';
import { sendError } from './respond.js';

export interface AppDependencies {
  store: UserStore;
  rateLimit: RateLimitConfig;
  healthTimeoutMs?: number;
}

/**
 * Helper to add timeout to a promise.
 */
function withTimeout<T>(promise: Promise<T>, ms: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<T>((_, reject) => {
    timer = setTimeout(() => reject(new Error('timeout')), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

export function createApp(deps: AppDependencies): express.Application {
  const userService = new UserService(deps.store);
  const healthTimeoutMs = deps.healthTimeoutMs ?? 2000;

  const app = express();
  app.use(express.json());
  app.use(createApiRateLimiter(deps.rateLimit));

  // Health check (outside the envelope contract of /users)
  app.get('/healthz', (_req, res) => {
    withTimeout(deps.store.ping(), healthTimeoutMs)
      .then(() => {
        res.status(200).json({ status: 'ok' });
      })
      .catch((error: unknown) => {
        console.error('Health check failed:', error);
        sendError(res, 'INTERNAL_SERVER_ERROR', 'Store unavailable');
      });
  });

  app.use(createSwaggerRoutes());
  app.use('/users', createUserRoutes(userService, deps.rateLimit));

  app.use((_req, res) => {
    sendError(res, 'NOT_FOUND', 'Route not found');
  });

  // Error handler (must be last)
  app.use(errorHandler);

  return app;
}
