import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import compression from 'compression';
import rateLimit from 'express-rate-limit';

import type { AppConfig } from '@/config/app.config';
import { attachCorrelationId } from '@/middleware/correlation';
import { errorHandler, notFoundHandler } from '@/middleware/errorHandler';
import { createChatRouter } from '@/routes/chat';
import type { Runtime } from '@/runtime';
import { componentLogger } from '@/services/logger';
import { requestTimeout } from '@/stability/errorHandlers';

const log = componentLogger('http');

export function createApp(config: AppConfig, runtime: Runtime): express.Express {
  const app = express();

  // Security middleware
  app.use(helmet());

  app.use(
    cors({
      origin: config.corsOrigins,
      credentials: true,
    }),
  );

  if (config.nodeEnv === 'production') {
    app.use(
      rateLimit({
        windowMs: 60 * 1000, // 1 minute window
        max: 100, // limit to 100 requests per minute per IP
        standardHeaders: true,
        legacyHeaders: false,
      }),
    );
    log.info('rate limiting enabled');
  }

  app.use(attachCorrelationId);

  // chat waits for the whole turn
  app.use(requestTimeout(15000, { '/api/chat': config.chatTimeoutMs + 5000 }));

  app.use(express.json({ limit: '1mb' }));

  // SSE responses must not be buffered
  app.use(
    compression({
      filter: (req, res) =>
        !String(res.getHeader('Content-Type') ?? '').startsWith('text/event-stream') && compression.filter(req, res),
    }),
  );

  if (config.nodeEnv === 'development') {
    app.use(morgan('dev'));
  } else if (config.nodeEnv === 'production') {
    app.use(morgan('combined'));
  }

  app.get('/health', (_req, res) => {
    res.status(200).json({
      status: 'OK',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      sessions: runtime.store.size(),
    });
  });

  app.use('/api/chat', createChatRouter(runtime.coordinator, { chatTimeoutMs: config.chatTimeoutMs }));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
