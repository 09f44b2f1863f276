import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import cookieParser from 'cookie-parser';

import env from './config/env';
import type { Services } from './services';
import type { RefreshStore } from './auth/refreshStore';
import { errorHandler } from './middleware/error';
import { notFound } from './middleware/notFound';
import { requestLogger } from './middleware/requestLogger';
import { attachSession } from './middleware/session';
import healthRoutes from './routes/health';
import authRoutes from './routes/auth';
import ideaRoutes from './routes/ideas';
import verificationRoutes from './routes/verifications';
import adminRoutes from './routes/admin';
import userRoutes from './routes/users';

export interface AppDeps {
  services: Services;
  refreshStore: RefreshStore;
}

/** Build the plain Express application (no http.Server). */
export function buildExpressApp({ services, refreshStore }: AppDeps) {
  const app = express();

  app.use(helmet());
  app.use(cookieParser());
  app.use(cors({ origin: true, credentials: true }));
  // attachments arrive base64-encoded inside JSON
  app.use(express.json({ limit: env.JSON_BODY_LIMIT }));
  app.use(requestLogger);
  app.use(attachSession);

  // REST routes
  app.use('/api', healthRoutes);
  app.use('/api/auth', authRoutes(services, refreshStore));
  app.use('/api/ideas', ideaRoutes(services));
  app.use('/api/verifications', verificationRoutes(services));
  app.use('/api/admin', adminRoutes(services));
  app.use('/api/users', userRoutes(services));

  app.use(notFound);
  app.use(errorHandler);

  return app;
}
