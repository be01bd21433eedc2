import express from 'express';
import type { RequestHandler } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import config from './config';

import authRoutes from './api/auth/auth.routes';
import userRoutes from './api/user/user.routes';
import apiKeyRoutes from './api/apiKey/apiKey.routes';
import voiceRoutes from './api/voice/voice.routes';
import ttsRoutes from './api/tts/tts.routes';
import healthRoutes from './api/health/health.routes';
import { buildOpenApiDocument } from './api/docs/openapi';
import { createDocsRouter } from './api/docs/docs.routes';
import { errorHandler } from './utils/errorHandler';

const app = express();
const prefix = config.apiPrefix;

app.set('trust proxy', config.trustProxy);

app.use(
  helmet({
    // Swagger UI and ReDoc pull inline scripts and CDN bundles.
    contentSecurityPolicy: false,
  })
);

// In-memory limits; a multi-instance deployment needs a shared store.
const apiLimiter = config.enableRateLimit
  ? rateLimit({
      windowMs: 5 * 60 * 1000,
      limit: 300,
      standardHeaders: true,
      legacyHeaders: false,
    })
  : null;

const authLimiter = config.enableRateLimit
  ? rateLimit({
      windowMs: 15 * 60 * 1000,
      limit: 20,
      standardHeaders: true,
      legacyHeaders: false,
    })
  : null;

const corsOrigin: cors.CorsOptions['origin'] = (origin, cb) => {
  // Non-browser clients (curl, SDKs) may omit Origin.
  if (!origin) return cb(null, true);

  if (config.cors.allowAnyOrigin) return cb(null, true);
  if (config.cors.allowedOrigins.includes(origin)) return cb(null, true);

  return cb(null, false);
};

app.use(
  cors({
    origin: corsOrigin,
    methods: ['GET', 'HEAD', 'POST', 'PATCH', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Authorization', 'Content-Type', 'X-API-Key'],
    exposedHeaders: ['Content-Length', 'Content-Disposition'],
    maxAge: 86400,
  })
);
app.use(express.json({ limit: '1mb' }));
// OAuth2 password form on the token endpoint.
app.use(express.urlencoded({ extended: false }));

// express-rate-limit's handler type doesn't line up with Express 5's `app.use` overloads.
if (apiLimiter) app.use(prefix || '/', apiLimiter as unknown as RequestHandler);
if (authLimiter) app.use(`${prefix}/auth`, authLimiter as unknown as RequestHandler);

const openApiDocument = buildOpenApiDocument(config);
const openApiUrl = `${prefix}/openapi.json`;

app.get(openApiUrl, (req, res) => {
  res.json(openApiDocument);
});
app.use(createDocsRouter(openApiDocument, openApiUrl));

app.use(`${prefix}/auth`, authRoutes);
app.use(`${prefix}/users`, userRoutes);
app.use(`${prefix}/api-keys`, apiKeyRoutes);
app.use(`${prefix}/voices`, voiceRoutes);
app.use(`${prefix}/tts`, ttsRoutes);
app.use(`${prefix}/health`, healthRoutes);

app.get('/', (req, res) => {
  res.json({ message: `${config.projectName} is running`, docs: '/docs' });
});

app.use((req, res) => {
  res.status(404).json({ message: 'Not Found' });
});

app.use(errorHandler);

export default app;
