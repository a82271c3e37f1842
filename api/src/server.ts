import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import type { Server } from 'http';
import { readSettings, type AppSettings } from './config/env';
import { loadConfiguration, type BootstrapDeps } from './config/bootstrap';
import type { Configuration } from './config/configuration';
import { joinKey } from './config/keys';
import { errorHandler } from './middleware/error';
import { notFound } from './utils/http';
import { errorMessage } from './utils/errors';
import { probeConnection, type ConnectionProbe } from './services/connectionProbe';
import userRouter from './routes/user';
import { setupOpenApi } from './docs/openapi';

export interface AppDeps {
  configuration: Configuration;
  probe?: ConnectionProbe;
  docs?: boolean;
}

export function connectionStringKey(configuration: Configuration) {
  return joinKey(['Secrets', 'ConnectionString'], configuration.style);
}

/** Builds the HTTP app from an already loaded configuration; reads no globals. */
export function createApp({ configuration, probe = probeConnection, docs = true }: AppDeps) {
  const connectionString = configuration.getRequired(connectionStringKey(configuration));

  const app = express();
  app.use(helmet());
  app.use(cors());
  app.use(express.json({ limit: '1mb' }));

  /**
   * @openapi
   * /healthz:
   *   get:
   *     summary: Liveness
   *     tags: [Health]
   *     responses:
   *       200:
   *         description: OK
   */
  app.get('/healthz', (_req, res) => res.json({ status: 'ok' }));
  // Alias for convenience
  app.get('/api/health', (_req, res) => res.json({ status: 'ok' }));

  app.use('/api/User', userRouter({ connectionString, probe }));

  if (docs) {
    try {
      setupOpenApi(app);
    } catch (e) {
      console.warn('[startup] OpenAPI setup failed:', errorMessage(e));
    }
  }

  app.use((_req, res) => notFound(res));
  app.use(errorHandler);
  return app;
}

export interface StartOptions extends BootstrapDeps {
  settings?: AppSettings;
  probe?: ConnectionProbe;
}

/**
 * Loads configuration (vault included) and only then starts listening.
 * Rejects without opening a listener when loading fails.
 */
export async function start(options: StartOptions = {}): Promise<Server> {
  const settings = options.settings ?? readSettings(options.env ?? process.env);
  const { configuration, credentialKind } = await loadConfiguration(settings, options);
  const app = createApp({ configuration, probe: options.probe });
  return new Promise<Server>((resolve, reject) => {
    const server = app.listen(settings.port, () => {
      console.log(
        `API listening on http://localhost:${settings.port} (keyStyle=${settings.keyStyle.name}, credential=${credentialKind ?? 'none'})`
      );
      resolve(server);
    });
    server.once('error', reject);
  });
}

if (require.main === module) {
  start().catch(err => {
    console.error('[startup] Failed to start server:', err instanceof Error ? `${err.name}: ${err.message}` : err);
    process.exit(1);
  });
}
