import { Hono, type Context } from 'hono';
import { logger } from 'hono/logger';
import { CryptError, ProviderNotFoundError } from '@pemc/block';
import { CryptApi, loadConfig, type CryptConfig } from '@pemc/chain';
import { createKeysRouter } from './routes/keys.js';
import { createCryptRouter } from './routes/crypt.js';
import { createDocumentsRouter } from './routes/documents.js';

export interface AppOptions {
  /** Read from the environment when omitted */
  config?: CryptConfig;
  api?: CryptApi;
  /** Request log lines, on by default */
  requestLog?: boolean;
}

export function createApp(options: AppOptions = {}) {
  const config = options.config ?? loadConfig();
  const api = options.api ?? new CryptApi({ config });
  const log = api.logger.child('http');
  const app = new Hono();

  // Middleware
  if (options.requestLog ?? true) {
    app.use('*', logger());
  }

  app.get('/health', (c) =>
    c.json({ status: 'ok', defaultCipher: api.config.defaultCipher, defaultSigner: api.config.defaultSigner }),
  );

  // Routes
  app.route('/keys', createKeysRouter(api));
  app.route('/documents', createDocumentsRouter(api));
  app.route('/', createCryptRouter(api));

  app.onError((err, c) => toErrorResponse(err, c, (fields) => log.error('request failed', fields)));

  return { app, api };
}

function toErrorResponse(err: Error, c: Context, report: (fields: Record<string, unknown>) => void) {
  if (err instanceof ProviderNotFoundError) {
    return c.json({ error: err.message, code: err.code }, 404);
  }
  if (err instanceof CryptError) {
    return c.json({ error: err.message, code: err.code, block: err.block?.name }, 422);
  }
  // unreadable JSON body
  if (err instanceof SyntaxError) {
    return c.json({ error: 'Invalid JSON body' }, 400);
  }

  report({ path: c.req.path, error: err.message });
  return c.json({ error: 'Internal error' }, 500);
}
