import Fastify from 'fastify';
import type { FormsClient, FormTemplate } from '../../../src/index.js';
import { registerErrorHandler } from './middleware/error-handler.js';
import { registerDocumentRoutes } from './routes/documents.js';

export interface ServerOptions {
  template: FormTemplate;
  ref: string;
  logger?: boolean;
}

export function buildServer(client: FormsClient, options: ServerOptions) {
  const app = Fastify({ logger: options.logger ?? true });

  registerErrorHandler(app);

  const prefix = '/api/v1';

  app.register(async (instance) => {
    await registerDocumentRoutes(instance, client, options.template, options.ref);
  }, { prefix });

  return app;
}
