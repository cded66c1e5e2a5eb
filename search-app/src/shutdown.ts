import type { FastifyInstance } from 'fastify';

interface Closable {
  close(): Promise<void>;
}

/**
 * Stops the server, then the resources it used. Never rejects: a failure is
 * logged and reported as `false`.
 */
export async function shutdown(app: FastifyInstance, resources: readonly (Closable | undefined)[] = []): Promise<boolean> {
  try {
    await app.close();
    for (const resource of resources) await resource?.close();
    return true;
  } catch (err) {
    app.log.error(err, 'Shutdown failed');
    return false;
  }
}
