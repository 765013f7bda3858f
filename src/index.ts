// src/index.ts
// Process entry: open the database, wire the context, start the job queue
// and the HTTP server.

import { config } from './config.js';
import { createAppContext } from './context.js';
import { openDatabase } from './db/index.js';
import { createLogger } from './observability/index.js';
import { createApp } from './server.js';

const startupLogger = createLogger('startup');

async function main() {
  const db = await openDatabase(config.database.path);
  const ctx = createAppContext(db);
  const app = await createApp(ctx);

  app.log.info(
    {
      cwd: process.cwd(),
      dbFile: config.database.path,
      transcripts: config.storage.transcripts,
      node: process.version,
      pipeline: config.pipeline,
    },
    'Lorekeeper API boot'
  );

  await ctx.queue.recoverStale();
  ctx.queue.start(config.jobs.pollIntervalMs);
  app.log.info('Job queue started');

  const shutdown = async (signal: string) => {
    app.log.info({ signal }, 'Shutting down');
    try {
      await app.close();
      await ctx.queue.stop();
      await db.close();
      process.exit(0);
    } catch (err) {
      app.log.error({ err }, 'Shutdown failed');
      process.exit(1);
    }
  };
  process.once('SIGINT', (signal) => void shutdown(signal));
  process.once('SIGTERM', (signal) => void shutdown(signal));

  await app.listen({ port: config.server.port, host: config.server.host });
  app.log.info({ port: config.server.port }, 'API listening');
}

main().catch((err) => {
  startupLogger.fatal({ err }, 'Server startup failed');
  process.exit(1);
});
