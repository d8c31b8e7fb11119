import 'dotenv/config';
import { createApp } from './app';
import { closePool } from './db';
import { createPgPlanRunStore } from './services/planRuns.service';

const PORT = Number(process.env.PORT) || 3000;

const app = createApp({
  planRunStore: createPgPlanRunStore(),
  jsonLimit: process.env.JSON_BODY_LIMIT || undefined
});

const server = app.listen(PORT, () => {
  console.log(JSON.stringify({ event: 'server_started', port: PORT, timestamp: new Date().toISOString() }));
});

function shutdown(signal: string) {
  console.log(JSON.stringify({ event: 'server_stopping', signal, timestamp: new Date().toISOString() }));
  server.close(() => {
    closePool()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        console.error('Failed to close DB pool', error);
        process.exit(1);
      });
  });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
