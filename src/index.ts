import app from './app.js';
import { env } from './config/env.js';

const server = app.listen(env.PORT, () => {
  console.log(`Uppercase API listening on http://localhost:${env.PORT}/api/uppercase (${env.NODE_ENV})`);
});

// Local runs only; on Lambda the runtime owns the process lifecycle
function shutdown(signal: string) {
  console.log(`${signal} received, closing uppercase API`);

  server.close(() => process.exit(0));

  // In-flight requests get 10 seconds
  setTimeout(() => {
    console.error('Uppercase API did not close in time, exiting');
    process.exit(1);
  }, 10000).unref();
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
