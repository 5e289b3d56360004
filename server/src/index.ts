import { buildServer } from './server.js';
import { serverPort } from './config.js';
import { log } from './logging.js';

async function bootstrap() {
  const app = await buildServer();
  const port = serverPort();
  await app.listen({ port, host: '0.0.0.0' });
  log('info', `Server listening on ${port}`);
}

bootstrap().catch(err => {
  log('error', String(err));
  process.exit(1);
});
