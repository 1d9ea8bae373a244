import { createApp } from './app.js';
import { env } from './env.js';
import { logger } from './logger.js';

const app = createApp();

app.listen(env.PORT, () => {
  logger.info('server_started', { port: env.PORT, environment: env.ENVIRONMENT });
});
