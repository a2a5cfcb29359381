import 'dotenv/config';
import { readServerEnv } from './config/env.js';
import { initTelemetry } from './observability/telemetry.js';
import { logger, setLogLevel } from './observability/logger.js';
import { createRoomRegistry } from './rooms/index.js';
import { createStatsService } from './stats/index.js';
import { createAppServer } from './server.js';
import { WebSocketGateway } from './ws/Gateway.js';

const env = readServerEnv();
setLogLevel(env.logLevel);

initTelemetry();

const registry = createRoomRegistry(env);
const stats = createStatsService(env);
const server = createAppServer({ context: { registry, stats } });
const gateway = new WebSocketGateway(server, { registry });

server.listen(env.port, env.host, () => {
  logger.info('server listening', {
    context: { host: env.host, port: env.port, minPlayers: env.minPlayers, maxPlayers: env.maxPlayers },
  });
});

function shutdown(signal: NodeJS.Signals) {
  logger.info('shutting down', { context: { signal } });
  gateway.shutdown();
  server.close(() => {
    stats
      .close()
      .catch((error: unknown) => {
        logger.error('error closing statistics store', { error });
      })
      .finally(() => process.exit(0));
  });
}

process.once('SIGINT', shutdown);
process.once('SIGTERM', shutdown);
