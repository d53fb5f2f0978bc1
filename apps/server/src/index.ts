import { readFileSync } from 'fs';
import { createServer } from 'http';
import { Server } from 'colyseus';
import { WebSocketTransport } from '@colyseus/ws-transport';
import { GlobalRoutePlanner, RoadGraphBuilder, logger, parseTopology } from '@lanepath/shared';
import { loadConfig } from './config';
import { createHttpApp } from './http';
import { createDriveRoom } from './rooms/drive';

const config = loadConfig();
logger.setLogLevel(config.logLevel);

logger.info(`Loading map ${config.mapPath}`);
const topology = parseTopology(JSON.parse(readFileSync(config.mapPath, 'utf8')));
const graph = RoadGraphBuilder.build(topology, { resolution: config.samplingResolution });
const routes = new GlobalRoutePlanner(graph);

const app = createHttpApp(routes);

const gameServer = new Server({
  transport: new WebSocketTransport({ server: createServer(app) }),
});

// Register our driving room
gameServer.define(
  'drive',
  createDriveRoom({
    routes,
    tickRate: config.tickRate,
    plannerOptions: {
      targetSpeed: config.targetSpeed,
      sampleSpacing: config.samplingResolution,
      followSpeedLimits: config.followSpeedLimits,
    },
  })
);

gameServer
  .listen(config.port)
  .then(() => {
    logger.info(`Server listening on ws://localhost:${config.port}`);
  })
  .catch((err: unknown) => {
    logger.error('Server failed to start', err);
    process.exit(1);
  });
