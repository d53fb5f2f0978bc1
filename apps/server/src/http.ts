import express, { type Express } from 'express';
import { maneuverSummary, type GlobalRoutePlanner } from '@lanepath/shared';
import { toErrorMessage } from './errors';
import { parseRouteRequest } from './messages';

/**
 * REST surface next to the realtime rooms: health, map statistics and one-off routing
 */
export function createHttpApp(routes: GlobalRoutePlanner): Express {
  const app = express();
  app.use(express.json());

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  app.get('/map', (_req, res) => {
    res.json(routes.graph.getStats());
  });

  app.post('/route', (req, res) => {
    const request = parseRouteRequest(req.body);
    if (!request) {
      res.status(400).json({ code: 'BAD_REQUEST', message: 'Expected { start: [x, y], end: [x, y] }' });
      return;
    }

    try {
      const route = routes.planRoute(request.start, request.end);
      res.json({
        length: route.length,
        nodes: route.nodes,
        maneuvers: maneuverSummary(route),
        points: route.points.map((point) => ({
          position: point.position,
          heading: point.heading,
          maneuver: point.maneuver,
        })),
      });
    } catch (err) {
      const { status, code, message } = toErrorMessage(err);
      res.status(status).json({ code, message });
    }
  });

  return app;
}
