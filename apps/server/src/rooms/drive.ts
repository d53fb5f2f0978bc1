import { Room, type Client } from 'colyseus';
import { logger, type GlobalRoutePlanner, type LocalPlannerOptions, type VehicleState } from '@lanepath/shared';
import { toErrorMessage } from '../errors';
import { parseRouteRequest, parseVehicleControl, parseVehicleState, type ErrorMessage } from '../messages';
import { PlannerSession } from '../session';

export interface DriveRoomContext {
  routes: GlobalRoutePlanner;
  plannerOptions: LocalPlannerOptions;
  tickRate: number;             // Hz
}

const log = logger.scope('DriveRoom');

/**
 * Room class bound to a map. Each client drives one vehicle: it reports
 * `state`, receives `target` every tick and may push `control` through.
 */
export function createDriveRoom(context: DriveRoomContext) {
  return class DriveRoom extends Room {
    private readonly sessions = new Map<string, PlannerSession>();
    private readonly latest = new Map<string, VehicleState>();

    onCreate() {
      log.info(`Room ${this.roomId} created`);

      this.setPatchRate(1000 / context.tickRate);
      this.setSimulationInterval(() => this.tick(), 1000 / context.tickRate);

      this.onMessage('route', (client, message: unknown) => {
        const session = this.sessions.get(client.sessionId);
        const request = parseRouteRequest(message);
        if (!session || !request) {
          this.reject(client, 'route');
          return;
        }
        try {
          client.send('route', session.requestRoute(request.start, request.end, request.append));
        } catch (err) {
          const { code, message: text } = toErrorMessage(err);
          log.warn(`Route request from ${client.sessionId} failed: ${text}`);
          client.send('error', { code, message: text } satisfies ErrorMessage);
        }
      });

      this.onMessage('state', (client, message: unknown) => {
        const state = parseVehicleState(message);
        if (!state) {
          this.reject(client, 'state');
          return;
        }
        this.latest.set(client.sessionId, state);
      });

      this.onMessage('control', (client, message: unknown) => {
        const session = this.sessions.get(client.sessionId);
        const control = parseVehicleControl(message);
        if (!session || !control) {
          this.reject(client, 'control');
          return;
        }
        session.applyControl(control);
      });
    }

    onJoin(client: Client) {
      this.sessions.set(client.sessionId, new PlannerSession(context.routes, context.plannerOptions));
      log.info(`${client.sessionId} joined`);
    }

    onLeave(client: Client, consented: boolean) {
      this.sessions.get(client.sessionId)?.dispose();
      this.sessions.delete(client.sessionId);
      this.latest.delete(client.sessionId);
      log.info(`${client.sessionId} left${consented ? '' : ' unexpectedly'}`);
    }

    onDispose() {
      log.info(`Room ${this.roomId} disposing`);
    }

    private tick() {
      for (const client of this.clients) {
        const session = this.sessions.get(client.sessionId);
        const state = this.latest.get(client.sessionId);
        if (!session || !state || session.planner.getState() === 'uninitialized') continue;
        client.send('target', session.tick(state));
      }
    }

    private reject(client: Client, type: string) {
      log.warn(`Malformed "${type}" message from ${client.sessionId}`);
      client.send('error', { code: 'BAD_REQUEST', message: `Malformed "${type}" message` } satisfies ErrorMessage);
    }
  };
}
