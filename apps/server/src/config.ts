import path from 'path';
import { DEFAULT_SAMPLING_RESOLUTION, DEFAULT_TARGET_SPEED, LogLevel, TICK_RATE, logger, parseLogLevel } from '@lanepath/shared';

export interface ServerConfig {
  port: number;
  mapPath: string;
  logLevel: LogLevel;
  samplingResolution: number;   // m
  targetSpeed: number;          // m/s
  followSpeedLimits: boolean;
  tickRate: number;             // Hz
}

export const DEFAULT_MAP_PATH = path.resolve(__dirname, '../maps/demo-town.json');

const log = logger.scope('config');

/**
 * Read server settings from the environment; malformed values fall back to defaults
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  return {
    port: readNumber(env, 'PORT', 3000, Number.isInteger),
    mapPath: env.MAP_PATH ? path.resolve(env.MAP_PATH) : DEFAULT_MAP_PATH,
    logLevel: parseLogLevel(env.LOG_LEVEL),
    samplingResolution: readNumber(env, 'SAMPLING_RESOLUTION', DEFAULT_SAMPLING_RESOLUTION),
    targetSpeed: readNumber(env, 'TARGET_SPEED', DEFAULT_TARGET_SPEED),
    followSpeedLimits: env.FOLLOW_SPEED_LIMITS === 'true' || env.FOLLOW_SPEED_LIMITS === '1',
    tickRate: readNumber(env, 'TICK_RATE', TICK_RATE),
  };
}

function readNumber(
  env: NodeJS.ProcessEnv,
  key: string,
  fallback: number,
  accept: (value: number) => boolean = Number.isFinite
): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;

  const value = Number(raw);
  if (!accept(value) || value <= 0) {
    log.warn(`Ignoring ${key}=${raw}, using ${fallback}`);
    return fallback;
  }
  return value;
}
