export * from './constants';
export * from './errors';
export * from './geometry';
export * from './types';
export { EventBus } from './eventBus';
export { LogLevel, Logger, ScopedLogger, logger, parseLogLevel } from './logger';
export * from './road-network';
export * from './planning';
