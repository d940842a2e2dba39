export * from './constants/server-messages.constants';
export * from './libs/engine/path-matcher';
export * from './libs/engine/request-router';
export * from './libs/engine/response-synthesizer';
export * from './libs/engine/route-errors';
export * from './libs/engine/schema-validator';
export * from './libs/engine/token-resolver';
export * from './libs/engine/webhook-dispatcher';
export * from './libs/logger';
export * from './libs/server/events-listeners';
export * from './libs/server/server';
export * from './libs/utils';

export { RouteConfigLoader } from './libs/route-config-loader';
export * from './types/route-config';
export * from './types/server.types';
