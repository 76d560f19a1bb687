export * from './config/env';
export * from './database';
export * from './errors/ServiceError';
export * from './observability';
export * from './types';
