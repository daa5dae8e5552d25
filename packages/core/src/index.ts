export * from './domain/events';
export * from './domain/models';
export * from './app/PushDispatcher';
export * from './ports/Logger';
export * from './ports/PushClient';
export * from './ports/RateLimiter';
export * from './ports/Transport';
