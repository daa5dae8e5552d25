export * from './errors';
export { MAX_TIMER_DELAY_MS } from './durations';
export { ClientState } from './ClientState';
export { FixedWindowLimiter } from './FixedWindowLimiter';
export { HttpPushClient } from './HttpPushClient';
export { HttpTransport, DEFAULT_TIMEOUT_MS, type HttpTransportOptions } from './HttpTransport';
export {
  PushApiClient,
  DEFAULT_INTERVAL_MS,
  DEFAULT_RATE,
  type PushApiClientOptions
} from './PushApiClient';
export { ResetClock } from './ResetClock';
export { TokenCache, type CredentialExchange, type IssuedToken } from './TokenCache';
