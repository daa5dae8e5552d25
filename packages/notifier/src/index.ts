export * from './env';
export {
  createNotifier,
  InstrumentedPushClient,
  parseLogLevel,
  serializeError,
  toClientLogger,
  type Notifier,
  type NotifierOptions
} from './notifier';
