import { Logger } from '@aws-lambda-powertools/logger';
import { Metrics, MetricUnit } from '@aws-lambda-powertools/metrics';
import {
  PushDispatcher,
  type ClientLogger,
  type DispatchResult,
  type PushClient,
  type PushRequest
} from '@pushlane/core';
import { HttpPushClient, PushApiClient, PushApiError } from '@pushlane/push-http';
import { loadConfig, type AppConfig } from './env';

const LOG_LEVELS = ['TRACE', 'DEBUG', 'INFO', 'WARN', 'ERROR', 'CRITICAL', 'SILENT'] as const;
type NotifierLogLevel = (typeof LOG_LEVELS)[number];

export interface NotifierOptions {
  config?: AppConfig;
  logger?: Logger;
  metrics?: Metrics;
  fetchImpl?: typeof fetch;
}

export interface Notifier {
  readonly api: PushApiClient;
  readonly client: PushClient;
  send(job: unknown, signal?: AbortSignal): Promise<DispatchResult>;
  close(): void;
}

export class InstrumentedPushClient implements PushClient {
  constructor(
    private readonly inner: PushClient,
    private readonly logger: Logger,
    private readonly metrics: Metrics
  ) {}

  async pushSync(target: string, request: PushRequest, signal?: AbortSignal) {
    this.logger.debug('Preparing sync push', {
      target,
      strategy: request.strategy,
      title: request.pushMessage.title
    });
    try {
      const response = await this.inner.pushSync(target, request, signal);
      this.metrics.addMetric('push_sync_success', MetricUnit.Count, 1);
      return response;
    } catch (error) {
      this.recordFailure('push sync', error);
      throw error;
    }
  }

  async pushSingle(targets: string[], request: PushRequest, signal?: AbortSignal) {
    this.logger.debug('Preparing batch push', {
      targets: targets.length,
      strategy: request.strategy,
      title: request.pushMessage.title
    });
    try {
      const response = await this.inner.pushSingle(targets, request, signal);
      this.metrics.addMetric('push_single_success', MetricUnit.Count, 1);
      return response;
    } catch (error) {
      this.recordFailure('push single', error);
      throw error;
    }
  }

  private recordFailure(operation: string, error: unknown): void {
    this.metrics.addMetric('push_error', MetricUnit.Count, 1);
    this.logger.error('Push request failed', {
      operation,
      status: error instanceof PushApiError ? error.status : undefined,
      error: serializeError(error)
    });
  }
}

export async function createNotifier(options: NotifierOptions = {}): Promise<Notifier> {
  const config = options.config ?? (await loadConfig());
  const logger =
    options.logger ??
    new Logger({ serviceName: config.appName, logLevel: parseLogLevel(config.logLevel) });
  const metrics = options.metrics ?? new Metrics({ namespace: config.appName });
  logger.appendKeys({ stage: config.stage, app: config.appName });
  metrics.setDefaultDimensions({ app: config.appName, stage: config.stage });

  const api = new PushApiClient({
    baseUrl: config.push.host,
    orgName: config.push.orgName,
    appName: config.push.appName,
    clientId: config.push.clientId,
    clientSecret: config.push.clientSecret,
    rate: config.push.rate,
    intervalMs: config.push.intervalMs,
    timeoutMs: config.push.timeoutMs,
    tokenTtlSeconds: config.push.tokenTtlSeconds,
    fetchImpl: options.fetchImpl,
    logger: toClientLogger(logger)
  });
  const client = new InstrumentedPushClient(new HttpPushClient(api), logger, metrics);
  const dispatcher = new PushDispatcher(client, {
    debug: (message, context) => (context ? logger.debug(message, context) : logger.debug(message))
  });
  logger.info('Push notifier ready', {
    rate: config.push.rate,
    intervalMs: config.push.intervalMs,
    timeoutMs: config.push.timeoutMs
  });

  return {
    api,
    client,
    send: (job, signal) => dispatcher.dispatch(job, signal),
    close: () => {
      api.shutdown();
      metrics.publishStoredMetrics();
    }
  };
}

export function toClientLogger(logger: Logger): ClientLogger {
  return {
    debug: (message, context) => (context ? logger.debug(message, context) : logger.debug(message)),
    warn: (message, context) => (context ? logger.warn(message, context) : logger.warn(message)),
    error: (message, context) => (context ? logger.error(message, context) : logger.error(message))
  };
}

export function parseLogLevel(value: string): NotifierLogLevel {
  const normalized = value.toUpperCase();
  return LOG_LEVELS.find(level => level === normalized) ?? 'INFO';
}

export function serializeError(error: unknown): Record<string, unknown> {
  const base: Record<string, unknown> = { message: 'Unknown error' };
  if (error instanceof Error) {
    base.message = error.message;
    base.name = error.name;
    base.stack = error.stack;
    if ('cause' in error && error.cause) {
      base.cause = error.cause instanceof Error ? error.cause.message : error.cause;
    }
  } else if (error !== undefined) {
    base.message = String(error);
  }
  return base;
}
