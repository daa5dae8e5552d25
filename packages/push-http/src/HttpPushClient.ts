import {
  MAX_BATCH_TARGETS,
  PushSingleResponseSchema,
  PushSyncResponseSchema,
  type PushClient,
  type PushRequest,
  type PushSingleResponse,
  type PushSyncResponse,
  type Transport,
  type TransportResponse
} from '@pushlane/core';
import type { z } from 'zod';
import { LimiterClosedError, PushApiError, wrapError } from './errors';
import type { PushApiClient } from './PushApiClient';
import { parseBody } from './responses';

const SYNC_SUCCESS = 'SUCCESS';

export class HttpPushClient implements PushClient {
  constructor(private readonly api: PushApiClient) {}

  /** Pushes to one target and waits for the vendor's delivery verdict. */
  async pushSync(
    target: string,
    request: PushRequest,
    signal?: AbortSignal
  ): Promise<PushSyncResponse> {
    if (!target) {
      throw new PushApiError('push sync', 'target is required');
    }

    const response = await this.postOperation(
      'push sync',
      `push/sync/${encodeURIComponent(target)}`,
      { strategy: request.strategy, pushMessage: request.pushMessage },
      PushSyncResponseSchema,
      signal
    );

    for (const item of response.data) {
      if (item.pushStatus !== SYNC_SUCCESS) {
        throw new PushApiError('push sync', item.pushStatus);
      }
    }
    return response;
  }

  /** Queues one push for up to 100 targets. */
  async pushSingle(
    targets: string[],
    request: PushRequest,
    signal?: AbortSignal
  ): Promise<PushSingleResponse> {
    if (targets.length === 0) {
      throw new PushApiError('push single', 'at least one target is required');
    }
    if (targets.length > MAX_BATCH_TARGETS) {
      throw new PushApiError('push single', `targets length > ${MAX_BATCH_TARGETS}`);
    }

    return this.postOperation(
      'push single',
      'push/single',
      { targets, strategy: request.strategy, pushMessage: request.pushMessage },
      PushSingleResponseSchema,
      signal
    );
  }

  private async postOperation<T extends z.ZodTypeAny>(
    operation: string,
    subPath: string,
    payload: unknown,
    schema: T,
    signal?: AbortSignal
  ): Promise<z.output<T>> {
    let transport: Transport;
    try {
      transport = await this.api.acquireAuthorized(signal);
    } catch (error) {
      // Admission cancellation and shutdown reach the caller untouched.
      if ((signal?.aborted && error === signal.reason) || error instanceof LimiterClosedError) {
        throw error;
      }
      throw wrapError(operation, error);
    }

    let response: TransportResponse;
    try {
      response = await transport.post(this.api.url(subPath), payload, signal);
    } catch (error) {
      throw wrapError(operation, error);
    }

    if (!response.ok) {
      throw PushApiError.fromResponse(operation, response);
    }
    return parseBody(operation, response.body, schema);
  }
}
