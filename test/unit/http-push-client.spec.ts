import { afterEach, describe, expect, it } from 'vitest';
import type { PushRequest } from '@pushlane/core';
import {
  HttpPushClient,
  LimiterClosedError,
  PushApiClient,
  PushApiError
} from '@pushlane/push-http';
import {
  BASE_URL,
  createFetchStub,
  fakeResponse,
  identity,
  requestBody,
  requestHeaders,
  tokenBody
} from '../fixtures/push';

const request: PushRequest = {
  strategy: 2,
  pushMessage: {
    title: 'Order shipped',
    content: 'Your parcel is on its way',
    config: { clickAction: { url: 'https://shop.example.test/orders/42' } }
  }
};

const syncResponse = {
  timestamp: 1_700_000_000_000,
  data: [{ pushStatus: 'SUCCESS', data: { result: 'ok', msg_id: ['m-1'] } }],
  duration: 12
};

const singleResponse = {
  timestamp: 1_700_000_000_500,
  data: [{ pushStatus: 'ASYNC_SUCCESS', data: 'succeed', desc: 'queued' }],
  duration: 3
};

let api: PushApiClient | undefined;

const setup = (routes: Parameters<typeof createFetchStub>[0]) => {
  const fetchImpl = createFetchStub({
    '/org/app/token': () => fakeResponse(200, tokenBody()),
    ...routes
  });
  api = new PushApiClient({ ...identity, rate: 10, intervalMs: 0, fetchImpl });
  return { fetchImpl, api, client: new HttpPushClient(api) };
};

afterEach(() => {
  if (api && !api.isClosed) {
    api.shutdown();
  }
  api = undefined;
});

describe('HttpPushClient.pushSync', () => {
  it('posts the message to the target with the bearer token', async () => {
    const { client, fetchImpl } = setup({
      '/org/app/push/sync/user-1': () => fakeResponse(200, syncResponse)
    });

    const result = await client.pushSync('user-1', request);

    expect(result).toEqual(syncResponse);
    const [url, init] = fetchImpl.mock.calls[1];
    expect(String(url)).toBe(`${BASE_URL}/org/app/push/sync/user-1`);
    expect(requestHeaders(init).authorization).toBe('Bearer tok-1');
    expect(requestBody(init)).toEqual({
      strategy: 2,
      pushMessage: request.pushMessage
    });
  });

  it('escapes the target in the path', async () => {
    const { client, fetchImpl } = setup({
      '/org/app/push/sync/user%201%2Fx': () => fakeResponse(200, syncResponse)
    });

    await client.pushSync('user 1/x', request);

    expect(String(fetchImpl.mock.calls[1][0])).toBe(
      `${BASE_URL}/org/app/push/sync/user%201%2Fx`
    );
  });

  it('fails when the vendor reports a push status other than SUCCESS', async () => {
    const { client } = setup({
      '/org/app/push/sync/user-1': () =>
        fakeResponse(200, { ...syncResponse, data: [{ pushStatus: 'FAIL', data: null }] })
    });

    await expect(client.pushSync('user-1', request)).rejects.toThrow('push sync error: FAIL');
  });

  it('surfaces error statuses with the body text', async () => {
    const { client } = setup({
      '/org/app/push/sync/user-1': () => fakeResponse(500, 'upstream broke', 'Internal Server Error')
    });

    const failure = client.pushSync('user-1', request);

    await expect(failure).rejects.toThrow('push sync error: 500 Internal Server Error, upstream broke');
    await expect(failure).rejects.toMatchObject({ status: 500, body: 'upstream broke' });
  });

  it('requires a target', async () => {
    const { client, fetchImpl } = setup({});

    await expect(client.pushSync('', request)).rejects.toThrow('push sync error: target is required');
    expect(fetchImpl).not.toHaveBeenCalled();
  });
});

describe('HttpPushClient.pushSingle', () => {
  it('posts the targets and parses the batch result', async () => {
    const { client, fetchImpl } = setup({
      '/org/app/push/single': () => fakeResponse(200, singleResponse)
    });

    const result = await client.pushSingle(['user-1', 'user-2'], request);

    expect(result.data).toEqual([{ pushStatus: 'ASYNC_SUCCESS', data: 'succeed', desc: 'queued' }]);
    expect(requestBody(fetchImpl.mock.calls[1][1])).toEqual({
      targets: ['user-1', 'user-2'],
      strategy: 2,
      pushMessage: request.pushMessage
    });
  });

  it('rejects more than 100 targets before taking a permit', async () => {
    const { client, fetchImpl, api: apiClient } = setup({});
    const targets = Array.from({ length: 101 }, (_, i) => `user-${i}`);

    await expect(client.pushSingle(targets, request)).rejects.toThrow(
      'push single error: targets length > 100'
    );
    expect(fetchImpl).not.toHaveBeenCalled();
    expect(apiClient.limiterInUse).toBe(0);
  });

  it('rejects an empty target list', async () => {
    const { client } = setup({});

    await expect(client.pushSingle([], request)).rejects.toBeInstanceOf(PushApiError);
  });

  it('reports a body that is not JSON', async () => {
    const { client } = setup({
      '/org/app/push/single': () => fakeResponse(200, 'not json')
    });

    await expect(client.pushSingle(['user-1'], request)).rejects.toThrow(
      'push single error: malformed response body'
    );
  });

  it('reports a body of the wrong shape', async () => {
    const { client } = setup({
      '/org/app/push/single': () => fakeResponse(200, { data: [{ desc: 'missing status' }] })
    });

    await expect(client.pushSingle(['user-1'], request)).rejects.toThrow(
      'push single error: unexpected response shape: data.0.pushStatus: Required'
    );
  });
});

describe('HttpPushClient admission failures', () => {
  it('names the push operation when the token exchange fails', async () => {
    const { client, fetchImpl } = setup({
      '/org/app/token': () => fakeResponse(401, '{"error":"invalid_client"}', 'Unauthorized')
    });

    const failure = client.pushSingle(['user-1'], request);

    await expect(failure).rejects.toThrow(
      'push single error: refresh token error: 401 Unauthorized, {"error":"invalid_client"}'
    );
    await expect(failure).rejects.toMatchObject({
      operation: 'push single',
      status: 401,
      body: '{"error":"invalid_client"}',
      cause: expect.objectContaining({ operation: 'refresh token', status: 401 })
    });
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });

  it('passes the cancellation reason through untouched', async () => {
    const { client, fetchImpl } = setup({});
    const controller = new AbortController();
    const reason = new Error('caller deadline');
    controller.abort(reason);

    await expect(client.pushSync('user-1', request, controller.signal)).rejects.toBe(reason);
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it('passes a closed limiter through untouched', async () => {
    const { client, api: apiClient } = setup({});
    apiClient.shutdown();

    await expect(client.pushSingle(['user-1'], request)).rejects.toBeInstanceOf(LimiterClosedError);
  });
});
