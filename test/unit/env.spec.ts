import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  GetSecretValueCommand,
  type SecretsManagerClient
} from '@aws-sdk/client-secrets-manager';
import { clearConfigCache, loadConfig } from '@pushlane/notifier';

const ENV_KEYS = [
  'APP_NAME',
  'STAGE',
  'SECRETS_PREFIX',
  'LOG_LEVEL',
  'PUSH_HOST',
  'PUSH_ORG_NAME',
  'PUSH_APP_NAME',
  'PUSH_CLIENT_ID',
  'PUSH_CLIENT_SECRET',
  'PUSH_RATE',
  'PUSH_INTERVAL_MS',
  'PUSH_TIMEOUT_MS',
  'PUSH_TOKEN_TTL_SECONDS'
];

const saved: Record<string, string | undefined> = {};

const secretsClientReturning = (secret: string) => {
  const send = vi.fn().mockResolvedValue({ SecretString: secret });
  return { send, client: { send } as unknown as SecretsManagerClient };
};

describe('loadConfig', () => {
  beforeEach(() => {
    for (const key of ENV_KEYS) {
      saved[key] = process.env[key];
      delete process.env[key];
    }
    process.env.PUSH_HOST = 'push.example.test';
    process.env.PUSH_ORG_NAME = 'org';
    process.env.PUSH_APP_NAME = 'app';
    process.env.PUSH_CLIENT_ID = 'client-id';
    clearConfigCache();
  });

  afterEach(() => {
    for (const key of ENV_KEYS) {
      if (saved[key] === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = saved[key];
      }
    }
    clearConfigCache();
  });

  it('reads the environment and applies defaults', async () => {
    process.env.PUSH_CLIENT_SECRET = 'test-secret';

    const config = await loadConfig();

    expect(config).toEqual({
      appName: 'pushlane',
      stage: 'dev',
      secretsPrefix: '/pushlane/dev',
      logLevel: 'INFO',
      push: {
        host: 'push.example.test',
        orgName: 'org',
        appName: 'app',
        clientId: 'client-id',
        clientSecret: 'test-secret',
        rate: 1,
        intervalMs: 1000,
        timeoutMs: 30_000,
        tokenTtlSeconds: 0
      }
    });
  });

  it('parses limiter and timeout overrides, ignoring values that are not numbers', async () => {
    process.env.PUSH_CLIENT_SECRET = 'test-secret';
    process.env.PUSH_RATE = '5';
    process.env.PUSH_INTERVAL_MS = 'soon';
    process.env.PUSH_TIMEOUT_MS = '5000';
    process.env.PUSH_TOKEN_TTL_SECONDS = '3600';

    const { push } = await loadConfig();

    expect(push.rate).toBe(5);
    expect(push.intervalMs).toBe(1000);
    expect(push.timeoutMs).toBe(5000);
    expect(push.tokenTtlSeconds).toBe(3600);
  });

  it('fetches the client secret from Secrets Manager when it is not in the environment', async () => {
    process.env.STAGE = 'prod';
    const { send, client } = secretsClientReturning('test-secret');

    const config = await loadConfig({ secretsClient: client });

    expect(config.push.clientSecret).toBe('test-secret');
    const command = send.mock.calls[0][0];
    expect(command).toBeInstanceOf(GetSecretValueCommand);
    expect((command as GetSecretValueCommand).input).toEqual({
      SecretId: '/pushlane/prod/PUSH_CLIENT_SECRET'
    });
  });

  it('fails on an empty secret', async () => {
    const { client } = secretsClientReturning('');

    await expect(loadConfig({ secretsClient: client })).rejects.toThrow(
      'Secret /pushlane/dev/PUSH_CLIENT_SECRET has no value'
    );
  });

  it('caches the config until forced to reload', async () => {
    const { send, client } = secretsClientReturning('test-secret');

    const first = await loadConfig({ secretsClient: client });
    const second = await loadConfig({ secretsClient: client });
    const third = await loadConfig({ secretsClient: client, forceRefresh: true });

    expect(second).toBe(first);
    expect(third).not.toBe(first);
    expect(send).toHaveBeenCalledTimes(2);
  });

  it('requires the vendor identifiers', async () => {
    delete process.env.PUSH_ORG_NAME;

    await expect(loadConfig()).rejects.toThrow('PUSH_ORG_NAME environment variable is required');
  });
});
