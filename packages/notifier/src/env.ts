import { SecretsManagerClient, GetSecretValueCommand } from '@aws-sdk/client-secrets-manager';

export interface AppConfig {
  appName: string;
  stage: string;
  secretsPrefix: string;
  logLevel: string;
  push: {
    host: string;
    orgName: string;
    appName: string;
    clientId: string;
    clientSecret: string;
    rate: number;
    intervalMs: number;
    timeoutMs: number;
    tokenTtlSeconds: number;
  };
}

export interface LoadConfigOptions {
  forceRefresh?: boolean;
  secretsClient?: SecretsManagerClient;
}

const CACHE_TTL_MS = 5 * 60 * 1000;
let defaultSecretsClient: SecretsManagerClient | undefined;
let cachedConfig: { value: AppConfig; expiresAt: number } | undefined;

export async function loadConfig(options: LoadConfigOptions = {}): Promise<AppConfig> {
  const now = Date.now();
  if (!options.forceRefresh && cachedConfig && cachedConfig.expiresAt > now) {
    return cachedConfig.value;
  }

  const appName = process.env.APP_NAME ?? 'pushlane';
  const stage = process.env.STAGE ?? 'dev';
  const secretsPrefix = process.env.SECRETS_PREFIX ?? `/pushlane/${stage}`;
  const logLevel = process.env.LOG_LEVEL ?? 'INFO';

  const host = requiredEnv('PUSH_HOST');
  const orgName = requiredEnv('PUSH_ORG_NAME');
  const pushAppName = requiredEnv('PUSH_APP_NAME');
  const clientId = requiredEnv('PUSH_CLIENT_ID');
  const clientSecret =
    process.env.PUSH_CLIENT_SECRET ||
    (await getSecret(`${secretsPrefix}/PUSH_CLIENT_SECRET`, options.secretsClient));

  const config: AppConfig = {
    appName,
    stage,
    secretsPrefix,
    logLevel,
    push: {
      host,
      orgName,
      appName: pushAppName,
      clientId,
      clientSecret,
      rate: parseOptionalInt(process.env.PUSH_RATE) ?? 1,
      intervalMs: parseOptionalInt(process.env.PUSH_INTERVAL_MS) ?? 1000,
      timeoutMs: parseOptionalInt(process.env.PUSH_TIMEOUT_MS) ?? 30_000,
      tokenTtlSeconds: parseOptionalInt(process.env.PUSH_TOKEN_TTL_SECONDS) ?? 0
    }
  };

  cachedConfig = { value: config, expiresAt: Date.now() + CACHE_TTL_MS };
  return config;
}

async function getSecret(secretId: string, client?: SecretsManagerClient): Promise<string> {
  const secretsClient = client ?? (defaultSecretsClient ??= new SecretsManagerClient({}));
  const command = new GetSecretValueCommand({ SecretId: secretId });
  const response = await secretsClient.send(command);
  const secret =
    response.SecretString ??
    (response.SecretBinary ? Buffer.from(response.SecretBinary).toString('utf8') : '');
  if (!secret) {
    throw new Error(`Secret ${secretId} has no value`);
  }
  return secret;
}

export function clearConfigCache(): void {
  cachedConfig = undefined;
}

function requiredEnv(name: string): string {
  const value = process.env[name];
  if (!value) {
    throw new Error(`${name} environment variable is required`);
  }
  return value;
}

function parseOptionalInt(value: string | undefined): number | undefined {
  if (!value) {
    return undefined;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) || parsed < 0 ? undefined : parsed;
}
