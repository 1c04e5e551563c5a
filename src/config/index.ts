import dotenv from 'dotenv';
import {
  connectionConfig,
  targetConfig,
  type InitiatorConfig,
  type TargetConfig,
} from '../types/nvmeof/config';

export type Env = Record<string, string | undefined>;

export type AppConfig = Readonly<{
  target: TargetConfig;
  initiator: InitiatorConfig;
  ssh: {
    readyTimeoutMs: number;
  };
  run: {
    settleMs: number;
    resultsFile: string;
    collectLogs: boolean;
    logDir: string;
    kernelLogLines: number;
  };
  broker?: {
    url: string;
    exchange: string;
    routingKey: string;
  };
}>;

const getEnv = (env: Env, key: string, fallback?: string): string => {
  const value = env[key] ?? fallback;
  if (!value) {
    throw new Error(`Missing required env var ${key}`);
  }
  return value;
};

const getEnvOptional = (env: Env, key: string): string | undefined => {
  const value = env[key];
  if (!value) return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
};

const toNumber = (value: string, key: string): number => {
  const parsed = Number(value);
  if (Number.isNaN(parsed)) {
    throw new Error(`Env var ${key} must be a number`);
  }
  return parsed;
};

const toPositiveInt = (value: string, key: string): number => {
  const parsed = toNumber(value, key);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new Error(`Env var ${key} must be a positive integer`);
  }
  return parsed;
};

const toPort = (value: string, key: string): number => {
  const parsed = toPositiveInt(value, key);
  if (parsed > 65535) {
    throw new Error(`Env var ${key} must be a valid port (1-65535)`);
  }
  return parsed;
};

const toBoolean = (value: string, key: string): boolean => {
  const normalized = value.trim().toLowerCase();
  if (['true', '1', 'yes', 'y'].includes(normalized)) return true;
  if (['false', '0', 'no', 'n'].includes(normalized)) return false;
  throw new Error(`Env var ${key} must be boolean-like (true/false)`);
};

/**
 * Build the run configuration from environment variables. `.env` in the
 * working directory is loaded into process.env by loadDotenv() first.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const target = targetConfig({
    connection: connectionConfig({
      host: getEnv(env, 'TARGET_HOST'),
      username: getEnv(env, 'TARGET_USER', 'root'),
      password: getEnv(env, 'TARGET_PASSWORD'),
      port: toPort(getEnv(env, 'TARGET_SSH_PORT', '22'), 'TARGET_SSH_PORT'),
    }),
    dataIp: getEnv(env, 'TARGET_DATA_IP'),
    subsystemNqn: getEnv(env, 'SUBSYS_NQN', 'nqn.2026-01.lab:nvme:target1'),
    servicePort: toPort(getEnv(env, 'TARGET_PORT', '4420'), 'TARGET_PORT'),
    backendDevice: getEnv(env, 'BACKEND_DEVICE', '/dev/nvme0n1'),
    namespaceCount: toPositiveInt(getEnv(env, 'NAMESPACE_COUNT', '1'), 'NAMESPACE_COUNT'),
    portId: toPositiveInt(getEnv(env, 'PORT_ID', '1'), 'PORT_ID'),
  });

  const initiator: InitiatorConfig = Object.freeze({
    connection: connectionConfig({
      host: getEnv(env, 'INITIATOR_HOST'),
      username: getEnv(env, 'INITIATOR_USER', 'root'),
      password: getEnv(env, 'INITIATOR_PASSWORD'),
      port: toPort(getEnv(env, 'INITIATOR_SSH_PORT', '22'), 'INITIATOR_SSH_PORT'),
    }),
  });

  const brokerUrl = getEnvOptional(env, 'REPORT_BROKER_URL');

  return Object.freeze({
    target,
    initiator,
    ssh: {
      readyTimeoutMs: toPositiveInt(getEnv(env, 'SSH_READY_TIMEOUT_MS', '20000'), 'SSH_READY_TIMEOUT_MS'),
    },
    run: {
      settleMs: toNumber(getEnv(env, 'SETTLE_DELAY_MS', '2000'), 'SETTLE_DELAY_MS'),
      resultsFile: getEnv(env, 'RESULTS_FILE', 'nvmeof_test_results.json'),
      collectLogs: toBoolean(getEnv(env, 'COLLECT_LOGS', 'true'), 'COLLECT_LOGS'),
      logDir: getEnv(env, 'LOG_DIR', 'test_logs'),
      kernelLogLines: toPositiveInt(getEnv(env, 'KERNEL_LOG_LINES', '100'), 'KERNEL_LOG_LINES'),
    },
    ...(brokerUrl
      ? {
          broker: {
            url: brokerUrl,
            exchange: getEnv(env, 'REPORT_EXCHANGE', 'results'),
            routingKey: getEnv(env, 'REPORT_ROUTING_KEY', 'nvmeof.report'),
          },
        }
      : {}),
  });
}

export function loadDotenv(): void {
  dotenv.config();
}
