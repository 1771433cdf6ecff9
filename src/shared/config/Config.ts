/**
 * Runtime configuration for the delegation gateway.
 *
 * This centralises environment variables and provides
 * typed access throughout the codebase.
 */
import dotenv from 'dotenv';

dotenv.config();

export type AppEnv = 'development' | 'test' | 'production';

export interface TransportSettings {
  timeoutMs: number;
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface CircuitBreakerSettings {
  failureThreshold: number;
  openTimeoutMs: number;
}

export interface AppConfig {
  env: AppEnv;
  port: number;
  serviceName: string;
  serviceVersion: string;

  /**
   * JSON file with the static agent directory. Missing file is not an error.
   */
  agentsConfigPath: string;

  /**
   * Also read AGENT_<NAME>_URL / AGENT_<NAME>_CAPABILITIES variables.
   */
  agentsFromEnv: boolean;

  routingConfigPath: string;

  transport: TransportSettings;
  circuitBreaker: CircuitBreakerSettings;
  rateLimitPerMinute: number;

  workflowTimeoutMs: number;
  shutdownGraceMs: number;
}

const DEFAULT_PORT = 4000;

function parsePort(raw: string | undefined, fallback: number): number {
  const port = raw ? Number(raw) : fallback;
  if (Number.isNaN(port) || port <= 0) {
    return fallback;
  }
  return port;
}

function parsePositiveInt(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim().length === 0) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) return fallback;
  return value;
}

function parseNonNegativeInt(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim().length === 0) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) return fallback;
  return value;
}

function parseBoolean(raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined) return fallback;
  const normalized = raw.trim().toLowerCase();
  if (normalized === 'true' || normalized === '1' || normalized === 'yes') return true;
  if (normalized === 'false' || normalized === '0' || normalized === 'no') return false;
  return fallback;
}

function parseEnv(raw: string | undefined): AppEnv {
  if (raw === 'production' || raw === 'test' || raw === 'development') return raw;
  return 'development';
}

/**
 * Build configuration from an environment map. Exported so tests can
 * construct configs without touching process.env.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    env: parseEnv(env.NODE_ENV),
    port: parsePort(env.PORT, DEFAULT_PORT),
    serviceName: env.SERVICE_NAME || 'agent-delegation-gateway',
    serviceVersion: env.SERVICE_VERSION || '0.1.0',

    agentsConfigPath: env.AGENTS_CONFIG_PATH || 'config/agents.json',
    agentsFromEnv: parseBoolean(env.AGENTS_FROM_ENV, true),
    routingConfigPath: env.ROUTING_CONFIG_PATH || 'config/routing.json',

    transport: {
      timeoutMs: parsePositiveInt(env.TRANSPORT_TIMEOUT_MS, 30_000),
      maxRetries: parseNonNegativeInt(env.TRANSPORT_MAX_RETRIES, 3),
      baseDelayMs: parsePositiveInt(env.TRANSPORT_BASE_DELAY_MS, 500),
      maxDelayMs: parsePositiveInt(env.TRANSPORT_MAX_DELAY_MS, 4_000),
    },
    circuitBreaker: {
      failureThreshold: parsePositiveInt(env.CIRCUIT_FAILURE_THRESHOLD, 5),
      openTimeoutMs: parsePositiveInt(env.CIRCUIT_OPEN_TIMEOUT_MS, 60_000),
    },
    rateLimitPerMinute: parsePositiveInt(env.RATE_LIMIT_PER_MINUTE, 60),

    workflowTimeoutMs: parsePositiveInt(env.WORKFLOW_TIMEOUT_MS, 120_000),
    shutdownGraceMs: parseNonNegativeInt(env.SHUTDOWN_GRACE_MS, 5_000),
  };
}

/**
 * Load configuration from environment variables with sane defaults.
 */
export const config: AppConfig = loadConfig();
