/**
 * Runtime configuration for the invoice reply service.
 *
 * This centralises environment variables and provides
 * typed access throughout the codebase.
 */
import dotenv from 'dotenv';

dotenv.config();

export type AppEnv = 'development' | 'test' | 'production';

export interface AppConfig {
  env: AppEnv;
  port: number;
  serviceName: string;
  serviceVersion: string;
  logLevel: string;
}

const DEFAULT_PORT = 4000;

function parsePort(raw: string | undefined, fallback: number): number {
  const port = raw ? Number(raw) : fallback;
  if (Number.isNaN(port) || port <= 0) {
    return fallback;
  }
  return port;
}

function parseEnv(raw: string | undefined): AppEnv {
  return raw === 'test' || raw === 'production' ? raw : 'development';
}

const env = parseEnv(process.env.NODE_ENV);

/**
 * Load configuration from environment variables with sane defaults.
 */
export const config: AppConfig = {
  env,
  port: parsePort(process.env.PORT, DEFAULT_PORT),
  serviceName: process.env.SERVICE_NAME || 'invoice-reply-service',
  serviceVersion: process.env.SERVICE_VERSION || '0.1.0',
  logLevel: process.env.LOG_LEVEL || (env === 'production' ? 'info' : 'debug'),
};
