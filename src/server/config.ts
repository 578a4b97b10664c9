// Centralized configuration for the Node.js host layer.
// Parses and validates process.env once at first import and exposes a
// typed config object. The rules engine under src/shared never imports this.

import dotenv from 'dotenv';
import { ConfigurationError } from '../shared/errors';
import { LogFormat, LogLevel, NodeEnv, getEffectiveNodeEnv, parseEnv } from './config/env';

// Load .env into process.env before we read anything from it.
dotenv.config();

export interface AppConfig {
  nodeEnv: NodeEnv;
  isProduction: boolean;
  isTest: boolean;
  logging: {
    level: LogLevel;
    format: LogFormat;
    file?: string;
  };
}

/**
 * Build the config from a raw environment. Throws ConfigurationError
 * listing every invalid variable.
 */
export function buildConfig(rawEnv: Record<string, string | undefined>): AppConfig {
  const envResult = parseEnv(rawEnv);
  if (!envResult.success) {
    const details = envResult.errors
      .map((error) => `${error.path || 'root'}: ${error.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid environment configuration: ${details}`, {
      errors: envResult.errors,
    });
  }
  const env = envResult.data;
  const nodeEnv = getEffectiveNodeEnv(env);
  const logFile = env.LOG_FILE?.trim() || undefined;

  return {
    nodeEnv,
    isProduction: nodeEnv === 'production',
    isTest: nodeEnv === 'test',
    logging: {
      level: env.LOG_LEVEL,
      format: env.LOG_FORMAT,
      ...(logFile ? { file: logFile } : {}),
    },
  };
}

export const config: AppConfig = buildConfig(process.env);
