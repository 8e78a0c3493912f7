import pino, { type LoggerOptions } from "pino";
import { LogLevelSchema, type LogLevel } from "../../shared/env-validation";
import { Environment } from "../types/environment";

/**
 * Logger Configuration
 *
 * Pino logger shared by the service and route layers.
 * In development, it uses pino-pretty for human-readable logs.
 * In production, it outputs JSON logs suitable for log aggregation services.
 */

const logLevels: Record<Environment, LogLevel> = {
  [Environment.Development]: "debug",
  [Environment.Test]: "error",
  [Environment.Production]: "info",
};

function resolveEnvironment(value: string | undefined): Environment {
  switch (value) {
    case Environment.Production:
      return Environment.Production;
    case Environment.Test:
      return Environment.Test;
    default:
      return Environment.Development;
  }
}

/**
 * LOG_LEVEL when it names a pino level, otherwise the environment default.
 * pino throws on unknown levels, so the raw value never reaches it.
 */
export function resolveLogLevel(value: string | undefined, environment: Environment): LogLevel {
  const parsed = LogLevelSchema.safeParse(value);
  return parsed.success ? parsed.data : logLevels[environment];
}

const environment = resolveEnvironment(process.env.NODE_ENV);

const baseConfig: LoggerOptions = {
  level: resolveLogLevel(process.env.LOG_LEVEL, environment),
  timestamp: pino.stdTimeFunctions.isoTime,
  redact: {
    paths: [
      "req.headers.authorization",
      "req.headers.cookie",
      'res.headers["set-cookie"]',
      "*.password",
      "*.apiKey",
      "*.secret",
    ],
    censor: "[REDACTED]",
  },
};

// Development-specific configuration with pretty printing
const developmentConfig: LoggerOptions = {
  ...baseConfig,
  transport: {
    target: "pino-pretty",
    options: {
      colorize: true,
      translateTime: "SYS:standard",
      ignore: "pid,hostname",
    },
  },
};

// Production-specific configuration optimized for log aggregation
const productionConfig: LoggerOptions = {
  ...baseConfig,
  base: {
    env: process.env.NODE_ENV,
    version: process.env.npm_package_version,
    nodeVersion: process.version,
  },
  formatters: {
    level: (label: string) => {
      return { level: label };
    },
  },
};

const config =
  environment === Environment.Development
    ? developmentConfig
    : productionConfig;

export const logger = pino(config);
