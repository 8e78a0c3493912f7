/**
 * Unified Configuration System
 *
 * Single source of truth for the service configuration. Environment variables
 * are validated by the shared zod schema and mapped onto a typed AppConfig.
 */

import path from "path";
import { validateEnvironment } from "../../shared/env-validation";
import { Environment } from "../types/environment";

export { Environment };

export interface AppConfig {
  env: Environment;
  port: number;
  host: string;

  security: {
    corsOrigins: string[];
  };

  matching: {
    profilesPath: string;
    defaultTopN: number;
    maxTopN: number;
  };
}

function toEnvironment(value: "development" | "test" | "production"): Environment {
  switch (value) {
    case "production":
      return Environment.Production;
    case "test":
      return Environment.Test;
    default:
      return Environment.Development;
  }
}

function parseOrigins(value: string): string[] {
  return value
    .split(",")
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);
}

/**
 * Build the application configuration from an environment map.
 * Relative dataset paths resolve against the working directory.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  const validated = validateEnvironment(env);

  return {
    env: toEnvironment(validated.NODE_ENV),
    port: validated.PORT,
    host: validated.HOST,
    security: {
      corsOrigins: parseOrigins(validated.CORS_ORIGINS),
    },
    matching: {
      profilesPath: path.resolve(validated.PROFILES_PATH),
      defaultTopN: validated.DEFAULT_TOP_N,
      maxTopN: validated.MAX_TOP_N,
    },
  };
}
