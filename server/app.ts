import express, { type Express } from "express";
import cors from "cors";
import helmet from "helmet";
import pinoHttp from "pino-http";
import { logger } from "./config/logger";
import { Environment, type AppConfig } from "./config/unified-config";
import { registerRoutes } from "./routes";
import { globalErrorHandler, notFoundHandler } from "./middleware/global-error-handler";
import type { ProfileSource } from "./services/profile-dataset";

export interface AppDependencies {
  config: AppConfig;
  profileSource: ProfileSource;
}

function corsOptions(origins: string[]): cors.CorsOptions {
  // "*" or an empty list allows any origin
  if (origins.length === 0 || origins.includes("*")) {
    return { origin: true };
  }
  return { origin: origins };
}

/**
 * Build the Express application. Kept separate from listen() so tests can
 * drive it with supertest.
 */
export function createApp({ config, profileSource }: AppDependencies): Express {
  const app = express();

  app.disable("x-powered-by");

  app.use(helmet());
  app.use(cors(corsOptions(config.security.corsOrigins)));
  app.use(express.json({ limit: "1mb" }));
  app.use(express.urlencoded({ extended: false, limit: "1mb" }));

  app.use(
    pinoHttp({
      logger,
      customLogLevel: (req, res, err) => {
        if (res.statusCode >= 500 || err) {
          return "error";
        } else if (res.statusCode >= 400) {
          return "warn";
        }
        return "info";
      },
      autoLogging: {
        ignore: (req) =>
          config.env === Environment.Production && (req.url ?? "").endsWith("/health"),
      },
    }),
  );

  registerRoutes(app, {
    profileSource,
    limits: {
      defaultTopN: config.matching.defaultTopN,
      maxTopN: config.matching.maxTopN,
    },
  });

  app.use(notFoundHandler);
  app.use(globalErrorHandler);

  return app;
}
