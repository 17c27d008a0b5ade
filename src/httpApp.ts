import { MemoryGateway } from "@app/memory/MemoryUseCase";
import type { EngineState } from "@domain/memory/engineState";
import { errorHandler } from "@middleware/errorHandler";
import { registerRoutes } from "@routes/index";
import cors from "cors";
import express from "express";
import type { Express } from "express";
import type { Server } from "http";

export interface AppOptions {
  corsOrigin?: string;
  /** Largest accepted JSON body, in `express.json` notation. */
  bodyLimit?: string;
}

/**
 * Builds the HTTP application around an already-initialized engine state.
 */
export function createApp(state: EngineState, options: AppOptions = {}): Express {
  const app = express();

  app.use(cors({ origin: options.corsOrigin ?? "*" }));
  app.use(express.json({ limit: options.bodyLimit ?? "10mb" }));

  registerRoutes(app, new MemoryGateway(state));

  app.use(errorHandler);

  return app;
}

/**
 * Binds the app and resolves once it accepts connections. A failed bind
 * (port in use, permission denied) rejects instead of reporting a start.
 */
export function listen(
  app: Express,
  port: number,
  host: string
): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host, (error?: Error) => {
      if (error) {
        reject(error);
        return;
      }
      resolve(server);
    });
  });
}
