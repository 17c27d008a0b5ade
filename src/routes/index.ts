/**
 * Express route registration for the memory gateway.
 *
 * - Liveness (`/`) and readiness (`/health`)
 * - Memory operations: `/add`, `/search`, `/all`, `/clear`
 */
import type { MemoryGateway } from "@app/memory/MemoryUseCase";
import { createHealthRouter } from "@routes/public/health";
import { createMemoryRouter } from "@routes/public/memory";
import type { Express } from "express";

export function registerRoutes(app: Express, gateway: MemoryGateway): void {
  app.use(createHealthRouter(gateway));
  app.use(createMemoryRouter(gateway));
}
