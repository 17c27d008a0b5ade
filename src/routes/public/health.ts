/**
 * Liveness and readiness routes.
 *
 * - GET /        service identity and whether the engine initialized
 * - GET /health  503 unless the engine initialized; no call to the engine
 */
import type { MemoryGateway } from "@app/memory/MemoryUseCase";
import { SERVICE_INFO } from "@config/service";
import { Router } from "express";

export function createHealthRouter(gateway: MemoryGateway): Router {
  const router = Router();

  router.get("/", (_req, res) => {
    res.json({
      service: SERVICE_INFO.name,
      status: gateway.isReady() ? "running" : "error",
      version: SERVICE_INFO.version,
    });
  });

  router.get("/health", (_req, res) => {
    gateway.assertReady();
    res.json({ status: "healthy" });
  });

  return router;
}
