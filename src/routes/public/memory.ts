import type { MemoryGateway } from "@app/memory/MemoryUseCase";
import { createMemoryControllers } from "@interfaces/http/MemoryController";
import { Router } from "express";

export function createMemoryRouter(gateway: MemoryGateway): Router {
  const router = Router();
  const controllers = createMemoryControllers(gateway);

  router.post("/add", controllers.add);
  router.post("/search", controllers.search);
  router.get("/all", controllers.listAll);
  router.delete("/clear", controllers.clear);

  return router;
}
