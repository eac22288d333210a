import { Hono } from "hono";
import { logger } from "hono/logger";
import type { AppConfig } from "./config/environment";
import { createCorsMiddleware } from "./middleware/cors-middleware";
import { createIspuRoutes } from "./routes/ispu-routes";
import { createModelRoutes } from "./routes/model-routes";
import type { ModelService } from "./services/model-service";

export interface AppDependencies {
  config: AppConfig;
  modelService: ModelService;
}

export function createApp({ config, modelService }: AppDependencies) {
  const app = new Hono();

  app.use("*", createCorsMiddleware(config.corsOrigins));
  app.use(logger());

  // Routes
  app.route("/api/ispu", createIspuRoutes(modelService));
  app.route("/api/models", createModelRoutes(modelService));

  app.get("/api/health", (c) => {
    return c.json({ status: "ok", models: modelService.getStatus() });
  });

  // Default route
  app.get("/", (c) => {
    return c.json({
      message: "Welcome to the ISPU API",
      endpoints: [
        "POST /api/ispu/calculate",
        "GET /api/ispu/breakpoints",
        "GET /api/ispu/pollutants",
        "GET /api/ispu/categories",
        "GET /api/ispu/classify?value=",
        "GET /api/models/status",
        "POST /api/models/classify",
        "GET /api/models/forecast?hours=",
        "GET /api/health",
      ],
    });
  });

  app.notFound((c) => c.json({ error: "Not Found" }, 404));

  app.onError((error, c) => {
    console.error("Unhandled error:", error);
    return c.json(
      { error: "Internal Server Error", message: error.message },
      500
    );
  });

  return app;
}
