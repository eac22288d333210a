import { Hono } from "hono";
import { MAX_ISPU, classifyIspu, roundTo } from "../services/ispu-service";
import type { ModelService } from "../services/model-service";
import { parseReadings } from "./ispu-routes";

const DEFAULT_FORECAST_HOURS = 24;
const MAX_FORECAST_HOURS = 168;

export function createModelRoutes(modelService: ModelService) {
  const app = new Hono();

  // Which model artifacts the last probe found
  app.get("/status", (c) => {
    return c.json(modelService.getStatus());
  });

  // Classify readings with the pre-trained classification model
  app.post("/classify", async (c) => {
    const parsed = await parseReadings(c);
    if ("response" in parsed) {
      return parsed.response;
    }

    const classification = await modelService.classify(parsed.readings);
    if (!classification) {
      return c.json(
        {
          error: "Classification model unavailable",
          message: "Use /api/ispu/calculate for the standard ISPU category",
        },
        503
      );
    }

    return c.json({ source: "model", ...classification });
  });

  // Hourly ISPU forecast from the forecasting model
  app.get("/forecast", async (c) => {
    const raw = c.req.query("hours");
    const hours = raw === undefined ? DEFAULT_FORECAST_HOURS : Number(raw);

    if (!Number.isInteger(hours) || hours < 1 || hours > MAX_FORECAST_HOURS) {
      return c.json(
        { error: `Query parameter 'hours' must be an integer between 1 and ${MAX_FORECAST_HOURS}` },
        400
      );
    }

    console.log(`API request received for ${hours}h ISPU forecast`);

    const forecast = await modelService.forecast(hours);
    if (!forecast) {
      return c.json({ error: "Forecasting model unavailable" }, 503);
    }

    const now = Date.now();
    const hourMs = 60 * 60 * 1000;

    const predictions = forecast.values.slice(0, hours).map((value, i) => {
      const ispu = roundTo(Math.min(Math.max(value, 0), MAX_ISPU), 2);
      const category = classifyIspu(ispu);
      return {
        hour: i + 1,
        timestamp: now + (i + 1) * hourMs,
        ispu,
        category: category.label,
        categoryKey: category.key,
        tier: category.tier,
      };
    });

    console.log(`Returning ${predictions.length} hourly predictions`);

    return c.json(predictions);
  });

  return app;
}
