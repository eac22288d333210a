import { Hono } from "hono";
import type { Context } from "hono";
import type { ZodIssue } from "zod";
import {
  HEALTH_RECOMMENDATIONS,
  POLLUTANT_INFO,
  POLLUTANT_SOURCES,
} from "../info/ispu-explanation";
import {
  POLLUTANTS,
  POLLUTANT_NAMES,
  POLLUTANT_UNITS,
  breakpoints,
} from "../services/breakpoint-table";
import {
  BAND_WIDTH,
  ISPU_CATEGORIES,
  buildBreakdown,
  classifyIspu,
  computeIndex,
} from "../services/ispu-service";
import type { IspuCategory } from "../services/ispu-service";
import type { ModelService } from "../services/model-service";
import {
  ADVISORY_NAMES,
  readingsSchema,
  toIndexReadings,
  validateReadings,
} from "../services/validation-service";
import type { ReadingField, Readings } from "../services/validation-service";

interface ReadingSummary {
  parameter: ReadingField;
  name: string;
  value: number;
  unit: string;
  // Carried for display only, not part of the index
  advisory: boolean;
}

export function formatIssues(issues: ZodIssue[]) {
  return issues.map((issue) => ({
    field: issue.path.join("."),
    message: issue.message,
  }));
}

/**
 * Reads and checks a readings body. Returns either the readings or the
 * response to send back.
 */
export async function parseReadings(
  c: Context
): Promise<{ readings: Readings } | { response: Response }> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch (error) {
    console.warn("Rejected request with invalid JSON body:", String(error));
    return { response: c.json({ error: "Request body must be valid JSON" }, 400) };
  }

  const parsed = readingsSchema.safeParse(body);
  if (!parsed.success) {
    return {
      response: c.json(
        { error: "Invalid readings", details: formatIssues(parsed.error.issues) },
        400
      ),
    };
  }

  const errors = validateReadings(parsed.data);
  if (errors.length > 0) {
    console.log(`Validation failed for ${errors.map((e) => e.field).join(", ")}`);
    return {
      response: c.json(
        { error: "Validation failed", errors: errors.map((e) => e.toJSON()) },
        422
      ),
    };
  }

  return { readings: parsed.data };
}

function describeRange(category: IspuCategory, index: number): string {
  const previous = index > 0 ? ISPU_CATEGORIES[index - 1].max : null;
  if (category.max === null) {
    return `>${previous ?? 0}`;
  }
  return `${previous === null ? 0 : previous + 1}-${category.max}`;
}

function summarizeReadings(readings: Readings): ReadingSummary[] {
  const summary: ReadingSummary[] = POLLUTANTS.map((pollutant) => ({
    parameter: pollutant,
    name: POLLUTANT_NAMES[pollutant],
    value: readings[pollutant],
    unit: POLLUTANT_UNITS[pollutant],
    advisory: false,
  }));

  for (const field of ["no", "nh3"] as const) {
    const value = readings[field];
    if (value === undefined) continue;
    summary.push({
      parameter: field,
      name: ADVISORY_NAMES[field],
      value,
      unit: "μg/m³",
      advisory: true,
    });
  }

  return summary;
}

export function createIspuRoutes(modelService: ModelService) {
  const app = new Hono();

  // Calculate the ISPU for a set of pollutant readings
  app.post("/calculate", async (c) => {
    const parsed = await parseReadings(c);
    if ("response" in parsed) {
      return parsed.response;
    }
    const { readings } = parsed;

    try {
      const indexReadings = toIndexReadings(readings);
      const result = computeIndex(indexReadings);

      console.log(
        `ISPU calculated: ${result.ispu} (${result.category}), dominant ${result.dominantPollutantName}`
      );

      const modelClassification = await modelService.classify(readings);

      return c.json({
        ...result,
        breakdown: buildBreakdown(indexReadings, result),
        recommendation: HEALTH_RECOMMENDATIONS[result.categoryKey],
        readings: summarizeReadings(readings),
        classification: modelClassification
          ? { source: "model", ...modelClassification }
          : { source: "ispu", label: result.category, confidence: null },
      });
    } catch (error) {
      console.error("Error calculating ISPU:", error);
      return c.json(
        {
          error: "Failed to calculate ISPU",
          message: error instanceof Error ? error.message : String(error),
        },
        500
      );
    }
  });

  // Breakpoint table used for the sub-index interpolation
  app.get("/breakpoints", (c) => {
    return c.json({
      indexBreakpoints: [0, 1, 2, 3, 4, 5].map((band) => band * BAND_WIDTH),
      pollutants: POLLUTANTS.map((pollutant) => ({
        pollutant,
        name: POLLUTANT_NAMES[pollutant],
        unit: "μg/m³",
        inputUnit: POLLUTANT_UNITS[pollutant],
        breakpoints: [...breakpoints(pollutant)],
      })),
    });
  });

  // Pollutant definitions, "Good" thresholds and their main sources
  app.get("/pollutants", (c) => {
    const indexPollutants = POLLUTANTS.map((pollutant) => ({
      pollutant,
      name: POLLUTANT_NAMES[pollutant],
      ...POLLUTANT_INFO[pollutant],
      // Upper bound of the first band, in μg/m³
      goodThreshold: breakpoints(pollutant)[1],
      inIndex: true,
    }));

    return c.json({
      pollutants: [
        ...indexPollutants,
        {
          pollutant: "nh3",
          name: ADVISORY_NAMES.nh3,
          ...POLLUTANT_INFO.nh3,
          goodThreshold: null,
          inIndex: false,
        },
      ],
      sources: POLLUTANT_SOURCES.map((group) => ({ ...group, sources: [...group.sources] })),
    });
  });

  // Categories with their ranges and health recommendations
  app.get("/categories", (c) => {
    return c.json(
      ISPU_CATEGORIES.map((category, index) => ({
        ...category,
        range: describeRange(category, index),
        recommendation: HEALTH_RECOMMENDATIONS[category.key],
      }))
    );
  });

  // Category for an arbitrary index value
  app.get("/classify", (c) => {
    const raw = c.req.query("value");
    const value = raw === undefined || raw.trim() === "" ? NaN : Number(raw);

    if (!Number.isFinite(value) || value < 0) {
      return c.json({ error: "Query parameter 'value' must be a non-negative number" }, 400);
    }

    const category = classifyIspu(value);
    return c.json({
      ispu: value,
      category: category.label,
      categoryKey: category.key,
      localLabel: category.localLabel,
      tier: category.tier,
      recommendation: HEALTH_RECOMMENDATIONS[category.key],
    });
  });

  return app;
}
