import { z } from "zod";
import { POLLUTANTS, POLLUTANT_NAMES } from "./breakpoint-table";
import type { Pollutant } from "./breakpoint-table";
import type { IndexReadings } from "./ispu-service";

// Realistic ceiling for any reading, in its own unit
export const MAX_CONCENTRATION = 10000;
// CO is submitted in mg/m³
export const MAX_CO_CONCENTRATION = 100;

export type AdvisoryPollutant = "no" | "nh3";
export type ReadingField = Pollutant | AdvisoryPollutant;

export const ADVISORY_NAMES: Readonly<Record<AdvisoryPollutant, string>> = {
  no: "NO",
  nh3: "NH₃",
};

const concentration = z.number({ invalid_type_error: "must be a number" }).finite();

export const readingsSchema = z.object({
  pm10: concentration,
  pm2_5: concentration,
  so2: concentration,
  no2: concentration,
  o3: concentration,
  co: concentration,
  no: concentration.optional(),
  nh3: concentration.optional(),
});

export type Readings = z.infer<typeof readingsSchema>;

export type ValidationReason = "negative" | "above_maximum";

export class ValidationError extends Error {
  constructor(
    public readonly field: ReadingField,
    public readonly reason: ValidationReason,
    message: string
  ) {
    super(message);
    this.name = "ValidationError";
  }

  toJSON() {
    return { field: this.field, reason: this.reason, message: this.message };
  }
}

function fieldName(field: ReadingField): string {
  return field === "no" || field === "nh3" ? ADVISORY_NAMES[field] : POLLUTANT_NAMES[field];
}

function checkReading(field: ReadingField, value: number): ValidationError | null {
  const name = fieldName(field);

  if (value < 0) {
    return new ValidationError(field, "negative", `${name} must not be negative`);
  }
  if (field === "co" && value > MAX_CO_CONCENTRATION) {
    return new ValidationError(
      field,
      "above_maximum",
      `${name} is too high (maximum ${MAX_CO_CONCENTRATION} mg/m³)`
    );
  }
  if (value > MAX_CONCENTRATION) {
    return new ValidationError(
      field,
      "above_maximum",
      `${name} is too high (maximum ${MAX_CONCENTRATION})`
    );
  }
  return null;
}

/**
 * Range-checks every submitted reading. Returns one error per offending
 * field, in evaluation order followed by the advisory readings. An empty
 * list means the readings can be passed to the index engine.
 */
export function validateReadings(readings: Readings): ValidationError[] {
  const errors: ValidationError[] = [];

  for (const pollutant of POLLUTANTS) {
    const error = checkReading(pollutant, readings[pollutant]);
    if (error) errors.push(error);
  }

  for (const field of ["no", "nh3"] as const) {
    const value = readings[field];
    if (value === undefined) continue;
    const error = checkReading(field, value);
    if (error) errors.push(error);
  }

  return errors;
}

export function toIndexReadings(readings: Readings): IndexReadings {
  return {
    pm10: readings.pm10,
    pm2_5: readings.pm2_5,
    so2: readings.so2,
    no2: readings.no2,
    o3: readings.o3,
    co: readings.co,
  };
}
