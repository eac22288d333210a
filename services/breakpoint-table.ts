/**
 * ISPU breakpoint table
 *
 * Concentration breakpoints per pollutant, following the national ambient
 * air quality standard (PP No. 22 Tahun 2021). Each row holds 6 strictly
 * increasing concentrations C0..C5 that bound 5 bands of 50 index points.
 *
 * All values are μg/m³. CO readings arrive in mg/m³ and are converted by
 * the index engine before lookup.
 */

// Evaluation order also decides the dominant pollutant on ties.
export const POLLUTANTS = ["pm10", "pm2_5", "so2", "no2", "o3", "co"] as const;

export type Pollutant = (typeof POLLUTANTS)[number];

export type Breakpoints = readonly [number, number, number, number, number, number];

export const POLLUTANT_NAMES: Readonly<Record<Pollutant, string>> = Object.freeze({
  pm10: "PM10",
  pm2_5: "PM2.5",
  so2: "SO₂",
  no2: "NO₂",
  o3: "O₃",
  co: "CO",
});

// Unit a reading is submitted in (not the lookup unit)
export const POLLUTANT_UNITS: Readonly<Record<Pollutant, string>> = Object.freeze({
  pm10: "μg/m³",
  pm2_5: "μg/m³",
  so2: "μg/m³",
  no2: "μg/m³",
  o3: "μg/m³",
  co: "mg/m³",
});

const BREAKPOINT_TABLE: Readonly<Record<Pollutant, Breakpoints>> = Object.freeze({
  pm10: Object.freeze([0, 50, 150, 350, 420, 500] as const),
  pm2_5: Object.freeze([0, 15.5, 55.4, 150.4, 250.4, 350.4] as const),
  so2: Object.freeze([0, 52, 180, 400, 800, 1200] as const),
  no2: Object.freeze([0, 80, 200, 1130, 2260, 3000] as const),
  o3: Object.freeze([0, 120, 235, 400, 800, 1000] as const),
  co: Object.freeze([0, 4000, 8000, 15000, 30000, 45000] as const),
});

export class UnknownPollutantError extends Error {
  constructor(public readonly pollutant: string) {
    super(`Unknown pollutant: ${pollutant}`);
    this.name = "UnknownPollutantError";
  }
}

export function isPollutant(key: string): key is Pollutant {
  return POLLUTANTS.some((pollutant) => pollutant === key);
}

export function breakpoints(pollutant: string): Breakpoints {
  if (!isPollutant(pollutant)) {
    throw new UnknownPollutantError(pollutant);
  }
  return BREAKPOINT_TABLE[pollutant];
}
