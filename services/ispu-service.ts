import {
  POLLUTANTS,
  POLLUTANT_NAMES,
  POLLUTANT_UNITS,
  breakpoints,
} from "./breakpoint-table";
import type { Pollutant } from "./breakpoint-table";

export const BAND_WIDTH = 50;
export const MAX_ISPU = 500;

const MG_TO_UG = 1000;

export type IndexReadings = Record<Pollutant, number>;

export type CategoryKey =
  | "good"
  | "moderate"
  | "unhealthy"
  | "very_unhealthy"
  | "hazardous";

export interface IspuCategory {
  key: CategoryKey;
  label: string;
  // Name used by the national ISPU publication
  localLabel: string;
  tier: 1 | 2 | 3 | 4 | 5;
  // Inclusive upper bound, null for the open-ended last category
  max: number | null;
}

export interface IndexResult {
  ispu: number;
  category: string;
  categoryKey: CategoryKey;
  tier: IspuCategory["tier"];
  dominantPollutant: Pollutant;
  dominantPollutantName: string;
  subIndices: Record<Pollutant, number>;
}

export interface BreakdownEntry {
  pollutant: Pollutant;
  name: string;
  concentration: number;
  unit: string;
  subIndex: number;
  // Percentage of the overall index, 1 decimal
  contribution: number;
}

// Scanned top-down; the first category whose max is not exceeded wins
export const ISPU_CATEGORIES: readonly IspuCategory[] = [
  { key: "good", label: "Good", localLabel: "Baik", tier: 1, max: 50 },
  { key: "moderate", label: "Moderate", localLabel: "Sedang", tier: 2, max: 100 },
  { key: "unhealthy", label: "Unhealthy", localLabel: "Tidak Sehat", tier: 3, max: 200 },
  {
    key: "very_unhealthy",
    label: "Very Unhealthy",
    localLabel: "Sangat Tidak Sehat",
    tier: 4,
    max: 300,
  },
  { key: "hazardous", label: "Hazardous", localLabel: "Berbahaya", tier: 5, max: null },
];

/**
 * Rounds the exact binary value of `value` to `decimals` places. Exact ties
 * go to the even digit, so 50.004999999999995 → 50 and 0.125 → 0.12.
 */
export function roundTo(value: number, decimals: number): number {
  if (!Number.isFinite(value) || Math.abs(value) >= 1e21) {
    return value;
  }

  // Exact decimal expansion; a double in range needs fewer than 100 digits
  const exact = value.toFixed(100);
  const point = exact.indexOf(".");
  const cut = point + 1 + decimals;

  // toFixed resolves ties away from zero
  if (!/^50*$/.test(exact.slice(cut))) {
    return Number(value.toFixed(decimals));
  }

  const lastDigit = Number(exact.charAt(decimals > 0 ? cut - 1 : point - 1));
  return lastDigit % 2 === 0
    ? Number(exact.slice(0, decimals > 0 ? cut : point))
    : Number(value.toFixed(decimals));
}

/**
 * Converts a submitted reading to the unit the breakpoint table uses.
 * Only CO differs (mg/m³ in, μg/m³ out).
 */
export function normalizeConcentration(pollutant: Pollutant, value: number): number {
  return pollutant === "co" ? value * MG_TO_UG : value;
}

/**
 * Linear interpolation of a concentration against one breakpoint row. The
 * first band whose upper breakpoint is not exceeded is used; a band with
 * equal bounds yields its lower index. Concentrations above the last
 * breakpoint saturate at {@link MAX_ISPU}.
 */
export function interpolate(concentration: number, thresh: readonly number[]): number {
  for (let i = 0; i < thresh.length - 1; i++) {
    const cHigh = thresh[i + 1];
    if (concentration <= cHigh) {
      const iLow = i * BAND_WIDTH;
      const iHigh = (i + 1) * BAND_WIDTH;
      const cLow = thresh[i];

      if (cHigh - cLow === 0) {
        return iLow;
      }

      return roundTo(((iHigh - iLow) / (cHigh - cLow)) * (concentration - cLow) + iLow, 2);
    }
  }

  return MAX_ISPU;
}

/**
 * @param concentration - already normalized to μg/m³
 */
export function calculateSubIndex(pollutant: Pollutant, concentration: number): number {
  return interpolate(concentration, breakpoints(pollutant));
}

export function classifyIspu(ispu: number): IspuCategory {
  for (const category of ISPU_CATEGORIES) {
    if (category.max === null || ispu <= category.max) {
      return category;
    }
  }
  // Unreachable while the last category is open-ended
  return ISPU_CATEGORIES[ISPU_CATEGORIES.length - 1];
}

/**
 * Computes the ISPU for six readings. `co` is in mg/m³, everything else in
 * μg/m³. Readings must already have passed validation.
 */
export function computeIndex(readings: IndexReadings): IndexResult {
  const subIndexOf = (pollutant: Pollutant): number =>
    calculateSubIndex(pollutant, normalizeConcentration(pollutant, readings[pollutant]));

  const subIndices: Record<Pollutant, number> = {
    pm10: subIndexOf("pm10"),
    pm2_5: subIndexOf("pm2_5"),
    so2: subIndexOf("so2"),
    no2: subIndexOf("no2"),
    o3: subIndexOf("o3"),
    co: subIndexOf("co"),
  };

  let dominantPollutant: Pollutant = POLLUTANTS[0];
  for (const pollutant of POLLUTANTS) {
    // Strictly greater keeps the earliest pollutant on ties
    if (subIndices[pollutant] > subIndices[dominantPollutant]) {
      dominantPollutant = pollutant;
    }
  }

  const ispu = Math.min(subIndices[dominantPollutant], MAX_ISPU);
  const category = classifyIspu(ispu);

  return {
    ispu,
    category: category.label,
    categoryKey: category.key,
    tier: category.tier,
    dominantPollutant,
    dominantPollutantName: POLLUTANT_NAMES[dominantPollutant],
    subIndices,
  };
}

/**
 * Per-pollutant view of a result in evaluation order, with each sub-index
 * expressed as a share of the overall index.
 */
export function buildBreakdown(readings: IndexReadings, result: IndexResult): BreakdownEntry[] {
  return POLLUTANTS.map((pollutant) => {
    const subIndex = result.subIndices[pollutant];
    return {
      pollutant,
      name: POLLUTANT_NAMES[pollutant],
      concentration: readings[pollutant],
      unit: POLLUTANT_UNITS[pollutant],
      subIndex,
      contribution: result.ispu > 0 ? roundTo((subIndex / result.ispu) * 100, 1) : 0,
    };
  });
}
