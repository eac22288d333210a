/**
 * Indonesian Air Pollution Standard Index (ISPU) Explanation
 *
 * ISPU uses a scale from 0-500, computed as the highest sub-index of six
 * pollutants (PM10, PM2.5, SO2, NO2, O3, CO):
 *
 * 0-50    Good (Baik): No effect on human or animal health.
 * 51-100  Moderate (Sedang): Acceptable, uncomfortable for sensitive groups.
 * 101-200 Unhealthy (Tidak Sehat): Harmful to sensitive groups.
 * 201-300 Very Unhealthy (Sangat Tidak Sehat): Harmful to the general public.
 * >300    Hazardous (Berbahaya): Serious health risk for everyone.
 *
 * First breakpoints ("Good" upper bound) per pollutant, in μg/m³:
 * - PM2.5: 15.5
 * - PM10: 50
 * - SO2: 52
 * - NO2: 80
 * - O3: 120
 * - CO: 4000 (4 mg/m³)
 */

import type { Pollutant } from "../services/breakpoint-table";
import type { CategoryKey } from "../services/ispu-service";

export type DescribedPollutant = Pollutant | "nh3";

export interface PollutantInfo {
  description: string;
  healthImpact: string;
}

export interface PollutantSourceGroup {
  group: string;
  sources: string[];
}

export const POLLUTANT_INFO: Readonly<Record<DescribedPollutant, PollutantInfo>> = {
  pm2_5: {
    description: "Fine particulate matter (≤ 2.5 μm)",
    healthImpact: "Penetrates deep into the lungs and the bloodstream",
  },
  pm10: {
    description: "Particulate matter (≤ 10 μm)",
    healthImpact: "Irritates the respiratory tract",
  },
  so2: {
    description: "Sulfur dioxide",
    healthImpact: "Breathing difficulties, asthma",
  },
  no2: {
    description: "Nitrogen dioxide",
    healthImpact: "Inflammation of the airways",
  },
  o3: {
    description: "Ozone",
    healthImpact: "Eye irritation, coughing, shortness of breath",
  },
  co: {
    description: "Carbon monoxide",
    healthImpact: "Binds to hemoglobin and starves the body of oxygen",
  },
  nh3: {
    description: "Ammonia",
    healthImpact: "Irritates the eyes and respiratory tract",
  },
};

export const POLLUTANT_SOURCES: readonly PollutantSourceGroup[] = [
  {
    group: "Transport",
    sources: ["Motor vehicles (NO₂, CO, PM)", "Aircraft", "Ships"],
  },
  {
    group: "Industry",
    sources: ["Power plants", "Chemical plants", "Mining"],
  },
  {
    group: "Other",
    sources: [
      "Waste burning",
      "Agriculture (NH₃ from fertilizer)",
      "Construction dust",
      "Forest fires",
    ],
  },
  {
    group: "Natural",
    sources: ["Desert dust", "Volcanic activity", "Plant pollen"],
  },
];

export interface HealthRecommendation {
  title: string;
  healthImpact: string;
  advice: string[];
}

export const HEALTH_RECOMMENDATIONS: Readonly<Record<CategoryKey, HealthRecommendation>> = {
  good: {
    title: "Air quality is GOOD",
    healthImpact: "No effect on health",
    advice: [
      "Outdoor activities are safe for everyone",
      "No restrictions on activities",
      "Ideal conditions for outdoor exercise",
    ],
  },
  moderate: {
    title: "Air quality is MODERATE",
    healthImpact: "Uncomfortable for sensitive groups",
    advice: [
      "Sensitive groups (children, the elderly, people with respiratory infections) should reduce outdoor activities",
      "Healthy people can carry on as usual",
      "Wear a mask if you feel uncomfortable",
    ],
  },
  unhealthy: {
    title: "Air quality is UNHEALTHY",
    healthImpact: "Harmful to sensitive groups",
    advice: [
      "Everyone should wear a mask when going outside",
      "Reduce strenuous outdoor physical activity",
      "Close windows to reduce exposure to pollutants",
      "Sensitive groups should stay indoors",
    ],
  },
  very_unhealthy: {
    title: "Air quality is VERY UNHEALTHY",
    healthImpact: "Harmful to the general public",
    advice: [
      "Avoid outdoor activities",
      "Use an air purifier indoors",
      "Close all ventilation openings",
      "Seek medical help immediately on shortness of breath, coughing or eye irritation",
    ],
  },
  hazardous: {
    title: "Air quality is HAZARDOUS",
    healthImpact: "Serious risk for the whole population",
    advice: [
      "Stay indoors with air conditioning",
      "Wear an N95 mask if you must go outside",
      "Evacuate to an area with clean air if possible",
      "Emergency status: avoid all outdoor activities",
    ],
  },
};
