import { blackRockCity2025 } from "./blackRockCity";
import type { CityPlan, ConcentricStreetBreakpoint } from "./types";

const CITY_PLAN_REGISTRY: Record<string, CityPlan> = {
  [blackRockCity2025.slug]: blackRockCity2025,
};

const normaliseEnvValue = (value?: string) => value?.trim().toLowerCase();

const DEFAULT_CITY_PLAN_SLUG =
  normaliseEnvValue(process.env.NEXT_PUBLIC_CITY_PLAN) ||
  normaliseEnvValue(process.env.CITY_PLAN) ||
  blackRockCity2025.slug;

export const listCityPlans = (): CityPlan[] => Object.values(CITY_PLAN_REGISTRY);

export const getCityPlan = (slug?: string): CityPlan => {
  const key = normaliseEnvValue(slug);
  if (key && CITY_PLAN_REGISTRY[key]) return CITY_PLAN_REGISTRY[key];
  return CITY_PLAN_REGISTRY[DEFAULT_CITY_PLAN_SLUG] ?? blackRockCity2025;
};

export { DEFAULT_CITY_PLAN_SLUG, blackRockCity2025 };
export type { CityPlan, ConcentricStreetBreakpoint };
