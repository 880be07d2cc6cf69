import type { GridWorld } from "./gridWorld.js";
import type { CellState } from "./types.js";
import { isHeatStressed, type WeatherState } from "./weather.js";

/** Expected yield units per cell, by state. */
const YIELD_HEALTHY = 1;
const YIELD_GROWING = 0.7;
const YIELD_DISEASED = 0.3;

/** Growth points gained per tick while a crop is watered. */
const GROWTH_RATE = 2;
const LOW_WATER = 0.3;
const HEAT_STRESS_WATER = 0.5;

const GROWING_STATES: ReadonlySet<CellState> = new Set(["growing", "healthy", "need_water"]);
const CROP_STATES: ReadonlySet<CellState> = new Set(["growing", "healthy", "need_water", "sown"]);

export interface YieldPrediction {
  estimatedYield: number;
  currentHarvest: number;
  potentialYield: number;
  /** Ticks until the average crop matures. */
  ticksToHarvest: number;
  estimatedHarvestTick: number;
  averageGrowthProgress: number;
  healthyCrops: number;
  atRiskCrops: number;
}

export interface StressIndicators {
  waterStressedCount: number;
  temperatureStressedCount: number;
  totalCrops: number;
  waterStressPercentage: number;
  temperatureStressPercentage: number;
  overallHealthScore: number;
}

function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

export function calculateYieldPrediction(world: GridWorld, tick: number): YieldPrediction {
  const counts = world.countAllStates();
  let totalGrowth = 0;
  let cropCount = 0;
  for (const position of world.positions()) {
    if (GROWING_STATES.has(world.getCellState(position))) {
      totalGrowth += world.getCellAttributes(position).growthProgress;
      cropCount += 1;
    }
  }
  const averageGrowth = cropCount > 0 ? totalGrowth / cropCount : 0;

  const estimatedYield =
    (counts.healthy + counts.ready_to_harvest) * YIELD_HEALTHY +
    counts.growing * YIELD_GROWING +
    counts.diseased * YIELD_DISEASED;

  const ticksToHarvest = averageGrowth > 0 ? Math.trunc((100 - averageGrowth) / GROWTH_RATE) : 0;
  return {
    estimatedYield: round(estimatedYield, 2),
    currentHarvest: world.harvestedCount,
    potentialYield: round(estimatedYield + world.harvestedCount, 2),
    ticksToHarvest,
    estimatedHarvestTick: tick + ticksToHarvest,
    averageGrowthProgress: round(averageGrowth, 1),
    healthyCrops: counts.healthy,
    atRiskCrops: counts.diseased,
  };
}

export function getStressIndicators(world: GridWorld, weather: Readonly<WeatherState>): StressIndicators {
  let waterStressed = 0;
  let temperatureStressed = 0;
  let totalCrops = 0;
  const hot = isHeatStressed(weather);

  for (const position of world.positions()) {
    if (!CROP_STATES.has(world.getCellState(position))) {
      continue;
    }
    totalCrops += 1;
    const { waterLevel } = world.getCellAttributes(position);
    if (waterLevel < LOW_WATER) {
      waterStressed += 1;
    }
    if (hot && waterLevel < HEAT_STRESS_WATER) {
      temperatureStressed += 1;
    }
  }

  if (totalCrops === 0) {
    return {
      waterStressedCount: 0,
      temperatureStressedCount: 0,
      totalCrops: 0,
      waterStressPercentage: 0,
      temperatureStressPercentage: 0,
      overallHealthScore: 100,
    };
  }

  return {
    waterStressedCount: waterStressed,
    temperatureStressedCount: temperatureStressed,
    totalCrops,
    waterStressPercentage: round((waterStressed / totalCrops) * 100, 1),
    temperatureStressPercentage: round((temperatureStressed / totalCrops) * 100, 1),
    overallHealthScore: round(((totalCrops - waterStressed - temperatureStressed) / totalCrops) * 100, 1),
  };
}
