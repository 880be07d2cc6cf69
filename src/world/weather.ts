import { uniform, type RandomSource } from "../sim/random.js";

export interface WeatherState {
  /** Degrees Celsius. */
  temperature: number;
  /** Relative humidity, percent. */
  humidity: number;
  rainForecast24h: boolean;
  /** km/h. */
  windSpeed: number;
}

/** Read-only view handed to the planner and the workers. */
export interface WeatherReader {
  current(): Readonly<WeatherState>;
}

/** Above this temperature the planner treats crops as heat-stressed. */
export const HEAT_STRESS_TEMPERATURE = 32;

const TEMPERATURE_RANGE = { min: 20, max: 35, step: 2 } as const;
const HUMIDITY_RANGE = { min: 40, max: 90, step: 5 } as const;
const WIND_RANGE = { min: 5, max: 40, step: 3 } as const;
const RAIN_PROBABILITY = 0.1;

export const INITIAL_WEATHER: Readonly<WeatherState> = Object.freeze({
  temperature: 25,
  humidity: 60,
  rainForecast24h: false,
  windSpeed: 10,
});

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

export function isHeatStressed(weather: Readonly<WeatherState>): boolean {
  return weather.temperature > HEAT_STRESS_TEMPERATURE;
}

/**
 * Owner of the shared weather state. The simulation calls {@link update}
 * periodically; everything else only reads through {@link current}.
 */
export class WeatherStation implements WeatherReader {
  private state: WeatherState;

  constructor(initial: Partial<WeatherState> = {}) {
    this.state = { ...INITIAL_WEATHER, ...initial };
  }

  current(): Readonly<WeatherState> {
    return { ...this.state };
  }

  /** Overrides individual fields, e.g. to force a rain forecast in a scenario. */
  set(patch: Partial<WeatherState>): void {
    this.state = { ...this.state, ...patch };
  }

  /** Random-walks every field within its realistic bounds. */
  update(random: RandomSource): Readonly<WeatherState> {
    const { temperature, humidity, windSpeed } = this.state;
    this.state = {
      temperature: clamp(
        temperature + uniform(random, -TEMPERATURE_RANGE.step, TEMPERATURE_RANGE.step),
        TEMPERATURE_RANGE.min,
        TEMPERATURE_RANGE.max,
      ),
      humidity: clamp(humidity + uniform(random, -HUMIDITY_RANGE.step, HUMIDITY_RANGE.step), HUMIDITY_RANGE.min, HUMIDITY_RANGE.max),
      rainForecast24h: random() < RAIN_PROBABILITY,
      windSpeed: clamp(windSpeed + uniform(random, -WIND_RANGE.step, WIND_RANGE.step), WIND_RANGE.min, WIND_RANGE.max),
    };
    return this.current();
  }
}
