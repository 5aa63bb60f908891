import { WeatherRecord } from '../interfaces/weatherRecord';

export const STATISTIC_NAMES = [
  'averageTemperature',
  'maxTemperature',
  'minTemperature',
  'totalCitiesTested',
  'successfulTests',
] as const;

export type StatisticName = (typeof STATISTIC_NAMES)[number];

// Empty when nothing has been recorded yet
export type WeatherStatistics = Partial<Record<StatisticName, number>>;

export function buildStatistics(records: readonly WeatherRecord[]): WeatherStatistics {
  if (records.length === 0) return {};

  const temperatures = records
    .map((record) => record.temperature)
    .filter((temperature) => Number.isFinite(temperature));

  if (temperatures.length === 0) {
    return { totalCitiesTested: records.length, successfulTests: 0 };
  }

  const sum = temperatures.reduce((total, temperature) => total + temperature, 0);

  return {
    averageTemperature: sum / temperatures.length,
    maxTemperature: Math.max(...temperatures),
    minTemperature: Math.min(...temperatures),
    totalCitiesTested: records.length,
    successfulTests: temperatures.length,
  };
}
