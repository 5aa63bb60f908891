import { Units } from '../interfaces/weather';
import { WeatherRecord } from '../interfaces/weatherRecord';
import { WeatherError } from '../interfaces/weatherResult';
import { StatisticName, STATISTIC_NAMES, WeatherStatistics } from './statistics';

export const UNIT_LABELS: Readonly<Record<Units, { temperature: string; speed: string }>> = {
  metric: { temperature: '°C', speed: 'm/s' },
  imperial: { temperature: '°F', speed: 'mph' },
  standard: { temperature: ' K', speed: 'm/s' },
};

const STATISTIC_LABELS: Readonly<Record<StatisticName, string>> = {
  averageTemperature: 'Average temperature',
  maxTemperature: 'Max temperature',
  minTemperature: 'Min temperature',
  totalCitiesTested: 'Cities tested',
  successfulTests: 'Successful queries',
};

const COUNT_STATISTICS: ReadonlySet<StatisticName> = new Set<StatisticName>(['totalCitiesTested', 'successfulTests']);

export function formatWeatherRecord(record: WeatherRecord): string {
  const { temperature: deg, speed } = UNIT_LABELS[record.units];

  return [
    `Weather data for ${record.city}, ${record.country}`,
    `  Temperature: ${record.temperature}${deg} (feels like ${record.feelsLike}${deg})`,
    `  Min/Max: ${record.tempMin}${deg} / ${record.tempMax}${deg}`,
    `  Humidity: ${record.humidity}%`,
    `  Wind speed: ${record.windSpeed} ${speed}`,
    `  Conditions: ${record.description}`,
    `  Pressure: ${record.pressure} hPa`,
    `  Queried at: ${record.queriedAt.toISOString()}`,
  ].join('\n');
}

export function formatWeatherFailure(city: string, error: WeatherError): string {
  const prefix = `No weather data for ${city}`;

  switch (error.kind) {
    case 'HttpError':
      return `${prefix}: HTTP ${error.status} - ${error.message}`;
    case 'TransportFailure':
      return `${prefix}: connection ${error.reason === 'timeout' ? 'timed out' : 'failed'} (${error.message})`;
    case 'MalformedResponse':
      return `${prefix}: malformed response (${error.message})`;
  }
}

export function formatStatistics(stats: WeatherStatistics): string {
  const lines = STATISTIC_NAMES.flatMap((name) => {
    const value = stats[name];
    if (value === undefined) return [];

    const rendered = COUNT_STATISTICS.has(name) ? String(value) : value.toFixed(2);
    return [`  ${STATISTIC_LABELS[name]}: ${rendered}`];
  });

  return ['Statistics', ...lines].join('\n');
}
