export { WeatherQueryClient, UNKNOWN_COUNTRY } from './modules/weather';
export type { WeatherQueryClientOptions, FetchWeatherOptions } from './modules/weather';
export { OPENWEATHER_URL, DEFAULT_TIMEOUT_MS } from './modules/getWeather';
export type { HttpClient } from './modules/getWeather';
export { HTTP_ERROR_MESSAGES, describeHttpError } from './modules/errorMessages';
export { buildStatistics } from './utils/statistics';
export type { WeatherStatistics, StatisticName } from './utils/statistics';
export { formatWeatherRecord, formatWeatherFailure, formatStatistics } from './utils/format';
export { loadEnv } from './config/env';
export type { Env } from './config/env';
export type { Units } from './interfaces/weather';
export type { WeatherRecord } from './interfaces/weatherRecord';
export type {
  WeatherResult,
  WeatherError,
  HttpError,
  TransportFailure,
  MalformedResponse,
} from './interfaces/weatherResult';
