import { Logger } from 'pino';
import { CurrentWeatherResponse, Units } from '../interfaces/weather';
import { WeatherRecord } from '../interfaces/weatherRecord';
import { WeatherError, WeatherResult } from '../interfaces/weatherResult';
import { buildStatistics, WeatherStatistics } from '../utils/statistics';

import { logger as defaultLogger } from '../logger';

import { classifyTransportError, toHttpError } from './errorMessages';
import {
  createHttpClient,
  DEFAULT_TIMEOUT_MS,
  getWeatherFromApi,
  HttpClient,
  OPENWEATHER_URL,
  RawWeatherResponse,
} from './getWeather';
import { extractRemoteMessage, parseWeatherResponse } from './parseWeather';
import { DEFAULT_OUTPUT_DIR, saveResponse } from './responseStore';

export const UNKNOWN_COUNTRY = 'unknown';

export interface WeatherQueryClientOptions {
  apiKey: string;
  httpClient?: HttpClient;
  baseUrl?: string;
  timeoutMs?: number;
  defaultUnits?: Units;
  outputDir?: string;
  saveResponses?: boolean;
  recordResults?: boolean;
  logger?: Logger;
  now?: () => Date;
}

export interface FetchWeatherOptions {
  saveToFile?: boolean;
}

export class WeatherQueryClient {
  private readonly apiKey: string;
  private readonly httpClient: HttpClient;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly defaultUnits: Units;
  private readonly outputDir: string;
  private readonly saveResponses: boolean;
  private readonly recordResults: boolean;
  private readonly logger: Logger;
  private readonly now: () => Date;

  private readonly records: WeatherRecord[] = [];

  constructor(options: WeatherQueryClientOptions) {
    const apiKey = options.apiKey.trim();
    if (!apiKey) {
      throw new Error('An OpenWeatherMap API key is required');
    }

    this.apiKey = apiKey;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.httpClient = options.httpClient ?? createHttpClient(this.timeoutMs);
    this.baseUrl = options.baseUrl ?? OPENWEATHER_URL;
    this.defaultUnits = options.defaultUnits ?? 'metric';
    this.outputDir = options.outputDir ?? DEFAULT_OUTPUT_DIR;
    this.saveResponses = options.saveResponses ?? false;
    this.recordResults = options.recordResults ?? true;
    this.logger = options.logger ?? defaultLogger;
    this.now = options.now ?? (() => new Date());
  }

  // Snapshot in query order
  get results(): readonly WeatherRecord[] {
    return [...this.records];
  }

  clearResults(): void {
    this.records.length = 0;
  }

  // Response mapping
  createRecord(city: string, data: CurrentWeatherResponse, units: Units): WeatherRecord {
    return Object.freeze({
      city,
      country: data.sys?.country ?? UNKNOWN_COUNTRY,
      temperature: data.main.temp,
      feelsLike: data.main.feels_like,
      humidity: data.main.humidity,
      pressure: data.main.pressure,
      tempMin: data.main.temp_min,
      tempMax: data.main.temp_max,
      windSpeed: data.wind.speed,
      description: data.weather[0].description,
      units,
      queriedAt: this.now(),
    });
  }

  // Public API
  async fetchWeather(
    city: string,
    units: Units = this.defaultUnits,
    { saveToFile = this.saveResponses }: FetchWeatherOptions = {}
  ): Promise<WeatherResult> {
    this.logger.info({ city, units }, 'Querying current weather');
    this.logger.debug(
      { params: { q: city, units, appid: '[redacted]' } },
      'Request parameters'
    );

    let response: RawWeatherResponse;

    try {
      response = await getWeatherFromApi(this.httpClient, {
        city,
        units,
        apiKey: this.apiKey,
        baseUrl: this.baseUrl,
        timeoutMs: this.timeoutMs,
      });
    } catch (err) {
      return this.fail(city, classifyTransportError(err));
    }

    if (response.status !== 200) {
      return this.fail(
        city,
        toHttpError(response.status, extractRemoteMessage(response.body))
      );
    }

    const parsed = parseWeatherResponse(response.body);

    if (!parsed.success) {
      return this.fail(city, parsed.error);
    }

    const record = this.createRecord(city, parsed.data, units);

    if (this.recordResults) {
      this.records.push(record);
    }

    this.logger.info(
      { city, country: record.country, temperature: record.temperature },
      'Weather data received'
    );

    if (saveToFile) {
      await this.saveRawResponse(city, parsed.raw, record.queriedAt);
    }

    return { status: 'success', data: record };
  }

  computeStatistics(): WeatherStatistics {
    return buildStatistics(this.records);
  }

  private async saveRawResponse(city: string, body: unknown, at: Date): Promise<void> {
    // The record is already valid; a failed dump only costs the file
    try {
      const file = await saveResponse(this.outputDir, city, body, at);
      this.logger.info({ city, file }, 'Saved raw response');
    } catch (err) {
      this.logger.error({ err, city, outputDir: this.outputDir }, 'Failed to save raw response');
    }
  }

  private fail(city: string, error: WeatherError): WeatherResult {
    const context =
      error.kind === 'HttpError'
        ? { status: error.status }
        : error.kind === 'TransportFailure'
          ? { reason: error.reason }
          : { issues: error.issues };

    this.logger.error(
      { city, kind: error.kind, ...context },
      error.message
    );

    return { status: 'error', error };
  }
}
