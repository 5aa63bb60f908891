import axios, { AxiosInstance } from 'axios';
import { Units } from '../interfaces/weather';

export const OPENWEATHER_URL = 'https://api.openweathermap.org/data/2.5/weather';
export const DEFAULT_TIMEOUT_MS = 10_000;

export type HttpClient = Pick<AxiosInstance, 'get'>;

export interface WeatherRequest {
  city: string;
  units: Units;
  apiKey: string;
  baseUrl?: string;
  timeoutMs?: number;
}

export interface RawWeatherResponse {
  status: number;
  body: string;
}

export function createHttpClient(timeoutMs = DEFAULT_TIMEOUT_MS): AxiosInstance {
  return axios.create({ timeout: timeoutMs });
}

/**
 * Single GET against the current-weather endpoint.
 *
 * Every HTTP status resolves; only transport failures (DNS, reset,
 * timeout) reject. The body comes back as text so that decoding stays
 * with the caller.
 */
export async function getWeatherFromApi(
  httpClient: HttpClient,
  { city, units, apiKey, baseUrl = OPENWEATHER_URL, timeoutMs = DEFAULT_TIMEOUT_MS }: WeatherRequest
): Promise<RawWeatherResponse> {
  const response = await httpClient.get<unknown>(baseUrl, {
    timeout: timeoutMs,
    responseType: 'text',
    validateStatus: () => true,
    params: {
      q: city,
      units,
      appid: apiKey,
    },
  });

  const { data } = response;

  return {
    status: response.status,
    body: typeof data === 'string' ? data : data == null ? '' : JSON.stringify(data),
  };
}
