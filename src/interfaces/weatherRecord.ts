import { Units } from "./weather";

export interface WeatherRecord {
  readonly city: string;
  readonly country: string;
  readonly temperature: number;
  readonly feelsLike: number;
  readonly humidity: number;
  readonly pressure: number;
  readonly tempMin: number;
  readonly tempMax: number;
  readonly windSpeed: number;
  readonly description: string;
  readonly units: Units;
  readonly queriedAt: Date;
}
