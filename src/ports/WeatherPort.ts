import type { WeatherError } from '../utils/errors.js';

export interface ConditionEntry {
  readonly id: number;
  readonly main: string;
  readonly description: string;
}

export interface MainReadings {
  readonly temp: number;
  readonly feelsLike: number;
  readonly pressure: number;
  readonly humidity: number;
}

export interface Wind {
  /** m/s, as returned for metric units */
  readonly speed: number;
  /** Degrees clockwise from true north */
  readonly deg: number;
}

export interface CurrentWeather {
  readonly name: string;
  readonly country: string;
  readonly sunrise: number;
  readonly sunset: number;
  readonly conditions: readonly [ConditionEntry, ...ConditionEntry[]];
  readonly main: MainReadings;
  readonly wind: Wind;
}

export interface ForecastEntry {
  readonly dt: number;
  readonly main: MainReadings;
  readonly conditions: readonly [ConditionEntry, ...ConditionEntry[]];
}

export type Forecast = readonly ForecastEntry[];

export type WeatherResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: WeatherError };

export interface CurrentWeatherPort {
  fetchCurrentWeather(city: string): Promise<WeatherResult<CurrentWeather>>;
}

export interface ForecastPort {
  fetchForecast(city: string): Promise<WeatherResult<Forecast>>;
}
