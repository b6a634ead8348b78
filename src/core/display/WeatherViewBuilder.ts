import type { WeatherState } from '../weather/WeatherStore.js';
import { compassDirection, formatHourLabel, iconFor, type WeatherIcon } from './formatters.js';

export const HOURLY_STRIP_LENGTH = 12;

export interface HourlyView {
  hour: string;
  icon: WeatherIcon;
  temperature: number;
}

export interface CurrentView {
  title: string;
  icon: WeatherIcon;
  temperature: number;
  feelsLike: number;
  description: string;
  wind: string;
  sunriseSunset: string;
  humidity: string;
  pressure: string;
}

export interface WeatherView {
  city: string;
  cities: readonly string[];
  loading: boolean;
  current: CurrentView | null;
  hourly: HourlyView[];
  error: string | null;
}

function capitalizeWords(text: string): string {
  return text.replace(
    /(^|\s)(\p{L})/gu,
    (_match, space: string, letter: string) => space + letter.toUpperCase()
  );
}

function metresPerSecondToKmh(speed: number): number {
  return Math.trunc(speed * 3.6);
}

export function buildWeatherView(state: WeatherState): WeatherView {
  const weather = state.currentWeather;
  const error = state.lastError ? state.lastError.message : null;

  if (!weather) {
    return { city: state.city, cities: state.cities, loading: true, current: null, hourly: [], error };
  }

  const [condition] = weather.conditions;
  const hourly = (state.forecast ?? []).slice(0, HOURLY_STRIP_LENGTH).map(
    (entry): HourlyView => ({
      hour: formatHourLabel(entry.dt),
      icon: iconFor(entry.conditions[0].id),
      temperature: Math.trunc(entry.main.temp),
    })
  );

  return {
    city: state.city,
    cities: state.cities,
    loading: false,
    current: {
      title: `${weather.name}, ${weather.country}`,
      icon: iconFor(condition.id),
      temperature: Math.trunc(weather.main.temp),
      feelsLike: Math.trunc(weather.main.feelsLike),
      description: capitalizeWords(condition.description),
      wind: `${compassDirection(weather.wind.deg)} ${metresPerSecondToKmh(weather.wind.speed)} km/h`,
      sunriseSunset: `${formatHourLabel(weather.sunrise)} - ${formatHourLabel(weather.sunset)}`,
      humidity: `${Math.trunc(weather.main.humidity)}%`,
      pressure: `${Math.trunc(weather.main.pressure)} hPa`,
    },
    hourly,
    error,
  };
}
