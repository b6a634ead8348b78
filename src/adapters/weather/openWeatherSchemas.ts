import { z } from 'zod';
import type { ConditionEntry, CurrentWeather, ForecastEntry, MainReadings } from '../../ports/WeatherPort.js';

const conditionSchema = z.object({
  id: z.number().int(),
  main: z.string(),
  description: z.string(),
});

const mainSchema = z.object({
  temp: z.number(),
  feels_like: z.number(),
  pressure: z.number(),
  humidity: z.number(),
});

export const currentWeatherResponseSchema = z.object({
  name: z.string(),
  sys: z.object({
    country: z.string(),
    sunrise: z.number().int(),
    sunset: z.number().int(),
  }),
  weather: z.array(conditionSchema).nonempty(),
  main: mainSchema,
  wind: z.object({
    speed: z.number(),
    deg: z.number().int(),
  }),
});

export const forecastResponseSchema = z.object({
  list: z.array(
    z.object({
      dt: z.number().int(),
      main: mainSchema,
      weather: z.array(conditionSchema).nonempty(),
    })
  ),
});

type ConditionResponse = z.infer<typeof conditionSchema>;
type MainResponse = z.infer<typeof mainSchema>;

function toCondition(condition: ConditionResponse): ConditionEntry {
  return { id: condition.id, main: condition.main, description: condition.description };
}

function toConditions(
  conditions: [ConditionResponse, ...ConditionResponse[]]
): [ConditionEntry, ...ConditionEntry[]] {
  const [first, ...rest] = conditions;
  return [toCondition(first), ...rest.map(toCondition)];
}

function toMain(main: MainResponse): MainReadings {
  return {
    temp: main.temp,
    feelsLike: main.feels_like,
    pressure: main.pressure,
    humidity: main.humidity,
  };
}

export function toCurrentWeather(data: z.infer<typeof currentWeatherResponseSchema>): CurrentWeather {
  return {
    name: data.name,
    country: data.sys.country,
    sunrise: data.sys.sunrise,
    sunset: data.sys.sunset,
    conditions: toConditions(data.weather),
    main: toMain(data.main),
    wind: { speed: data.wind.speed, deg: data.wind.deg },
  };
}

export function toForecast(data: z.infer<typeof forecastResponseSchema>): ForecastEntry[] {
  return data.list.map((entry) => ({
    dt: entry.dt,
    main: toMain(entry.main),
    conditions: toConditions(entry.weather),
  }));
}
