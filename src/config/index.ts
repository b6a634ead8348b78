import { z } from 'zod';
import cron from 'node-cron';
import { ConfigError } from '../utils/errors.js';

export const STALE_RESPONSE_POLICIES = ['selected-city', 'last-completion'] as const;

const configSchema = z
  .object({
    // OpenWeatherMap
    openWeatherApiKey: z.string().min(1),
    openWeatherBaseUrl: z.string().url().default('https://api.openweathermap.org/data/2.5'),

    // Cities
    defaultCity: z.string().trim().min(1).default('Montreal'),
    cities: z
      .string()
      .default('Montreal,Toronto,Vancouver')
      .transform((value) =>
        value
          .split(',')
          .map((city) => city.trim())
          .filter((city) => city.length > 0)
      ),

    // Refresh
    staleResponsePolicy: z.enum(STALE_RESPONSE_POLICIES).default('selected-city'),
    refreshCron: z
      .string()
      .refine((expression) => cron.validate(expression), { message: 'Invalid cron expression' })
      .optional(),

    // App
    host: z.string().default('0.0.0.0'),
    port: z.coerce.number().int().positive().default(5000),
  })
  .transform((config) => ({
    ...config,
    cities: config.cities.includes(config.defaultCity)
      ? config.cities
      : [config.defaultCity, ...config.cities],
  }));

export type Config = z.infer<typeof configSchema>;
export type StaleResponsePolicy = Config['staleResponsePolicy'];

export function loadConfig(source: NodeJS.ProcessEnv = process.env): Config {
  // Empty strings count as unset
  const env = (key: string): string | undefined => {
    const value = source[key];
    return value === '' ? undefined : value;
  };

  const raw = {
    openWeatherApiKey: env('OPENWEATHER_API_KEY'),
    openWeatherBaseUrl: env('OPENWEATHER_BASE_URL'),
    defaultCity: env('DEFAULT_CITY'),
    cities: env('CITIES'),
    staleResponsePolicy: env('STALE_RESPONSE_POLICY'),
    refreshCron: env('REFRESH_CRON'),
    host: env('HOST'),
    port: env('PORT'),
  };

  try {
    return configSchema.parse(raw);
  } catch (error) {
    if (error instanceof z.ZodError) {
      const issues = error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      throw new ConfigError(`Configuration validation failed:\n${issues.join('\n')}`, {
        cause: error,
      });
    }
    throw error;
  }
}
