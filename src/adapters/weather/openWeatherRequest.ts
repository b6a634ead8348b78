import type { z } from 'zod';
import type { WeatherResult } from '../../ports/WeatherPort.js';
import type { Logger } from '../../utils/logger.js';
import { DecodeError, InvalidInputError, NetworkError } from '../../utils/errors.js';

export type FetchFn = typeof fetch;

export interface OpenWeatherClientOptions {
  apiKey: string;
  baseUrl: string;
  /** Transport; defaults to the global fetch */
  fetchFn?: FetchFn;
}

export type OpenWeatherEndpoint = 'weather' | 'forecast';

/** `city` must already be URL-encoded; it is placed in the query as given. */
export function buildOpenWeatherUrl(
  baseUrl: string,
  endpoint: OpenWeatherEndpoint,
  city: string,
  apiKey: string
): string {
  const base = baseUrl.replace(/\/+$/, '');
  return `${base}/${endpoint}?q=${city}&appid=${encodeURIComponent(apiKey)}&units=metric`;
}

/**
 * Single GET against an OpenWeatherMap endpoint, decoded through `schema` and mapped by `map`.
 * Expected failures come back as `{ ok: false }`; nothing is thrown.
 */
export async function requestOpenWeather<S extends z.ZodTypeAny, T>(
  options: OpenWeatherClientOptions,
  endpoint: OpenWeatherEndpoint,
  city: string,
  schema: S,
  map: (data: z.infer<S>) => T,
  logger: Logger
): Promise<WeatherResult<T>> {
  if (city.trim().length === 0) {
    return { ok: false, error: new InvalidInputError('City must be a non-empty string') };
  }

  const fetchFn = options.fetchFn ?? fetch;
  const url = buildOpenWeatherUrl(options.baseUrl, endpoint, city, options.apiKey);

  let response: Response;
  try {
    response = await fetchFn(url);
  } catch (error) {
    logger.error({ error }, 'OpenWeather request failed');
    return {
      ok: false,
      error: new NetworkError(`OpenWeather ${endpoint} request failed`, { cause: error }),
    };
  }

  if (!response.ok) {
    logger.error({ status: response.status }, 'OpenWeather API returned an error status');
    // Release the connection; the error body is not used
    await response.body?.cancel();
    return {
      ok: false,
      error: new NetworkError(`OpenWeather API error: ${response.status}`, {
        status: response.status,
      }),
    };
  }

  let body: unknown;
  try {
    body = await response.json();
  } catch (error) {
    logger.error({ error }, 'OpenWeather response is not valid JSON');
    return {
      ok: false,
      error: new DecodeError(`OpenWeather ${endpoint} response is not valid JSON`, [], {
        cause: error,
      }),
    };
  }

  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue: z.ZodIssue) => `${issue.path.join('.')}: ${issue.message}`
    );
    logger.error({ issues }, 'OpenWeather response schema mismatch');
    return {
      ok: false,
      error: new DecodeError(`OpenWeather ${endpoint} response schema mismatch`, issues, {
        cause: parsed.error,
      }),
    };
  }

  return { ok: true, value: map(parsed.data) };
}
