import type { Forecast, ForecastPort, WeatherResult } from '../../ports/WeatherPort.js';
import { createLogger } from '../../utils/logger.js';
import { forecastResponseSchema, toForecast } from './openWeatherSchemas.js';
import { requestOpenWeather, type OpenWeatherClientOptions } from './openWeatherRequest.js';

/** 3-hourly forecast. The provider's ordering is kept as-is; callers truncate. */
export class OpenWeatherForecastAdapter implements ForecastPort {
  private readonly logger = createLogger({ adapter: 'OpenWeatherForecastAdapter' });

  constructor(private readonly options: OpenWeatherClientOptions) {}

  async fetchForecast(city: string): Promise<WeatherResult<Forecast>> {
    const logger = this.logger.child({ method: 'fetchForecast', city });
    logger.info('Fetching forecast');

    const result = await requestOpenWeather(
      this.options,
      'forecast',
      city,
      forecastResponseSchema,
      toForecast,
      logger
    );

    if (result.ok) {
      logger.info({ entries: result.value.length }, 'Forecast fetched');
    }
    return result;
  }
}
