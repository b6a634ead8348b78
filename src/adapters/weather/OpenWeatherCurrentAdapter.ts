import type { CurrentWeather, CurrentWeatherPort, WeatherResult } from '../../ports/WeatherPort.js';
import { createLogger } from '../../utils/logger.js';
import { currentWeatherResponseSchema, toCurrentWeather } from './openWeatherSchemas.js';
import { requestOpenWeather, type OpenWeatherClientOptions } from './openWeatherRequest.js';

export class OpenWeatherCurrentAdapter implements CurrentWeatherPort {
  private readonly logger = createLogger({ adapter: 'OpenWeatherCurrentAdapter' });

  constructor(private readonly options: OpenWeatherClientOptions) {}

  async fetchCurrentWeather(city: string): Promise<WeatherResult<CurrentWeather>> {
    const logger = this.logger.child({ method: 'fetchCurrentWeather', city });
    logger.info('Fetching current weather');

    const result = await requestOpenWeather(
      this.options,
      'weather',
      city,
      currentWeatherResponseSchema,
      toCurrentWeather,
      logger
    );

    if (result.ok) {
      logger.info({ temp: result.value.main.temp }, 'Current weather fetched');
    }
    return result;
  }
}
