// Load environment variables first
import 'dotenv/config';

import { loadConfig } from './config/index.js';
import { createLogger } from './utils/logger.js';
import { OpenWeatherCurrentAdapter } from './adapters/weather/OpenWeatherCurrentAdapter.js';
import { OpenWeatherForecastAdapter } from './adapters/weather/OpenWeatherForecastAdapter.js';
import { WeatherStore } from './core/weather/WeatherStore.js';
import { scheduleRefresh } from './scheduler/index.js';
import { startServer } from './server.js';

const logger = createLogger({ component: 'index' });

async function main(): Promise<void> {
  logger.info('Starting weather display');

  try {
    const config = loadConfig();

    // One credential and transport shared by both clients
    const clientOptions = {
      apiKey: config.openWeatherApiKey,
      baseUrl: config.openWeatherBaseUrl,
      fetchFn: fetch,
    };

    const store = new WeatherStore({
      currentWeatherPort: new OpenWeatherCurrentAdapter(clientOptions),
      forecastPort: new OpenWeatherForecastAdapter(clientOptions),
      defaultCity: config.defaultCity,
      cities: config.cities,
      staleResponsePolicy: config.staleResponsePolicy,
    });

    store.subscribe((state) => {
      logger.debug(
        {
          city: state.city,
          hasCurrentWeather: state.currentWeather !== null,
          forecastEntries: state.forecast?.length ?? 0,
          lastError: state.lastError?.code,
        },
        'Weather state updated'
      );
    });

    if (config.refreshCron) {
      scheduleRefresh(store, config.refreshCron);
    }

    await startServer(store, config.port, config.host);
    logger.info({ host: config.host, port: config.port }, 'Server started successfully');

    await store.start();
  } catch (error) {
    logger.error({ error }, 'Failed to start application');
    process.exit(1);
  }
}

main().catch((error) => {
  console.error('Unhandled error:', error);
  process.exit(1);
});
