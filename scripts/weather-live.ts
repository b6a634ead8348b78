/**
 * Live check against the real OpenWeatherMap API.
 * Run with: npx tsx scripts/weather-live.ts [city]
 */
import 'dotenv/config';
import { loadConfig } from '../src/config/index.js';
import { OpenWeatherCurrentAdapter } from '../src/adapters/weather/OpenWeatherCurrentAdapter.js';
import { OpenWeatherForecastAdapter } from '../src/adapters/weather/OpenWeatherForecastAdapter.js';
import { WeatherStore } from '../src/core/weather/WeatherStore.js';
import { buildWeatherView } from '../src/core/display/WeatherViewBuilder.js';

async function main() {
  const config = loadConfig();
  const city = process.argv[2] ?? config.defaultCity;
  const clientOptions = { apiKey: config.openWeatherApiKey, baseUrl: config.openWeatherBaseUrl };

  const store = new WeatherStore({
    currentWeatherPort: new OpenWeatherCurrentAdapter(clientOptions),
    forecastPort: new OpenWeatherForecastAdapter(clientOptions),
    defaultCity: config.defaultCity,
    cities: config.cities,
  });

  console.log('='.repeat(60));
  console.log(`LIVE WEATHER CHECK: ${city}`);
  console.log('='.repeat(60));

  await store.selectCity(city);

  const { lastError } = store.getState();
  if (lastError) {
    console.error(`${lastError.name} (${lastError.code}): ${lastError.message}`);
  }

  console.log(JSON.stringify(buildWeatherView(store.getState()), null, 2));
}

main().catch((error) => {
  console.error('Live check failed:', error);
  process.exit(1);
});
