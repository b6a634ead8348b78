import type { Server } from 'node:http';
import express from 'express';
import { z } from 'zod';
import { createLogger } from './utils/logger.js';
import type { WeatherStore, WeatherState } from './core/weather/WeatherStore.js';
import { buildWeatherView } from './core/display/WeatherViewBuilder.js';

const logger = createLogger({ component: 'server' });

const selectCityBodySchema = z.object({
  city: z.string().trim().min(1),
});

function serializeState(state: WeatherState) {
  return {
    city: state.city,
    cities: state.cities,
    currentWeather: state.currentWeather,
    forecast: state.forecast,
    lastError: state.lastError
      ? { name: state.lastError.name, code: state.lastError.code, message: state.lastError.message }
      : null,
  };
}

export function createApp(store: WeatherStore): express.Express {
  const app = express();

  app.use(express.json());

  // Request logging middleware
  app.use((req, _res, next) => {
    logger.info({ method: req.method, path: req.path }, 'Incoming request');
    next();
  });

  app.get('/health', (_req, res) => {
    res.status(200).json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.get('/api/state', (_req, res) => {
    res.status(200).json(serializeState(store.getState()));
  });

  app.get('/api/view', (_req, res) => {
    res.status(200).json(buildWeatherView(store.getState()));
  });

  app.get('/api/cities', (_req, res) => {
    const state = store.getState();
    res.status(200).json({ selected: state.city, cities: state.cities });
  });

  app.post('/api/city', (req, res) => {
    const parsed = selectCityBodySchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: 'Body must be { "city": "<non-empty string>" }' });
      return;
    }

    const { city } = parsed.data;
    // Responds before the fetches complete; clients poll /api/view
    store.selectCity(city).catch((error) => {
      logger.error({ error, city }, 'City selection failed');
    });
    res.status(202).json({ city });
  });

  app.post('/api/refresh', (_req, res) => {
    store.refresh().catch((error) => {
      logger.error({ error }, 'Refresh failed');
    });
    res.status(202).json({ city: store.getState().city });
  });

  // Error handling
  app.use((err: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    logger.error({ error: err }, 'Unhandled error in Express');
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}

export async function startServer(
  store: WeatherStore,
  port: number,
  host: string = '0.0.0.0'
): Promise<Server> {
  const app = createApp(store);

  return new Promise((resolve) => {
    const server = app.listen(port, host, () => {
      logger.info({ host, port }, 'HTTP server started');
      resolve(server);
    });
  });
}
