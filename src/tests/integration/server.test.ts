import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { Server } from 'node:http';
import { startServer } from '../../server.js';
import { WeatherStore } from '../../core/weather/WeatherStore.js';
import type { CurrentWeatherPort, ForecastPort } from '../../ports/WeatherPort.js';
import { NetworkError } from '../../utils/errors.js';
import { buildCurrentWeather, buildForecastEntry, fail, ok } from '../fixtures/weather.js';

describe('HTTP server', () => {
  const fetchCurrentWeather = vi.fn<CurrentWeatherPort['fetchCurrentWeather']>();
  const fetchForecast = vi.fn<ForecastPort['fetchForecast']>();
  let store: WeatherStore;
  let server: Server;
  let baseUrl: string;

  beforeEach(async () => {
    fetchCurrentWeather.mockReset();
    fetchForecast.mockReset();
    fetchCurrentWeather.mockImplementation(async (city) => ok(buildCurrentWeather({ name: city })));
    fetchForecast.mockResolvedValue(ok([buildForecastEntry(1768500000, 3.2, 600)]));

    store = new WeatherStore({
      currentWeatherPort: { fetchCurrentWeather },
      forecastPort: { fetchForecast },
      defaultCity: 'Montreal',
      cities: ['Montreal', 'Toronto', 'Vancouver'],
    });
    server = await startServer(store, 0, '127.0.0.1');
    const address = server.address();
    if (!address || typeof address === 'string') throw new Error('Server is not listening on a port');
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    await new Promise<void>((resolve, reject) => {
      server.closeAllConnections();
      server.close((error) => (error ? reject(error) : resolve()));
    });
  });

  it('responds to health checks', async () => {
    const response = await fetch(`${baseUrl}/health`);

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({ status: 'ok' });
  });

  it('lists the selectable cities', async () => {
    const response = await fetch(`${baseUrl}/api/cities`);

    expect(await response.json()).toEqual({
      selected: 'Montreal',
      cities: ['Montreal', 'Toronto', 'Vancouver'],
    });
  });

  it('selects a city and loads its weather', async () => {
    const response = await fetch(`${baseUrl}/api/city`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ city: 'Toronto' }),
    });

    expect(response.status).toBe(202);
    expect(await response.json()).toEqual({ city: 'Toronto' });
    await vi.waitFor(() => expect(store.getState().currentWeather?.name).toBe('Toronto'));
    expect(fetchForecast).toHaveBeenCalledWith('Toronto');

    const view = await (await fetch(`${baseUrl}/api/view`)).json();
    expect(view).toMatchObject({
      city: 'Toronto',
      loading: false,
      current: { title: 'Toronto, CA' },
      hourly: [{ icon: 'snow', temperature: 3 }],
    });
  });

  it('encodes a city name with spaces once before it reaches the clients', async () => {
    const response = await fetch(`${baseUrl}/api/city`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ city: 'New York' }),
    });

    expect(response.status).toBe(202);
    await vi.waitFor(() => expect(fetchCurrentWeather).toHaveBeenCalledWith('New%20York'));
    expect(fetchForecast).toHaveBeenCalledWith('New%20York');
  });

  it('rejects a city selection without a city', async () => {
    const response = await fetch(`${baseUrl}/api/city`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ city: '  ' }),
    });

    expect(response.status).toBe(400);
    expect(fetchCurrentWeather).not.toHaveBeenCalled();
  });

  it('exposes the last error alongside the retained data', async () => {
    await store.start();
    fetchCurrentWeather.mockResolvedValueOnce(
      fail(new NetworkError('OpenWeather API error: 502', { status: 502 }))
    );
    await store.refresh();

    const state = await (await fetch(`${baseUrl}/api/state`)).json();

    expect(state).toMatchObject({
      city: 'Montreal',
      currentWeather: { name: 'Montreal' },
      lastError: {
        name: 'NetworkError',
        code: 'WEATHER_NETWORK',
        message: 'OpenWeather API error: 502',
      },
    });
  });

  it('triggers a refresh of the selected city', async () => {
    const response = await fetch(`${baseUrl}/api/refresh`, { method: 'POST' });

    expect(response.status).toBe(202);
    await vi.waitFor(() => expect(fetchCurrentWeather).toHaveBeenCalledWith('Montreal'));
  });
});
