import type { StaleResponsePolicy } from '../../config/index.js';
import type {
  CurrentWeather,
  CurrentWeatherPort,
  Forecast,
  ForecastPort,
  WeatherResult,
} from '../../ports/WeatherPort.js';
import { InvalidInputError, type WeatherError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';

export interface WeatherState {
  readonly city: string;
  readonly cities: readonly string[];
  readonly currentWeather: CurrentWeather | null;
  readonly forecast: Forecast | null;
  readonly lastError: WeatherError | null;
}

type ErrorSource = 'selection' | 'currentWeather' | 'forecast';

export type WeatherStateListener = (state: WeatherState) => void;

export interface WeatherStoreOptions {
  currentWeatherPort: CurrentWeatherPort;
  forecastPort: ForecastPort;
  defaultCity: string;
  cities: readonly string[];
  staleResponsePolicy?: StaleResponsePolicy;
}

/**
 * Holds the latest current-weather and forecast snapshots for the selected city.
 *
 * Both fetches are issued together and complete independently; each one writes only its own
 * slot. A failed fetch leaves the previous data in place and is reported through `lastError`,
 * which stays set until the slot that failed (or any slot, after a rejected selection) succeeds.
 * Under the `selected-city` policy a response is dropped if the user has moved on to another
 * city by the time it arrives. Under `last-completion`, whichever response lands last wins.
 */
export class WeatherStore {
  private readonly logger = createLogger({ component: 'WeatherStore' });
  private readonly currentWeatherPort: CurrentWeatherPort;
  private readonly forecastPort: ForecastPort;
  private readonly staleResponsePolicy: StaleResponsePolicy;
  private listeners: WeatherStateListener[] = [];
  private state: WeatherState;
  private errorSource: ErrorSource | null = null;

  constructor(options: WeatherStoreOptions) {
    this.currentWeatherPort = options.currentWeatherPort;
    this.forecastPort = options.forecastPort;
    this.staleResponsePolicy = options.staleResponsePolicy ?? 'selected-city';
    this.state = Object.freeze({
      city: options.defaultCity,
      cities: Object.freeze([...options.cities]),
      currentWeather: null,
      forecast: null,
      lastError: null,
    });
  }

  getState(): WeatherState {
    return this.state;
  }

  subscribe(listener: WeatherStateListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((registered) => registered !== listener);
    };
  }

  /** Initial load for the default city. */
  async start(): Promise<void> {
    this.logger.info({ city: this.state.city }, 'Loading weather for default city');
    await this.load(this.state.city);
  }

  async selectCity(city: string): Promise<void> {
    const logger = this.logger.child({ method: 'selectCity' });
    const selected = city.trim();

    if (selected.length === 0) {
      logger.warn('Ignoring empty city selection');
      this.setError('selection', new InvalidInputError('City must be a non-empty string'));
      return;
    }

    logger.info({ city: selected, previous: this.state.city }, 'City selected');
    this.setState({ city: selected });
    await this.load(selected);
  }

  async refresh(): Promise<void> {
    await this.load(this.state.city);
  }

  private async load(city: string): Promise<void> {
    // Issued together; neither waits on the other
    await Promise.all([this.loadCurrentWeather(city), this.loadForecast(city)]);
  }

  // Ports take the city URL-encoded; state keeps it as the user typed it
  private async loadCurrentWeather(city: string): Promise<void> {
    const result = await this.currentWeatherPort.fetchCurrentWeather(encodeURIComponent(city));
    this.apply(city, 'currentWeather', result, (value) => ({ currentWeather: value }));
  }

  private async loadForecast(city: string): Promise<void> {
    const result = await this.forecastPort.fetchForecast(encodeURIComponent(city));
    this.apply(city, 'forecast', result, (value) => ({ forecast: Object.freeze([...value]) }));
  }

  private apply<T>(
    city: string,
    slot: 'currentWeather' | 'forecast',
    result: WeatherResult<T>,
    toPatch: (value: T) => Partial<WeatherState>
  ): void {
    const logger = this.logger.child({ method: 'apply', slot, city });

    if (this.staleResponsePolicy === 'selected-city' && city !== this.state.city) {
      logger.info({ selected: this.state.city }, 'Discarding response for a city no longer selected');
      return;
    }

    if (result.ok) {
      const clearsError = this.errorSource === slot || this.errorSource === 'selection';
      if (clearsError) {
        this.errorSource = null;
      }
      this.setState(clearsError ? { ...toPatch(result.value), lastError: null } : toPatch(result.value));
      return;
    }

    logger.error({ error: result.error }, 'Weather fetch failed; keeping previous data');
    this.setError(slot, result.error);
  }

  private setError(source: ErrorSource, error: WeatherError): void {
    this.errorSource = source;
    this.setState({ lastError: error });
  }

  private setState(patch: Partial<WeatherState>): void {
    this.state = Object.freeze({ ...this.state, ...patch });
    for (const listener of this.listeners) {
      try {
        listener(this.state);
      } catch (error) {
        this.logger.error({ error }, 'Weather state listener threw');
      }
    }
  }
}
