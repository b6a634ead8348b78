import cron, { type ScheduledTask } from 'node-cron';
import { createLogger } from '../utils/logger.js';
import { ConfigError } from '../utils/errors.js';
import type { WeatherStore } from '../core/weather/WeatherStore.js';

const logger = createLogger({ component: 'scheduler' });

/** Periodically re-fetches weather for whichever city is selected when the job fires. */
export function scheduleRefresh(store: WeatherStore, cronExpression: string): ScheduledTask {
  if (!cron.validate(cronExpression)) {
    throw new ConfigError(`Invalid REFRESH_CRON expression: ${cronExpression}`);
  }

  logger.info({ cronExpression }, 'Scheduling weather refresh job');

  return cron.schedule(cronExpression, () => {
    const city = store.getState().city;
    logger.debug({ city }, 'Scheduled refresh');
    store.refresh().catch((error) => {
      logger.error({ error, city }, 'Scheduled weather refresh failed');
    });
  });
}
