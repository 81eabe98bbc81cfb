import { ConfigError } from './errorHandler';

/**
 * Maps a fixed polling interval onto a node-cron expression (six fields, seconds first).
 *
 * Only intervals that split a minute, an hour or a day evenly can be expressed as a
 * cron step without drifting; anything else is rejected.
 */
export function toCronExpression(intervalSeconds: number): string {
  if (!Number.isInteger(intervalSeconds) || intervalSeconds <= 0) {
    throw new ConfigError(`Poll interval must be a positive whole number of seconds, got ${intervalSeconds}`);
  }

  if (intervalSeconds < 60) {
    if (60 % intervalSeconds === 0) {
      return `*/${intervalSeconds} * * * * *`;
    }
  } else if (intervalSeconds % 60 === 0) {
    const minutes = intervalSeconds / 60;
    if (minutes < 60 && 60 % minutes === 0) {
      return `0 */${minutes} * * * *`;
    }
    if (minutes % 60 === 0) {
      const hours = minutes / 60;
      if (hours < 24 && 24 % hours === 0) {
        return `0 0 */${hours} * * *`;
      }
      if (hours === 24) {
        return '0 0 0 * * *';
      }
    }
  }

  throw new ConfigError(
    `Poll interval of ${intervalSeconds}s cannot be scheduled; use a divisor of 60 seconds, 60 minutes or 24 hours`
  );
}
