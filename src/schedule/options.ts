/**
 * Friendly Schedule Options
 *
 * Turns `--daily`, `--weekly`, `--monthly`, `--every` and `--cron` into
 * schedule configuration updates.
 */

import { Cron } from 'croner';

import { ScheduleError, errorMessage } from '../core/errors.js';
import type { FriendlyScheduleOptions, IntervalUnit, ScheduleConfig } from './types.js';

const DAYS_OF_WEEK: Record<string, number> = {
  sun: 0,
  sunday: 0,
  mon: 1,
  monday: 1,
  tue: 2,
  tuesday: 2,
  wed: 3,
  wednesday: 3,
  thu: 4,
  thursday: 4,
  fri: 5,
  friday: 5,
  sat: 6,
  saturday: 6,
};

const INTERVAL_UNITS: Record<string, IntervalUnit> = {
  minute: 'minutes',
  minutes: 'minutes',
  hour: 'hours',
  hours: 'hours',
  day: 'days',
  days: 'days',
};

function parseInteger(text: string): number | undefined {
  return /^\s*\d+\s*$/.test(text) ? Number.parseInt(text, 10) : undefined;
}

/**
 * Parse "HH" or "HH:MM" in 24-hour format.
 */
export function parseTimeOfDay(text: string): { hour: number; minute: number } {
  const [hourText = '', minuteText = '0', ...rest] = text.split(':');
  const hour = parseInteger(hourText);
  const minute = parseInteger(minuteText);

  if (hour === undefined || minute === undefined || rest.length > 0) {
    throw new ScheduleError(`Invalid time format: ${text}. Please use HH:MM in 24-hour format`);
  }
  if (hour > 23 || minute > 59) {
    throw new ScheduleError(
      `Invalid time format: ${text}. Please use HH:MM in 24-hour format (00-23:00-59)`
    );
  }
  return { hour, minute };
}

/**
 * Throw unless `expression` is a cron pattern croner accepts.
 */
export function assertValidCron(expression: string): void {
  try {
    new Cron(expression, { paused: true }).stop();
  } catch (error) {
    throw new ScheduleError(`Invalid cron expression "${expression}": ${errorMessage(error)}`);
  }
}

function optionalTime(args: string[]): { hour: number; minute: number } {
  const time = args[1];
  return time === undefined ? { hour: 0, minute: 0 } : parseTimeOfDay(time);
}

/**
 * Convert friendly options to configuration updates.
 *
 * Options are considered in the order daily, weekly, monthly, every, cron;
 * the first one present wins. Returns an empty object when none is given.
 *
 * @throws ScheduleError for malformed values
 */
export function scheduleUpdatesFromOptions(
  options: FriendlyScheduleOptions
): Partial<ScheduleConfig> {
  if (options.daily !== undefined) {
    const { hour, minute } = parseTimeOfDay(options.daily);
    return { schedule_type: 'cron', cron_expression: `${minute} ${hour} * * *` };
  }

  if (options.weekly !== undefined) {
    const dayText = options.weekly[0];
    if (dayText === undefined) {
      throw new ScheduleError('Weekly schedule requires at least the day of week');
    }
    const dayOfWeek = DAYS_OF_WEEK[dayText.toLowerCase()];
    if (dayOfWeek === undefined) {
      throw new ScheduleError(
        `Invalid day of week: ${dayText}. Use mon, tue, wed, thu, fri, sat, or sun`
      );
    }
    const { hour, minute } = optionalTime(options.weekly);
    return { schedule_type: 'cron', cron_expression: `${minute} ${hour} * * ${dayOfWeek}` };
  }

  if (options.monthly !== undefined) {
    const dayText = options.monthly[0];
    if (dayText === undefined) {
      throw new ScheduleError('Monthly schedule requires at least the day of month');
    }
    const dayOfMonth = parseInteger(dayText);
    if (dayOfMonth === undefined || dayOfMonth < 1 || dayOfMonth > 31) {
      throw new ScheduleError(
        `Invalid day of month: ${dayText}. Must be a number between 1 and 31`
      );
    }
    const { hour, minute } = optionalTime(options.monthly);
    return { schedule_type: 'cron', cron_expression: `${minute} ${hour} ${dayOfMonth} * *` };
  }

  if (options.every !== undefined) {
    const [valueText, unitText, ...rest] = options.every;
    if (valueText === undefined || unitText === undefined || rest.length > 0) {
      throw new ScheduleError("'--every' requires VALUE and UNIT arguments");
    }
    const value = parseInteger(valueText);
    if (value === undefined || value < 1) {
      throw new ScheduleError(
        `Invalid value for --every: ${valueText}. Must be a positive integer`
      );
    }
    const unit = INTERVAL_UNITS[unitText.toLowerCase()];
    if (unit === undefined) {
      throw new ScheduleError(
        `Invalid unit for --every: ${unitText}. Must be minutes, hours, or days`
      );
    }
    return { schedule_type: 'interval', interval_value: value, interval_unit: unit };
  }

  if (options.cron !== undefined) {
    assertValidCron(options.cron);
    return { schedule_type: 'cron', cron_expression: options.cron };
  }

  return {};
}
