/**
 * Human-readable schedule descriptions
 */

import type { ScheduleConfig } from './types.js';

const DAY_NAMES = ['Sunday', 'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday'];

const COMMON_PATTERNS: Record<string, string> = {
  '0 0 * * *': 'Daily at midnight',
  '0 12 * * *': 'Daily at noon',
  '0 0 * * 0': 'Weekly on Sunday at midnight',
  '0 0 1 * *': 'Monthly on the 1st at midnight',
  '0 0 1 1 *': 'Yearly on January 1st at midnight',
};

function toInt(field: string): number | undefined {
  return /^\d+$/.test(field) ? Number.parseInt(field, 10) : undefined;
}

/**
 * "midnight", "noon", "9am", "2:30pm"
 */
export function formatClockTime(hour: number, minute: number): string {
  if (minute === 0 && hour === 0) return 'midnight';
  if (minute === 0 && hour === 12) return 'noon';

  const suffix = hour < 12 ? 'am' : 'pm';
  const hour12 = hour % 12 === 0 ? 12 : hour % 12;
  return minute === 0
    ? `${hour12}${suffix}`
    : `${hour12}:${String(minute).padStart(2, '0')}${suffix}`;
}

/**
 * "1st", "2nd", "3rd", "11th", "22nd"
 */
export function ordinal(day: number): string {
  if ((day >= 4 && day <= 20) || (day >= 24 && day <= 30)) {
    return `${day}th`;
  }
  const suffixes: Record<number, string> = { 1: 'st', 2: 'nd', 3: 'rd' };
  return `${day}${suffixes[day % 10] ?? 'th'}`;
}

function describeCron(expression: string): string {
  const parts = expression.trim().split(/\s+/);
  const [minute, hour, dayOfMonth, month, dayOfWeek] = parts;
  if (
    parts.length !== 5 ||
    minute === undefined ||
    hour === undefined ||
    dayOfMonth === undefined ||
    month === undefined ||
    dayOfWeek === undefined
  ) {
    return `Custom schedule: ${expression}`;
  }

  const h = toInt(hour);
  const m = toInt(minute);
  const at = h !== undefined && m !== undefined ? formatClockTime(h, m) : undefined;

  if (month === '*' && at !== undefined) {
    if (dayOfMonth === '*' && dayOfWeek === '*') {
      return `Daily at ${at}`;
    }

    const dow = toInt(dayOfWeek);
    if (dayOfMonth === '*' && dow !== undefined) {
      return `Weekly on ${DAY_NAMES[dow % 7] ?? 'Sunday'} at ${at}`;
    }

    const dom = toInt(dayOfMonth);
    if (dom !== undefined && dayOfWeek === '*') {
      return `Monthly on the ${ordinal(dom)} at ${at}`;
    }
  }

  return COMMON_PATTERNS[expression.trim()] ?? `Custom schedule: ${expression}`;
}

/**
 * Describe a schedule, e.g. "Every 2 hours" or "Weekly on Monday at 9am".
 */
export function describeSchedule(config: Pick<ScheduleConfig, 'schedule_type' | 'interval_unit' | 'interval_value' | 'cron_expression'>): string {
  switch (config.schedule_type) {
    case 'interval': {
      const unit =
        config.interval_value === 1 ? config.interval_unit.replace(/s$/, '') : config.interval_unit;
      return `Every ${config.interval_value} ${unit}`;
    }
    case 'cron':
      return describeCron(config.cron_expression);
    default:
      return 'Unknown schedule';
  }
}
