/**
 * Schedule Types
 *
 * The persisted scheduler configuration (vcf-monitoring-schedule.json).
 */

export type ScheduleType = 'interval' | 'cron';

export type IntervalUnit = 'minutes' | 'hours' | 'days';

export interface ScheduleConfig {
  schedule_type: ScheduleType;
  interval_unit: IntervalUnit;
  interval_value: number;
  /** Five-field cron expression, used when schedule_type is "cron" */
  cron_expression: string;
  /** Names of the VMs to process; null means all VMs */
  vm_names: string[] | null;
  force_update: boolean;
  /** Set while a scheduler process is active */
  enabled: boolean;
  /** ISO timestamp of the last completed run */
  last_run: string | null;
  /** ISO timestamp of the next planned run */
  next_run: string | null;
}

export const DEFAULT_SCHEDULE_CONFIG: Readonly<ScheduleConfig> = {
  schedule_type: 'interval',
  interval_unit: 'days',
  interval_value: 1,
  cron_expression: '0 0 * * *',
  vm_names: null,
  force_update: false,
  enabled: false,
  last_run: null,
  next_run: null,
};

/**
 * Options accepted by `schedule configure`
 */
export interface FriendlyScheduleOptions {
  /** HH:MM */
  daily?: string;
  /** DAY [HH:MM] */
  weekly?: string[];
  /** DAY_OF_MONTH [HH:MM] */
  monthly?: string[];
  /** VALUE UNIT */
  every?: string[];
  cron?: string;
}
