import cron from 'node-cron';
import { ConfigInvalid } from '../errors';

export interface CronSchedule {
  expression: string;
}

/** Standard 5-field expression (minute hour day month weekday), checked by node-cron. */
export function parseCron(expr: string): CronSchedule {
  const trimmed = String(expr || '').trim();
  const parts = trimmed.split(/\s+/).filter(Boolean);
  // node-cron also takes a leading seconds field; tenants get minute resolution only
  if (parts.length !== 5) {
    throw new ConfigInvalid(`Invalid cron expression "${trimmed}": expected 5 fields, got ${parts.length}`, 'cron');
  }
  const expression = parts.join(' ');
  if (!cron.validate(expression)) throw new ConfigInvalid(`Invalid cron expression "${expression}"`, 'cron');
  return { expression };
}
