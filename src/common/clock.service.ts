import { Injectable } from '@nestjs/common';
import dayjs, { Dayjs } from 'dayjs';
import utc from 'dayjs/plugin/utc';
import timezone from 'dayjs/plugin/timezone';
import { Constants } from '../constants';
import { QuarterSlot, toQuarterSlot } from './utils/time-slot.util';

dayjs.extend(utc);
dayjs.extend(timezone);

const DATE_FORMAT = 'YYYY-MM-DD';

/**
 * Source of the market's current date and slot
 *
 * Injected wherever "today" matters so the evaluation date stays explicit
 * and can be pinned in tests.
 */
@Injectable()
export class ClockService {
  public now(): Dayjs {
    return dayjs().tz(Constants.MARKET.TIMEZONE);
  }

  public today(): string {
    return this.now().format(DATE_FORMAT);
  }

  public currentSlot(): QuarterSlot {
    const now = this.now();
    return toQuarterSlot(now.hour(), now.minute());
  }
}

/**
 * Checks that a value is a real calendar date in YYYY-MM-DD form
 */
export function isIsoDate(value: string): boolean {
  return /^\d{4}-\d{2}-\d{2}$/.test(value) && dayjs(value).format(DATE_FORMAT) === value;
}

export function nextDay(date: string): string {
  return dayjs(date).add(1, 'day').format(DATE_FORMAT);
}

export function daysInMonth(date: string): number {
  return dayjs(date).daysInMonth();
}
