/**
 * Time slot helpers
 *
 * A market day is split either into 24 hourly slots keyed by the hour number,
 * or into 96 quarter-hour slots keyed by "H:MM". Both forms share the helpers
 * below so the rest of the code never inspects the key format itself.
 */

export type QuarterMinute = '00' | '15' | '30' | '45';

export type QuarterSlot = `${number}:${QuarterMinute}`;

export type TimeSlot = number | QuarterSlot;

export type SlotGranularity = 'hourly' | 'quarter-hourly';

const HOUR_KEY = /^\d{1,2}$/;
const QUARTER_KEY = /^(\d{1,2}):(00|15|30|45)$/;
const CLOCK_INPUT = /^(\d{1,2})(?::(\d{1,2}))?$/;

/**
 * Floors minutes to the start of their quarter hour
 */
export function floorToQuarter(minutes: number): QuarterMinute {
  if (minutes < 15) {
    return '00';
  } else if (minutes < 30) {
    return '15';
  } else if (minutes < 45) {
    return '30';
  }
  return '45';
}

export function toQuarterSlot(hour: number, minutes: number): QuarterSlot {
  return `${hour}:${floorToQuarter(minutes)}`;
}

/**
 * Parses a user supplied clock value ("13", "13:20", "08:05") into a quarter slot
 * @returns The slot, or null when the value is not a valid time of day
 */
export function parseClockSlot(input: string): QuarterSlot | null {
  const match = CLOCK_INPUT.exec(input.trim());
  if (!match) {
    return null;
  }

  const hour = Number(match[1]);
  const minutes = match[2] === undefined ? 0 : Number(match[2]);
  if (hour > 23 || minutes > 59) {
    return null;
  }

  return toQuarterSlot(hour, minutes);
}

/**
 * Parses a stored series key back into a slot ("7" -> 7, "7:45" -> "7:45")
 */
export function parseSlotKey(key: string): TimeSlot | null {
  if (HOUR_KEY.test(key)) {
    return Number(key);
  }

  const match = QUARTER_KEY.exec(key);
  if (!match) {
    return null;
  }
  return toQuarterSlot(Number(match[1]), Number(match[2]));
}

export function slotHour(slot: TimeSlot): number {
  return typeof slot === 'number' ? slot : Number(slot.split(':')[0]);
}

/**
 * Minutes since midnight of the slot start
 */
export function slotOrdinal(slot: TimeSlot): number {
  if (typeof slot === 'number') {
    return slot * 60;
  }
  const [hour, minutes] = slot.split(':');
  return Number(hour) * 60 + Number(minutes);
}

export function compareSlots(a: TimeSlot, b: TimeSlot): number {
  return slotOrdinal(a) - slotOrdinal(b);
}

export function slotKey(slot: TimeSlot): string {
  return String(slot);
}

export function detectGranularity(slots: readonly TimeSlot[]): SlotGranularity {
  return slots.length > 0 && typeof slots[0] === 'string' ? 'quarter-hourly' : 'hourly';
}

/**
 * Maps a quarter slot onto the granularity of a series, so "13:15" addresses hour 13 in hourly data
 */
export function resolveSlot(slot: QuarterSlot, granularity: SlotGranularity): TimeSlot {
  return granularity === 'hourly' ? slotHour(slot) : slot;
}

/**
 * Parses a comma separated hour list ("0,1,2,20") into hour numbers
 * @returns Unique hours, or null when an entry is not an hour of day
 */
export function parseHourList(input: string): number[] | null {
  const hours: number[] = [];

  for (const part of input.split(',')) {
    const value = part.trim();
    if (value === '') {
      continue;
    }
    if (!HOUR_KEY.test(value) || Number(value) > 23) {
      return null;
    }
    if (!hours.includes(Number(value))) {
      hours.push(Number(value));
    }
  }

  return hours;
}
