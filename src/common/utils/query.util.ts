import { HttpException, HttpStatus } from '@nestjs/common';
import { QuarterSlot, parseClockSlot, parseHourList } from './time-slot.util';

/**
 * Query string parsers for controller parameters
 *
 * Each parser returns the fallback when the parameter is absent and throws a
 * 400 HttpException when it is present but malformed.
 */

function readString(name: string, value: unknown): string | undefined {
  if (value === undefined || value === '') {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new HttpException(`${name} must be given once`, HttpStatus.BAD_REQUEST);
  }
  return value;
}

export function parseNumberParam(name: string, value: unknown, fallback: number): number {
  const text = readString(name, value);
  if (text === undefined) {
    return fallback;
  }

  const parsed = Number(text);
  if (!Number.isFinite(parsed)) {
    throw new HttpException(`${name} must be a number`, HttpStatus.BAD_REQUEST);
  }
  return parsed;
}

export function parseCountParam(name: string, value: unknown, fallback: number): number {
  const parsed = parseNumberParam(name, value, fallback);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new HttpException(`${name} must be a non-negative integer`, HttpStatus.BAD_REQUEST);
  }
  return parsed;
}

export function parseBooleanParam(name: string, value: unknown, fallback: boolean): boolean {
  const text = readString(name, value);
  if (text === undefined) {
    return fallback;
  }

  switch (text.toLowerCase()) {
    case 'true':
    case '1':
    case 'yes':
      return true;
    case 'false':
    case '0':
    case 'no':
      return false;
    default:
      throw new HttpException(`${name} must be true or false`, HttpStatus.BAD_REQUEST);
  }
}

export function parseHoursParam(name: string, value: unknown, fallback: string): number[] {
  const hours = parseHourList(readString(name, value) ?? fallback);
  if (hours === null) {
    throw new HttpException(`${name} must be a comma separated list of hours 0-23`, HttpStatus.BAD_REQUEST);
  }
  return hours;
}

export function parseSlotParam(name: string, value: unknown): QuarterSlot | undefined {
  const text = readString(name, value);
  if (text === undefined) {
    return undefined;
  }

  const slot = parseClockSlot(text);
  if (slot === null) {
    throw new HttpException(`${name} must be a time of day like 13 or 13:15`, HttpStatus.BAD_REQUEST);
  }
  return slot;
}
