import { HttpException, HttpStatus } from '@nestjs/common';
import { LoggingService } from '../logging.service';
import { isConversionRateUnavailable, isPriceNotFound } from './price.errors';

/**
 * Maps a failure raised while serving a request onto the HTTP response
 *
 * - HttpException: passed through
 * - PRICE_NOT_FOUND: 404
 * - CONVERSION_RATE_UNAVAILABLE: 502
 * - anything else: logged, 503
 */
export function toHttpException(error: unknown, action: string, logger: LoggingService, context: string): HttpException {
  if (error instanceof HttpException) {
    return error;
  }

  if (isPriceNotFound(error)) {
    logger.warn(`${action}: ${error.message}`, context);
    return new HttpException('prices not found', HttpStatus.NOT_FOUND);
  }

  if (isConversionRateUnavailable(error)) {
    logger.warn(`${action}: ${error.message}`, context);
    return new HttpException('conversion rate unavailable', HttpStatus.BAD_GATEWAY);
  }

  logger.error(`Failed to ${action}`, error, context);
  return new HttpException(`Failed to ${action}`, HttpStatus.SERVICE_UNAVAILABLE);
}
