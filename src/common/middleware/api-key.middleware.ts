import { Inject, Injectable, NestMiddleware } from '@nestjs/common';
import { NextFunction, Request, Response } from 'express';
import { Constants } from '../../constants';
import { LoggingService } from '../logging.service';

/**
 * Middleware for API key validation
 *
 * Validates the X-API-Key header against the configured API key.
 * Closes connection without response if key is missing or invalid.
 * With no API_KEY configured every request is accepted.
 */
@Injectable()
export class ApiKeyMiddleware implements NestMiddleware {
  private readonly context = ApiKeyMiddleware.name;

  @Inject(LoggingService)
  private readonly logger!: LoggingService;

  /**
   * Validates API key from request headers
   * @param req - Express request object
   * @param res - Express response object
   * @param next - Next function to call if validation passes
   */
  public use(req: Request, res: Response, next: NextFunction): void {
    const expectedApiKey = Constants.API.KEY;

    if (!expectedApiKey || req.method === 'OPTIONS') {
      return next();
    }

    const apiKey = req.headers['x-api-key'];

    if (typeof apiKey !== 'string' || apiKey === '') {
      this.logger.warn(
        `API request rejected: No API key provided - ${req.method} ${req.originalUrl} from ${req.ip}`,
        this.context
      );
      res.destroy();
      return;
    }

    if (apiKey !== expectedApiKey) {
      this.logger.warn(
        `API request rejected: Invalid API key - ${req.method} ${req.originalUrl} from ${req.ip}`,
        this.context
      );
      res.destroy();
      return;
    }

    next();
  }
}
