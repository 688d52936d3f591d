import { Injectable } from '@nestjs/common';
import { Cron, CronExpression } from '@nestjs/schedule';
import * as fs from 'fs';
import * as path from 'path';
import dayjs from 'dayjs';
import { Constants } from '../constants';

type LogLevel = 'debug' | 'verbose' | 'info' | 'warn' | 'error';

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  verbose: 1,
  info: 2,
  warn: 3,
  error: 4
};

/**
 * Centralized logging service for the entire application
 *
 * Writes context-tagged entries to a daily file and echoes errors to the console.
 * Replaces the default NestJS Logger inside services so every price fetch,
 * cache access and plan computation ends up in the same file.
 *
 * Configuration:
 * - LOG_DIR: Directory for log files (default: 'logs')
 * - APP_NAME: Application name for log file naming (default: 'spot-price-calculator')
 * - LOG_LEVEL: Lowest level written (DEBUG, VERBOSE, INFO, WARN, ERROR; default: INFO)
 * - LOG_MAX_AGE_DAYS: Age after which daily files are removed (default: 5)
 *
 * Output Files:
 * - {APP_NAME}-YYYY-MM-DD.log
 */
@Injectable()
export class LoggingService {
  private readonly logDir: string;
  private readonly appName: string;
  private readonly minRank: number;

  constructor() {
    this.logDir = Constants.LOGGING.LOG_DIR;
    this.appName = Constants.LOGGING.APP_NAME;
    this.minRank = LoggingService.parseLevel(Constants.LOGGING.LOG_LEVEL);

    if (!fs.existsSync(this.logDir)) {
      fs.mkdirSync(this.logDir, { recursive: true });
    }

    this.cleanOldLogFiles();
  }

  private static parseLevel(level: string): number {
    switch (level) {
      case 'DEBUG':
        return LEVEL_RANK.debug;
      case 'VERBOSE':
        return LEVEL_RANK.verbose;
      case 'WARN':
        return LEVEL_RANK.warn;
      case 'ERROR':
        return LEVEL_RANK.error;
      default:
        return LEVEL_RANK.info;
    }
  }

  private writeToFile(level: LogLevel, message: string, context?: string): void {
    if (LEVEL_RANK[level] < this.minRank) {
      return;
    }

    const now = dayjs();
    const contextString = context ? `[${context}] ` : '';
    const logMessage = `${now.format('YYYY-MM-DD HH:mm:ss')} [${level.toUpperCase()}] ${contextString}${message}\n`;
    const logFile = path.join(this.logDir, `${this.appName}-${now.format('YYYY-MM-DD')}.log`);

    try {
      fs.appendFileSync(logFile, logMessage);
    } catch (error) {
      console.error('Failed to write to log file:', error);
    }
  }

  /**
   * Log debug message
   */
  public debug(message: string, context?: string): void {
    this.writeToFile('debug', message, context);
  }

  /**
   * Log info message
   */
  public log(message: string, context?: string): void {
    this.writeToFile('info', message, context);
  }

  /**
   * Log warning message
   */
  public warn(message: string, context?: string): void {
    this.writeToFile('warn', message, context);
  }

  /**
   * Log error message, with the stack when an Error is given
   */
  public error(message: string, error?: unknown, context?: string): void {
    let fullMessage = message;
    if (error instanceof Error) {
      fullMessage = `${message}: ${error.message}\n${error.stack}`;
    } else if (typeof error === 'string') {
      fullMessage = `${message}: ${error}`;
    }

    console.error(`[ERROR] ${context ? `[${context}] ` : ''}${fullMessage}`);
    this.writeToFile('error', fullMessage, context);
  }

  /**
   * Log verbose message
   */
  public verbose(message: string, context?: string): void {
    this.writeToFile('verbose', message, context);
  }

  /**
   * Removes this application's log files older than LOG_MAX_AGE_DAYS
   * Called on startup and daily via cron
   */
  @Cron(CronExpression.EVERY_DAY_AT_2AM)
  public cleanOldLogFiles(): void {
    try {
      if (!fs.existsSync(this.logDir)) {
        return;
      }

      const now = Date.now();
      const maxAge = Constants.LOGGING.MAX_AGE_DAYS * 24 * 60 * 60 * 1000;

      for (const file of fs.readdirSync(this.logDir)) {
        if (!file.startsWith(this.appName) || !file.endsWith('.log')) {
          continue;
        }

        const filePath = path.join(this.logDir, file);
        const fileAge = now - fs.statSync(filePath).mtime.getTime();

        if (fileAge > maxAge) {
          fs.unlinkSync(filePath);
          const ageInDays = Math.round(fileAge / (24 * 60 * 60 * 1000));
          this.writeToFile('info', `Deleted old log file: ${file} (${ageInDays} days old)`, 'LogCleanup');
        }
      }
    } catch (error) {
      console.error('Failed to clean old log files:', error);
    }
  }
}
