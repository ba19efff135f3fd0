/**
 * Structured logging for the perp router.
 *
 * Builds a winston logger that writes JSON lines to the console with the
 * level taken from LOG_LEVEL.
 */
import winston from 'winston';
import { formatUnits } from 'ethers';
import { PRICE_DECIMALS } from '../types';

const defaultLevel = process.env.LOG_LEVEL || (process.env.NODE_ENV === 'production' ? 'info' : 'debug');

export const logger = winston.createLogger({
  level: defaultLevel,
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json()
  ),
  defaultMeta: {
    service: 'perp-router',
    environment: process.env.NODE_ENV || 'development',
  },
  transports: [new winston.transports.Console()],
});

// Create a child logger with component information
export function createComponentLogger(component: string, metadata: Record<string, unknown> = {}): winston.Logger {
  return logger.child({
    component,
    ...metadata,
  });
}

/**
 * Render an 18-decimal fixed-point amount for log output
 */
export function formatAmount(value: bigint): string {
  return formatUnits(value, PRICE_DECIMALS);
}

export default logger;
