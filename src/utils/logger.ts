import winston from 'winston';
import path from 'path';
import { resolveLogLevel } from './config';

const logLevel = resolveLogLevel();
const logDir = path.resolve(process.cwd(), 'logs');
const isTest = process.env.NODE_ENV === 'test';

// stdout carries the MCP protocol, so the console transport writes everything to stderr
const consoleTransport = new winston.transports.Console({
  stderrLevels: Object.keys(winston.config.npm.levels),
  format: winston.format.combine(
    winston.format.colorize(),
    winston.format.printf(({ timestamp, level, message, ...meta }) => {
      const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
      return `${timestamp} [${level}]: ${message}${metaStr}`;
    })
  )
});

export const logger = winston.createLogger({
  level: logLevel,
  silent: isTest,
  format: winston.format.combine(
    winston.format.timestamp({
      format: 'YYYY-MM-DD HH:mm:ss'
    }),
    winston.format.errors({ stack: true }),
    winston.format.json()
  ),
  defaultMeta: { service: 'meeting-transcriber' },
  transports: isTest
    ? [consoleTransport]
    : [
        new winston.transports.File({
          filename: path.join(logDir, 'error.log'),
          level: 'error',
          maxsize: 5242880, // 5MB
          maxFiles: 5
        }),
        new winston.transports.File({
          filename: path.join(logDir, 'transcriber.log'),
          maxsize: 5242880,
          maxFiles: 5
        })
      ]
});

if (!isTest && process.env.NODE_ENV !== 'production') {
  logger.add(consoleTransport);
}

export type StageStatus = 'started' | 'completed' | 'failed';

export function logStageStatus(
  jobName: string,
  stage: string,
  status: StageStatus,
  details: Record<string, unknown> = {}
): void {
  const level = status === 'failed' ? 'error' : 'info';
  logger.log(level, 'stage_status', {
    jobName,
    stage,
    status,
    ...details
  });
}
