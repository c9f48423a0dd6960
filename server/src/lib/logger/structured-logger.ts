/**
 * Structured Logger with Pino
 *
 * - JSON logging, ISO timestamps, label levels
 * - Pretty console output in development
 * - Optional daily rotated log file
 * - Secret redaction
 * - Request tracking via child loggers
 */

import pino from 'pino';
import * as rfs from 'rotating-file-stream';
import pinoPretty from 'pino-pretty';
import path from 'node:path';
import fs from 'node:fs';
import { getLoggingConfig } from '../../config/logging.config.js';

const config = getLoggingConfig();

function createFileStream(): rfs.RotatingFileStream | undefined {
  if (!config.toFile) return undefined;

  const logsDir = path.resolve(process.cwd(), config.dir);
  if (!fs.existsSync(logsDir)) {
    fs.mkdirSync(logsDir, { recursive: true });
  }

  return rfs.createStream('server.log', {
    interval: '1d',
    path: logsDir,
    maxFiles: config.rotateDays,
    compress: 'gzip'
  });
}

const fileStream = createFileStream();

const streams: pino.StreamEntry[] = [];
if (config.console) {
  streams.push({
    level: config.level === 'silent' ? 'fatal' : config.level,
    stream: config.pretty
      ? pinoPretty({ colorize: true, translateTime: 'SYS:HH:MM:ss', ignore: 'pid,hostname' })
      : process.stdout
  });
}
if (fileStream) {
  streams.push({ level: config.level === 'silent' ? 'fatal' : config.level, stream: fileStream });
}

export const logger = pino(
  {
    level: config.level,
    redact: {
      paths: config.redactFields,
      censor: '[REDACTED]'
    },
    formatters: {
      level: (label) => ({ level: label })
    },
    timestamp: pino.stdTimeFunctions.isoTime
  },
  pino.multistream(streams)
);

export type Logger = pino.Logger;
