import * as dotenv from 'dotenv';
import winston from 'winston';
import LokiTransport from 'winston-loki';
dotenv.config();
import os from 'os';

const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'debug',
  format: winston.format.json(),
  transports: [
    new winston.transports.Console({
      format: winston.format.printf((log) => `${process.env.APP_NAME || 'GAUGE_NODE'} | ${log.level} | ${log.message}`)
    })
  ]
});

if (process.env.LOKI_URI && process.env.LOKI_LOGIN && process.env.LOKI_PWD) {
  logger.add(
    new LokiTransport({
      level: 'debug',
      host: process.env.LOKI_URI,
      format: winston.format.printf((log) => `${log.message}`),
      json: true,
      labels: getLokiLabels(),
      basicAuth: `${process.env.LOKI_LOGIN}:${process.env.LOKI_PWD}`,
      useWinstonMetaAsLabels: false,
      batching: true
    })
  );
}

function getLokiLabels() {
  return {
    app: process.env.APP_NAME || 'GAUGE_NODE',
    host: os.hostname()
  };
}

export function Log(msg: string) {
  logger.info(msg);
}

export function Warn(msg: string) {
  logger.warn(msg);
}

export function Err(msg: string, error?: unknown) {
  if (error instanceof Error) {
    logger.error(`${msg}: ${error.message}`);
  } else if (error !== undefined) {
    logger.error(`${msg}: ${String(error)}`);
  } else {
    logger.error(msg);
  }
}

export default logger;
