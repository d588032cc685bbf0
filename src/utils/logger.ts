import winston from 'winston';
import { config } from '../config/env.js';

type LogEntry = winston.Logform.TransformableInfo;

const formatEntry = (service: string, { timestamp, level, message, tags = [], ...rest }: LogEntry, space?: number) =>
  JSON.stringify({
    timestamp,
    service,
    level,
    tags: Array.isArray(tags) ? tags : [tags],
    message,
    data: rest
  }, null, space);

// One JSON object per line; colour codes would be escaped inside the JSON
const consoleFormat = (service: string) => winston.format.printf(info => formatEntry(service, info));

// Create Winston loggers for each service with proper formatting
const createServiceLogger = (service: string) => {
  const transports: winston.transport[] = [
    new winston.transports.Console({
      format: consoleFormat(service)
    })
  ];

  if (config.logFile) {
    transports.push(new winston.transports.File({
      filename: config.logFile,
      level: 'debug'
    }));
  }

  return winston.createLogger({
    level: config.logLevel,
    silent: config.nodeEnv === 'test',
    format: winston.format.combine(
      winston.format.timestamp({
        format: 'YYYY-MM-DD HH:mm:ss.SSS'
      }),
      winston.format.printf(info => formatEntry(service, info, 2))
    ),
    transports
  });
};

const logger = createServiceLogger('server');
const registryLogger = createServiceLogger('registry');

// morgan writes one line per request, already newline-terminated
const httpLogStream = {
  write: (line: string) => {
    logger.http(line.trim(), { tags: ['access'] });
  }
};

const logRegistry = {
  seeded: (activityCount: number) => {
    registryLogger.info('Activity registry seeded', {
      tags: ['registry', 'seed'],
      activityCount
    });
  },
  signup: (activityName: string, email: string, participantCount: number, maxParticipants: number) => {
    registryLogger.info('Participant signed up', {
      tags: ['registry', 'signup'],
      activityName,
      email,
      spotsLeft: maxParticipants - participantCount
    });
  },
  unregister: (activityName: string, email: string, participantCount: number) => {
    registryLogger.info('Participant unregistered', {
      tags: ['registry', 'unregister'],
      activityName,
      email,
      participantCount
    });
  },
  rejected: (operation: 'signup' | 'unregister', activityName: string, email: string, reason: string) => {
    registryLogger.warn('Registry operation rejected', {
      tags: ['registry', operation, 'rejected'],
      activityName,
      email,
      reason
    });
  }
};

export {
  logger,
  logRegistry,
  httpLogStream,
  consoleFormat
};

export default logger;
