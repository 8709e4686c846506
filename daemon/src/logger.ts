import pino from 'pino';

export const logger = pino({
  name: 'daemon',
  level: process.env.LOG_LEVEL || 'info',
});
