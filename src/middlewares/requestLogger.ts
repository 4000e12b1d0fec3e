import morgan, { StreamOptions } from 'morgan';
import { getLogger } from '../utils';
import { env } from '../config';

const logger = getLogger('HTTP');

// Morgan stream for Winston
const stream: StreamOptions = {
  write: (message: string) => {
    logger.http(message.trim());
  },
};

// Skip logging in test environment
const skip = (): boolean => {
  return env.NODE_ENV === 'test';
};

// Request logger middleware
export const requestLogger = morgan(
  env.NODE_ENV === 'production' ? 'combined' : 'dev',
  { stream, skip }
);

export default requestLogger;

