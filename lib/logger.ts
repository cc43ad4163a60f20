import pino from 'pino';
import { CONFIG } from './config';

/**
 * Process-wide pino logger. Modules take a child with their own `module`
 * binding; credential fields are redacted wherever they appear.
 */
const logger = pino({
  name: 'host-identity',
  level: CONFIG.LOG_LEVEL,
  redact: {
    paths: ['credential.password', '*.credential.password', 'password'],
    censor: '[redacted]',
  },
});

export default logger;
