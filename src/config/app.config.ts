import { registerAs } from '@nestjs/config';
import { readEnvironment } from './env.validation';

export default registerAs('app', () => {
  const env = readEnvironment();

  return {
    port: env.PORT,
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    rateLimitTtl: env.RATE_LIMIT_TTL,
    rateLimitMax: env.RATE_LIMIT_MAX,
  };
});
