import { registerAs } from '@nestjs/config';
import { readEnvironment } from './env.validation';

export default registerAs('database', () => {
  const env = readEnvironment();

  return {
    host: env.DB_HOST,
    port: env.DB_PORT,
    username: env.DB_USERNAME,
    password: env.DB_PASSWORD,
    database: env.DB_DATABASE,
  };
});
