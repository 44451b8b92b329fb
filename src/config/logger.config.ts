import { WinstonModule, utilities as nestWinstonUtilities } from 'nest-winston';
import * as winston from 'winston';
import { readEnvironment } from './env.validation';

const env = readEnvironment();
const isProduction = env.NODE_ENV === 'production';

export const winstonConfig = WinstonModule.createLogger({
  level: env.LOG_LEVEL,
  transports: [
    new winston.transports.Console({
      format: isProduction
        ? winston.format.combine(winston.format.timestamp(), winston.format.errors({ stack: true }), winston.format.json())
        : winston.format.combine(
            winston.format.timestamp(),
            winston.format.ms(),
            nestWinstonUtilities.format.nestLike('SeatBooking', { colors: true, prettyPrint: true }),
          ),
    }),
  ],
});
