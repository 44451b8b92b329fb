import { registerAs } from '@nestjs/config';
import { readEnvironment } from './env.validation';

export default registerAs('rabbitmq', () => {
  const env = readEnvironment();

  const url = `amqp://${env.RABBITMQ_USER}:${env.RABBITMQ_PASSWORD}@${env.RABBITMQ_HOST}:${env.RABBITMQ_PORT}`;

  return {
    host: env.RABBITMQ_HOST,
    port: env.RABBITMQ_PORT,
    user: env.RABBITMQ_USER,
    password: env.RABBITMQ_PASSWORD,
    url,
    eventsQueue: 'booking_events',
    // DLX + TTL topology names (referenced by the expiry queue & consumer)
    expiration: {
      exchange: 'hold.expiration.exchange',
      dlx: 'hold.expiration.dlx',
      waitQueue: 'hold.expiration.wait',
      processQueue: 'hold.expiration.process',
      routingKey: 'hold.expire',
    },
  };
});
