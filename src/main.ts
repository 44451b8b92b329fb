import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger, ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { MicroserviceOptions, Transport } from '@nestjs/microservices';
import { AppModule } from './app.module';
import { winstonConfig } from './config/logger.config';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, {
    logger: winstonConfig,
  });
  const logger = new Logger('Bootstrap');
  const configService = app.get(ConfigService);

  const rabbitmqUrl = configService.get<string>('rabbitmq.url', 'amqp://localhost:5672');

  // Domain events: broadcaster, notifications and refund settlement
  app.connectMicroservice<MicroserviceOptions>({
    transport: Transport.RMQ,
    options: {
      urls: [rabbitmqUrl],
      queue: configService.get<string>('rabbitmq.eventsQueue', 'booking_events'),
      noAck: false,
      prefetchCount: 10,
      queueOptions: {
        durable: true,
      },
    },
  });

  // Delayed hold expiry, dead-lettered out of the wait queue
  app.connectMicroservice<MicroserviceOptions>({
    transport: Transport.RMQ,
    options: {
      urls: [rabbitmqUrl],
      queue: configService.get<string>('rabbitmq.expiration.processQueue', 'hold.expiration.process'),
      noAck: false,
      prefetchCount: 10,
      queueOptions: {
        durable: true,
      },
    },
  });

  await app.startAllMicroservices();

  app.enableShutdownHooks();

  // Global validation pipe
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
    }),
  );

  // Swagger configuration
  const config = new DocumentBuilder()
    .setTitle('Seat Booking Engine API')
    .setDescription('API de reserva de assentos com bloqueio temporário, pagamento e cancelamento')
    .setVersion('1.0')
    .addTag('shows', 'Salas, sessões e mapa de assentos')
    .addTag('holds', 'Bloqueio temporário de assentos')
    .addTag('bookings', 'Pagamento, confirmação e cancelamento de reservas')
    .addTag('reports', 'Relatórios somente leitura')
    .addTag('health', 'Saúde da aplicação')
    .build();

  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('api-docs', app, document);

  const port = configService.get<number>('app.port', 3000);
  await app.listen(port);
  logger.log(`Application is running on: http://localhost:${port}`);
  logger.log(`API Documentation: http://localhost:${port}/api-docs`);
  logger.log(`RabbitMQ consumers connected to: ${configService.get<string>('rabbitmq.host', 'localhost')}`);
}
void bootstrap();
