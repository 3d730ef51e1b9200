import 'reflect-metadata';
import { ValidationPipe } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { Transport, MicroserviceOptions } from '@nestjs/microservices';
import { Logger } from 'nestjs-pino';
import { AppModule } from './app.module';
import { ConfigService } from '@nestjs/config';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, { bufferLogs: true });
  app.useLogger(app.get(Logger));
  const logger = app.get(Logger);

  const configService = app.get(ConfigService);

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
    }),
  );

  app.enableShutdownHooks();

  // TCP microservice for the Extractor/Planner collaborators
  const tcpPort = Number(configService.get<string>('TCP_PORT', '4010'));
  app.connectMicroservice<MicroserviceOptions>({
    transport: Transport.TCP,
    options: {
      host: configService.get<string>('TCP_HOST', 'localhost'),
      port: tcpPort,
    },
  });

  await app.startAllMicroservices();
  logger.log(`TCP microservice is running on port ${tcpPort}`);

  const port = Number(configService.get<string>('PORT', '50060'));
  await app.listen(port);
  logger.log(`Document structuring service is running on http://localhost:${port}`);
}

void bootstrap();
