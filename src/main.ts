import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { Logger } from 'nestjs-pino';
import helmet from 'helmet';
import compression from 'compression';
import { Request, Response } from 'express';
import { AppModule } from './app.module';
import { HttpExceptionFilter } from './common/filters/http-exception.filter';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, {
    bufferLogs: true,
  });

  const configService = app.get(ConfigService);
  const logger = app.get(Logger);

  app.useLogger(logger);

  app.use(
    helmet({
      contentSecurityPolicy: {
        directives: {
          defaultSrc: ["'self'"],
          styleSrc: ["'self'", "'unsafe-inline'"], // Swagger UI
          scriptSrc: ["'self'", "'unsafe-inline'", "'unsafe-eval'"], // Swagger UI
          imgSrc: ["'self'", 'data:', 'https:'],
          connectSrc: ["'self'"],
          fontSrc: ["'self'", 'data:'],
          objectSrc: ["'none'"],
          mediaSrc: ["'self'"],
          frameSrc: ["'self'"],
        },
      },
      crossOriginEmbedderPolicy: false,
      crossOriginResourcePolicy: { policy: 'cross-origin' },
    }),
  );

  app.use(
    compression({
      level: 6,
      filter: (req: Request, res: Response) => {
        if (req.headers['x-no-compression']) {
          return false;
        }
        return compression.filter(req, res);
      },
    }),
  );

  const allowedOrigins = configService
    .get<string>('cors.origins', 'http://localhost:3001,http://localhost:3000')
    .split(',');
  const isDevelopment = configService.get<string>('nodeEnv', 'development') === 'development';

  app.enableCors({
    origin: (origin, callback) => {
      // curl, Postman
      if (!origin && isDevelopment) {
        return callback(null, true);
      }
      if (!origin || allowedOrigins.includes(origin)) {
        callback(null, true);
      } else {
        callback(new Error('Not allowed by CORS'));
      }
    },
    credentials: true,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-Requested-With'],
    maxAge: 86400,
  });

  app.useGlobalFilters(new HttpExceptionFilter());

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
      transformOptions: {
        enableImplicitConversion: true,
      },
    }),
  );

  const swaggerConfig = new DocumentBuilder()
    .setTitle('Fractional Auction Market API')
    .setDescription(`
Fractional ownership through sealed-bid share offerings, plus single-unit
resale listings of ledger shares and registry tokens.

- **Assets**: offerings, sealed bids, closure, cap table
- **Listings**: resale auctions settled by execute
- **Tokens**: registry tokens and marketplace approvals
- **Users**: balance, ledger, holdings, deposits and withdrawals

All value is held as internal balances; funds leave only through withdraw.
    `)
    .setVersion('1.0.0')
    .addBearerAuth()
    .addTag('Assets', 'Share offerings')
    .addTag('Listings', 'Secondary market')
    .addTag('Tokens', 'Token registry')
    .addTag('Users', 'Account balance and holdings')
    .addTag('Auth', 'Registration and login')
    .addTag('Health', 'Service health checks')
    .build();

  const document = SwaggerModule.createDocument(app, swaggerConfig);
  SwaggerModule.setup('api/docs', app, document, {
    swaggerOptions: {
      persistAuthorization: true,
      docExpansion: 'none',
      filter: true,
      showRequestDuration: true,
    },
    customSiteTitle: 'Fractional Auction Market API',
  });

  const port = configService.get<number>('port', 3000);
  await app.listen(port);

  logger.log(`API is running on: http://localhost:${port}`);
  logger.log(`Swagger API docs available at: http://localhost:${port}/api/docs`);
}

bootstrap().catch((error: unknown) => {
  console.error('Failed to start application', error);
  process.exit(1);
});
