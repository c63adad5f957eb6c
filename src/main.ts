import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { INestApplication, ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { Logger } from 'nestjs-pino';
import helmet from 'helmet';
import compression from 'compression';
import { AppModule } from './app.module';
import { HttpExceptionFilter } from './common/filters/http-exception.filter';

const API_TITLE = 'Asset Auction Marketplace API';

// swagger ui тянет inline скрипты и стили
function applySecurity(app: INestApplication, config: ConfigService) {
  app.use(
    helmet({
      contentSecurityPolicy: {
        directives: {
          defaultSrc: ["'self'"],
          styleSrc: ["'self'", "'unsafe-inline'"],
          scriptSrc: ["'self'", "'unsafe-inline'"],
          imgSrc: ["'self'", 'data:'],
        },
      },
    }),
  );
  app.use(compression());

  const origins = config.get<string>('cors.origins', '').split(',').filter(Boolean);
  app.enableCors({
    origin: origins.length > 0 ? origins : false,
    credentials: true,
    allowedHeaders: ['Content-Type', 'Authorization'],
  });
}

function applyValidation(app: INestApplication) {
  app.useGlobalFilters(new HttpExceptionFilter());
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
    }),
  );
}

function mountDocs(app: INestApplication) {
  const document = SwaggerModule.createDocument(
    app,
    new DocumentBuilder()
      .setTitle(API_TITLE)
      .setDescription(
        'Listings hand custody of an asset to the marketplace. Bids are escrowed, ' +
          'must beat the leader by the minimum increment and push the deadline back. ' +
          'Refunds and proceeds that cannot be delivered become credits only their owner can withdraw. ' +
          'Every error carries a stable `code`.',
      )
      .setVersion('1.0.0')
      .addBearerAuth()
      .addTag('Auth')
      .addTag('Users')
      .addTag('Assets')
      .addTag('Listings')
      .addTag('Credits')
      .addTag('Health')
      .build(),
  );

  SwaggerModule.setup('api/docs', app, document, {
    swaggerOptions: { persistAuthorization: true },
    customSiteTitle: API_TITLE,
  });
}

async function bootstrap() {
  const app = await NestFactory.create(AppModule, { bufferLogs: true });
  const logger = app.get(Logger);
  const config = app.get(ConfigService);
  app.useLogger(logger);

  applySecurity(app, config);
  applyValidation(app);
  mountDocs(app);

  const port = config.get<number>('port', 3000);
  await app.listen(port);
  logger.log(`Marketplace listening on ${port}, docs at /api/docs`);
}

bootstrap().catch((error: unknown) => {
  console.error('Failed to start marketplace API', error);
  process.exit(1);
});
