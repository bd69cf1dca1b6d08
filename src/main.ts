import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import helmet from 'helmet';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import cookieParser = require('cookie-parser');
import compression = require('compression');
import * as express from 'express';
import { randomUUID } from 'crypto';
import type { Response, NextFunction } from 'express';
import type { NestExpressApplication } from '@nestjs/platform-express';
import { Logger } from '@nestjs/common';
import { AppModule } from './modules/app/app.module';
import { ApiResponseInterceptor } from './common/interceptors/api-response.interceptor';
import { ApiExceptionFilter, type RequestWithId } from './common/filters/api-exception.filter';
import { AppConfigService } from './modules/app/app-config.service';
import { RATE_LIMITS_LOCALS_KEY, routeRateLimits } from './common/throttling/rate-limit.resolver';

function isAddressInUse(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'EADDRINUSE';
}

async function bootstrap() {
  const logger = new Logger('HTTP');
  const startup = new Logger('Startup');
  const nodeEnv = (process.env.NODE_ENV ?? 'development').trim().toLowerCase();
  const isProd = nodeEnv === 'production';
  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    logger: isProd ? ['error', 'warn', 'log'] : ['error', 'warn', 'log', 'debug', 'verbose'],
  });

  const appConfig = app.get(AppConfigService);

  // Route-specific rate limits for the Throttler resolvers, read from ExecutionContext without DI.
  const http: express.Express = app.getHttpAdapter().getInstance();
  http.disable('etag');
  http.locals[RATE_LIMITS_LOCALS_KEY] = routeRateLimits(appConfig);

  if (appConfig.trustProxy()) {
    // Required for correct req.ip behind reverse proxies; only enable with a trusted proxy in front.
    app.set('trust proxy', 1);
  }

  if (!appConfig.isProd()) {
    startup.log(
      [
        `nodeEnv=${appConfig.nodeEnv()}`,
        `port=${appConfig.port()}`,
        `trustProxy=${appConfig.trustProxy()}`,
        `allowedOrigins=${appConfig.allowedOrigins().join(',') || '(none)'}`,
        `storage=${appConfig.s3() ? 'configured' : 'disabled'}`,
        `throttle.global=${appConfig.rateLimitLimit()}/${appConfig.rateLimitTtlSeconds()}s`,
        `throttle.postWrite=${appConfig.rateLimitPostWriteLimit()}/${appConfig.rateLimitPostWriteTtlSeconds()}s`,
        `throttle.interact=${appConfig.rateLimitInteractLimit()}/${appConfig.rateLimitInteractTtlSeconds()}s`,
      ].join(' | '),
    );
  }

  // Security headers (API-safe defaults).
  app.use(
    helmet({
      crossOriginResourcePolicy: false,
      contentSecurityPolicy: false,
    }),
  );

  app.use(compression());
  app.use(express.json({ limit: '1mb' }));
  app.use(express.urlencoded({ extended: true, limit: '1mb' }));

  // Cookies (session).
  app.use(cookieParser());

  // Request id, returned as `x-request-id`.
  app.use((req: RequestWithId, res: Response, next: NextFunction) => {
    const incoming = String(req.headers['x-request-id'] ?? '').trim();
    const id = incoming || randomUUID();
    res.setHeader('x-request-id', id);
    req.requestId = id;
    next();
  });

  // Dev-only request logging (opt-in via LOG_REQUESTS=true).
  if (!appConfig.isProd() && appConfig.logRequests()) {
    app.use((req: RequestWithId, res: Response, next: NextFunction) => {
      const start = Date.now();
      const method = String(req.method || '');
      const path = String(req.originalUrl || req.url || '');
      res.on('finish', () => {
        const ms = Date.now() - start;
        logger.log(`${method} ${path} -> ${res.statusCode} (${ms}ms)${req.requestId ? ` rid=${req.requestId}` : ''}`);
      });
      next();
    });
  }

  app.useGlobalInterceptors(new ApiResponseInterceptor());
  app.useGlobalFilters(new ApiExceptionFilter());
  app.enableShutdownHooks();

  app.enableCors({
    credentials: true,
    origin: (origin: string | undefined, callback: (err: Error | null, allow?: boolean) => void) => {
      // Non-browser clients send no Origin.
      if (!origin) return callback(null, true);
      if (appConfig.isOriginAllowed(origin)) return callback(null, true);
      // Not a 500: the browser blocks the response without CORS headers.
      appConfig.logCorsBlocked(origin);
      return callback(null, false);
    },
  });

  const swaggerConfig = new DocumentBuilder()
    .setTitle('Microblog API')
    .setDescription('Blogs, posts with attachments and tags, follows and search.')
    .setVersion('0.1.0')
    .build();
  const document = SwaggerModule.createDocument(app, swaggerConfig);
  SwaggerModule.setup('docs', app, document);

  const port = appConfig.port();
  try {
    await app.listen(port);
  } catch (err) {
    if (isAddressInUse(err)) {
      startup.error(`Port ${port} is already in use (set PORT in .env).`);
    } else {
      startup.error(`Failed to start server: ${err instanceof Error ? err.message : String(err)}`);
    }
    process.exit(1);
  }
}

void bootstrap();
