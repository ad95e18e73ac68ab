import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ValidationPipe, type INestApplication } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import { AppModule } from './app.module';
import { appConfig } from './config/app.config';
import { API_PREFIX } from './lib/http/request-context';

type CorsOriginCallback = (err: Error | null, allow?: boolean) => void;

/** Prefix, CORS and pipes shared by the server and the e2e suites. */
export function configureApp(app: INestApplication): INestApplication {
  // Allow http(s)://localhost:<any>, http(s)://127.0.0.1:<any>, http(s)://[::1]:<any>
  const localhostOrigin =
    /^https?:\/\/(localhost|\[::1\]|127\.0\.0\.1)(:\d+)?$/;

  app.enableCors({
    origin(origin: string | undefined, cb: CorsOriginCallback): void {
      // Allow requests without Origin (curl/Postman/server-to-server)
      if (origin == null) {
        cb(null, true);
        return;
      }
      if (localhostOrigin.test(origin)) {
        cb(null, true);
        return;
      }
      cb(new Error(`CORS: origin not allowed → ${String(origin)}`));
    },
    methods: ['GET', 'HEAD', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-Request-Id'],
    exposedHeaders: ['Location'],
    credentials: false,
    maxAge: 86_400, // cache preflight for 24h
  });

  app.setGlobalPrefix(API_PREFIX);

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      transform: true,
      forbidUnknownValues: false,
    }),
  );
  return app;
}

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create(AppModule, { cors: false });
  configureApp(app);
  app.enableShutdownHooks();

  const cfg = app.get<ConfigType<typeof appConfig>>(appConfig.KEY);
  await app.listen(cfg.port);
}

if (require.main === module) {
  void bootstrap();
}
