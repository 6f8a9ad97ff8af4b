import "reflect-metadata";
import { ValidationPipe } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";
import cookieParser = require("cookie-parser");
import { NextFunction, Request, Response } from "express";
import { AppModule } from "./app.module";
import { parsePositiveInt } from "./common/config/app-config";
import { createCorsOriginCheck, parseCorsOrigins } from "./common/http/cors-origins";
import {
  createLoginRateLimiter,
  FixedWindowRateLimiter,
} from "./common/http/login-rate-limiter";

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create(AppModule);
  const slowRequestMs = parsePositiveInt(process.env.SLOW_REQUEST_LOG_MS, 400);

  app.use((req: Request, res: Response, next: NextFunction) => {
    const startAt = process.hrtime.bigint();
    res.on("finish", () => {
      const durationMs = Number(process.hrtime.bigint() - startAt) / 1_000_000;
      if (durationMs >= slowRequestMs) {
        console.warn(
          `[SLOW] ${req.method} ${req.originalUrl || req.url} ${res.statusCode} ${durationMs.toFixed(1)}ms`,
        );
      }
    });
    next();
  });

  app.use(cookieParser());
  app.use(
    "/auth/login",
    createLoginRateLimiter(
      new FixedWindowRateLimiter({
        max: parsePositiveInt(process.env.AUTH_LOGIN_RATE_LIMIT_MAX, 8),
        windowMs: parsePositiveInt(
          process.env.AUTH_LOGIN_RATE_LIMIT_WINDOW_MS,
          60_000,
        ),
      }),
    ),
  );
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
    }),
  );

  app.enableCors({
    origin: createCorsOriginCheck(parseCorsOrigins(process.env.CORS_ORIGIN)),
    credentials: true,
  });
  app.enableShutdownHooks();

  const port = parsePositiveInt(process.env.PORT, 4001);
  await app.listen(port);

  console.log(`API running on http://localhost:${port}`);
}

bootstrap().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
