import { Injectable, NestMiddleware, Logger } from '@nestjs/common';
import { Request, Response, NextFunction } from 'express';

@Injectable()
export class RequestLoggerMiddleware implements NestMiddleware {
  private readonly logger = new Logger('RequestLogger');

  use(req: Request, res: Response, next: NextFunction) {
    const startTime = Date.now();
    const { method, originalUrl, headers } = req;
    const requestId = Math.random().toString(36).substring(7);

    // Capture the logger instance from the middleware class
    const middlewareLogger = this.logger;

    middlewareLogger.log(
      `[${requestId}] [${method}] ${originalUrl}` +
      `\nHeaders: ${JSON.stringify({
        'content-type': headers['content-type'],
        'authorization': headers['authorization'] ? 'Bearer ***' : undefined,
        'x-forwarded-for': headers['x-forwarded-for'],
        'x-real-ip': headers['x-real-ip'],
      })}`,
    );

    res.on('finish', () => {
      const duration = Date.now() - startTime;
      middlewareLogger.log(
        `[${requestId}] [${method}] ${originalUrl} - Status: ${res.statusCode} - Duration: ${duration}ms`,
      );
    });

    next();
  }
}
