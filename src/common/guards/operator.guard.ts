import {
  Injectable,
  CanActivate,
  ExecutionContext,
  UnauthorizedException,
  Logger,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { timingSafeEqual } from 'crypto';
import { Request } from 'express';

/**
 * Guards the operator surface (manual runs, resets, status). The bearer token
 * must equal OPERATOR_API_KEY. The marketplace webhook is not behind this guard.
 */
@Injectable()
export class OperatorGuard implements CanActivate {
  private readonly logger = new Logger(OperatorGuard.name);

  constructor(private readonly configService: ConfigService) {}

  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<Request>();
    const token = this.extractTokenFromHeader(request);

    if (!token) {
      this.logger.warn(`No operator token on ${request.method} ${request.originalUrl}`);
      throw new UnauthorizedException('Authorization token is required');
    }

    const expected = this.configService.get<string>('OPERATOR_API_KEY');
    if (!expected) {
      this.logger.error('OPERATOR_API_KEY is not configured; rejecting operator request');
      throw new UnauthorizedException('Operator access is not configured');
    }

    const given = Buffer.from(token);
    const wanted = Buffer.from(expected);
    if (given.length !== wanted.length || !timingSafeEqual(given, wanted)) {
      this.logger.warn(`Invalid operator token on ${request.method} ${request.originalUrl}`);
      throw new UnauthorizedException('Invalid operator token');
    }

    return true;
  }

  // Helper function to extract 'Bearer <token>'
  private extractTokenFromHeader(request: Request): string | undefined {
    const [type, token] = request.headers.authorization?.split(' ') ?? [];
    return type === 'Bearer' ? token : undefined;
  }
}
