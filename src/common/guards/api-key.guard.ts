import { CanActivate, ExecutionContext, Injectable, Logger, UnauthorizedException } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { Request } from 'express';
import { timingSafeEqual } from 'crypto';
import { IS_PUBLIC_KEY } from '../decorators/public.decorator';
import { ErrorCode } from '../errors';

@Injectable()
export class ApiKeyGuard implements CanActivate {
  private readonly logger = new Logger(ApiKeyGuard.name);
  private readonly apiKey: string;

  constructor(
    private readonly reflector: Reflector,
    config: ConfigService,
  ) {
    this.apiKey = config.get<string>('API_KEY') ?? '';
    if (!this.apiKey) {
      // env validation refuses this in production
      this.logger.warn('API_KEY is not configured; every route is open');
    }
  }

  canActivate(context: ExecutionContext): boolean {
    const isPublic = this.reflector.getAllAndOverride<boolean>(IS_PUBLIC_KEY, [
      context.getHandler(),
      context.getClass(),
    ]);
    if (isPublic || !this.apiKey) return true;

    const request = context.switchToHttp().getRequest<Request>();
    const provided = this.extractKey(request);
    if (!provided || !this.safeCompare(provided, this.apiKey)) {
      this.logger.warn({
        msg: 'API key invalid',
        correlationId: request.headers['x-correlation-id'],
        path: request.path,
        providedHeader: provided ? 'present' : 'none',
      });
      throw new UnauthorizedException({ code: ErrorCode.API_KEY_INVALID, message: 'Invalid or missing API key' });
    }
    return true;
  }

  private extractKey(request: Request) {
    const header = request.headers['x-api-key'];
    const direct = Array.isArray(header) ? header[0] : header;
    if (direct) return direct;
    const authorization = request.headers.authorization;
    if (authorization?.startsWith('Bearer ')) {
      return authorization.slice('Bearer '.length).trim();
    }
    return '';
  }

  private safeCompare(a: string, b: string) {
    const aBuf = Buffer.from(a);
    const bBuf = Buffer.from(b);
    if (aBuf.length !== bBuf.length) return false;
    return timingSafeEqual(aBuf, bBuf);
  }
}
