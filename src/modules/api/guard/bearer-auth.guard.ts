import {
  CanActivate,
  ExecutionContext,
  Injectable,
  UnauthorizedException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { FastifyRequest } from 'fastify';

/**
 * Guards the mutating session and relay endpoints with the shared SECRET_KEY.
 */
@Injectable()
export class BearerAuthGuard implements CanActivate {
  private readonly secretKey: string | undefined;

  constructor(private readonly configService: ConfigService) {
    this.secretKey = this.configService.get<string>('app.security.secretKey');
  }

  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<FastifyRequest>();
    const authHeader = request.headers.authorization;

    if (!authHeader) {
      throw new UnauthorizedException('Authorization header is missing');
    }

    const [type, token] = authHeader.split(' ');

    if (type?.toLowerCase() !== 'bearer') {
      throw new UnauthorizedException('Invalid authorization type. Expected Bearer token');
    }

    if (!this.secretKey || !token || token !== this.secretKey) {
      throw new UnauthorizedException('Unauthorized');
    }

    return true;
  }
}
