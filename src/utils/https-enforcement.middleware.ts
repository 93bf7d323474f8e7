import { Injectable, NestMiddleware } from '@nestjs/common';
import { Request, Response, NextFunction } from 'express';
import { ConfigService } from '@nestjs/config';
import { AllConfigType } from '../config/config.type';

/**
 * Rejects plain-HTTP requests when running in production.
 *
 * TLS is expected to terminate at the load balancer, which must forward
 * `X-Forwarded-Proto`. Other environments accept HTTP.
 */
@Injectable()
export class HttpsEnforcementMiddleware implements NestMiddleware {
  constructor(private configService: ConfigService<AllConfigType>) {}

  use(req: Request, res: Response, next: NextFunction) {
    const nodeEnv = this.configService.get('app.nodeEnv', { infer: true });

    if (nodeEnv === 'production') {
      const isHttps =
        req.secure ||
        req.protocol === 'https' ||
        req.get('x-forwarded-proto') === 'https';

      if (!isHttps) {
        // 403 rather than a redirect; the proxy owns HTTP->HTTPS redirects
        res.status(403).json({
          statusCode: 403,
          message: 'HTTPS is required in production.',
          error: 'Forbidden',
        });
        return;
      }
    }

    next();
  }
}
