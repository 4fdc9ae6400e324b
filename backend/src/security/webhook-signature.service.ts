import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createHmac, timingSafeEqual } from 'crypto';

import { InvalidSignatureError } from '../common/errors/concierge.errors';

const SIGNATURE_PREFIX = 'sha256=';

/**
 * HMAC-SHA256 over the raw request body, sent as `sha256=<hex>`. Verification
 * is only enforced when WEBHOOK_SECRET is configured.
 */
@Injectable()
export class WebhookSignatureService {
  private readonly secret: string | undefined;

  constructor(configService: ConfigService) {
    this.secret = configService.get<string>('WEBHOOK_SECRET') || undefined;
  }

  isEnabled(): boolean {
    return this.secret !== undefined;
  }

  sign(rawBody: Buffer | string, secret: string): string {
    return `${SIGNATURE_PREFIX}${createHmac('sha256', secret).update(rawBody).digest('hex')}`;
  }

  verify(rawBody: Buffer | undefined, header: string | string[] | undefined): void {
    if (this.secret === undefined) {
      return;
    }

    if (typeof header !== 'string' || !header.startsWith(SIGNATURE_PREFIX)) {
      throw new InvalidSignatureError('missing or malformed signature header');
    }
    if (!rawBody) {
      throw new InvalidSignatureError('request body unavailable');
    }

    const expected = Buffer.from(this.sign(rawBody, this.secret));
    const received = Buffer.from(header.trim().toLowerCase());
    if (expected.length !== received.length || !timingSafeEqual(expected, received)) {
      throw new InvalidSignatureError('signature mismatch');
    }
  }
}
