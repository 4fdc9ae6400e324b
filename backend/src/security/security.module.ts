import { Module } from '@nestjs/common';

import { WebhookSignatureService } from './webhook-signature.service';

@Module({
  providers: [WebhookSignatureService],
  exports: [WebhookSignatureService],
})
export class SecurityModule {}
