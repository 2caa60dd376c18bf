import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DatabaseModule } from '../../database/database.module';
import { GitWebhookController } from './git-webhook.controller';
import { WEBHOOK_SECRET, WebhookReceiverService } from './webhook-receiver.service';
import type { Env } from '../../config/env.validation';

@Module({
  imports: [DatabaseModule],
  controllers: [GitWebhookController],
  providers: [
    WebhookReceiverService,
    {
      provide: WEBHOOK_SECRET,
      useFactory: (config: ConfigService<Env, true>) =>
        config.get('GITHUB_WEBHOOK_SECRET', { infer: true }),
      inject: [ConfigService],
    },
  ],
})
export class WebhooksModule {}
