import { Inject, Injectable, Logger } from '@nestjs/common';
import { AuthError } from '../../common/errors';
import { EntityStore } from '../../store/entity-store';
import { PIPELINE_OPTIONS, type PipelineOptions } from '../../config/pipeline-options';
import { verifySignature } from './signature';

export const WEBHOOK_SECRET = Symbol('WEBHOOK_SECRET');

export interface InboundNotification {
  signature: string | undefined;
  rawBody: Buffer | string;
  /** Notifier's delivery id; redeliveries carry the same one. */
  deliveryId?: string;
  eventType?: string;
}

export interface ReceiveResult {
  eventId: string;
  status: 'accepted' | 'duplicate';
}

/**
 * Verifies an inbound notification and persists it as a PENDING event. Nothing else:
 * normalization and analysis happen later in the worker pool, so the notifier gets
 * its answer as soon as the row is written.
 */
@Injectable()
export class WebhookReceiverService {
  private readonly logger = new Logger(WebhookReceiverService.name);

  constructor(
    private readonly store: EntityStore,
    @Inject(WEBHOOK_SECRET) private readonly secret: string,
    @Inject(PIPELINE_OPTIONS) private readonly options: PipelineOptions,
  ) {}

  /** @throws AuthError when the signature is missing or wrong; nothing is written then. */
  async receive(notification: InboundNotification): Promise<ReceiveResult> {
    if (!notification.signature) {
      throw new AuthError('missing signature header');
    }
    if (!verifySignature(this.secret, notification.rawBody, notification.signature)) {
      this.logger.warn(`Rejected notification ${notification.deliveryId ?? '(no delivery id)'}: bad signature`);
      throw new AuthError('signature does not match payload');
    }

    const rawPayload =
      typeof notification.rawBody === 'string'
        ? notification.rawBody
        : notification.rawBody.toString('utf8');

    const { eventId, created } = await this.store.insertEvent({
      source: 'webhook',
      delivery_id: notification.deliveryId || null,
      event_type: notification.eventType || null,
      raw_payload: rawPayload,
      max_attempts: this.options.maxAttempts,
    });

    if (!created) {
      this.logger.log(`Duplicate delivery ${notification.deliveryId} ignored (event ${eventId})`);
      return { eventId, status: 'duplicate' };
    }
    this.logger.log(`Accepted ${notification.eventType ?? 'push'} delivery as event ${eventId}`);
    return { eventId, status: 'accepted' };
  }
}
