import {
  BadRequestException,
  Controller,
  Headers,
  HttpStatus,
  Post,
  Req,
  Res,
  ServiceUnavailableException,
  UnauthorizedException,
  type RawBodyRequest,
} from '@nestjs/common';
import { ApiBody, ApiHeader, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import type { Request, Response } from 'express';
import { AuthError, StoreUnavailableError } from '../../common/errors';
import { WebhookReceiverService, type ReceiveResult } from './webhook-receiver.service';

@Controller('webhooks')
@ApiTags('webhooks')
export class GitWebhookController {
  constructor(private readonly receiver: WebhookReceiverService) {}

  /**
   * Receive a GitHub webhook. The signature is checked over the raw body, the delivery is
   * stored as a PENDING event, and the response goes out before any processing starts.
   */
  @Post('github')
  @ApiOperation({ summary: 'Receive a signed GitHub webhook and queue it for processing' })
  @ApiHeader({ name: 'X-Hub-Signature-256', description: 'sha256=<hex HMAC of the raw body>' })
  @ApiHeader({ name: 'X-GitHub-Delivery', required: false, description: 'Idempotency key' })
  @ApiHeader({ name: 'X-GitHub-Event', required: false, description: 'push, ping, ...' })
  @ApiBody({ description: 'GitHub push payload', schema: { type: 'object', additionalProperties: true } })
  @ApiResponse({ status: 202, description: 'Stored as a new event' })
  @ApiResponse({ status: 200, description: 'Duplicate delivery id; nothing stored' })
  @ApiResponse({ status: 401, description: 'Missing or invalid signature' })
  async receive(
    @Req() req: RawBodyRequest<Request>,
    @Res({ passthrough: true }) res: Response,
    @Headers('x-hub-signature-256') signature?: string,
    @Headers('x-github-delivery') deliveryId?: string,
    @Headers('x-github-event') eventType?: string,
  ): Promise<ReceiveResult> {
    const rawBody = req.rawBody;
    if (!rawBody) {
      throw new BadRequestException('Request body is missing');
    }

    try {
      const result = await this.receiver.receive({ signature, rawBody, deliveryId, eventType });
      res.status(result.status === 'accepted' ? HttpStatus.ACCEPTED : HttpStatus.OK);
      return result;
    } catch (err) {
      if (err instanceof AuthError) throw new UnauthorizedException(err.message);
      // The notifier only redelivers on a failure status, so the event must not be acked.
      if (err instanceof StoreUnavailableError) {
        throw new ServiceUnavailableException('Event store unavailable; retry the delivery');
      }
      throw err;
    }
  }
}
