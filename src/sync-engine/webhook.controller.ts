import { Body, Controller, Headers, HttpCode, HttpStatus, Inject, Logger, Post } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { SkipThrottle } from '@nestjs/throttler';
import { v4 as uuidv4 } from 'uuid';
import { pipelineConfig } from '../config/pipeline.config';
import { ActivityLogService } from '../common/activity-log.service';
import { errorMessage, errorStack } from '../common/errors/pipeline.errors';
import { WebhookReceiverService } from './webhook-receiver.service';

export interface WebhookAck {
  received: true;
  webhookId: string;
}

@Controller('webhook')
export class WebhookController {
  private readonly logger = new Logger(WebhookController.name);

  constructor(
    private readonly receiver: WebhookReceiverService,
    private readonly activityLogService: ActivityLogService,
    @Inject(pipelineConfig.KEY)
    private readonly config: ConfigType<typeof pipelineConfig>,
  ) {}

  /**
   * The sender does not retry selectively, so every delivery is acknowledged
   * with 200 before it is processed, including ones that end up dropped.
   * Processing that throws is tried once more, then recorded with the raw
   * body so an operator can replay it.
   */
  @Post('marketplace')
  @HttpCode(HttpStatus.OK)
  @SkipThrottle()
  handleMarketplaceWebhook(
    @Headers() headers: Record<string, string | string[] | undefined>,
    @Body() body: unknown,
  ): WebhookAck {
    const webhookId = `wh_${uuidv4()}`;
    const eventName = this.eventName(headers, body);
    this.logger.log(`[${webhookId}] Received marketplace webhook: ${eventName ?? 'no event type'}`);

    this.receiver
      .handle(webhookId, eventName, body)
      .catch(err => {
        this.logger.warn(`[${webhookId}] Webhook processing failed, retrying once: ${errorMessage(err)}`);
        return this.receiver.handle(webhookId, eventName, body);
      })
      .then(result => {
        this.logger.log(`[${webhookId}] Webhook processing completed: ${result.disposition}`);
      })
      .catch(err => this.recordFailure(webhookId, eventName, body, err));

    return { received: true, webhookId };
  }

  private async recordFailure(webhookId: string, eventName: string | null, body: unknown, err: unknown): Promise<void> {
    this.logger.error(`[${webhookId}] Webhook processing failed after retry: ${errorMessage(err)}`, errorStack(err));
    await this.activityLogService.logWebhookEvent(
      webhookId,
      'WEBHOOK_PROCESSING_FAILED',
      'NeedsAttention',
      `Webhook ${eventName ?? 'without event type'} could not be processed: ${errorMessage(err)}`,
      { eventType: eventName, error: errorMessage(err), rawBody: body },
    );
  }

  private eventName(headers: Record<string, string | string[] | undefined>, body: unknown): string | null {
    const header = headers[this.config.webhookEventHeader.toLowerCase()];
    const fromHeader = Array.isArray(header) ? header[0] : header;
    if (fromHeader && fromHeader.trim() !== '') {
      return fromHeader.trim();
    }
    if (typeof body === 'object' && body !== null && 'event' in body && typeof body.event === 'string') {
      return body.event;
    }
    return null;
  }
}
