// apps/api/src/webhook/webhook.controller.ts
import { Body, Controller, HttpCode, Post } from '@nestjs/common';
import { RawResponse } from '../common/decorators/raw-response.decorator';
import { ZodValidationPipe } from '../common/pipes/zod-validation.pipe';
import { FulfillmentResponse, toFulfillment } from './fulfillment';
import { IntentRouterService } from './intent-router.service';
import {
  WebhookIntent,
  webhookPayloadSchema,
} from './webhook-payload.schema';

@Controller('webhook')
export class WebhookController {
  constructor(private readonly router: IntentRouterService) {}

  /**
   * POST /api/v1/webhook
   * Fulfillment endpoint for the conversational agent. The body is
   * returned without the API envelope because the platform reads
   * `fulfillmentText` at the top level.
   */
  @Post()
  @HttpCode(200)
  @RawResponse()
  async fulfill(
    @Body(new ZodValidationPipe(webhookPayloadSchema)) intent: WebhookIntent,
  ): Promise<FulfillmentResponse> {
    return toFulfillment(await this.router.route(intent));
  }
}
