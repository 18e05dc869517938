// apps/api/src/webhook/webhook-payload.schema.ts
import { z } from 'zod';
import type { IntentParameters } from './intent-params';

const parametersSchema = z.record(z.unknown()).default({});

/** `{ intent, parameters }` as sent by simple clients and tests. */
const plainPayloadSchema = z.object({
  intent: z.string(),
  parameters: parametersSchema,
});

/** Dialogflow ES fulfillment request (only the fields routing needs). */
const dialogflowPayloadSchema = z.object({
  queryResult: z.object({
    intent: z
      .object({ displayName: z.string().default('') })
      .default({ displayName: '' }),
    parameters: parametersSchema,
  }),
});

export type WebhookIntent = {
  name: string;
  parameters: IntentParameters;
};

export const webhookPayloadSchema = z
  .union([plainPayloadSchema, dialogflowPayloadSchema])
  .transform(
    (payload): WebhookIntent =>
      'queryResult' in payload
        ? {
            name: payload.queryResult.intent.displayName,
            parameters: payload.queryResult.parameters,
          }
        : { name: payload.intent, parameters: payload.parameters },
  );
