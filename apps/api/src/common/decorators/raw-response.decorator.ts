import { SetMetadata } from '@nestjs/common';

export const RAW_RESPONSE_KEY = 'api:raw-response';

/** Sends the handler's return value as-is, without the `{ code, message, details }` envelope. */
export const RawResponse = (): MethodDecorator & ClassDecorator =>
  SetMetadata(RAW_RESPONSE_KEY, true);
