import { applyDecorators, Header, SetMetadata } from '@nestjs/common';

export const PLAIN_RESPONSE_KEY = 'plain_response';

/** Sends the handler's return value as-is, outside the `{ data, meta }` envelope. */
export const PlainResponse = (contentType = 'text/plain; charset=utf-8') =>
  applyDecorators(SetMetadata(PLAIN_RESPONSE_KEY, true), Header('Content-Type', contentType));
