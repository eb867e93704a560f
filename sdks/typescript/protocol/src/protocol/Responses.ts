/**
 * Builders for responses to a decoded request. Both leave DMap and key empty;
 * handlers that echo the key must build the response themselves.
 */

import { toFailureText } from '@cachewire/core';
import { createResponse, type Message } from './Message.js';
import { StatusCodes, type StatusCode } from './StatusCodes.js';

const utf8 = new TextEncoder();

/**
 * Error response for `request`, carrying the display text of `cause` as its value.
 * Plain descriptions and Error instances both reduce to their text.
 */
export function buildError(request: Message, status: StatusCode | number, cause: unknown): Message {
  return createResponse(request.header.op, status, {
    value: utf8.encode(toFailureText(cause)),
  });
}

/**
 * Success response for `request` with an empty value.
 */
export function buildSuccess(request: Message): Message {
  return createResponse(request.header.op, StatusCodes.OK);
}
