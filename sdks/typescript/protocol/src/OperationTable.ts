/**
 * Opcode dispatch for nodes serving the protocol. The table belongs to the
 * caller; cache semantics live entirely in the registered handlers.
 */

import { ConnectionClosedError, toFailureText } from '@cachewire/core';
import type { ProtocolCodec } from './ProtocolCodec.js';
import { getOpCodeName, type OpCode } from './protocol/OpCodes.js';
import { buildError } from './protocol/Responses.js';
import { StatusCodes } from './protocol/StatusCodes.js';
import type { Message } from './protocol/Message.js';
import type { ByteStream } from './streams/ByteStream.js';

/**
 * Handler for one opcode: takes the decoded request, returns the response.
 */
export type Operation = (request: Message) => Message | Promise<Message>;

/**
 * Logging surface used by the serve loop.
 */
export type OperationLogger = Pick<Console, 'warn' | 'error'>;

export class OperationTable {
  private readonly handlers = new Map<number, Operation>();
  private readonly logger: OperationLogger;

  constructor(logger: OperationLogger = console) {
    this.logger = logger;
  }

  /**
   * Registers the handler for an opcode.
   * @throws Error if the opcode already has a handler
   */
  register(op: OpCode, handler: Operation): this {
    if (this.handlers.has(op)) {
      throw new Error(`Operation already registered: ${getOpCodeName(op)} (${op})`);
    }
    this.handlers.set(op, handler);
    return this;
  }

  has(op: number): boolean {
    return this.handlers.has(op);
  }

  /**
   * Runs the handler for the request's opcode. Unknown opcodes and failing
   * handlers both produce an InternalServerError response.
   */
  async dispatch(request: Message): Promise<Message> {
    const op = request.header.op;
    const handler = this.handlers.get(op);
    if (!handler) {
      return buildError(request, StatusCodes.InternalServerError, `unknown operation: ${op}`);
    }

    try {
      return await handler(request);
    } catch (error) {
      this.logger.error(`Operation ${getOpCodeName(op)} failed: ${toFailureText(error)}`);
      return buildError(request, StatusCodes.InternalServerError, error);
    }
  }
}

/**
 * Serves requests from one connection until the peer hangs up: decode,
 * dispatch, encode, repeat. Resolves on ConnectionClosedError.
 *
 * Any other codec failure is logged and rethrown; the stream is no longer
 * positioned at a frame boundary, so the caller should drop the connection.
 */
export async function serveConnection(
  stream: ByteStream,
  codec: ProtocolCodec,
  table: OperationTable,
  logger: OperationLogger = console
): Promise<void> {
  for (;;) {
    let request: Message;
    try {
      request = await codec.decode(stream);
    } catch (error) {
      if (error instanceof ConnectionClosedError) {
        return;
      }
      logger.warn(`Dropping connection after decode failure: ${toFailureText(error)}`);
      throw error;
    }

    const response = await table.dispatch(request);

    try {
      await codec.encode(response, stream);
    } catch (error) {
      if (error instanceof ConnectionClosedError) {
        return;
      }
      logger.warn(`Dropping connection after encode failure: ${toFailureText(error)}`);
      throw error;
    }
  }
}
