/**
 * Command Dispatcher
 *
 * Correlates an outgoing frame with its response on one connection.
 * Requests on the same connection are queued: only one is in flight at a time.
 */

import type { Logger } from '../core/logger.js';
import type { Connection } from '../transport/types.js';
import { DEFAULT_RESPONSE_TIMEOUT_MS, formatFrame } from './constants.js';

export interface CommandSender {
  sendCommand(
    connection: Connection,
    frame: Uint8Array,
    expectResponse: boolean,
    timeoutMs?: number,
  ): Promise<Uint8Array | null>;
}

export class CommandDispatcher implements CommandSender {
  private queues = new WeakMap<Connection, Promise<unknown>>();

  constructor(
    private logger: Logger,
    private defaultTimeoutMs = DEFAULT_RESPONSE_TIMEOUT_MS,
  ) {}

  /**
   * Write `frame` and, when `expectResponse` is set, wait for the first
   * notification carrying the same opcode. Resolves null on timeout.
   * Rejects if the write itself fails.
   */
  sendCommand(
    connection: Connection,
    frame: Uint8Array,
    expectResponse: boolean,
    timeoutMs = this.defaultTimeoutMs,
  ): Promise<Uint8Array | null> {
    const previous = this.queues.get(connection) ?? Promise.resolve();
    const run = previous.then(
      () => this.exchange(connection, frame, expectResponse, timeoutMs),
      () => this.exchange(connection, frame, expectResponse, timeoutMs),
    );
    // Keep the chain alive past failures of this request
    this.queues.set(connection, run.catch(() => undefined));
    return run;
  }

  private async exchange(
    connection: Connection,
    frame: Uint8Array,
    expectResponse: boolean,
    timeoutMs: number,
  ): Promise<Uint8Array | null> {
    if (frame.length === 0) {
      throw new Error('Cannot send an empty frame');
    }
    if (!connection.isConnected) {
      throw new Error(`Connection to ${connection.address} is closed`);
    }

    this.logger.debug(`-> ${connection.address}: ${formatFrame(frame)}`);

    if (!expectResponse) {
      await connection.write(frame);
      return null;
    }

    const opcode = frame[0];
    let unsubscribe: () => void = () => {};
    let timer: ReturnType<typeof setTimeout> | undefined;

    const response = new Promise<Uint8Array | null>((resolve) => {
      unsubscribe = connection.onNotification((incoming) => {
        if (incoming.length > 0 && incoming[0] === opcode) {
          resolve(incoming);
        }
      });
      timer = setTimeout(() => {
        this.logger.debug(`No response from ${connection.address} within ${timeoutMs}ms`);
        resolve(null);
      }, timeoutMs);
    });

    try {
      await connection.write(frame);
      const result = await response;
      if (result) {
        this.logger.debug(`<- ${connection.address}: ${formatFrame(result)}`);
      }
      return result;
    } finally {
      clearTimeout(timer);
      unsubscribe();
    }
  }
}
