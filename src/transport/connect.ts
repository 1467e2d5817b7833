import { attempt, withTimeout, type Result } from '../core/errors.js';
import type { Logger } from '../core/logger.js';
import type { Connection, Transport } from './types.js';

/**
 * Disconnect, logging a failure instead of raising it.
 */
export async function closeQuietly(
  transport: Transport,
  connection: Connection,
  logger: Logger,
): Promise<void> {
  const closed = await attempt('connection', () => transport.disconnect(connection));
  if (!closed.ok) {
    logger.warn(`Disconnect from ${connection.address} failed: ${closed.error.message}`);
  }
}

/**
 * Connect with a deadline. A link that lands after the deadline is closed
 * straight away.
 */
export async function connectWithin(
  transport: Transport,
  address: string,
  timeoutSeconds: number,
  logger: Logger,
): Promise<Result<Connection>> {
  const pending = Promise.resolve().then(() => transport.connect(address, timeoutSeconds));
  const connected = await attempt('connection', () =>
    withTimeout(pending, timeoutSeconds * 1000, `Connect to ${address}`),
  );
  if (!connected.ok) {
    void pending.then(
      (late) => closeQuietly(transport, late, logger),
      () => undefined,
    );
  }
  return connected;
}
