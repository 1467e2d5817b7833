/**
 * Transport Types
 *
 * The radio link layer is consumed through these interfaces only.
 * A real stack (or the simulated one) implements `Transport`.
 */

/** A device seen advertising during a scan */
export interface ScannedDevice {
  name: string | null;
  address: string;
  rssi: number;
}

export type NotificationListener = (frame: Uint8Array) => void;
export type DisconnectListener = () => void;

/** Live link to one physical unit */
export interface Connection {
  readonly address: string;
  readonly isConnected: boolean;
  /** Send a raw frame */
  write(frame: Uint8Array): Promise<void>;
  /** Subscribe to inbound frames. Returns an unsubscribe function. */
  onNotification(listener: NotificationListener): () => void;
  /** Called once when the link drops without `disconnect()`. Returns an unsubscribe function. */
  onDisconnect(listener: DisconnectListener): () => void;
}

export interface Transport {
  scan(timeoutSeconds: number): Promise<ScannedDevice[]>;
  /** Rejects on timeout or when the unit refuses the link */
  connect(address: string, timeoutSeconds: number): Promise<Connection>;
  /** Radio-level bonding handshake on an open connection */
  pair(connection: Connection): Promise<void>;
  disconnect(connection: Connection): Promise<void>;
}
