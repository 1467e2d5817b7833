/**
 * Connector status snapshot and its one-line rendering
 */

import type { Side } from '../pairing/types.js';

export interface SideStatus {
  address: string | null;
  name: string | null;
  paired: boolean;
  connected: boolean;
  battery: number | null;
}

export interface ConnectorStatus {
  left: SideStatus;
  right: SideStatus;
  silentMode: boolean;
}

function formatSide(side: Side, status: SideStatus): string {
  const link = status.connected ? 'connected' : status.paired ? 'paired' : 'not paired';
  const battery = status.battery === null ? '?' : `${status.battery}%`;
  return `${side}=${link} (battery ${battery})`;
}

export function formatStatus(status: ConnectorStatus): string {
  return [
    formatSide('left', status.left),
    formatSide('right', status.right),
    `silent=${status.silentMode ? 'on' : 'off'}`,
  ].join(', ');
}
