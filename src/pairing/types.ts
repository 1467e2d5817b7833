/**
 * Glasses Pairing Types
 */

export type Side = 'left' | 'right';

export const SIDES: readonly Side[] = ['left', 'right'];

export function isSide(value: unknown): value is Side {
  return value === 'left' || value === 'right';
}

export function sideLabel(side: Side): string {
  return side === 'left' ? 'Left glass' : 'Right glass';
}

/** One physical half of the pair, as seen during discovery */
export interface Unit {
  side: Side;
  address: string;
  displayName: string;
  pairedFlag: boolean;
  rssi: number;       // advisory only
}

/** At most one candidate per side from a single scan */
export type DiscoveryResult = Partial<Record<Side, Unit>>;

export interface DiscoveryCache {
  result: DiscoveryResult;
  scannedAt: number | null;   // ms timestamp from the manager's clock
}

/** Per-unit lifecycle */
export type UnitState = 'unknown' | 'discovered' | 'pairing' | 'paired' | 'verifying';

/** Ephemeral state while pairing one unit */
export interface PairingSession {
  side: Side;
  address: string;
  attempt: number;
  maxAttempts: number;
  lastError: string | null;
}

/** Persisted record for one side */
export interface SideRecord {
  address: string | null;
  name: string | null;
  paired: boolean;
}

/** Glasses store on disk */
export interface GlassesRecordFile {
  version: 1;
  left: SideRecord;
  right: SideRecord;
  updatedAt?: string;   // ISO timestamp
}

export interface PairingOptions {
  scanTimeoutSec: number;
  connectTimeoutSec: number;
  probeTimeoutSec: number;
  maxAttempts: number;
  retryDelayMs: number;
  settleDelayMs: number;
  cacheTtlMs: number;
}

export const DEFAULT_PAIRING_OPTIONS: PairingOptions = {
  scanTimeoutSec: 15,
  connectTimeoutSec: 20,
  probeTimeoutSec: 5,
  maxAttempts: 3,
  retryDelayMs: 2000,
  settleDelayMs: 1000,
  cacheTtlMs: 60_000,
};

/** Name markers that identify each side in advertised names */
export const SIDE_MARKERS: Record<Side, string> = {
  left: '_L_',
  right: '_R_',
};
