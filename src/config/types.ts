/**
 * Glasslink Configuration Types
 */

import type { LogLevel } from '../core/logger.js';
import type { PairingOptions } from '../pairing/types.js';
import { DEFAULT_PAIRING_OPTIONS } from '../pairing/types.js';
import { DEFAULT_RESPONSE_TIMEOUT_MS } from '../protocol/constants.js';
import type { SimulatedUnitConfig } from '../transport/simulated.js';

export interface GlasslinkConfig {
  // Where the pairing record lives (default: ~/.glasslink/glasses.json)
  store: {
    path?: string;
  };

  // Discovery/pairing timeouts, delays and retry cap
  pairing: PairingOptions;

  commands: {
    responseTimeoutMs: number;
  };

  logging: {
    level: LogLevel;
  };

  // Virtual units for the simulated transport
  simulated?: {
    units: SimulatedUnitConfig[];
  };
}

export const DEFAULT_CONFIG: GlasslinkConfig = {
  store: {},
  pairing: { ...DEFAULT_PAIRING_OPTIONS },
  commands: {
    responseTimeoutMs: DEFAULT_RESPONSE_TIMEOUT_MS,
  },
  logging: {
    level: 'info',
  },
};
