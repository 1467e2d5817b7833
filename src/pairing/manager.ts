/**
 * Pairing Manager
 *
 * Discovers the left and right units, pairs each one, verifies saved pairing
 * on restart and unpairs on demand. Discovery and pairing share one lock, so
 * only one such workflow runs at a time per manager.
 */

import {
  attempt,
  ConfigIncompleteError,
  ConnectionError,
  describeError,
  fail,
  ok,
  type Result,
} from '../core/errors.js';
import type { Logger } from '../core/logger.js';
import { closeQuietly, connectWithin } from '../transport/connect.js';
import type { Connection, ScannedDevice, Transport } from '../transport/types.js';
import { sleep as defaultSleep, type Sleep } from '../utils/time.js';
import { PairingLock } from './lock.js';
import type { ConfigStore } from './store.js';
import {
  DEFAULT_PAIRING_OPTIONS,
  SIDES,
  SIDE_MARKERS,
  sideLabel,
  type DiscoveryCache,
  type DiscoveryResult,
  type PairingOptions,
  type PairingSession,
  type Side,
  type UnitState,
} from './types.js';

export interface PairingHooks {
  /** Read initial device state after a unit pairs. Resolving false is only a warning. */
  queryInitialState?(side: Side): Promise<boolean>;
}

export interface PairingManagerDeps {
  transport: Transport;
  store: ConfigStore;
  logger: Logger;
  options?: Partial<PairingOptions>;
  hooks?: PairingHooks;
  now?: () => number;
  sleep?: Sleep;
}

/**
 * Sort advertised devices into left/right by name marker.
 * Unnamed and unmatched devices are dropped; a later match replaces an earlier one.
 */
export function classifyDevices(devices: ScannedDevice[]): DiscoveryResult {
  const result: DiscoveryResult = {};
  for (const device of devices) {
    if (!device.name) continue;
    let side: Side;
    if (device.name.includes(SIDE_MARKERS.left)) {
      side = 'left';
    } else if (device.name.includes(SIDE_MARKERS.right)) {
      side = 'right';
    } else {
      continue;
    }
    result[side] = {
      side,
      address: device.address,
      displayName: device.name,
      pairedFlag: false,
      rssi: device.rssi,
    };
  }
  return result;
}

function copyResult(result: DiscoveryResult): DiscoveryResult {
  const copy: DiscoveryResult = {};
  for (const side of SIDES) {
    const unit = result[side];
    if (unit) copy[side] = { ...unit };
  }
  return copy;
}

export class PairingManager {
  private transport: Transport;
  private store: ConfigStore;
  private logger: Logger;
  private options: PairingOptions;
  private hooks: PairingHooks;
  private now: () => number;
  private sleep: Sleep;

  private lock = new PairingLock();
  private cache: DiscoveryCache = { result: {}, scannedAt: null };
  private states: Record<Side, UnitState> = { left: 'unknown', right: 'unknown' };
  private sessions: Partial<Record<Side, PairingSession>> = {};

  constructor(deps: PairingManagerDeps) {
    this.transport = deps.transport;
    this.store = deps.store;
    this.logger = deps.logger;
    this.options = { ...DEFAULT_PAIRING_OPTIONS, ...deps.options };
    this.hooks = deps.hooks ?? {};
    this.now = deps.now ?? Date.now;
    this.sleep = deps.sleep ?? defaultSleep;

    for (const side of SIDES) {
      if (this.store.getSide(side).paired) this.states[side] = 'paired';
    }
  }

  getUnitState(side: Side): UnitState {
    return this.states[side];
  }

  /** Current pairing attempt for a side, if one is running */
  getPairingSession(side: Side): PairingSession | null {
    const session = this.sessions[side];
    return session ? { ...session } : null;
  }

  getDiscoveryCache(): DiscoveryCache {
    return { result: copyResult(this.cache.result), scannedAt: this.cache.scannedAt };
  }

  /**
   * Scan for the two units. Never throws: a failed scan yields `{}`.
   */
  async discoverUnits(timeoutSeconds = this.options.scanTimeoutSec): Promise<DiscoveryResult> {
    return this.lock.runExclusive(() => this.scan(timeoutSeconds));
  }

  /**
   * Pair both units from the discovery cache, rescanning if it is empty or stale.
   * Left is paired first; right is skipped if left fails.
   */
  async pairUnits(): Promise<boolean> {
    try {
      return await this.lock.runExclusive(async () => {
        if (this.isCacheStale()) {
          await this.scan(this.options.scanTimeoutSec);
        }

        const { left, right } = this.cache.result;
        if (!left || !right) {
          this.logger.error('Could not find both glasses');
          return false;
        }

        this.store.setAddress('left', left.address, left.displayName);
        this.store.setAddress('right', right.address, right.displayName);

        if (!(await this.pairSide(left.address, 'left', this.options.maxAttempts))) {
          return false;
        }
        if (!(await this.pairSide(right.address, 'right', this.options.maxAttempts))) {
          return false;
        }

        this.logger.info('Successfully paired with both glasses');
        return true;
      });
    } catch (err) {
      this.logger.error(`Pairing failed: ${describeError(err)}`);
      return false;
    }
  }

  /**
   * Pair one unit, retrying with a fixed delay. Connect runs at most `maxAttempts` times.
   */
  async attemptPairing(
    address: string,
    side: Side,
    maxAttempts = this.options.maxAttempts,
  ): Promise<boolean> {
    try {
      return await this.lock.runExclusive(() => this.pairSide(address, side, maxAttempts));
    } catch (err) {
      this.logger.error(`Pairing attempt failed: ${describeError(err)}`);
      return false;
    }
  }

  /**
   * Check that both saved units are reachable, bonding any side whose
   * paired flag is not yet set.
   */
  async verifyPairing(): Promise<boolean> {
    this.logger.debug('Verifying pairing...');

    const saved = this.savedAddresses();
    if (!saved.ok) {
      this.logger.debug(saved.error.message);
      return false;
    }

    for (const side of SIDES) this.states[side] = 'verifying';

    let verified = false;
    try {
      verified = await this.runVerification(saved.value);
    } catch (err) {
      this.logger.error(`Error verifying pairing: ${describeError(err)}`);
    }

    for (const side of SIDES) this.states[side] = verified ? 'paired' : 'unknown';
    return verified;
  }

  /**
   * Forget both units. No transport-level unpair is sent.
   */
  async unpairGlasses(): Promise<void> {
    this.store.clear();
    for (const side of SIDES) this.states[side] = 'unknown';

    const saved = await attempt('storage', () => this.store.save());
    if (!saved.ok) {
      this.logger.error(`Error unpairing: ${saved.error.message}`);
      return;
    }
    this.logger.info('Unpaired from glasses');
  }

  private isCacheStale(): boolean {
    const { result, scannedAt } = this.cache;
    if (scannedAt === null || Object.keys(result).length === 0) return true;
    return this.now() - scannedAt > this.options.cacheTtlMs;
  }

  // Callers hold the lock
  private async scan(timeoutSeconds: number): Promise<DiscoveryResult> {
    this.logger.info('Starting glasses discovery...');

    const scanned = await attempt('discovery', () => this.transport.scan(timeoutSeconds));
    if (!scanned.ok) {
      this.logger.error(`Discovery failed: ${scanned.error.message}`);
      return {};
    }

    const result = classifyDevices(scanned.value);
    for (const side of SIDES) {
      const unit = result[side];
      if (!unit) continue;
      this.logger.info(`Found ${side} glass: ${unit.displayName}`);
      if (this.states[side] === 'unknown') this.states[side] = 'discovered';
    }

    this.cache = { result, scannedAt: this.now() };
    return copyResult(result);
  }

  // Callers hold the lock
  private async pairSide(address: string, side: Side, maxAttempts: number): Promise<boolean> {
    const label = sideLabel(side);
    const session: PairingSession = { side, address, attempt: 0, maxAttempts, lastError: null };
    this.sessions[side] = session;
    this.states[side] = 'pairing';
    this.logger.info(`Performing first-time pairing for ${label}...`);

    try {
      for (let n = 1; n <= maxAttempts; n++) {
        session.attempt = n;
        const outcome = await this.pairOnce(address, side);
        if (outcome.ok) {
          this.states[side] = 'paired';
          this.logger.info(`${label} paired and connected`);
          await this.loadInitialState(side);
          return true;
        }

        session.lastError = outcome.error.message;
        this.logger.error(`Connection attempt ${n} failed: ${outcome.error.message}`);
        if (n < maxAttempts) {
          this.logger.info('Retrying connection...');
          await this.sleep(this.options.retryDelayMs);
        }
      }

      this.states[side] = 'unknown';
      this.logger.error(`${label} could not be paired after ${maxAttempts} attempt(s)`);
      return false;
    } finally {
      delete this.sessions[side];
    }
  }

  private async pairOnce(address: string, side: Side): Promise<Result<void>> {
    const connected = await this.connectWithin(address, this.options.connectTimeoutSec);
    if (!connected.ok) return fail(connected.error);
    const connection = connected.value;

    if (!connection.isConnected) {
      await this.closeQuietly(connection);
      return fail(new ConnectionError(`Link to ${address} closed before pairing`));
    }
    this.logger.debug(`Connection established with ${address}`);

    const paired = await attempt('connection', () => this.transport.pair(connection));
    if (!paired.ok) {
      await this.closeQuietly(connection);
      return paired;
    }
    this.logger.debug('Pairing successful');

    // Persist before reporting success
    this.store.setPaired(side, true);
    const saved = await attempt('storage', () => this.store.save());
    if (!saved.ok) {
      this.store.setPaired(side, false);
      await this.closeQuietly(connection);
      return saved;
    }

    await this.closeQuietly(connection);
    await this.sleep(this.options.settleDelayMs);
    return ok(undefined);
  }

  private async loadInitialState(side: Side): Promise<void> {
    const query = this.hooks.queryInitialState;
    if (!query) return;

    const state = await attempt('protocol', () => query.call(this.hooks, side));
    if (!state.ok || !state.value) {
      const reason = state.ok ? '' : `: ${state.error.message}`;
      this.logger.warn(`Could not get initial state for ${sideLabel(side)}${reason}`);
    }
  }

  private async runVerification(addresses: Record<Side, string>): Promise<boolean> {
    // Reachability probe
    for (const side of SIDES) {
      const probe = await this.probe(addresses[side], false);
      if (!probe.ok) {
        this.logger.warn(`Could not verify ${side} glass pairing: ${probe.error.message}`);
        return false;
      }
      this.logger.debug(`Successfully verified ${side} glass pairing`);
    }
    this.logger.info('Pairing verification successful');

    if (this.store.leftPaired && this.store.rightPaired) {
      return true;
    }

    this.logger.info('First time connection detected. Pairing the glasses with this device, this only happens once...');
    for (const side of SIDES) {
      const bonded = await this.probe(addresses[side], true);
      if (!bonded.ok) {
        this.logger.warn(`Could not verify ${side} glass pairing: ${bonded.error.message}`);
        return false;
      }
      this.store.setPaired(side, true);
      const saved = await attempt('storage', () => this.store.save());
      if (!saved.ok) {
        this.store.setPaired(side, false);
        this.logger.warn(`Could not save ${side} glass pairing: ${saved.error.message}`);
        return false;
      }
      this.logger.debug(`Successfully paired ${side} glass`);
    }

    this.logger.info('Pairing verification successful');
    return true;
  }

  /** Short-timeout connect (and optional handshake), then disconnect */
  private async probe(address: string, handshake: boolean): Promise<Result<void>> {
    const connected = await this.connectWithin(address, this.options.probeTimeoutSec);
    if (!connected.ok) return fail(connected.error);
    const connection = connected.value;

    if (handshake) {
      const paired = await attempt('connection', () => this.transport.pair(connection));
      if (!paired.ok) {
        await this.closeQuietly(connection);
        return paired;
      }
    }

    return attempt('connection', () => this.transport.disconnect(connection));
  }

  private savedAddresses(): Result<Record<Side, string>> {
    const left = this.store.leftAddress;
    const right = this.store.rightAddress;
    if (!left || !right) {
      return fail(new ConfigIncompleteError('No saved addresses found'));
    }
    return ok({ left, right });
  }

  private connectWithin(address: string, timeoutSeconds: number): Promise<Result<Connection>> {
    return connectWithin(this.transport, address, timeoutSeconds, this.logger);
  }

  private closeQuietly(connection: Connection): Promise<void> {
    return closeQuietly(this.transport, connection, this.logger);
  }
}
