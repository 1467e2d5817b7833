/**
 * Device Session Manager
 *
 * Holds device-wide session state (silent mode, per-side battery) for one
 * connector and issues the silent-mode command to the right unit.
 */

import { buildSilentModeFrame, parseBatteryFrame, ResponseCategory } from '../protocol/constants.js';
import type { CommandSender } from '../protocol/dispatcher.js';
import { isSide, type Side } from '../pairing/types.js';
import type { Connection } from '../transport/types.js';
import { attempt, ConnectionError, ProtocolError } from './errors.js';
import type { Logger } from './logger.js';

export type BatteryLevels = Record<Side, number | null>;

export interface DeviceSessionState {
  silentMode: boolean;
  batteryLevel: BatteryLevels;
}

export interface SilentModeOptions {
  /** Send the command even when the local state already matches */
  force?: boolean;
}

export interface DeviceSessionDeps {
  dispatcher: CommandSender;
  logger: Logger;
  /** Live connection for a side, or null when that side is down */
  getConnection: (side: Side) => Connection | null;
  /** Called after a confirmed silent-mode change */
  refreshStatus?: () => Promise<void>;
}

function hex(byte: number): string {
  return `0x${byte.toString(16).padStart(2, '0')}`;
}

export class DeviceSessionManager {
  private state: DeviceSessionState = {
    silentMode: false,
    batteryLevel: { left: null, right: null },
  };

  constructor(private deps: DeviceSessionDeps) {}

  getSilentMode(): boolean {
    return this.state.silentMode;
  }

  /**
   * Toggle silent mode (disables all glasses functionality).
   * No command is sent when the state already matches, unless `force` is set.
   * A fresh session cannot know what an earlier process left on the device,
   * so one-shot callers force the write.
   */
  async setSilentMode(enabled: boolean, options: SilentModeOptions = {}): Promise<boolean> {
    if (!options.force && enabled === this.state.silentMode) return true;

    const { dispatcher, logger } = this.deps;
    const sent = await attempt('connection', async () => {
      const connection = this.deps.getConnection('right');
      if (!connection) {
        throw new ConnectionError('Right glass is not connected');
      }
      return dispatcher.sendCommand(connection, buildSilentModeFrame(enabled), true);
    });

    if (!sent.ok) {
      logger.error(`Error setting silent mode: ${sent.error.message}`);
      return false;
    }

    const response = sent.value;
    if (response && response.length > 1 && response[1] === ResponseCategory.COMMAND_RESPONSE) {
      this.state.silentMode = enabled;
      logger.info(`Silent mode ${enabled ? 'enabled' : 'disabled'}`);
      await this.refreshStatus();
      return true;
    }

    const code = response && response.length > 1 ? hex(response[1]) : 'None';
    const error = new ProtocolError(`unexpected response ${code}`);
    logger.warn(`Failed to set silent mode: ${error.message}`);
    return false;
  }

  /** Copy of the current readings */
  getBatteryLevel(): BatteryLevels {
    return { ...this.state.batteryLevel };
  }

  /**
   * Record a battery reading. Unrecognized sides are ignored.
   */
  updateBatteryLevel(side: string, level: number): void {
    if (!isSide(side)) return;
    this.state.batteryLevel[side] = level;
    this.deps.logger.debug(`Battery level updated for ${side}: ${level}%`);
  }

  /**
   * Feed an inbound frame from a side's connection. Non-battery frames are ignored.
   */
  handleBatteryFrame(side: Side, frame: Uint8Array): boolean {
    const level = parseBatteryFrame(frame);
    if (level === null) return false;
    this.updateBatteryLevel(side, level);
    return true;
  }

  private async refreshStatus(): Promise<void> {
    const refresh = this.deps.refreshStatus;
    if (!refresh) return;
    const refreshed = await attempt('protocol', () => refresh());
    if (!refreshed.ok) {
      this.deps.logger.warn(`Status refresh failed: ${refreshed.error.message}`);
    }
  }
}
