/**
 * Glasses Connector
 *
 * Owns every collaborator for one process: the store, the transport, the
 * command dispatcher, the pairing manager and the device session. Session
 * state lives here, not in module globals.
 */

import { PairingManager } from '../pairing/manager.js';
import type { ConfigStore } from '../pairing/store.js';
import {
  DEFAULT_PAIRING_OPTIONS,
  SIDES,
  sideLabel,
  type PairingOptions,
  type Side,
} from '../pairing/types.js';
import { buildBatteryQueryFrame, DEFAULT_RESPONSE_TIMEOUT_MS } from '../protocol/constants.js';
import { CommandDispatcher } from '../protocol/dispatcher.js';
import { closeQuietly, connectWithin } from '../transport/connect.js';
import type { Connection, Transport } from '../transport/types.js';
import type { Sleep } from '../utils/time.js';
import { ConnectionError, fail, type Result } from './errors.js';
import type { Logger } from './logger.js';
import { DeviceSessionManager } from './session.js';
import { formatStatus, type ConnectorStatus } from './status.js';

export interface ConnectorDeps {
  transport: Transport;
  store: ConfigStore;
  logger: Logger;
  pairing?: Partial<PairingOptions>;
  responseTimeoutMs?: number;
  now?: () => number;
  sleep?: Sleep;
}

interface LiveLink {
  connection: Connection;
  unsubscribe: Array<() => void>;
}

export class GlassesConnector {
  readonly pairing: PairingManager;
  readonly session: DeviceSessionManager;
  readonly dispatcher: CommandDispatcher;

  private transport: Transport;
  private store: ConfigStore;
  private logger: Logger;
  private options: PairingOptions;
  private links: Partial<Record<Side, LiveLink>> = {};

  constructor(deps: ConnectorDeps) {
    this.transport = deps.transport;
    this.store = deps.store;
    this.logger = deps.logger;
    this.options = { ...DEFAULT_PAIRING_OPTIONS, ...deps.pairing };

    this.dispatcher = new CommandDispatcher(
      deps.logger.child('Commands'),
      deps.responseTimeoutMs ?? DEFAULT_RESPONSE_TIMEOUT_MS,
    );

    this.pairing = new PairingManager({
      transport: deps.transport,
      store: deps.store,
      logger: deps.logger.child('Pairing'),
      options: this.options,
      hooks: { queryInitialState: (side) => this.queryInitialState(side) },
      now: deps.now,
      sleep: deps.sleep,
    });

    this.session = new DeviceSessionManager({
      dispatcher: this.dispatcher,
      logger: deps.logger.child('Device'),
      getConnection: (side) => this.getConnection(side),
      refreshStatus: () => this.refreshStatus(),
    });
  }

  /**
   * Verify saved pairing, falling back to a fresh pairing, then open
   * long-lived links to both units.
   */
  async start(): Promise<boolean> {
    let ready = await this.pairing.verifyPairing();
    if (!ready) {
      this.logger.info('No valid pairing found, starting pairing...');
      ready = await this.pairing.pairUnits();
    }
    if (!ready) {
      this.logger.error('Glasses are not paired');
      return false;
    }
    return this.connectSides();
  }

  /**
   * Open a link to each saved address and subscribe to its telemetry.
   */
  async connectSides(): Promise<boolean> {
    const opened: Side[] = [];
    for (const side of SIDES) {
      if (this.getConnection(side)) continue;

      const linked = await this.openLink(side, this.options.connectTimeoutSec);
      if (!linked.ok) {
        this.logger.error(`Could not connect ${sideLabel(side)}: ${linked.error.message}`);
        // Leave nothing half-open
        for (const done of opened) await this.closeLink(done);
        return false;
      }
      this.attach(side, linked.value);
      opened.push(side);
    }

    this.logger.info('Connected to both glasses');
    await this.refreshStatus();
    return true;
  }

  getConnection(side: Side): Connection | null {
    const link = this.links[side];
    return link && link.connection.isConnected ? link.connection : null;
  }

  getStatus(): ConnectorStatus {
    const battery = this.session.getBatteryLevel();
    const sideStatus = (side: Side) => {
      const record = this.store.getSide(side);
      return {
        address: record.address,
        name: record.name,
        paired: record.paired,
        connected: this.getConnection(side) !== null,
        battery: battery[side],
      };
    };
    return {
      left: sideStatus('left'),
      right: sideStatus('right'),
      silentMode: this.session.getSilentMode(),
    };
  }

  async refreshStatus(): Promise<void> {
    this.logger.info(`Status: ${formatStatus(this.getStatus())}`);
  }

  /**
   * Read a side's battery over a short-lived link. Used right after pairing.
   */
  async queryInitialState(side: Side): Promise<boolean> {
    const linked = await this.openLink(side, this.options.probeTimeoutSec);
    if (!linked.ok) {
      this.logger.debug(`Initial state for ${side} unavailable: ${linked.error.message}`);
      return false;
    }
    const connection = linked.value;

    try {
      const response = await this.dispatcher.sendCommand(connection, buildBatteryQueryFrame(), true);
      return response !== null && this.session.handleBatteryFrame(side, response);
    } finally {
      await closeQuietly(this.transport, connection, this.logger);
    }
  }

  async stop(): Promise<void> {
    for (const side of SIDES) await this.closeLink(side);
    this.logger.info('Disconnected');
  }

  private async openLink(side: Side, timeoutSeconds: number): Promise<Result<Connection>> {
    const address = this.store.getSide(side).address;
    if (!address) {
      return fail(new ConnectionError(`No saved address for ${side} glass`));
    }
    return connectWithin(this.transport, address, timeoutSeconds, this.logger);
  }

  private async closeLink(side: Side): Promise<void> {
    const link = this.links[side];
    if (!link) return;
    this.detach(side);
    await closeQuietly(this.transport, link.connection, this.logger);
  }

  private attach(side: Side, connection: Connection): void {
    this.detach(side);
    this.links[side] = {
      connection,
      unsubscribe: [
        connection.onNotification((frame) => {
          this.session.handleBatteryFrame(side, frame);
        }),
        connection.onDisconnect(() => this.handleConnectionLost(side)),
      ],
    };
  }

  private detach(side: Side): void {
    const link = this.links[side];
    if (!link) return;
    for (const unsubscribe of link.unsubscribe) unsubscribe();
    delete this.links[side];
  }

  private handleConnectionLost(side: Side): void {
    this.detach(side);
    this.logger.warn(`${sideLabel(side)} connection lost`);
  }
}
