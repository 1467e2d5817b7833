/**
 * Simulated Transport
 *
 * In-process stand-in for a radio stack. Each virtual unit advertises a name,
 * accepts connections and answers the command frames the connector sends.
 * Faults (refused connects, failed handshakes, scan errors) can be injected
 * per unit for development and tests.
 */

import { Command, ResponseCategory } from '../protocol/constants.js';
import type {
  Connection,
  DisconnectListener,
  NotificationListener,
  ScannedDevice,
  Transport,
} from './types.js';

export interface SimulatedUnitConfig {
  name: string;
  address: string;
  rssi?: number;
  battery?: number;
}

interface SimulatedUnit extends Required<SimulatedUnitConfig> {
  silentMode: boolean;
  bonded: boolean;
  failConnects: number;
  failPairs: number;
  /** Reply category for SET_SILENT_MODE; null means no reply */
  silentReply: number | null;
}

class SimulatedConnection implements Connection {
  private notificationListeners = new Set<NotificationListener>();
  private disconnectListeners = new Set<DisconnectListener>();
  private open = true;

  constructor(
    readonly address: string,
    private respond: (frame: Uint8Array) => Uint8Array | null,
  ) {}

  get isConnected(): boolean {
    return this.open;
  }

  async write(frame: Uint8Array): Promise<void> {
    if (!this.open) {
      throw new Error(`Not connected to ${this.address}`);
    }
    const reply = this.respond(frame);
    if (reply) {
      // Answer asynchronously, like a real notification
      setImmediate(() => this.notify(reply));
    }
  }

  onNotification(listener: NotificationListener): () => void {
    this.notificationListeners.add(listener);
    return () => this.notificationListeners.delete(listener);
  }

  onDisconnect(listener: DisconnectListener): () => void {
    this.disconnectListeners.add(listener);
    return () => this.disconnectListeners.delete(listener);
  }

  notify(frame: Uint8Array): void {
    for (const listener of this.notificationListeners) {
      listener(frame);
    }
  }

  close(lost: boolean): void {
    if (!this.open) return;
    this.open = false;
    if (lost) {
      for (const listener of this.disconnectListeners) {
        listener();
      }
    }
    this.notificationListeners.clear();
    this.disconnectListeners.clear();
  }
}

export class SimulatedTransport implements Transport {
  private units = new Map<string, SimulatedUnit>();
  private connections = new Set<SimulatedConnection>();
  private scanFailure: string | null = null;

  /** Addresses passed to connect(), in call order */
  readonly connectCalls: string[] = [];
  readonly pairCalls: string[] = [];
  /** Frames written, keyed by address */
  readonly written = new Map<string, Uint8Array[]>();

  constructor(units: SimulatedUnitConfig[] = []) {
    for (const unit of units) {
      this.addUnit(unit);
    }
  }

  addUnit(config: SimulatedUnitConfig): void {
    this.units.set(config.address, {
      rssi: -60,
      battery: 100,
      ...config,
      silentMode: false,
      bonded: false,
      failConnects: 0,
      failPairs: 0,
      silentReply: ResponseCategory.COMMAND_RESPONSE,
    });
  }

  removeUnit(address: string): void {
    this.units.delete(address);
  }

  /** Next `count` connects to `address` are refused */
  failConnects(address: string, count: number): void {
    this.requireUnit(address).failConnects = count;
  }

  /** Next `count` pairing handshakes with `address` fail */
  failPairs(address: string, count: number): void {
    this.requireUnit(address).failPairs = count;
  }

  failNextScan(message: string): void {
    this.scanFailure = message;
  }

  setSilentReply(address: string, category: number | null): void {
    this.requireUnit(address).silentReply = category;
  }

  setBattery(address: string, level: number): void {
    this.requireUnit(address).battery = level;
  }

  isBonded(address: string): boolean {
    return this.units.get(address)?.bonded ?? false;
  }

  isSilent(address: string): boolean {
    return this.units.get(address)?.silentMode ?? false;
  }

  /** Push an unsolicited frame to every open connection to `address` */
  emit(address: string, frame: Uint8Array): void {
    for (const conn of this.connections) {
      if (conn.address === address && conn.isConnected) conn.notify(frame);
    }
  }

  /** Drop every open link to `address` as if the unit went out of range */
  dropLink(address: string): void {
    for (const conn of [...this.connections]) {
      if (conn.address === address) {
        conn.close(true);
        this.connections.delete(conn);
      }
    }
  }

  get openConnections(): number {
    return [...this.connections].filter((c) => c.isConnected).length;
  }

  async scan(_timeoutSeconds: number): Promise<ScannedDevice[]> {
    if (this.scanFailure) {
      const message = this.scanFailure;
      this.scanFailure = null;
      throw new Error(message);
    }
    return [...this.units.values()].map((u) => ({ name: u.name, address: u.address, rssi: u.rssi }));
  }

  async connect(address: string, _timeoutSeconds: number): Promise<Connection> {
    this.connectCalls.push(address);
    const unit = this.units.get(address);
    if (!unit) {
      throw new Error(`Device ${address} not found`);
    }
    if (unit.failConnects > 0) {
      unit.failConnects--;
      throw new Error(`Connection to ${address} refused`);
    }
    const conn = new SimulatedConnection(address, (frame) => this.handleFrame(unit, frame));
    this.connections.add(conn);
    return conn;
  }

  async pair(connection: Connection): Promise<void> {
    this.pairCalls.push(connection.address);
    const unit = this.requireUnit(connection.address);
    if (!connection.isConnected) {
      throw new Error(`Cannot pair ${connection.address}: not connected`);
    }
    if (unit.failPairs > 0) {
      unit.failPairs--;
      throw new Error(`Pairing with ${connection.address} rejected`);
    }
    unit.bonded = true;
  }

  async disconnect(connection: Connection): Promise<void> {
    for (const conn of this.connections) {
      if (conn === connection) {
        conn.close(false);
        this.connections.delete(conn);
        return;
      }
    }
  }

  private handleFrame(unit: SimulatedUnit, frame: Uint8Array): Uint8Array | null {
    const log = this.written.get(unit.address) ?? [];
    log.push(frame);
    this.written.set(unit.address, log);

    switch (frame[0]) {
      case Command.SET_SILENT_MODE:
        if (unit.silentReply === null) return null;
        if (unit.silentReply === ResponseCategory.COMMAND_RESPONSE) {
          unit.silentMode = frame[1] === 0x01;
        }
        return Uint8Array.of(Command.SET_SILENT_MODE, unit.silentReply);
      case Command.GET_BATTERY:
        return Uint8Array.of(Command.GET_BATTERY, unit.battery);
      case Command.HEARTBEAT:
        return Uint8Array.of(Command.HEARTBEAT, ResponseCategory.COMMAND_RESPONSE);
      default:
        return null;
    }
  }

  private requireUnit(address: string): SimulatedUnit {
    const unit = this.units.get(address);
    if (!unit) {
      throw new Error(`Unknown simulated unit: ${address}`);
    }
    return unit;
  }
}
