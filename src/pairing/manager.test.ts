/**
 * Pairing Manager Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { silentLogger } from '../core/logger.js';
import { SimulatedTransport } from '../transport/simulated.js';
import type { Connection, ScannedDevice, Transport } from '../transport/types.js';
import { classifyDevices, PairingManager, type PairingManagerDeps } from './manager.js';
import { GlassesStore } from './store.js';

const LEFT = { name: 'G1_L_42', address: 'AA', rssi: -50, battery: 80 };
const RIGHT = { name: 'G1_R_42', address: 'BB', rssi: -55, battery: 75 };

describe('classifyDevices', () => {
  it('sorts units by name marker', () => {
    const result = classifyDevices([
      { name: 'G1_L_42', address: 'AA', rssi: -50 },
      { name: 'G1_R_42', address: 'BB', rssi: -55 },
    ]);

    expect(result).toEqual({
      left: { side: 'left', address: 'AA', displayName: 'G1_L_42', pairedFlag: false, rssi: -50 },
      right: { side: 'right', address: 'BB', displayName: 'G1_R_42', pairedFlag: false, rssi: -55 },
    });
  });

  it('drops unnamed and unmatched devices', () => {
    const result = classifyDevices([
      { name: null, address: 'CC', rssi: -40 },
      { name: '', address: 'DD', rssi: -40 },
      { name: 'Headphones', address: 'EE', rssi: -40 },
    ]);

    expect(result).toEqual({});
  });

  it('keeps the most recently seen device for a side', () => {
    const result = classifyDevices([
      { name: 'G1_L_1', address: 'A1', rssi: -70 },
      { name: 'G1_L_2', address: 'A2', rssi: -80 },
    ]);

    expect(result.left?.address).toBe('A2');
    expect(result.right).toBeUndefined();
  });

  it('treats a name carrying both markers as left', () => {
    const result = classifyDevices([{ name: 'X_L_R_1', address: 'AB', rssi: -60 }]);
    expect(Object.keys(result)).toEqual(['left']);
  });
});

describe('PairingManager', () => {
  let tempDir: string;
  let store: GlassesStore;
  let transport: SimulatedTransport;
  let clock: number;

  function createManager(overrides: Partial<PairingManagerDeps> = {}): PairingManager {
    return new PairingManager({
      transport,
      store,
      logger: silentLogger,
      options: { retryDelayMs: 0, settleDelayMs: 0 },
      now: () => clock,
      ...overrides,
    });
  }

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'glasslink-pairing-test-'));
    store = new GlassesStore(join(tempDir, 'glasses.json'));
    transport = new SimulatedTransport([LEFT, RIGHT]);
    clock = 1_000_000;
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  describe('discoverUnits', () => {
    it('returns both units found by the scan', async () => {
      const manager = createManager();
      const result = await manager.discoverUnits(1);

      expect(result.left?.address).toBe('AA');
      expect(result.right?.address).toBe('BB');
      expect(manager.getUnitState('left')).toBe('discovered');
      expect(manager.getDiscoveryCache().scannedAt).toBe(1_000_000);
    });

    it('returns an empty result when the scan fails', async () => {
      const manager = createManager();
      transport.failNextScan('adapter off');

      const result = await manager.discoverUnits(1);

      expect(result).toEqual({});
      expect(manager.getDiscoveryCache()).toEqual({ result: {}, scannedAt: null });
    });

    it('returns a copy that does not alter the cache', async () => {
      const manager = createManager();
      const result = await manager.discoverUnits(1);
      delete result.left;

      expect(manager.getDiscoveryCache().result.left?.address).toBe('AA');
    });

    it('runs one scan at a time', async () => {
      let releaseFirst: (devices: ScannedDevice[]) => void = () => {};
      const scan = vi
        .fn<[number], Promise<ScannedDevice[]>>()
        .mockImplementationOnce(() => new Promise((resolve) => { releaseFirst = resolve; }))
        .mockResolvedValue([]);
      const manager = createManager({ transport: { ...stubTransport(), scan } });

      const first = manager.discoverUnits(1);
      const second = manager.discoverUnits(1);
      await vi.waitFor(() => expect(scan).toHaveBeenCalledTimes(1));
      await new Promise((resolve) => setImmediate(resolve));
      expect(scan).toHaveBeenCalledTimes(1);

      releaseFirst([{ name: 'G1_L_9', address: 'L9', rssi: -40 }]);
      expect((await first).left?.address).toBe('L9');
      expect(await second).toEqual({});
      expect(scan).toHaveBeenCalledTimes(2);
    });
  });

  describe('pairUnits', () => {
    it('pairs left then right and persists both', async () => {
      const manager = createManager();

      expect(await manager.pairUnits()).toBe(true);
      expect(transport.pairCalls).toEqual(['AA', 'BB']);
      expect(manager.getUnitState('left')).toBe('paired');
      expect(manager.getUnitState('right')).toBe('paired');

      const reloaded = new GlassesStore(store.filePath);
      expect(reloaded.getSide('left')).toEqual({ address: 'AA', name: 'G1_L_42', paired: true });
      expect(reloaded.getSide('right')).toEqual({ address: 'BB', name: 'G1_R_42', paired: true });
      expect(transport.openConnections).toBe(0);
    });

    it('fails without connecting when a side is missing', async () => {
      transport.removeUnit('BB');
      const manager = createManager();

      expect(await manager.pairUnits()).toBe(false);
      expect(transport.connectCalls).toEqual([]);
    });

    it('never attempts the right side when the left side fails', async () => {
      transport.failConnects('AA', 3);
      const manager = createManager();

      expect(await manager.pairUnits()).toBe(false);
      expect(transport.connectCalls).toEqual(['AA', 'AA', 'AA']);
      expect(store.leftAddress).toBe('AA');
      expect(store.rightAddress).toBe('BB');
      expect(store.leftPaired).toBe(false);
      expect(manager.getUnitState('left')).toBe('unknown');
    });

    it('reuses a fresh cache and rescans once it is older than 60 seconds', async () => {
      const scan = vi.spyOn(transport, 'scan');
      const manager = createManager();

      await manager.pairUnits();
      expect(scan).toHaveBeenCalledTimes(1);

      clock += 60_000;
      await manager.pairUnits();
      expect(scan).toHaveBeenCalledTimes(1);

      clock += 1;
      await manager.pairUnits();
      expect(scan).toHaveBeenCalledTimes(2);
    });

    it('rescans while the cache is empty', async () => {
      transport.removeUnit('AA');
      transport.removeUnit('BB');
      const scan = vi.spyOn(transport, 'scan');
      const manager = createManager();

      expect(await manager.pairUnits()).toBe(false);
      expect(await manager.pairUnits()).toBe(false);
      expect(scan).toHaveBeenCalledTimes(2);
    });
  });

  describe('attemptPairing', () => {
    it('succeeds on the first attempt', async () => {
      const manager = createManager();

      expect(await manager.attemptPairing('AA', 'left')).toBe(true);
      expect(transport.connectCalls).toEqual(['AA']);
      expect(new GlassesStore(store.filePath).leftPaired).toBe(true);
      expect(transport.isBonded('AA')).toBe(true);
    });

    it('retries until a connect succeeds', async () => {
      transport.failConnects('AA', 2);
      const manager = createManager();

      expect(await manager.attemptPairing('AA', 'left', 3)).toBe(true);
      expect(transport.connectCalls).toHaveLength(3);
    });

    it('retries after a failed handshake and closes the failed link', async () => {
      transport.failPairs('AA', 1);
      const manager = createManager();

      expect(await manager.attemptPairing('AA', 'left', 3)).toBe(true);
      expect(transport.connectCalls).toHaveLength(2);
      expect(transport.openConnections).toBe(0);
    });

    it('connects at most maxAttempts times and then fails', async () => {
      transport.failConnects('AA', 10);
      const manager = createManager();

      expect(await manager.attemptPairing('AA', 'left', 3)).toBe(false);
      expect(transport.connectCalls).toHaveLength(3);
      expect(store.leftPaired).toBe(false);
    });

    it('waits a fixed 2s between attempts and 1s after pairing', async () => {
      transport.failConnects('AA', 2);
      const sleep = vi.fn(async (_ms: number) => {});
      const manager = createManager({ options: {}, sleep });

      expect(await manager.attemptPairing('AA', 'left')).toBe(true);
      expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([2000, 2000, 1000]);
    });

    it('does not wait after the final failed attempt', async () => {
      transport.failConnects('AA', 2);
      const sleep = vi.fn(async (_ms: number) => {});
      const manager = createManager({ options: {}, sleep });

      expect(await manager.attemptPairing('AA', 'left', 2)).toBe(false);
      expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([2000]);
    });

    it('treats a failed save as a failed attempt', async () => {
      vi.spyOn(store, 'save').mockRejectedValue(new Error('disk full'));
      const manager = createManager();

      expect(await manager.attemptPairing('AA', 'left', 2)).toBe(false);
      expect(transport.connectCalls).toHaveLength(2);
      expect(store.leftPaired).toBe(false);
    });

    it('still succeeds when the initial state query fails', async () => {
      const queryInitialState = vi.fn().mockRejectedValue(new Error('no reply'));
      const manager = createManager({ hooks: { queryInitialState } });

      expect(await manager.attemptPairing('BB', 'right')).toBe(true);
      expect(queryInitialState).toHaveBeenCalledWith('right');
    });

    it('tracks the running attempt', async () => {
      let seen: ReturnType<PairingManager['getPairingSession']> = null;
      const manager: PairingManager = createManager({
        hooks: {
          queryInitialState: async (side) => {
            seen = manager.getPairingSession(side);
            return true;
          },
        },
      });
      transport.failConnects('AA', 1);

      await manager.attemptPairing('AA', 'left');

      expect(seen).toEqual({
        side: 'left',
        address: 'AA',
        attempt: 2,
        maxAttempts: 3,
        lastError: 'Connection to AA refused',
      });
      expect(manager.getPairingSession('left')).toBeNull();
    });
  });

  describe('verifyPairing', () => {
    function saveAddresses(paired: boolean) {
      store.setAddress('left', 'AA', 'G1_L_42');
      store.setAddress('right', 'BB', 'G1_R_42');
      store.setPaired('left', paired);
      store.setPaired('right', paired);
    }

    it('fails without connecting when no addresses are saved', async () => {
      const manager = createManager();

      expect(await manager.verifyPairing()).toBe(false);
      expect(transport.connectCalls).toEqual([]);
    });

    it('probes both sides when already paired', async () => {
      saveAddresses(true);
      const manager = createManager();

      expect(await manager.verifyPairing()).toBe(true);
      expect(transport.connectCalls).toEqual(['AA', 'BB']);
      expect(transport.pairCalls).toEqual([]);
      expect(manager.getUnitState('right')).toBe('paired');
      expect(transport.openConnections).toBe(0);
    });

    it('bonds both sides when the paired flags are not set', async () => {
      saveAddresses(false);
      const manager = createManager();

      expect(await manager.verifyPairing()).toBe(true);
      expect(transport.connectCalls).toEqual(['AA', 'BB', 'AA', 'BB']);
      expect(transport.pairCalls).toEqual(['AA', 'BB']);

      const reloaded = new GlassesStore(store.filePath);
      expect(reloaded.leftPaired).toBe(true);
      expect(reloaded.rightPaired).toBe(true);
    });

    it('fails when a side is unreachable', async () => {
      saveAddresses(true);
      transport.failConnects('BB', 1);
      const manager = createManager();

      expect(await manager.verifyPairing()).toBe(false);
      expect(transport.connectCalls).toEqual(['AA', 'BB']);
      expect(manager.getUnitState('left')).toBe('unknown');
    });

    it('keeps the left flag persisted when the right handshake fails', async () => {
      saveAddresses(false);
      transport.failPairs('BB', 1);
      const manager = createManager();

      expect(await manager.verifyPairing()).toBe(false);

      const reloaded = new GlassesStore(store.filePath);
      expect(reloaded.leftPaired).toBe(true);
      expect(reloaded.rightPaired).toBe(false);
    });

    it('fails when a probe connect exceeds its timeout', async () => {
      saveAddresses(true);
      const hanging: Transport = {
        ...stubTransport(),
        connect: () => new Promise<Connection>(() => {}),
      };
      const manager = createManager({ transport: hanging, options: { probeTimeoutSec: 0.01 } });

      expect(await manager.verifyPairing()).toBe(false);
    });
  });

  describe('unpairGlasses', () => {
    it('clears and persists both sides', async () => {
      const manager = createManager();
      await manager.pairUnits();

      await manager.unpairGlasses();

      const reloaded = new GlassesStore(store.filePath);
      expect(reloaded.getSide('left')).toEqual({ address: null, name: null, paired: false });
      expect(reloaded.getSide('right')).toEqual({ address: null, name: null, paired: false });
      expect(manager.getUnitState('left')).toBe('unknown');
    });
  });
});

function stubTransport(): Transport {
  return {
    scan: async () => [],
    connect: async (address) => {
      throw new Error(`No device at ${address}`);
    },
    pair: async () => {},
    disconnect: async () => {},
  };
}
