#!/usr/bin/env node
/**
 * Glasslink CLI
 *
 * Commands:
 *   glasslink discover   - Scan for left/right units
 *   glasslink pair       - Pair both units
 *   glasslink verify     - Verify saved pairing
 *   glasslink unpair     - Forget both units
 *   glasslink status     - Show the saved pairing record
 *   glasslink silent     - Toggle silent mode
 */

import * as p from '@clack/prompts';
import { loadConfig, resolveConfigPath, type GlasslinkConfig } from './config/index.js';
import { GlassesConnector } from './core/connector.js';
import { createLogger, type Logger } from './core/logger.js';
import { formatStatus } from './core/status.js';
import { GlassesStore } from './pairing/store.js';
import { SIDES } from './pairing/types.js';
import { SimulatedTransport } from './transport/simulated.js';

const args = process.argv.slice(2);
const command = args[0];
const subCommand = args[1];

function flagValue(name: string): string | undefined {
  const idx = args.indexOf(name);
  return idx >= 0 ? args[idx + 1] : undefined;
}

function createConnector(config: GlasslinkConfig, logger: Logger): GlassesConnector | null {
  const units = config.simulated?.units ?? [];
  if (units.length === 0) {
    console.log(`No transport configured. Add simulated units to ${resolveConfigPath()}:`);
    console.log(`
simulated:
  units:
    - { name: G1_L_01, address: "AA:00", battery: 80 }
    - { name: G1_R_01, address: "BB:00", battery: 75 }
`);
    return null;
  }
  return new GlassesConnector({
    transport: new SimulatedTransport(units),
    store: new GlassesStore(config.store.path),
    logger,
    pairing: config.pairing,
    responseTimeoutMs: config.commands.responseTimeoutMs,
  });
}

async function discover(connector: GlassesConnector, timeoutArg?: string) {
  const timeout = timeoutArg ? Number(timeoutArg) : undefined;
  if (timeout !== undefined && (!Number.isFinite(timeout) || timeout <= 0)) {
    console.log(`Invalid timeout: ${timeoutArg}`);
    process.exitCode = 1;
    return;
  }

  const spinner = p.spinner();
  spinner.start('Scanning for glasses...');
  const found = await connector.pairing.discoverUnits(timeout);
  spinner.stop(`Found ${Object.keys(found).length} of 2 units`);

  console.log('\n  Side  | Name              | Address           | RSSI');
  console.log('  ------|-------------------|-------------------|------');
  for (const side of SIDES) {
    const unit = found[side];
    if (!unit) {
      console.log(`  ${side.padEnd(6)}| ${'-'.padEnd(18)}| ${'-'.padEnd(18)}| -`);
      continue;
    }
    console.log(`  ${side.padEnd(6)}| ${unit.displayName.padEnd(18)}| ${unit.address.padEnd(18)}| ${unit.rssi}`);
  }
  console.log('');
}

async function pair(connector: GlassesConnector) {
  p.intro('Pair glasses');
  const paired = await connector.pairing.pairUnits();
  if (!paired) {
    p.outro('Pairing failed. Make sure both glasses are out of the case and nearby, then retry.');
    process.exitCode = 1;
    return;
  }
  p.outro('✓ Both glasses paired');
}

async function verify(connector: GlassesConnector) {
  const verified = await connector.pairing.verifyPairing();
  if (!verified) {
    console.log('Pairing could not be verified. Run "glasslink pair".');
    process.exitCode = 1;
    return;
  }
  console.log('✓ Pairing verified');
}

async function unpair(connector: GlassesConnector) {
  const confirmed = await p.confirm({
    message: 'Forget both glasses?',
    initialValue: false,
  });
  if (p.isCancel(confirmed) || !confirmed) {
    p.cancel('Cancelled');
    return;
  }
  await connector.pairing.unpairGlasses();
  p.log.success('Unpaired. Run "glasslink pair" to pair again.');
}

function status(store: GlassesStore) {
  console.log(`\nPairing record: ${store.filePath}\n`);
  for (const side of SIDES) {
    const record = store.getSide(side);
    console.log(`  ${side.padEnd(6)} ${record.paired ? '✓ paired' : '✗ not paired'}  ${record.name ?? '-'} (${record.address ?? 'no address'})`);
  }
  if (store.updatedAt) {
    console.log(`\n  Last saved: ${new Date(store.updatedAt).toLocaleString()}`);
  }
  console.log('');
}

async function silent(connector: GlassesConnector, value?: string) {
  if (value !== 'on' && value !== 'off') {
    console.log('Usage: glasslink silent <on|off>');
    process.exitCode = 1;
    return;
  }

  try {
    if (!(await connector.start())) {
      process.exitCode = 1;
      return;
    }
    const changed = await connector.session.setSilentMode(value === 'on', { force: true });
    if (!changed) {
      process.exitCode = 1;
      return;
    }
    console.log(`✓ ${formatStatus(connector.getStatus())}`);
  } finally {
    await connector.stop();
  }
}

function showHelp() {
  console.log(`
Glasslink - Pairing and session connector for two-part smart glasses

Usage: glasslink <command>

Commands:
  discover [--timeout N]   Scan for left/right units (N seconds, default 15)
  pair                     Pair both units
  verify                   Verify saved pairing
  unpair                   Forget both units
  status                   Show the saved pairing record
  silent <on|off>          Toggle silent mode
  help                     Show this help message

Examples:
  glasslink discover --timeout 5
  glasslink pair
  glasslink silent on

Environment:
  GLASSLINK_CONFIG         Path to the config file
  LOG_LEVEL                debug, info, warn or error
`);
}

async function main() {
  if (command === undefined || command === 'help' || command === '-h' || command === '--help') {
    showHelp();
    return;
  }

  const config = loadConfig();
  const logger = createLogger('Glasslink', config.logging.level);

  if (command === 'status') {
    status(new GlassesStore(config.store.path));
    return;
  }

  const connector = createConnector(config, logger);
  if (!connector) {
    process.exitCode = 1;
    return;
  }

  switch (command) {
    case 'discover':
    case 'scan':
      await discover(connector, flagValue('--timeout'));
      break;

    case 'pair':
      await pair(connector);
      break;

    case 'verify':
      await verify(connector);
      break;

    case 'unpair':
      await unpair(connector);
      break;

    case 'silent':
      await silent(connector, subCommand);
      break;

    default:
      console.log(`Unknown command: ${command}`);
      console.log('Run "glasslink help" for usage.');
      process.exitCode = 1;
  }
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
