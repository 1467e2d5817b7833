/**
 * Glasslink Configuration I/O
 *
 * Config file location: ~/.glasslink/config.yaml (or ./glasslink.yaml in project)
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { dirname, join, resolve } from 'node:path';
import YAML from 'yaml';
import { isLogLevel } from '../core/logger.js';
import type { GlasslinkConfig } from './types.js';
import { DEFAULT_CONFIG } from './types.js';

function configPaths(): string[] {
  return [
    resolve(process.cwd(), 'glasslink.yaml'),           // Project-local
    resolve(process.cwd(), 'glasslink.yml'),            // Project-local alt
    join(homedir(), '.glasslink', 'config.yaml'),       // User global
    join(homedir(), '.glasslink', 'config.yml'),        // User global alt
  ];
}

/**
 * Find the config file path (first existing, or default)
 *
 * Priority:
 * 1. GLASSLINK_CONFIG env var (explicit override)
 * 2. ./glasslink.yaml (project-local)
 * 3. ./glasslink.yml (project-local alt)
 * 4. ~/.glasslink/config.yaml (user global)
 * 5. ~/.glasslink/config.yml (user global alt)
 */
export function resolveConfigPath(): string {
  if (process.env.GLASSLINK_CONFIG) {
    return resolve(process.env.GLASSLINK_CONFIG);
  }

  const paths = configPaths();
  for (const p of paths) {
    if (existsSync(p)) {
      return p;
    }
  }
  return paths[2];
}

function expandHome(p: string): string {
  return p === '~' || p.startsWith('~/') ? join(homedir(), p.slice(1)) : p;
}

function defaults(): GlasslinkConfig {
  return {
    ...DEFAULT_CONFIG,
    store: { ...DEFAULT_CONFIG.store },
    pairing: { ...DEFAULT_CONFIG.pairing },
    commands: { ...DEFAULT_CONFIG.commands },
    logging: { ...DEFAULT_CONFIG.logging },
  };
}

/**
 * Merge a parsed YAML document over the defaults, section by section
 */
export function mergeConfig(parsed: Partial<GlasslinkConfig> | null | undefined): GlasslinkConfig {
  const base = defaults();
  if (!parsed) return applyEnvOverrides(base);

  const merged: GlasslinkConfig = {
    ...base,
    ...parsed,
    store: { ...base.store, ...parsed.store },
    pairing: { ...base.pairing, ...parsed.pairing },
    commands: { ...base.commands, ...parsed.commands },
    logging: { ...base.logging, ...parsed.logging },
  };
  if (merged.store.path) {
    merged.store.path = expandHome(merged.store.path);
  }
  if (!isLogLevel(merged.logging.level)) {
    console.warn(`[Config] Unknown log level "${String(merged.logging.level)}", using info`);
    merged.logging.level = 'info';
  }
  return applyEnvOverrides(merged);
}

function applyEnvOverrides(config: GlasslinkConfig): GlasslinkConfig {
  const level = process.env.LOG_LEVEL;
  if (isLogLevel(level)) {
    config.logging.level = level;
  }
  return config;
}

/**
 * Load config from YAML file
 */
export function loadConfig(configPath = resolveConfigPath()): GlasslinkConfig {
  if (!existsSync(configPath)) {
    return mergeConfig(null);
  }

  try {
    const content = readFileSync(configPath, 'utf-8');
    const parsed = YAML.parse(content) as Partial<GlasslinkConfig> | null;
    return mergeConfig(parsed);
  } catch (err) {
    console.error(`[Config] Failed to load ${configPath}:`, err);
    return mergeConfig(null);
  }
}

/**
 * Save config to YAML file
 */
export function saveConfig(config: GlasslinkConfig, path?: string): void {
  const configPath = path || resolveConfigPath();

  const dir = dirname(configPath);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }

  const content = YAML.stringify(config, {
    indent: 2,
    lineWidth: 0, // Don't wrap lines
  });

  writeFileSync(configPath, content, 'utf-8');
  console.log(`[Config] Saved to ${configPath}`);
}
