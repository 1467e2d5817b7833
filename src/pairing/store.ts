/**
 * Glasses Store
 *
 * Durable record of each side's address, display name and paired flag.
 * Setters only touch memory; `save()` writes the whole record atomically.
 */

import crypto from 'node:crypto';
import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import type { GlassesRecordFile, Side, SideRecord } from './types.js';

export interface ConfigStore {
  leftAddress: string | null;
  rightAddress: string | null;
  leftName: string | null;
  rightName: string | null;
  leftPaired: boolean;
  rightPaired: boolean;
  getSide(side: Side): SideRecord;
  setAddress(side: Side, address: string | null, name?: string | null): void;
  setPaired(side: Side, paired: boolean): void;
  clear(): void;
  save(): Promise<void>;
}

export function getDefaultStorePath(): string {
  return path.join(os.homedir(), '.glasslink', 'glasses.json');
}

function emptySide(): SideRecord {
  return { address: null, name: null, paired: false };
}

function emptyRecord(): GlassesRecordFile {
  return { version: 1, left: emptySide(), right: emptySide() };
}

function normalizeSide(raw: unknown): SideRecord {
  if (typeof raw !== 'object' || raw === null) return emptySide();
  const address = 'address' in raw ? raw.address : null;
  const name = 'name' in raw ? raw.name : null;
  return {
    address: typeof address === 'string' && address ? address : null,
    name: typeof name === 'string' && name ? name : null,
    paired: 'paired' in raw && raw.paired === true,
  };
}

// File I/O
function readRecord(filePath: string): GlassesRecordFile {
  try {
    const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    if (typeof raw !== 'object' || raw === null) return emptyRecord();
    const updatedAt = 'updatedAt' in raw && typeof raw.updatedAt === 'string' ? raw.updatedAt : undefined;
    return {
      version: 1,
      left: normalizeSide('left' in raw ? raw.left : null),
      right: normalizeSide('right' in raw ? raw.right : null),
      updatedAt,
    };
  } catch {
    return emptyRecord();
  }
}

async function writeJson(filePath: string, data: unknown): Promise<void> {
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true, mode: 0o700 });
  const tmp = `${filePath}.${crypto.randomUUID()}.tmp`;
  try {
    await fs.promises.writeFile(tmp, JSON.stringify(data, null, 2) + '\n', { encoding: 'utf-8' });
    await fs.promises.chmod(tmp, 0o600);
    await fs.promises.rename(tmp, filePath);
  } catch (err) {
    await fs.promises.rm(tmp, { force: true });
    throw err;
  }
}

export class GlassesStore implements ConfigStore {
  readonly filePath: string;
  private data: GlassesRecordFile;

  constructor(filePath?: string) {
    this.filePath = path.resolve(filePath || getDefaultStorePath());
    this.data = readRecord(this.filePath);
  }

  get leftAddress(): string | null { return this.data.left.address; }
  set leftAddress(value: string | null) { this.data.left.address = value; }

  get rightAddress(): string | null { return this.data.right.address; }
  set rightAddress(value: string | null) { this.data.right.address = value; }

  get leftName(): string | null { return this.data.left.name; }
  set leftName(value: string | null) { this.data.left.name = value; }

  get rightName(): string | null { return this.data.right.name; }
  set rightName(value: string | null) { this.data.right.name = value; }

  get leftPaired(): boolean { return this.data.left.paired; }
  set leftPaired(value: boolean) { this.data.left.paired = value; }

  get rightPaired(): boolean { return this.data.right.paired; }
  set rightPaired(value: boolean) { this.data.right.paired = value; }

  get updatedAt(): string | undefined {
    return this.data.updatedAt;
  }

  getSide(side: Side): SideRecord {
    return { ...this.data[side] };
  }

  setAddress(side: Side, address: string | null, name: string | null = null): void {
    this.data[side].address = address;
    this.data[side].name = name;
  }

  setPaired(side: Side, paired: boolean): void {
    this.data[side].paired = paired;
  }

  clear(): void {
    const updatedAt = this.data.updatedAt;
    this.data = { ...emptyRecord(), updatedAt };
  }

  async save(): Promise<void> {
    this.data.updatedAt = new Date().toISOString();
    await writeJson(this.filePath, this.data);
  }
}
