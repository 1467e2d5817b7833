/**
 * Glasses command protocol constants
 *
 * Frames are raw byte arrays. Byte 0 is the opcode; a unit answers with the
 * same opcode followed by a response category.
 */

export const Command = {
  SET_SILENT_MODE: 0x03,
  GET_BATTERY: 0x2c,
  HEARTBEAT: 0x25,
} as const;

export type CommandCode = (typeof Command)[keyof typeof Command];

export const ResponseCategory = {
  /** Command acknowledged */
  COMMAND_RESPONSE: 0xc9,
  COMMAND_FAILURE: 0xca,
} as const;

export const DEFAULT_RESPONSE_TIMEOUT_MS = 2000;

export function buildSilentModeFrame(enabled: boolean): Uint8Array {
  return Uint8Array.of(Command.SET_SILENT_MODE, enabled ? 0x01 : 0x00);
}

export function buildBatteryQueryFrame(): Uint8Array {
  return Uint8Array.of(Command.GET_BATTERY, 0x01);
}

/**
 * Battery frame: [GET_BATTERY, percentage, ...]. Returns null for anything else.
 */
export function parseBatteryFrame(frame: Uint8Array): number | null {
  if (frame.length < 2 || frame[0] !== Command.GET_BATTERY) return null;
  const level = frame[1];
  return level <= 100 ? level : null;
}

export function formatFrame(frame: Uint8Array): string {
  return Array.from(frame, (b) => b.toString(16).padStart(2, '0')).join(' ');
}
