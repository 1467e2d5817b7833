/**
 * Glasslink - pairing and session connector for two-part smart glasses
 */

export * from './core/errors.js';
export * from './core/logger.js';
export * from './core/session.js';
export * from './core/status.js';
export * from './core/connector.js';
export * from './pairing/index.js';
export * from './protocol/constants.js';
export * from './protocol/dispatcher.js';
export * from './transport/types.js';
export * from './transport/connect.js';
export * from './transport/simulated.js';
export * from './config/index.js';
