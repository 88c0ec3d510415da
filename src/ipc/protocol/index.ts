/**
 * IPC Protocol Layer
 *
 * Exports message types, constructors, the wire codec and type guards.
 */

export * from './messages.js';
export * from './codec.js';
export * from './guards.js';
