/**
 * Error handling for niri-action.
 *
 * Provides structured error classes for CLI commands.
 */

export { CommandError, type ErrorMetadata } from './CommandError.js';
