/**
 * CommandRunner unit tests
 *
 * Captures console output and process.exitCode to check what a command
 * prints and how it exits.
 */

import assert from 'node:assert/strict';
import { afterEach, beforeEach, describe, it, mock } from 'node:test';

import { runCommand } from '@/commands/shared/CommandRunner.js';
import type { BaseOptions } from '@/commands/shared/optionTypes.js';
import { IPCConnectionError } from '@/ipc/transport/IPCError.js';
import { CommandError } from '@/ui/errors/index.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';
import { VERSION } from '@/utils/version.js';

void describe('runCommand()', () => {
  let stdout: string[];
  let stderr: string[];

  beforeEach(() => {
    stdout = [];
    stderr = [];
    mock.method(console, 'log', (message: unknown) => {
      stdout.push(String(message));
    });
    mock.method(console, 'error', (message: unknown) => {
      stderr.push(String(message));
    });
  });

  afterEach(() => {
    mock.restoreAll();
    process.exitCode = undefined;
  });

  void it('prints formatted text on success', async () => {
    await runCommand<BaseOptions, number>(
      () => Promise.resolve({ success: true, data: 42 }),
      {},
      (id) => `Focused window ${id}`
    );

    assert.deepEqual(stdout, ['Focused window 42']);
    assert.deepEqual(stderr, []);
    assert.equal(process.exitCode, undefined);
  });

  void it('prints nothing when the formatter returns empty text', async () => {
    await runCommand<BaseOptions, null>(
      () => Promise.resolve({ success: true, data: null }),
      {},
      () => ''
    );

    assert.deepEqual(stdout, []);
  });

  void it('prints a success envelope with --json', async () => {
    await runCommand<BaseOptions, { status: string }>(
      () => Promise.resolve({ success: true, data: { status: 'cancelled' } }),
      { json: true }
    );

    assert.equal(stdout.length, 1);
    assert.deepEqual(JSON.parse(stdout[0] ?? ''), {
      version: VERSION,
      success: true,
      data: { status: 'cancelled' },
    });
  });

  void it('reports a thrown CommandError with its metadata and exit code', async () => {
    await runCommand<BaseOptions, null>(
      () =>
        Promise.reject(
          new CommandError(
            'NIRI_SOCKET is not set',
            { suggestion: 'Pass --socket <path>' },
            EXIT_CODES.RESOURCE_NOT_FOUND
          )
        ),
      {}
    );

    assert.deepEqual(stderr, ['Error: NIRI_SOCKET is not set\n  Suggestion: Pass --socket <path>']);
    assert.deepEqual(stdout, []);
    assert.equal(process.exitCode, EXIT_CODES.RESOURCE_NOT_FOUND);
  });

  void it('adds connection suggestions when niri is unreachable', async () => {
    await runCommand<BaseOptions, null>(
      () => Promise.reject(new IPCConnectionError('/run/niri.sock', 'ENOENT')),
      {}
    );

    assert.deepEqual(stderr, [
      [
        'Error: IPC connection error on /run/niri.sock: ENOENT',
        '  Suggestion: Check that niri is running',
        '  Suggestion: Check NIRI_SOCKET, or pass --socket <path>',
      ].join('\n'),
    ]);
    assert.equal(process.exitCode, EXIT_CODES.IPC_CONNECTION_FAILURE);
  });

  void it('prints an error envelope on stdout with --json', async () => {
    await runCommand<BaseOptions, null>(() => Promise.reject(new TypeError('boom')), {
      json: true,
    });

    assert.deepEqual(stderr, []);
    assert.deepEqual(JSON.parse(stdout[0] ?? ''), {
      version: VERSION,
      success: false,
      error: 'boom',
      exitCode: EXIT_CODES.SOFTWARE_ERROR,
    });
    assert.equal(process.exitCode, EXIT_CODES.SOFTWARE_ERROR);
  });

  void it('reports a returned failure result', async () => {
    await runCommand<BaseOptions, null>(
      () =>
        Promise.resolve({
          success: false,
          error: 'nothing to do',
          exitCode: EXIT_CODES.INVALID_ARGUMENTS,
        }),
      {}
    );

    assert.deepEqual(stderr, ['Error: nothing to do']);
    assert.equal(process.exitCode, EXIT_CODES.INVALID_ARGUMENTS);
  });
});
