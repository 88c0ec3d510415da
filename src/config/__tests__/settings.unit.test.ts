/**
 * Settings resolution unit tests
 */

import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import {
  resolvePickerCommand,
  resolveSocketPath,
  resolveWorkspaceDirsPath,
} from '@/config/settings.js';
import { CommandError } from '@/ui/errors/index.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';

void describe('resolveSocketPath()', () => {
  void it('prefers the flag over NIRI_SOCKET', () => {
    assert.equal(
      resolveSocketPath('/tmp/flag.sock', { NIRI_SOCKET: '/run/user/1000/niri.sock' }),
      '/tmp/flag.sock'
    );
  });

  void it('reads NIRI_SOCKET', () => {
    assert.equal(
      resolveSocketPath(undefined, { NIRI_SOCKET: '/run/user/1000/niri.sock' }),
      '/run/user/1000/niri.sock'
    );
  });

  void it('ignores a blank flag', () => {
    assert.equal(resolveSocketPath('  ', { NIRI_SOCKET: '/run/niri.sock' }), '/run/niri.sock');
  });

  void it('fails when no socket is configured', () => {
    assert.throws(
      () => resolveSocketPath(undefined, { NIRI_SOCKET: '' }),
      (error: unknown) => {
        assert.ok(error instanceof CommandError);
        assert.equal(error.message, 'NIRI_SOCKET is not set');
        assert.equal(error.exitCode, EXIT_CODES.RESOURCE_NOT_FOUND);
        assert.equal(error.metadata.suggestion, 'Run inside a niri session, or pass --socket <path>');
        return true;
      }
    );
  });
});

void describe('resolvePickerCommand()', () => {
  void it('prefers the flag, then the environment, then fuzzel', () => {
    const env = { NIRI_ACTION_PICKER: 'wofi --dmenu' };

    assert.equal(resolvePickerCommand('rofi -dmenu', env), 'rofi -dmenu');
    assert.equal(resolvePickerCommand(undefined, env), 'wofi --dmenu');
    assert.equal(resolvePickerCommand(undefined, {}), 'fuzzel --dmenu');
  });
});

void describe('resolveWorkspaceDirsPath()', () => {
  void it('prefers the flag, then NIRI_ACTION_WORKSPACE_DIRS', () => {
    const env = { NIRI_ACTION_WORKSPACE_DIRS: '/etc/dirs', XDG_CONFIG_HOME: '/xdg' };

    assert.equal(resolveWorkspaceDirsPath('/flag/dirs', env, '/home/test'), '/flag/dirs');
    assert.equal(resolveWorkspaceDirsPath(undefined, env, '/home/test'), '/etc/dirs');
  });

  void it('falls back to the XDG config directory', () => {
    assert.equal(
      resolveWorkspaceDirsPath(undefined, { XDG_CONFIG_HOME: '/xdg' }, '/home/test'),
      '/xdg/niri-action/workspace-dirs'
    );
  });

  void it('falls back to ~/.config without XDG_CONFIG_HOME', () => {
    assert.equal(
      resolveWorkspaceDirsPath(undefined, {}, '/home/test'),
      '/home/test/.config/niri-action/workspace-dirs'
    );
  });
});
