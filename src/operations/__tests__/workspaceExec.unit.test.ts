/**
 * workspace-exec unit tests
 */

import assert from 'node:assert/strict';
import { beforeEach, describe, it } from 'node:test';

import { FakeNiri, makeWorkspace } from '@/__tests__/helpers/fakeNiri.js';
import { NiriClient } from '@/ipc/client.js';
import { detachedLauncher, type Launcher, workspaceExec } from '@/operations/index.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';

interface Launch {
  program: string;
  args: readonly string[];
  cwd: string;
}

function recordingLauncher(): { launch: Launcher; launches: Launch[] } {
  const launches: Launch[] = [];
  return {
    launches,
    launch: (program, args, cwd) => {
      launches.push({ program, args, cwd });
      return Promise.resolve();
    },
  };
}

const DIRS = new Map([
  ['code', '/home/test/src'],
  ['mail', '/home/test/Mail'],
]);

void describe('workspaceExec()', () => {
  let niri: FakeNiri;
  let client: NiriClient;

  beforeEach(() => {
    niri = new FakeNiri();
    niri.workspaces = [makeWorkspace(1, 0, 'mail'), makeWorkspace(2, 1, 'code', true)];
    client = new NiriClient(niri);
  });

  void it('launches in the mapped directory of the focused workspace', async () => {
    const launcher = recordingLauncher();

    const outcome = await workspaceExec(client, {
      command: ['foot', '-e', 'nvim'],
      dirs: DIRS,
      defaultDir: '/home/test',
      launch: launcher.launch,
    });

    assert.deepEqual(launcher.launches, [
      { program: 'foot', args: ['-e', 'nvim'], cwd: '/home/test/src' },
    ]);
    assert.deepEqual(outcome, {
      status: 'launched',
      command: ['foot', '-e', 'nvim'],
      cwd: '/home/test/src',
      workspace: 'code',
    });
    assert.deepEqual(niri.requestLog, ['Workspaces']);
  });

  void it('falls back to the default directory for an unmapped name', async () => {
    niri.workspaces = [makeWorkspace(3, 0, 'music', true)];
    const launcher = recordingLauncher();

    const outcome = await workspaceExec(client, {
      command: ['foot'],
      dirs: DIRS,
      defaultDir: '/home/test',
      launch: launcher.launch,
    });

    assert.equal(outcome.cwd, '/home/test');
  });

  void it('falls back to the default directory for an unnamed workspace', async () => {
    niri.workspaces = [makeWorkspace(3, 0, null, true)];
    const launcher = recordingLauncher();

    const outcome = await workspaceExec(client, {
      command: ['foot'],
      dirs: DIRS,
      defaultDir: '/home/test',
      launch: launcher.launch,
    });

    assert.equal(outcome.cwd, '/home/test');
    assert.equal(outcome.workspace, null);
  });

  void it('rejects an empty command before asking niri', async () => {
    await assert.rejects(
      workspaceExec(client, { command: [], dirs: DIRS, defaultDir: '/home/test' }),
      (error: unknown) => {
        assert.ok(error instanceof Error);
        assert.equal(error.message, 'No command given');
        assert.equal('exitCode' in error && error.exitCode, EXIT_CODES.INVALID_ARGUMENTS);
        return true;
      }
    );
    assert.deepEqual(niri.requests, []);
  });

  void it('fails when no workspace is focused', async () => {
    niri.workspaces = [makeWorkspace(1, 0, 'mail')];
    const launcher = recordingLauncher();

    await assert.rejects(
      workspaceExec(client, {
        command: ['foot'],
        dirs: DIRS,
        defaultDir: '/home/test',
        launch: launcher.launch,
      }),
      { name: 'InvariantViolationError' }
    );
    assert.deepEqual(launcher.launches, []);
  });
});

void describe('detachedLauncher()', () => {
  void it('reports a program that cannot be started', async () => {
    await assert.rejects(
      detachedLauncher('/nonexistent/niri-action-command', [], process.cwd()),
      (error: unknown) => {
        assert.ok(error instanceof Error);
        assert.equal(error.name, 'CommandLaunchError');
        assert.match(error.message, /^Failed to launch "\/nonexistent\/niri-action-command": /);
        assert.equal('exitCode' in error && error.exitCode, EXIT_CODES.COMMAND_LAUNCH_FAILURE);
        return true;
      }
    );
  });

  void it('resolves once the program is running', async () => {
    await detachedLauncher(process.execPath, ['-e', ''], process.cwd());
  });
});
