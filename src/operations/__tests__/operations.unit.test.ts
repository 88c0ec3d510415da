/**
 * Pick-and-act operation unit tests
 *
 * Each operation runs against FakeNiri and a scripted picker; assertions
 * cover what the picker was shown and which requests niri received.
 */

import assert from 'node:assert/strict';
import { beforeEach, describe, it } from 'node:test';

import {
  FakeNiri,
  makeOutput,
  makeWindow,
  makeWorkspace,
  scriptedPicker,
} from '@/__tests__/helpers/fakeNiri.js';
import { NiriClient } from '@/ipc/client.js';
import {
  focusContainer,
  focusWorkspace,
  moveToWorkspace,
  moveWorkspaceToOutput,
  PartialActionError,
  stealContainer,
} from '@/operations/index.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';

const WINDOW_LINES = ['42: Inbox - Mail', '7: Unknown'];
const WORKSPACE_LINES = ['3: mail (0)', '7: <unnamed> (1)', '5: web (2)'];

void describe('Operations', () => {
  let niri: FakeNiri;
  let client: NiriClient;

  beforeEach(() => {
    niri = new FakeNiri();
    niri.windows = [makeWindow(42, 'Inbox - Mail'), makeWindow(7, null)];
    niri.workspaces = [
      makeWorkspace(5, 2, 'web'),
      makeWorkspace(3, 0, 'mail'),
      makeWorkspace(7, 1, null, true),
    ];
    niri.outputs = {
      'DP-1': makeOutput('DP-1', 'Dell Inc.', 'U2720Q', null),
      'eDP-1': makeOutput('eDP-1', 'BOE', '0x0BCA', 'ABC123'),
    };
    client = new NiriClient(niri);
  });

  void describe('focusContainer()', () => {
    void it('focuses the picked window', async () => {
      const picker = scriptedPicker('42: Inbox - Mail\n');

      const outcome = await focusContainer({ client, pick: picker.pick });

      assert.deepEqual(picker.presented, [WINDOW_LINES]);
      assert.deepEqual(niri.requestLog, ['Windows', 'FocusWindow']);
      assert.deepEqual(niri.actions, [{ type: 'FocusWindow', id: 42 }]);
      assert.deepEqual(outcome, {
        status: 'completed',
        actions: [{ type: 'FocusWindow', id: 42 }],
      });
    });

    void it('does nothing when the pick is cancelled', async () => {
      const outcome = await focusContainer({ client, pick: scriptedPicker('').pick });

      assert.deepEqual(outcome, { status: 'cancelled' });
      assert.deepEqual(niri.requestLog, ['Windows']);
    });

    void it('rejects a window that was not listed', async () => {
      await assert.rejects(
        focusContainer({ client, pick: scriptedPicker('99: gone\n').pick }),
        { name: 'UnknownSelectionError' }
      );
      assert.deepEqual(niri.actions, []);
    });

    void it('reports a refused action', async () => {
      niri.actionFailures.set('FocusWindow', 'window vanished');

      await assert.rejects(focusContainer({ client, pick: scriptedPicker('7: Unknown').pick }), {
        name: 'UnhandledError',
        message: 'Not handled: window vanished',
      });
    });

    void it('rejects an action answered with a payload', async () => {
      niri.actionResponse = { type: 'Windows', windows: [] };

      await assert.rejects(focusContainer({ client, pick: scriptedPicker('7: Unknown').pick }), {
        name: 'UnhandledError',
        message: 'Not handled: Unexpected Windows response to FocusWindow action',
      });
    });
  });

  void describe('stealContainer()', () => {
    void it('moves the picked window to the focused workspace without following', async () => {
      const picker = scriptedPicker('42: Inbox - Mail\n');

      await stealContainer({ client, pick: picker.pick });

      assert.deepEqual(picker.presented, [WINDOW_LINES]);
      assert.deepEqual(niri.requestLog, ['Windows', 'Workspaces', 'MoveWindowToWorkspace']);
      assert.deepEqual(niri.actions, [
        {
          type: 'MoveWindowToWorkspace',
          windowId: 42,
          reference: { type: 'Id', id: 7 },
          focus: false,
        },
      ]);
    });

    void it('fails before picking when no workspace is focused', async () => {
      niri.workspaces = [makeWorkspace(5, 0, 'web')];
      const picker = scriptedPicker('42: Inbox - Mail');

      await assert.rejects(stealContainer({ client, pick: picker.pick }), (error: unknown) => {
        assert.ok(error instanceof Error);
        assert.equal(error.name, 'InvariantViolationError');
        assert.equal(error.message, 'niri reported no focused workspace');
        return true;
      });
      assert.deepEqual(picker.presented, []);
      assert.deepEqual(niri.actions, []);
    });

    void it('does nothing when the pick is cancelled', async () => {
      const outcome = await stealContainer({ client, pick: scriptedPicker('').pick });

      assert.deepEqual(outcome, { status: 'cancelled' });
      assert.deepEqual(niri.actions, []);
    });
  });

  void describe('focusWorkspace()', () => {
    void it('focuses a listed workspace by id', async () => {
      const picker = scriptedPicker('3: mail (0)\n');

      const outcome = await focusWorkspace({ client, pick: picker.pick });

      assert.deepEqual(picker.presented, [WORKSPACE_LINES]);
      assert.deepEqual(niri.actions, [{ type: 'FocusWorkspace', reference: { type: 'Id', id: 3 } }]);
      assert.equal(outcome.status, 'completed');
    });

    void it('focuses and renames the last workspace for a new name', async () => {
      const outcome = await focusWorkspace({ client, pick: scriptedPicker('scratch\n').pick });

      const expected = [
        { type: 'FocusWorkspace', reference: { type: 'Id', id: 5 } },
        { type: 'SetWorkspaceName', name: 'scratch', workspace: { type: 'Id', id: 5 } },
      ];
      assert.deepEqual(niri.requestLog, ['Workspaces', 'FocusWorkspace', 'SetWorkspaceName']);
      assert.deepEqual(niri.actions, expected);
      assert.deepEqual(outcome, { status: 'completed', actions: expected });
    });

    void it('keeps the focus and reports a failed rename', async () => {
      niri.actionFailures.set('SetWorkspaceName', 'name taken');

      await assert.rejects(
        focusWorkspace({ client, pick: scriptedPicker('scratch').pick }),
        (error: unknown) => {
          assert.ok(error instanceof PartialActionError);
          assert.equal(
            error.message,
            'Workspace 5 focused but renaming it to "scratch" failed: Not handled: name taken'
          );
          assert.equal(error.exitCode, EXIT_CODES.PARTIAL_ACTION);
          assert.deepEqual(error.completedActions, [
            { type: 'FocusWorkspace', reference: { type: 'Id', id: 5 } },
          ]);
          assert.equal(error.metadata.note, 'Applied: FocusWorkspace');
          return true;
        }
      );
      assert.deepEqual(niri.requestLog, ['Workspaces', 'FocusWorkspace', 'SetWorkspaceName']);
    });

    void it('does not rename when the focus step fails', async () => {
      niri.actionFailures.set('FocusWorkspace', 'no such workspace');

      await assert.rejects(focusWorkspace({ client, pick: scriptedPicker('scratch').pick }), {
        name: 'UnhandledError',
      });
      assert.deepEqual(niri.requestLog, ['Workspaces', 'FocusWorkspace']);
    });

    void it('fails a new name when niri lists no workspaces', async () => {
      niri.workspaces = [];

      await assert.rejects(focusWorkspace({ client, pick: scriptedPicker('scratch').pick }), {
        name: 'InvariantViolationError',
        message: 'niri reported no workspaces',
      });
      assert.deepEqual(niri.actions, []);
    });

    void it('does nothing when the pick is cancelled', async () => {
      const outcome = await focusWorkspace({ client, pick: scriptedPicker('  \n').pick });

      assert.deepEqual(outcome, { status: 'cancelled' });
      assert.deepEqual(niri.actions, []);
    });
  });

  void describe('moveToWorkspace()', () => {
    void it('moves the focused window to the picked workspace', async () => {
      const picker = scriptedPicker('5: web (2)\n');

      await moveToWorkspace({ client, pick: picker.pick });

      assert.deepEqual(picker.presented, [WORKSPACE_LINES]);
      assert.deepEqual(niri.actions, [
        {
          type: 'MoveWindowToWorkspace',
          windowId: null,
          reference: { type: 'Id', id: 5 },
          focus: false,
        },
      ]);
    });

    void it('does nothing when the pick is cancelled', async () => {
      const outcome = await moveToWorkspace({ client, pick: scriptedPicker('').pick });

      assert.deepEqual(outcome, { status: 'cancelled' });
      assert.deepEqual(niri.actions, []);
      assert.deepEqual(niri.requestLog, ['Workspaces']);
    });

    void it('rejects a typed name', async () => {
      await assert.rejects(moveToWorkspace({ client, pick: scriptedPicker('scratch').pick }), {
        name: 'SelectionParseError',
        message: 'Cannot read workspace id from selection "scratch"',
      });
      assert.deepEqual(niri.actions, []);
    });
  });

  void describe('moveWorkspaceToOutput()', () => {
    void it('moves the focused workspace to the picked output', async () => {
      const picker = scriptedPicker('eDP-1: BOE 0x0BCA ABC123\n');

      await moveWorkspaceToOutput({ client, pick: picker.pick });

      assert.deepEqual(picker.presented, [
        ['DP-1: Dell Inc. U2720Q <unknown>', 'eDP-1: BOE 0x0BCA ABC123'],
      ]);
      assert.deepEqual(niri.requestLog, ['Outputs', 'MoveWorkspaceToMonitor']);
      assert.deepEqual(niri.actions, [
        { type: 'MoveWorkspaceToMonitor', output: 'eDP-1', reference: null },
      ]);
    });

    void it('rejects an output that was not listed', async () => {
      await assert.rejects(
        moveWorkspaceToOutput({ client, pick: scriptedPicker('HDMI-A-1: x').pick }),
        { name: 'UnknownSelectionError' }
      );
    });

    void it('presents nothing when niri answers the query with Handled', async () => {
      niri.scriptedReplies.push({ ok: true, response: { type: 'Handled' } });
      const picker = scriptedPicker('');

      const outcome = await moveWorkspaceToOutput({ client, pick: picker.pick });

      assert.deepEqual(picker.presented, [[]]);
      assert.deepEqual(outcome, { status: 'cancelled' });
    });
  });
});
