/**
 * niri IPC message types.
 *
 * The daemon encodes these as externally tagged JSON (see codec.ts); inside
 * the CLI they are plain discriminated unions on `type`.
 */

/**
 * Reference to a workspace. Existing workspaces are always addressed by id.
 */
export type WorkspaceReference = { type: 'Id'; id: number } | { type: 'Index'; index: number };

export interface FocusWindowAction {
  type: 'FocusWindow';
  id: number;
}

export interface MoveWindowToWorkspaceAction {
  type: 'MoveWindowToWorkspace';
  /** Window to move; null moves the focused window */
  windowId: number | null;
  reference: WorkspaceReference;
  /** Follow the window to its new workspace */
  focus: boolean;
}

export interface FocusWorkspaceAction {
  type: 'FocusWorkspace';
  reference: WorkspaceReference;
}

export interface MoveWorkspaceToMonitorAction {
  type: 'MoveWorkspaceToMonitor';
  output: string;
  /** Workspace to move; null moves the focused workspace */
  reference: WorkspaceReference | null;
}

export interface SetWorkspaceNameAction {
  type: 'SetWorkspaceName';
  name: string;
  /** Workspace to rename; null renames the focused workspace */
  workspace: WorkspaceReference | null;
}

/**
 * Mutating intents. The only valid success reply to an action is `Handled`.
 */
export type Action =
  | FocusWindowAction
  | MoveWindowToWorkspaceAction
  | FocusWorkspaceAction
  | MoveWorkspaceToMonitorAction
  | SetWorkspaceNameAction;

export type ActionType = Action['type'];

export type Request =
  | { type: 'Outputs' }
  | { type: 'Windows' }
  | { type: 'Workspaces' }
  | { type: 'Action'; action: Action };

export type QueryRequest = Exclude<Request, { type: 'Action' }>;

export interface WindowInfo {
  id: number;
  title: string | null;
  appId: string | null;
  workspaceId: number | null;
  isFocused: boolean;
}

export interface WorkspaceInfo {
  id: number;
  /** Position on its output; used as the display sort key */
  idx: number;
  name: string | null;
  output: string | null;
  isActive: boolean;
  isFocused: boolean;
}

export interface OutputInfo {
  name: string;
  make: string;
  model: string;
  serial: string | null;
}

export type Response =
  | { type: 'Handled' }
  | { type: 'Outputs'; outputs: Record<string, OutputInfo> }
  | { type: 'Windows'; windows: WindowInfo[] }
  | { type: 'Workspaces'; workspaces: WorkspaceInfo[] };

export type ResponseType = Response['type'];

/**
 * One exchange's outcome as reported by the daemon: a response, or the
 * daemon's error text.
 */
export type Reply = { ok: true; response: Response } | { ok: false; error: string };

/** Query for all outputs. */
export const OUTPUTS_REQUEST: QueryRequest = { type: 'Outputs' };

/** Query for all windows. */
export const WINDOWS_REQUEST: QueryRequest = { type: 'Windows' };

/** Query for all workspaces. */
export const WORKSPACES_REQUEST: QueryRequest = { type: 'Workspaces' };

/**
 * Wrap an action into a request.
 */
export function actionRequest(action: Action): Request {
  return { type: 'Action', action };
}

/**
 * Reference an existing workspace by its id.
 */
export function workspaceById(id: number): WorkspaceReference {
  return { type: 'Id', id };
}
