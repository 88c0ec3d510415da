/**
 * Type guards for the daemon's JSON payloads.
 *
 * Replies arrive as `unknown` from JSON.parse; these guards check the fields
 * the CLI reads before anything is converted into protocol types. Fields the
 * CLI does not use are ignored.
 */

/**
 * Plain JSON object check.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Non-negative integer within the safe range, as niri's u64 ids are in practice.
 */
export function isEntityId(value: unknown): value is number {
  return typeof value === 'number' && Number.isSafeInteger(value) && value >= 0;
}

function isOptionalString(value: unknown): value is string | null | undefined {
  return value === undefined || value === null || typeof value === 'string';
}

function isOptionalId(value: unknown): value is number | null | undefined {
  return value === undefined || value === null || isEntityId(value);
}

function isOptionalBoolean(value: unknown): value is boolean | undefined {
  return value === undefined || typeof value === 'boolean';
}

/**
 * Wire shape of a window entry (`Windows` response element).
 */
export interface WireWindow {
  id: number;
  title?: string | null;
  app_id?: string | null;
  workspace_id?: number | null;
  is_focused?: boolean;
}

/**
 * Wire shape of a workspace entry (`Workspaces` response element).
 */
export interface WireWorkspace {
  id: number;
  idx: number;
  name?: string | null;
  output?: string | null;
  is_active?: boolean;
  is_focused?: boolean;
}

/**
 * Wire shape of an output entry (`Outputs` response value).
 */
export interface WireOutput {
  name: string;
  make: string;
  model: string;
  serial?: string | null;
}

export function isWireWindow(value: unknown): value is WireWindow {
  if (!isRecord(value)) {
    return false;
  }
  return (
    isEntityId(value['id']) &&
    isOptionalString(value['title']) &&
    isOptionalString(value['app_id']) &&
    isOptionalId(value['workspace_id']) &&
    isOptionalBoolean(value['is_focused'])
  );
}

export function isWireWorkspace(value: unknown): value is WireWorkspace {
  if (!isRecord(value)) {
    return false;
  }
  return (
    isEntityId(value['id']) &&
    isEntityId(value['idx']) &&
    isOptionalString(value['name']) &&
    isOptionalString(value['output']) &&
    isOptionalBoolean(value['is_active']) &&
    isOptionalBoolean(value['is_focused'])
  );
}

export function isWireOutput(value: unknown): value is WireOutput {
  if (!isRecord(value)) {
    return false;
  }
  return (
    typeof value['name'] === 'string' &&
    typeof value['make'] === 'string' &&
    typeof value['model'] === 'string' &&
    isOptionalString(value['serial'])
  );
}
