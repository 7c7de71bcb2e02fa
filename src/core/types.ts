export type WindowId = number;
export type WorkspaceId = number;

export type WorkspaceRef = { kind: 'id'; id: WorkspaceId } | { kind: 'name'; name: string };

export type Membership = 'sticky' | 'staged';

export type CompositorEvent =
  | { type: 'workspace-activated'; workspaceId: WorkspaceId }
  | { type: 'unknown'; raw: unknown };

export type Logger = Pick<Console, 'log' | 'warn' | 'error'>;

export const DEFAULT_STAGE_WORKSPACE = 'stage';

export function workspaceById(id: WorkspaceId): WorkspaceRef {
  return { kind: 'id', id };
}

export function workspaceByName(name: string): WorkspaceRef {
  return { kind: 'name', name };
}

export function describeWorkspace(ref: WorkspaceRef): string {
  return ref.kind === 'id' ? `workspace ${ref.id}` : `workspace "${ref.name}"`;
}

export function isWindowId(value: unknown): value is WindowId {
  return typeof value === 'number' && Number.isSafeInteger(value) && value >= 0;
}
