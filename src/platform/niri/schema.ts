import { z } from 'zod';
import { CompositorEvent } from '../../core/types';

const IdSchema = z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER);

export const NiriWindowSchema = z
  .object({
    id: IdSchema,
    title: z.string().nullable().optional(),
    app_id: z.string().nullable().optional(),
    workspace_id: IdSchema.nullable().optional()
  })
  .passthrough();

export const NiriWindowsSchema = z.array(NiriWindowSchema);

// `niri msg --json focused-window` prints `null` when nothing has focus.
export const NiriFocusedWindowSchema = NiriWindowSchema.nullable();

export const NiriWorkspaceSchema = z
  .object({
    id: IdSchema,
    idx: z.number().int().optional(),
    name: z.string().nullable().optional(),
    output: z.string().nullable().optional(),
    is_active: z.boolean(),
    is_focused: z.boolean().optional()
  })
  .passthrough();

export const NiriWorkspacesSchema = z.array(NiriWorkspaceSchema);

// Err is listed first: an object schema with an unknown Ok would accept any object.
export const NiriReplySchema = z.union([
  z.object({ Err: z.string() }),
  z.object({ Ok: z.unknown() })
]);

export const NiriWorkspaceActivatedSchema = z.object({
  WorkspaceActivated: z
    .object({
      id: IdSchema,
      focused: z.boolean().optional()
    })
    .passthrough()
});

export type NiriWorkspace = z.infer<typeof NiriWorkspaceSchema>;

/** Decodes one event-stream line. Anything that is not a workspace activation is `unknown`. */
export function decodeEvent(line: string): CompositorEvent {
  let payload: unknown;
  try {
    payload = JSON.parse(line);
  } catch {
    return { type: 'unknown', raw: line };
  }

  const activated = NiriWorkspaceActivatedSchema.safeParse(payload);
  if (!activated.success) {
    return { type: 'unknown', raw: payload };
  }
  return { type: 'workspace-activated', workspaceId: activated.data.WorkspaceActivated.id };
}

/** Picks the focused workspace, or the first active one when no output reports focus. */
export function pickActiveWorkspace(workspaces: readonly NiriWorkspace[]): NiriWorkspace | undefined {
  return (
    workspaces.find((workspace) => workspace.is_focused === true) ??
    workspaces.find((workspace) => workspace.is_active)
  );
}
