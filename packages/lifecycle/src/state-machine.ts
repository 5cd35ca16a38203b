import type { DraftStatus, EditSource } from '@postroom/shared';

/** Events that act on a draft. */
export type DraftEvent =
  | 'approve'
  | 'reject'
  | 'publish'
  | 'edit_text'
  | 'regenerate_text'
  | 'regenerate_image';

/** Events that change `status` itself (as opposed to content events). */
export type StatusEvent = Extract<DraftEvent, 'approve' | 'reject' | 'publish'>;

/** Terminal states that do not accept any transitions. */
const TERMINAL_STATES: ReadonlySet<DraftStatus> = new Set(['rejected', 'published']);

/**
 * Valid state transitions map.
 * Key: current status → Map of event → next status.
 */
const TRANSITIONS: Record<DraftStatus, Partial<Record<DraftEvent, DraftStatus>>> = {
  draft: {
    approve: 'approved',
    reject: 'rejected',
    edit_text: 'draft',
    regenerate_text: 'draft',
    regenerate_image: 'draft',
  },
  approved: {
    edit_text: 'approved',
    publish: 'published',
    reject: 'rejected',
  },
  rejected: {},
  published: {},
};

/**
 * Attempt a state transition. Returns the new status if valid, or null if the
 * transition is not allowed.
 */
export function transition(current: DraftStatus, event: DraftEvent): DraftStatus | null {
  if (TERMINAL_STATES.has(current)) {
    return null;
  }
  return TRANSITIONS[current][event] ?? null;
}

/** AI regenerations are only allowed before approval; human and system edits follow `edit_text`. */
export function textEventFor(source: EditSource): DraftEvent {
  switch (source) {
    case 'ai-regeneration': return 'regenerate_text';
    case 'human-dashboard':
    case 'human-chat':
    case 'system':
      return 'edit_text';
  }
}
