import type { Draft, EditSource } from "@postroom/shared";
import {
  InvalidTransitionError,
  textEventFor,
  transition,
  type DraftEvent,
  type StatusEvent,
} from "@postroom/lifecycle";

/**
 * Pure read-modify-write rules shared by every DraftStore implementation.
 * Each returns the fields to write, or null when the write would change nothing.
 */

function requireTransition(draft: Draft, event: DraftEvent) {
  const next = transition(draft.status, event);
  if (next === null) {
    throw new InvalidTransitionError(draft.id, draft.status, event);
  }
  return next;
}

export interface TextEditPlan {
  status: Draft["status"];
  previousText: string | null;
  newText: string;
}

export function planTextEdit(draft: Draft, newText: string, source: EditSource): TextEditPlan | null {
  const status = requireTransition(draft, textEventFor(source));
  if (draft.text === newText) {
    return null;
  }
  return { status, previousText: draft.text, newText };
}

export function planImageUpdate(draft: Draft, imageRef: string): { imageRef: string } | null {
  requireTransition(draft, "regenerate_image");
  if (draft.imageRef === imageRef) {
    return null;
  }
  return { imageRef };
}

export interface StatusPlan {
  status: Draft["status"];
  scheduledAt?: null;
  publishedAt?: Date;
}

export function planStatusChange(draft: Draft, event: StatusEvent, now: Date): StatusPlan {
  const status = requireTransition(draft, event);
  switch (event) {
    case "approve":
      return { status };
    case "reject":
      return { status, scheduledAt: null };
    case "publish":
      return { status, scheduledAt: null, publishedAt: now };
  }
}

/** Scheduling is bookkeeping on an approved draft; clearing is allowed from any state. */
export function planSchedule(draft: Draft, at: Date | null): { scheduledAt: Date | null } | null {
  if (at !== null && draft.status !== "approved") {
    throw new InvalidTransitionError(draft.id, draft.status, "publish");
  }
  if (draft.scheduledAt?.getTime() === at?.getTime()) {
    return null;
  }
  return { scheduledAt: at === null ? null : new Date(at.getTime()) };
}

/**
 * Strictly after the previous `updatedAt`, even when the clock is coarse or steps back.
 * Always a fresh instance, never shared with another field.
 */
export function nextUpdatedAt(draft: Draft, now: Date): Date {
  return new Date(Math.max(now.getTime(), draft.updatedAt.getTime() + 1));
}
