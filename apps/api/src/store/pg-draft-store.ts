import type {
  Draft,
  DraftStatus,
  EditHistoryEntry,
  EditSource,
  FrontendChannel,
} from "@postroom/shared";
import {
  type Database,
  drafts,
  editHistory,
  eq,
  and,
  asc,
  desc,
  lte,
  isNotNull,
  getTableColumns,
} from "@postroom/db";
import { NotFoundError, type StatusEvent } from "@postroom/lifecycle";
import { systemClock, type Clock, type DraftStore } from "./types.js";
import {
  nextUpdatedAt,
  planImageUpdate,
  planSchedule,
  planStatusChange,
  planTextEdit,
} from "./mutations.js";

// Every column except `seq`, which only orders listings.
const { seq: _seq, ...draftColumns } = getTableColumns(drafts);

type Transaction = Parameters<Parameters<Database["transaction"]>[0]>[0];
type DraftPatch = Partial<Omit<typeof drafts.$inferInsert, "id" | "seq" | "createdAt">>;

/**
 * Postgres-backed DraftStore.
 *
 * Mutations run in a transaction that first takes the draft's row lock
 * (`SELECT ... FOR UPDATE`), so two processes editing the same draft commit in
 * some total order and each history entry chains from the text it replaced.
 */
export class PgDraftStore implements DraftStore {
  constructor(
    private readonly db: Database,
    private readonly clock: Clock = systemClock,
  ) {}

  async createDraft(subject: string): Promise<Draft> {
    const now = this.clock();
    const [row] = await this.db
      .insert(drafts)
      .values({ subject, status: "draft", createdAt: now, updatedAt: now })
      .returning(draftColumns);
    if (!row) {
      throw new Error("Insert into drafts returned no row");
    }
    return row;
  }

  async getDraft(id: string): Promise<Draft> {
    const row = await this.db.query.drafts.findFirst({
      columns: { seq: false },
      where: (fields, ops) => ops.eq(fields.id, id),
    });
    if (!row) {
      throw new NotFoundError(id);
    }
    return row;
  }

  async listDrafts(status?: DraftStatus): Promise<Draft[]> {
    return this.db
      .select(draftColumns)
      .from(drafts)
      .where(status ? eq(drafts.status, status) : undefined)
      .orderBy(desc(drafts.createdAt), desc(drafts.seq));
  }

  async applyTextEdit(id: string, newText: string, source: EditSource): Promise<Draft> {
    return this.db.transaction(async (tx) => {
      const draft = await this.lock(tx, id);
      const plan = planTextEdit(draft, newText, source);
      if (!plan) {
        return draft;
      }

      const now = this.clock();
      await tx.insert(editHistory).values({
        draftId: id,
        previousText: plan.previousText,
        newText: plan.newText,
        source,
        timestamp: now,
      });
      return this.write(tx, draft, {
        text: plan.newText,
        status: plan.status,
        updatedAt: nextUpdatedAt(draft, now),
      });
    });
  }

  async applyImageUpdate(id: string, imageRef: string): Promise<Draft> {
    return this.db.transaction(async (tx) => {
      const draft = await this.lock(tx, id);
      const plan = planImageUpdate(draft, imageRef);
      if (!plan) {
        return draft;
      }
      return this.write(tx, draft, { ...plan, updatedAt: nextUpdatedAt(draft, this.clock()) });
    });
  }

  async transitionStatus(id: string, event: StatusEvent): Promise<Draft> {
    return this.db.transaction(async (tx) => {
      const draft = await this.lock(tx, id);
      const now = this.clock();
      const plan = planStatusChange(draft, event, now);
      return this.write(tx, draft, { ...plan, updatedAt: nextUpdatedAt(draft, now) });
    });
  }

  async getHistory(id: string): Promise<EditHistoryEntry[]> {
    await this.getDraft(id);
    return this.db
      .select()
      .from(editHistory)
      .where(eq(editHistory.draftId, id))
      .orderBy(asc(editHistory.id));
  }

  async setExternalRef(
    id: string,
    channel: FrontendChannel,
    ref: string | null,
  ): Promise<Draft> {
    return this.db.transaction(async (tx) => {
      const draft = await this.lock(tx, id);
      if ((draft.externalRefs[channel] ?? null) === ref) {
        return draft;
      }
      const externalRefs = { ...draft.externalRefs };
      if (ref === null) {
        delete externalRefs[channel];
      } else {
        externalRefs[channel] = ref;
      }
      return this.write(tx, draft, {
        externalRefs,
        updatedAt: nextUpdatedAt(draft, this.clock()),
      });
    });
  }

  async setSchedule(id: string, at: Date | null): Promise<Draft> {
    return this.db.transaction(async (tx) => {
      const draft = await this.lock(tx, id);
      const plan = planSchedule(draft, at);
      if (!plan) {
        return draft;
      }
      return this.write(tx, draft, { ...plan, updatedAt: nextUpdatedAt(draft, this.clock()) });
    });
  }

  async listDueForPublication(now: Date): Promise<Draft[]> {
    return this.db
      .select(draftColumns)
      .from(drafts)
      .where(
        and(
          eq(drafts.status, "approved"),
          isNotNull(drafts.scheduledAt),
          lte(drafts.scheduledAt, now),
        ),
      )
      .orderBy(asc(drafts.scheduledAt));
  }

  private async lock(tx: Transaction, id: string): Promise<Draft> {
    const [row] = await tx
      .select(draftColumns)
      .from(drafts)
      .where(eq(drafts.id, id))
      .for("update");
    if (!row) {
      throw new NotFoundError(id);
    }
    return row;
  }

  private async write(tx: Transaction, draft: Draft, patch: DraftPatch): Promise<Draft> {
    const [row] = await tx
      .update(drafts)
      .set(patch)
      .where(eq(drafts.id, draft.id))
      .returning(draftColumns);
    if (!row) {
      throw new NotFoundError(draft.id);
    }
    return row;
  }
}
