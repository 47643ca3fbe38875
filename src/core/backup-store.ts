import type { ResourceRef, RestorePoint } from "../functions/base.js";
import { generateRequestId } from "../utils/id.js";

export interface BackupRecord {
  id: string;
  sessionId: string;
  functionName: string;
  resource?: ResourceRef;
  /** Absent when the owning module exposes no state access. */
  restorePoint?: RestorePoint;
  description: string;
  createdAt: Date;
}

/** Per-session backups, newest first, bounded. */
export class BackupStore {
  private bySession = new Map<string, BackupRecord[]>();

  constructor(private maxPerSession: number) {}

  save(record: Omit<BackupRecord, "id" | "createdAt">): BackupRecord {
    const saved: BackupRecord = { ...record, id: `bk_${generateRequestId()}`, createdAt: new Date() };
    const list = [saved, ...(this.bySession.get(record.sessionId) ?? [])];
    this.bySession.set(record.sessionId, list.slice(0, this.maxPerSession));
    return saved;
  }

  get(sessionId: string, id: string): BackupRecord | undefined {
    return this.bySession.get(sessionId)?.find((b) => b.id === id);
  }

  /** Most recent restorable backup, optionally for one resource. */
  latestRestorable(sessionId: string, resource?: ResourceRef): BackupRecord | undefined {
    return this.bySession.get(sessionId)?.find(
      (b) =>
        b.restorePoint !== undefined &&
        (!resource || (b.resource?.type === resource.type && b.resource.id === resource.id))
    );
  }

  remove(sessionId: string, id: string): void {
    const list = this.bySession.get(sessionId);
    if (!list) return;
    this.bySession.set(sessionId, list.filter((b) => b.id !== id));
  }

  list(sessionId: string): BackupRecord[] {
    return [...(this.bySession.get(sessionId) ?? [])];
  }

  clearSession(sessionId: string): void {
    this.bySession.delete(sessionId);
  }
}
