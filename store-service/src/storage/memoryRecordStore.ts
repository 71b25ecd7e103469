import type { StoredRecord } from "@roadwatch/types";
import type { NewRecord, RecordStore } from "./recordStore.js";

export class MemoryRecordStore implements RecordStore {
  private readonly rows = new Map<number, StoredRecord>();
  private nextId = 1;

  async insert(record: NewRecord): Promise<StoredRecord> {
    const stored: StoredRecord = { id: this.nextId, ...record };
    this.nextId += 1;
    this.rows.set(stored.id, stored);
    return { ...stored };
  }

  async get(id: number): Promise<StoredRecord | null> {
    const row = this.rows.get(id);
    return row ? { ...row } : null;
  }

  async list(): Promise<StoredRecord[]> {
    return [...this.rows.values()]
      .sort((a, b) => a.id - b.id)
      .map((row) => ({ ...row }));
  }

  async update(id: number, record: NewRecord): Promise<StoredRecord | null> {
    if (!this.rows.has(id)) return null;
    const stored: StoredRecord = { id, ...record };
    this.rows.set(id, stored);
    return { ...stored };
  }

  async delete(id: number): Promise<StoredRecord | null> {
    const row = this.rows.get(id);
    if (!row) return null;
    this.rows.delete(id);
    return row;
  }
}
