import type { StoredRecord } from "@roadwatch/types";
import type { ProcessedAgentDataPayload } from "../lib/validation.js";

export type NewRecord = Omit<StoredRecord, "id">;

/**
 * Durable home of processed records. Ids are positive integers assigned by the store.
 * `update` and `delete` resolve null when the id is unknown.
 */
export interface RecordStore {
  insert(record: NewRecord): Promise<StoredRecord>;
  get(id: number): Promise<StoredRecord | null>;
  list(): Promise<StoredRecord[]>;
  update(id: number, record: NewRecord): Promise<StoredRecord | null>;
  delete(id: number): Promise<StoredRecord | null>;
  close?(): Promise<void>;
}

export type StorageOperation = "insert" | "get" | "list" | "update" | "delete";

export class StorageError extends Error {
  readonly statusCode = 503;

  constructor(readonly operation: StorageOperation, message: string, options?: { cause?: unknown }) {
    super(message, options);
    Object.setPrototypeOf(this, StorageError.prototype);
  }
}

export function toNewRecord(payload: ProcessedAgentDataPayload): NewRecord {
  const { agent_data: agent } = payload;
  return {
    road_state: payload.road_state,
    user_id: agent.user_id,
    x: agent.accelerometer.x,
    y: agent.accelerometer.y,
    z: agent.accelerometer.z,
    latitude: agent.gps.latitude,
    longitude: agent.gps.longitude,
    timestamp: new Date(agent.timestamp).toISOString(),
  };
}
