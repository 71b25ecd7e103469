import { beforeEach, describe, expect, it } from "vitest";
import { FirestoreRecordStore } from "../../src/storage/firestoreRecordStore.js";
import { StorageError, type NewRecord } from "../../src/storage/recordStore.js";
import { MockFirestore } from "../testUtils/mockFirestore.js";

const row: NewRecord = {
  road_state: "normal",
  user_id: 1,
  x: 0.5,
  y: -0.5,
  z: 15000,
  latitude: 50.45,
  longitude: 30.52,
  timestamp: "2024-01-01T00:00:00.000Z",
};

let firestore: MockFirestore;
let store: FirestoreRecordStore;

beforeEach(() => {
  firestore = new MockFirestore();
  store = new FirestoreRecordStore(firestore as never, "processed_agent_data");
});

describe("FirestoreRecordStore", () => {
  it("assigns sequential ids from the counter document", async () => {
    const first = await store.insert(row);
    const second = await store.insert({ ...row, z: 13000, road_state: "small_pits" });

    expect(first.id).toBe(1);
    expect(second.id).toBe(2);
    expect(firestore.dump("counters")?.get("processed_agent_data")).toEqual({ next: 3 });
  });

  it("stores the timestamp as a date and reads it back as ISO text", async () => {
    const { id } = await store.insert(row);

    expect(firestore.dump("processed_agent_data")?.get(String(id))?.timestamp).toEqual(new Date("2024-01-01T00:00:00.000Z"));
    await expect(store.get(id)).resolves.toEqual({ id, ...row });
  });

  it("lists rows in id order", async () => {
    await store.insert(row);
    await store.insert({ ...row, user_id: 2 });

    const rows = await store.list();

    expect(rows.map((item) => [item.id, item.user_id])).toEqual([[1, 1], [2, 2]]);
  });

  it("updates and deletes existing rows and reports unknown ids as null", async () => {
    const { id } = await store.insert(row);

    await expect(store.update(id, { ...row, road_state: "large_pits", z: 25000 })).resolves.toEqual({
      id,
      ...row,
      road_state: "large_pits",
      z: 25000,
    });
    await expect(store.update(99, row)).resolves.toBeNull();

    await expect(store.delete(id)).resolves.toMatchObject({ id, road_state: "large_pits" });
    await expect(store.get(id)).resolves.toBeNull();
    await expect(store.delete(id)).resolves.toBeNull();
  });

  it("wraps backend failures in StorageError", async () => {
    firestore.failNext(new Error("unavailable"));

    const failure = await store.insert(row).catch((err: unknown) => err);

    expect(failure).toBeInstanceOf(StorageError);
    expect(failure).toMatchObject({ operation: "insert", statusCode: 503, message: "firestore insert failed: unavailable" });
  });

  it("terminates the client on close", async () => {
    await store.close();
    expect(firestore.terminated).toBe(true);
  });
});
