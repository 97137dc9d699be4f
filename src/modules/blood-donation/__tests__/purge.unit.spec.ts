import type { ResourceKind } from "../../access-policy/types"
import { purgeOwnedRecords } from "../purge"
import { keyFieldOf } from "../resources"
import { MemoryRecordSource } from "./fixtures/memory-source"

describe("purgeOwnedRecords", () => {
  let source: MemoryRecordSource
  let remove: jest.Mock

  beforeEach(() => {
    source = new MemoryRecordSource()
    source.seed("User", { uid: "cus_01", role: "donor" }, { uid: "cus_02", role: "donor" })
    source.seed(
      "BloodRequest",
      { id: "breq_1", requester_uid: "cus_01" },
      { id: "breq_2", requester_uid: "cus_02" },
      { id: "breq_3", requester_uid: "cus_01" }
    )
    source.seed("Donation", { id: "don_1", donor_uid: "cus_02" })
    source.seed("Notification", { id: "dnotif_1", user_uid: "cus_01" })

    remove = jest.fn(async (kind: ResourceKind, keys: string[]) => {
      source.tables[kind] = source.tables[kind].filter((record) => !keys.includes(String(record[keyFieldOf(kind)])))
    })
  })

  it("removes the profile and everything it owns", async () => {
    const removed = await purgeOwnedRecords(
      { list: (kind, filters) => source.listRecords(kind, filters), remove },
      "cus_01"
    )

    expect(removed).toEqual([
      { kind: "Notification", count: 1 },
      { kind: "BloodRequest", count: 2 },
      { kind: "Donation", count: 0 },
      { kind: "User", count: 1 },
    ])
    expect(source.tables.User).toEqual([{ uid: "cus_02", role: "donor" }])
    expect(source.tables.BloodRequest).toEqual([{ id: "breq_2", requester_uid: "cus_02" }])
    expect(source.tables.Donation).toHaveLength(1)
    expect(source.tables.Notification).toEqual([])
  })

  it("deletes the profile last and skips kinds with nothing owned", async () => {
    await purgeOwnedRecords({ list: (kind, filters) => source.listRecords(kind, filters), remove }, "cus_01")

    expect(remove.mock.calls).toEqual([
      ["Notification", ["dnotif_1"]],
      ["BloodRequest", ["breq_1", "breq_3"]],
      ["User", ["cus_01"]],
    ])
  })
})
