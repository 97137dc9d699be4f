import type { RecordFields, ResourceKind } from "../access-policy/types"
import { keyFieldOf } from "./resources"
import type { StoredRecord } from "./resources"

export type PurgeOperations = {
  list(kind: ResourceKind, filters: RecordFields): Promise<StoredRecord[]>
  remove(kind: ResourceKind, keys: string[]): Promise<void>
}

export type PurgeCount = { kind: ResourceKind; count: number }

// Owned records first, the profile last
const OWNED_KINDS: ReadonlyArray<{ kind: ResourceKind; owner: string }> = [
  { kind: "Notification", owner: "user_uid" },
  { kind: "BloodRequest", owner: "requester_uid" },
  { kind: "Donation", owner: "donor_uid" },
  { kind: "User", owner: "uid" },
]

/**
 * Remove a profile and everything it owns, the way deleting the auth
 * identity cascades. System operation: no policy check.
 */
export async function purgeOwnedRecords(ops: PurgeOperations, uid: string): Promise<PurgeCount[]> {
  const removed: PurgeCount[] = []
  for (const { kind, owner } of OWNED_KINDS) {
    const records = await ops.list(kind, { [owner]: uid })
    const keys = records
      .map((record) => record[keyFieldOf(kind)])
      .filter((key): key is string => typeof key === "string")
    if (keys.length > 0) {
      await ops.remove(kind, keys)
    }
    removed.push({ kind, count: keys.length })
  }
  return removed
}
