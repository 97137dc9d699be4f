import { MedusaError } from "@medusajs/framework/utils"
import { evaluatePolicy } from "../../access-policy/engine"
import { AccessPolicyModuleService } from "../../access-policy/service"
import { ANONYMOUS, IdentityContext } from "../../access-policy/types"
import { PolicyDeniedError } from "../errors"
import { GuardedStore } from "../guarded-store"
import { MemoryRecordSource } from "./fixtures/memory-source"

const alice: IdentityContext = { subject_id: "user_alice", role: "donor" }
const bob: IdentityContext = { subject_id: "user_bob", role: "recipient" }
const admin: IdentityContext = { subject_id: "user_admin", role: "admin" }

describe("GuardedStore", () => {
  let source: MemoryRecordSource
  let store: GuardedStore

  beforeEach(() => {
    source = new MemoryRecordSource()
    store = new GuardedStore(source, { evaluate: evaluatePolicy })

    source.seed(
      "BloodRequest",
      { id: "breq_1", requester_uid: "user_alice", status: "Pending", units_required: 2, units_fulfilled: 0 },
      { id: "breq_2", requester_uid: "user_bob", status: "Active", units_required: 1, units_fulfilled: 0 },
      {
        id: "breq_3",
        requester_uid: "user_bob",
        status: "Pending Verification",
        units_required: 3,
        units_fulfilled: 0,
      }
    )
  })

  describe("list", () => {
    it("drops the records the caller may not read", async () => {
      const records = await store.list(alice, "BloodRequest")
      expect(records.map((record) => record.id)).toEqual(["breq_1", "breq_2"])
    })

    it("returns everything to an admin", async () => {
      const records = await store.list(admin, "BloodRequest")
      expect(records.map((record) => record.id)).toEqual(["breq_1", "breq_2", "breq_3"])
    })

    it("returns nothing private to an anonymous caller", async () => {
      expect(await store.list(ANONYMOUS, "BloodRequest")).toEqual([])
    })

    it("applies filters before the policy", async () => {
      const records = await store.list(bob, "BloodRequest", { requester_uid: "user_bob" })
      expect(records.map((record) => record.id)).toEqual(["breq_2", "breq_3"])
    })
  })

  describe("retrieve", () => {
    it("reports a missing record as not found", async () => {
      await expect(store.retrieve(alice, "BloodRequest", "breq_missing")).rejects.toMatchObject({
        type: MedusaError.Types.NOT_FOUND,
        message: "BloodRequest with key breq_missing was not found",
      })
    })

    it("refuses a record the caller may not read", async () => {
      const error = await store.retrieve(alice, "BloodRequest", "breq_3").catch((e: unknown) => e)

      expect(error).toBeInstanceOf(PolicyDeniedError)
      expect(error).toMatchObject({
        type: MedusaError.Types.NOT_ALLOWED,
        message: "Not allowed to read BloodRequest: invalid_lifecycle_state",
      })
    })
  })

  describe("create", () => {
    it("stores a request created by its owner", async () => {
      const record = await store.create(alice, "BloodRequest", {
        requester_uid: "user_alice",
        status: "Pending Verification",
        units_required: 1,
        units_fulfilled: 0,
      })

      expect(record.id).toBe("rec_1")
      expect(source.tables.BloodRequest).toHaveLength(4)
    })

    it("rejects an anonymous write as unauthorized", async () => {
      await expect(
        store.create(ANONYMOUS, "BloodBank", { name: "Central", inventory: {} })
      ).rejects.toMatchObject({
        type: MedusaError.Types.UNAUTHORIZED,
        verdict: { verdict: "deny", reason: "not_authenticated", denied_fields: [] },
      })
      expect(source.tables.BloodBank).toEqual([])
    })

    it("rejects a record that breaks its constraints", async () => {
      await expect(
        store.create(admin, "Campaign", {
          title: "Spring drive",
          start_date: "2025-06-10",
          end_date: "2025-06-01",
        })
      ).rejects.toMatchObject({
        type: MedusaError.Types.INVALID_DATA,
        message: "end_date must not be before start_date",
      })
      expect(source.tables.Campaign).toEqual([])
    })
  })

  describe("update", () => {
    it("applies an owner's edit while the request is open", async () => {
      const record = await store.update(alice, "BloodRequest", "breq_1", { units_required: 4 })
      expect(record).toMatchObject({ id: "breq_1", units_required: 4 })
    })

    it("checks the state the write lands on, not an earlier read", async () => {
      await store.retrieve(alice, "BloodRequest", "breq_1")
      await store.update(admin, "BloodRequest", "breq_1", { status: "Fulfilled", units_fulfilled: 2 })

      await expect(
        store.update(alice, "BloodRequest", "breq_1", { units_required: 5 })
      ).rejects.toMatchObject({ verdict: { reason: "invalid_lifecycle_state" } })
      expect(source.tables.BloodRequest[0].units_required).toBe(2)
    })

    it("rejects the whole patch when one field is denied", async () => {
      await expect(
        store.update(alice, "BloodRequest", "breq_1", { units_required: 4, units_fulfilled: 4 })
      ).rejects.toMatchObject({
        type: MedusaError.Types.NOT_ALLOWED,
        verdict: { reason: "field_not_updatable", denied_fields: ["units_fulfilled"] },
      })
      expect(source.tables.BloodRequest[0]).toMatchObject({ units_required: 2, units_fulfilled: 0 })
    })

    it("validates the merged record", async () => {
      await expect(
        store.update(admin, "BloodRequest", "breq_1", { units_fulfilled: -1 })
      ).rejects.toMatchObject({
        type: MedusaError.Types.INVALID_DATA,
        message: "units_fulfilled must be an integer >= 0",
      })
      expect(source.tables.BloodRequest[0].units_fulfilled).toBe(0)
    })
  })

  describe("profiles", () => {
    beforeEach(() => {
      source.seed("User", { uid: "user_alice", role: "donor", first_name: "Alice" })
    })

    it("keeps deletion with admins when the owner sets deleted_at", async () => {
      await expect(store.delete(alice, "User", "user_alice")).rejects.toMatchObject({
        verdict: { reason: "not_admin" },
      })
      await expect(
        store.update(alice, "User", "user_alice", { deleted_at: "2026-01-01T00:00:00Z" })
      ).rejects.toMatchObject({
        verdict: { reason: "field_not_updatable", denied_fields: ["deleted_at"] },
      })
      expect(source.tables.User).toEqual([{ uid: "user_alice", role: "donor", first_name: "Alice" }])
    })

    it("lets the owner edit their own details", async () => {
      const record = await store.update(alice, "User", "user_alice", { first_name: "Ali" })
      expect(record).toEqual({ uid: "user_alice", role: "donor", first_name: "Ali" })
    })
  })

  describe("denial logging", () => {
    let logger: { info: jest.Mock }

    beforeEach(() => {
      logger = { info: jest.fn() }
      store = new GuardedStore(source, new AccessPolicyModuleService({ logger }))
    })

    it("does not log records left out of a list", async () => {
      const records = await store.list(alice, "BloodRequest")

      expect(records).toHaveLength(2)
      expect(logger.info).not.toHaveBeenCalled()
    })

    it("logs a refused retrieve once", async () => {
      await expect(store.retrieve(alice, "BloodRequest", "breq_3")).rejects.toBeInstanceOf(PolicyDeniedError)

      expect(logger.info).toHaveBeenCalledTimes(1)
      expect(logger.info).toHaveBeenCalledWith(
        "[AccessPolicy] Denied read BloodRequest for user_alice: invalid_lifecycle_state"
      )
    })
  })

  describe("delete", () => {
    it("refuses a stranger", async () => {
      await expect(store.delete(bob, "BloodRequest", "breq_1")).rejects.toMatchObject({
        verdict: { reason: "not_owner" },
      })
      expect(source.tables.BloodRequest).toHaveLength(3)
    })

    it("lets the owner withdraw a request", async () => {
      await store.delete(alice, "BloodRequest", "breq_1")
      expect(source.tables.BloodRequest.map((record) => record.id)).toEqual(["breq_2", "breq_3"])
    })
  })
})
