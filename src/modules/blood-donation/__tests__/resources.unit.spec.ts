import { describeProposed, describeStored, describeUpdate, keyFieldOf, profileRole } from "../resources"

describe("profileRole", () => {
  it("defaults to donor when there is no profile yet", () => {
    expect(profileRole(undefined)).toBe("donor")
  })

  it("returns the stored role", () => {
    expect(profileRole({ uid: "cus_01", role: "admin" })).toBe("admin")
  })

  it("falls back to donor for a role it does not know", () => {
    expect(profileRole({ uid: "cus_01", role: "owner" })).toBe("donor")
  })
})

describe("descriptors", () => {
  const stored = { id: "breq_1", requester_uid: "cus_01", status: "Active", units_required: 2 }

  it("uses the identity key of each kind", () => {
    expect(keyFieldOf("User")).toBe("uid")
    expect(keyFieldOf("Campaign")).toBe("id")
  })

  it("describes a stored record by its owner and status columns", () => {
    expect(describeStored("BloodRequest", stored)).toEqual({
      kind: "BloodRequest",
      owner_ref: "cus_01",
      lifecycle_status: "Active",
      current_fields: stored,
    })
  })

  it("takes owner and status of a new record from the proposal", () => {
    expect(describeProposed("Donation", { donor_uid: "cus_02", units_donated: 1 })).toEqual({
      kind: "Donation",
      owner_ref: "cus_02",
      lifecycle_status: null,
      proposed_fields: { donor_uid: "cus_02", units_donated: 1 },
    })
  })

  it("gates an update on the stored owner, not the patch", () => {
    const descriptor = describeUpdate("BloodRequest", stored, { requester_uid: "cus_02" })

    expect(descriptor.owner_ref).toBe("cus_01")
    expect(descriptor.proposed_fields).toEqual({ requester_uid: "cus_02" })
  })
})
