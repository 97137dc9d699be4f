import { AccessPolicyModuleService } from "../service"
import { ANONYMOUS, ResourceDescriptor } from "../types"

const bank: ResourceDescriptor = {
  kind: "BloodBank",
  owner_ref: null,
  lifecycle_status: null,
  current_fields: { id: "bbank_1", name: "Central" },
}

const profile: ResourceDescriptor = {
  kind: "User",
  owner_ref: "user_alice",
  lifecycle_status: null,
  current_fields: { uid: "user_alice", role: "donor" },
  proposed_fields: { role: "admin" },
}

describe("AccessPolicyModuleService", () => {
  let logger: { info: jest.Mock }

  beforeEach(() => {
    logger = { info: jest.fn() }
  })

  it("logs a denied anonymous write", () => {
    const service = new AccessPolicyModuleService({ logger })

    const verdict = service.evaluate(ANONYMOUS, "update", bank)

    expect(verdict.reason).toBe("not_authenticated")
    expect(logger.info).toHaveBeenCalledTimes(1)
    expect(logger.info).toHaveBeenCalledWith(
      "[AccessPolicy] Denied update BloodBank for anonymous: not_authenticated"
    )
  })

  it("names the denied fields in the log line", () => {
    const service = new AccessPolicyModuleService({ logger })

    service.evaluate({ subject_id: "user_alice", role: "donor" }, "update", profile)

    expect(logger.info).toHaveBeenCalledWith(
      "[AccessPolicy] Denied update User for user_alice: field_not_updatable [role]"
    )
  })

  it("stays quiet when access is granted", () => {
    const service = new AccessPolicyModuleService({ logger })

    const verdict = service.evaluate(ANONYMOUS, "read", bank)

    expect(verdict).toEqual({ verdict: "allow", reason: "granted", denied_fields: [] })
    expect(logger.info).not.toHaveBeenCalled()
  })

  it("does not log denials when log_denials is off", () => {
    const service = new AccessPolicyModuleService({ logger }, { log_denials: false })

    const verdict = service.evaluate(ANONYMOUS, "delete", bank)

    expect(verdict.verdict).toBe("deny")
    expect(logger.info).not.toHaveBeenCalled()
  })
})
