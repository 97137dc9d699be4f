import { MedusaError } from "@medusajs/framework/utils"
import { evaluatePolicy } from "../access-policy/engine"
import {
  IdentityContext,
  PolicyAction,
  PolicyEvaluator,
  RecordFields,
  ResourceDescriptor,
  ResourceKind,
} from "../access-policy/types"
import { recordProblems } from "./constraints"
import { PolicyDeniedError } from "./errors"
import { describeProposed, describeStored, describeUpdate, StoredRecord } from "./resources"

/**
 * Persistence the guarded store sits on. `updateRecord` and `deleteRecord`
 * must call `precondition` with the stored record inside the same transaction
 * as the write, and must not write when it throws.
 */
export interface RecordSource {
  listRecords(kind: ResourceKind, filters: RecordFields): Promise<StoredRecord[]>
  retrieveRecord(kind: ResourceKind, key: string): Promise<StoredRecord | null>
  createRecord(kind: ResourceKind, data: RecordFields): Promise<StoredRecord>
  updateRecord(
    kind: ResourceKind,
    key: string,
    patch: RecordFields,
    precondition: (current: StoredRecord) => void
  ): Promise<StoredRecord>
  deleteRecord(
    kind: ResourceKind,
    key: string,
    precondition: (current: StoredRecord) => void
  ): Promise<void>
}

/**
 * Runs every read and write through the access policy before touching the
 * record source. Lists are filtered record by record; a denied write is
 * rejected whole. Only enforced decisions go through `policy_`, so a record
 * left out of a list is not reported as a denial.
 */
export class GuardedStore {
  constructor(
    protected readonly source_: RecordSource,
    protected readonly policy_: PolicyEvaluator
  ) {}

  async list(
    ctx: IdentityContext,
    kind: ResourceKind,
    filters: RecordFields = {}
  ): Promise<StoredRecord[]> {
    const records = await this.source_.listRecords(kind, filters)
    return records.filter(
      (record) => evaluatePolicy(ctx, "read", describeStored(kind, record)).verdict === "allow"
    )
  }

  async retrieve(ctx: IdentityContext, kind: ResourceKind, key: string): Promise<StoredRecord> {
    const record = await this.source_.retrieveRecord(kind, key)
    if (!record) {
      throw new MedusaError(MedusaError.Types.NOT_FOUND, `${kind} with key ${key} was not found`)
    }
    this.enforce_(ctx, "read", describeStored(kind, record))
    return record
  }

  async create(ctx: IdentityContext, kind: ResourceKind, data: RecordFields): Promise<StoredRecord> {
    this.enforce_(ctx, "create", describeProposed(kind, data))
    this.assertValid_(kind, data)
    return await this.source_.createRecord(kind, data)
  }

  async update(
    ctx: IdentityContext,
    kind: ResourceKind,
    key: string,
    patch: RecordFields
  ): Promise<StoredRecord> {
    return await this.source_.updateRecord(kind, key, patch, (current) => {
      this.enforce_(ctx, "update", describeUpdate(kind, current, patch))
      this.assertValid_(kind, { ...current, ...patch })
    })
  }

  async delete(ctx: IdentityContext, kind: ResourceKind, key: string): Promise<void> {
    await this.source_.deleteRecord(kind, key, (current) => {
      this.enforce_(ctx, "delete", describeStored(kind, current))
    })
  }

  protected enforce_(ctx: IdentityContext, action: PolicyAction, descriptor: ResourceDescriptor): void {
    const verdict = this.policy_.evaluate(ctx, action, descriptor)
    if (verdict.verdict !== "allow") {
      throw new PolicyDeniedError(action, descriptor.kind, verdict)
    }
  }

  protected assertValid_(kind: ResourceKind, record: StoredRecord): void {
    const problems = recordProblems(kind, record)
    if (problems.length > 0) {
      throw new MedusaError(MedusaError.Types.INVALID_DATA, problems.join("; "))
    }
  }
}
