import { POLICY_RULES } from "../access-policy/rules"
import {
  isUserRole,
  RecordFields,
  ResourceDescriptor,
  ResourceKind,
  UserRole,
} from "../access-policy/types"

export type StoredRecord = RecordFields

type ResourceShape = {
  owner: string | null
  status: string | null
}

/** Where each kind keeps its owner reference and lifecycle status. */
export const RESOURCE_SHAPES: Readonly<Record<ResourceKind, ResourceShape>> = {
  User: { owner: "uid", status: null },
  BloodBank: { owner: null, status: null },
  Campaign: { owner: null, status: "status" },
  BloodRequest: { owner: "requester_uid", status: "status" },
  Donation: { owner: "donor_uid", status: null },
  Notification: { owner: "user_uid", status: null },
}

export function keyFieldOf(kind: ResourceKind): string {
  return POLICY_RULES[kind].key
}

/** Role stored on a profile. A caller without a profile yet counts as a donor, the profile default. */
export function profileRole(profile: StoredRecord | undefined): UserRole {
  return profile && isUserRole(profile.role) ? profile.role : "donor"
}

function textOrNull(value: unknown): string | null {
  return typeof value === "string" ? value : null
}

function pick(record: RecordFields, field: string | null): string | null {
  return field === null ? null : textOrNull(record[field])
}

/** Descriptor for a record as it is stored (read, delete). */
export function describeStored(kind: ResourceKind, record: StoredRecord): ResourceDescriptor {
  const shape = RESOURCE_SHAPES[kind]
  return {
    kind,
    owner_ref: pick(record, shape.owner),
    lifecycle_status: pick(record, shape.status),
    current_fields: record,
  }
}

/** Descriptor for a record that does not exist yet; owner comes from the proposal. */
export function describeProposed(kind: ResourceKind, data: RecordFields): ResourceDescriptor {
  const shape = RESOURCE_SHAPES[kind]
  return {
    kind,
    owner_ref: pick(data, shape.owner),
    lifecycle_status: pick(data, shape.status),
    proposed_fields: data,
  }
}

/** Descriptor for an update: gated on the stored state, diffed against the patch. */
export function describeUpdate(
  kind: ResourceKind,
  current: StoredRecord,
  patch: RecordFields
): ResourceDescriptor {
  return { ...describeStored(kind, current), proposed_fields: patch }
}
