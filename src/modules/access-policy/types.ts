import type { UserRole } from "../../lib/enums"

export type { UserRole }

export const RESOURCE_KINDS = [
  "User",
  "BloodBank",
  "Campaign",
  "BloodRequest",
  "Donation",
  "Notification",
] as const
export type ResourceKind = (typeof RESOURCE_KINDS)[number]

export const POLICY_ACTIONS = ["create", "read", "update", "delete"] as const
export type PolicyAction = (typeof POLICY_ACTIONS)[number]

export type AuthenticatedIdentity = {
  subject_id: string
  role: UserRole
}

export type AnonymousIdentity = {
  subject_id: null
  role: null
}

/**
 * The principal a request runs as. Resolved once per request by the caller;
 * the engine never looks identities up on its own.
 */
export type IdentityContext = AuthenticatedIdentity | AnonymousIdentity

export const ANONYMOUS: AnonymousIdentity = { subject_id: null, role: null }

export type RecordFields = Record<string, unknown>

/**
 * Typed view of the record an action targets.
 *
 * For `create` the owner and status come from the proposed record, since
 * nothing is stored yet. For `update` they describe the stored record and
 * `proposed_fields` holds the incoming patch.
 */
export type ResourceDescriptor = {
  kind: ResourceKind
  owner_ref: string | null
  lifecycle_status: string | null
  current_fields?: RecordFields
  proposed_fields?: RecordFields
}

export type DenyReason =
  | "not_authenticated"
  | "not_owner"
  | "not_admin"
  | "invalid_lifecycle_state"
  | "field_not_updatable"
  | "unsupported"

export type PolicyReason = "granted" | DenyReason

export type PolicyVerdict = {
  verdict: "allow" | "deny"
  reason: PolicyReason
  // only filled for field-level failures
  denied_fields: string[]
}

export type PolicyEvaluator = {
  evaluate(
    ctx: IdentityContext,
    action: PolicyAction,
    descriptor: ResourceDescriptor
  ): PolicyVerdict
}

export function isUserRole(value: unknown): value is UserRole {
  return value === "donor" || value === "recipient" || value === "admin"
}

export function isResourceKind(value: unknown): value is ResourceKind {
  return RESOURCE_KINDS.some((kind) => kind === value)
}

export function isPolicyAction(value: unknown): value is PolicyAction {
  return POLICY_ACTIONS.some((action) => action === value)
}
