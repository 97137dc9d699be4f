import { DenyReason, IdentityContext, ResourceDescriptor } from "./types"

/**
 * A single condition of a grant. `failure` is the reason reported when the
 * condition is the one that stopped a grant from matching.
 */
export type Predicate = {
  name: string
  test: (ctx: IdentityContext, res: ResourceDescriptor) => boolean
  failure: DenyReason
}

export const isAuthenticated: Predicate = {
  name: "is_authenticated",
  test: (ctx) => ctx.subject_id !== null,
  failure: "not_authenticated",
}

export const isSelf: Predicate = {
  name: "is_self",
  test: (ctx, res) =>
    ctx.subject_id !== null && res.owner_ref !== null && ctx.subject_id === res.owner_ref,
  failure: "not_owner",
}

export const isAdmin: Predicate = {
  name: "is_admin",
  test: (ctx) => ctx.role === "admin",
  failure: "not_admin",
}

export const isPublic: Predicate = {
  name: "is_public",
  test: () => true,
  failure: "unsupported",
}

export function statusIn(statuses: ReadonlyArray<string>): Predicate {
  const allowed: ReadonlySet<string> = new Set(statuses)
  return {
    name: `status_in(${statuses.join(", ")})`,
    test: (_ctx, res) => res.lifecycle_status !== null && allowed.has(res.lifecycle_status),
    failure: "invalid_lifecycle_state",
  }
}
