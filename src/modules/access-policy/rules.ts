import {
  EDITABLE_REQUEST_STATUSES,
  PUBLIC_REQUEST_STATUSES,
} from "../../lib/enums"
import { isAdmin, isAuthenticated, isPublic, isSelf, Predicate, statusIn } from "./predicates"
import { IdentityContext, PolicyAction, ResourceKind } from "./types"

/** All predicates must hold for the grant to authorize the action. */
export type Grant = ReadonlyArray<Predicate>

/**
 * Decides whether the caller may move one field from `before` to `after`.
 * On create `before` is always undefined.
 */
export type FieldCheck = (ctx: IdentityContext, before: unknown, after: unknown) => boolean

export type FieldPolicy = {
  fields: Readonly<Record<string, FieldCheck>>
  // applies to every changed field not listed above; unlisted fields are free otherwise
  others?: FieldCheck
}

export type KindPolicy = {
  // identity key, never rewritten by an update
  key: string
  grants: Readonly<Record<PolicyAction, ReadonlyArray<Grant>>>
  onCreate?: FieldPolicy
  onUpdate?: FieldPolicy
}

// Timestamps the data layer maintains; setting deleted_at would delete the record
export const MANAGED_FIELDS: ReadonlyArray<string> = ["created_at", "updated_at", "deleted_at"]

const adminOnly: FieldCheck = (ctx) => ctx.role === "admin"

const anyone: FieldCheck = () => true

function adminOr(values: ReadonlyArray<unknown>): FieldCheck {
  return (ctx, _before, after) => ctx.role === "admin" || values.includes(after)
}

const ADMIN_MANAGED: Readonly<Record<PolicyAction, ReadonlyArray<Grant>>> = {
  create: [[isAdmin]],
  read: [[isPublic]],
  update: [[isAdmin]],
  delete: [[isAdmin]],
}

export const POLICY_RULES: Readonly<Record<ResourceKind, KindPolicy>> = {
  User: {
    key: "uid",
    grants: {
      // the profile row is written by its owner at signup, before any role exists
      create: [[isSelf]],
      read: [[isSelf], [isAdmin]],
      update: [[isSelf], [isAdmin]],
      delete: [[isAdmin]],
    },
    onCreate: {
      fields: { role: adminOr(["donor", "recipient"]) },
    },
    onUpdate: {
      fields: { role: adminOnly },
    },
  },

  BloodBank: { key: "id", grants: ADMIN_MANAGED },

  Campaign: { key: "id", grants: ADMIN_MANAGED },

  BloodRequest: {
    key: "id",
    grants: {
      create: [[isAuthenticated, isSelf]],
      read: [
        [isSelf],
        [isAdmin],
        [isAuthenticated, statusIn(PUBLIC_REQUEST_STATUSES)],
      ],
      update: [[isSelf, statusIn(EDITABLE_REQUEST_STATUSES)], [isAdmin]],
      delete: [[isSelf], [isAdmin]],
    },
    onCreate: {
      fields: {
        status: adminOr(["Pending Verification"]),
        units_fulfilled: adminOr([0]),
      },
    },
    onUpdate: {
      fields: {
        requester_uid: adminOnly,
        units_fulfilled: adminOnly,
        // owners may withdraw a request, verification stays with staff
        status: adminOr(["Cancelled"]),
      },
    },
  },

  Donation: {
    key: "id",
    grants: {
      create: [[isAdmin]],
      read: [[isSelf], [isAdmin]],
      update: [[isAdmin]],
      delete: [[isAdmin]],
    },
  },

  Notification: {
    key: "id",
    grants: {
      create: [[isAdmin]],
      read: [[isSelf], [isAdmin]],
      update: [[isSelf], [isAdmin]],
      delete: [[isAdmin]],
    },
    onUpdate: {
      fields: { is_read: anyone },
      others: adminOnly,
    },
  },
}
