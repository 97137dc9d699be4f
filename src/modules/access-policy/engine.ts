import { FieldPolicy, KindPolicy, MANAGED_FIELDS, POLICY_RULES } from "./rules"
import {
  DenyReason,
  IdentityContext,
  isPolicyAction,
  isResourceKind,
  PolicyAction,
  PolicyVerdict,
  RecordFields,
  ResourceDescriptor,
} from "./types"

function allow(): PolicyVerdict {
  return { verdict: "allow", reason: "granted", denied_fields: [] }
}

function deny(reason: DenyReason, deniedFields: string[] = []): PolicyVerdict {
  return { verdict: "deny", reason, denied_fields: deniedFields }
}

/**
 * Structural equality for record values: primitives, dates, arrays and
 * plain objects such as a blood bank inventory.
 */
function isSameValue(a: unknown, b: unknown): boolean {
  if (a === b) return true
  if (a instanceof Date && b instanceof Date) return a.getTime() === b.getTime()
  if (Array.isArray(a) && Array.isArray(b)) return isSameList(a, b)
  if (isPlainObject(a) && isPlainObject(b)) return isSameRecord(a, b)
  return false
}

function isSameList(a: ReadonlyArray<unknown>, b: ReadonlyArray<unknown>): boolean {
  return a.length === b.length && a.every((item, i) => isSameValue(item, b[i]))
}

function isSameRecord(a: Record<string, unknown>, b: Record<string, unknown>): boolean {
  const keys = Object.keys(a)
  if (keys.length !== Object.keys(b).length) return false
  return keys.every((key) => Object.prototype.hasOwnProperty.call(b, key) && isSameValue(a[key], b[key]))
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value) && !(value instanceof Date)
}

/**
 * Fields whose proposed value differs from the stored one. On create
 * nothing is stored, so every proposed field counts as changed.
 */
function changedFields(current: RecordFields, proposed: RecordFields): string[] {
  return Object.keys(proposed).filter((field) => !isSameValue(current[field], proposed[field]))
}

function checkFields(
  ctx: IdentityContext,
  action: PolicyAction,
  policy: KindPolicy,
  descriptor: ResourceDescriptor
): PolicyVerdict {
  if (action !== "create" && action !== "update") return allow()

  const current: RecordFields = action === "create" ? {} : descriptor.current_fields ?? {}
  const proposed: RecordFields = descriptor.proposed_fields ?? {}
  const fieldPolicy: FieldPolicy | undefined = action === "create" ? policy.onCreate : policy.onUpdate

  const denied = new Set<string>()
  for (const field of changedFields(current, proposed)) {
    if (MANAGED_FIELDS.includes(field) || (action === "update" && field === policy.key)) {
      denied.add(field)
      continue
    }
    if (!fieldPolicy) continue
    const check = Object.prototype.hasOwnProperty.call(fieldPolicy.fields, field)
      ? fieldPolicy.fields[field]
      : fieldPolicy.others
    if (check && !check(ctx, current[field], proposed[field])) {
      denied.add(field)
    }
  }

  if (denied.size > 0) {
    return deny("field_not_updatable", Array.from(denied).sort())
  }
  return allow()
}

function decide(
  ctx: IdentityContext,
  action: PolicyAction,
  descriptor: ResourceDescriptor
): PolicyVerdict {
  if (!isResourceKind(descriptor.kind) || !isPolicyAction(action)) {
    return deny("unsupported")
  }

  const policy = POLICY_RULES[descriptor.kind]
  const grants = policy.grants[action]

  // Remember the grant that got furthest before failing; its failing
  // predicate names the most specific reason. Ties keep the earlier grant.
  let furthest: { passed: number; reason: DenyReason } | null = null

  for (const grant of grants) {
    const failedAt = grant.findIndex((predicate) => !predicate.test(ctx, descriptor))
    if (failedAt === -1) {
      return checkFields(ctx, action, policy, descriptor)
    }
    if (furthest === null || failedAt > furthest.passed) {
      furthest = { passed: failedAt, reason: grant[failedAt].failure }
    }
  }

  if (ctx.subject_id === null) {
    return deny("not_authenticated")
  }
  return deny(furthest?.reason ?? "unsupported")
}

/**
 * Decides whether `ctx` may perform `action` on the described resource.
 *
 * Pure and synchronous. Never throws: unknown kinds or actions, and any
 * fault while evaluating, come back as a deny with reason `unsupported`.
 */
export function evaluatePolicy(
  ctx: IdentityContext,
  action: PolicyAction,
  descriptor: ResourceDescriptor
): PolicyVerdict {
  try {
    return decide(ctx, action, descriptor)
  } catch {
    return deny("unsupported")
  }
}
