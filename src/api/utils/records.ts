import { AuthenticatedMedusaRequest, MedusaResponse } from "@medusajs/framework/http"
import {
  ACCESS_POLICY_MODULE,
  AccessPolicyModuleService,
  RecordFields,
  ResourceKind,
} from "../../modules/access-policy"
import {
  BLOOD_DONATION_MODULE,
  BloodDonationModuleService,
  GuardedStore,
  PolicyDeniedError,
} from "../../modules/blood-donation"

export const RECORD_PATHS: Readonly<Record<string, ResourceKind>> = {
  users: "User",
  "blood-banks": "BloodBank",
  campaigns: "Campaign",
  "blood-requests": "BloodRequest",
  donations: "Donation",
  notifications: "Notification",
}

export function kindFromPath(segment: string | undefined): ResourceKind | null {
  if (!segment || !Object.prototype.hasOwnProperty.call(RECORD_PATHS, segment)) {
    return null
  }
  return RECORD_PATHS[segment]
}

export function isRecordFields(value: unknown): value is RecordFields {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

/**
 * Turns query params into equality filters. "true"/"false" become booleans
 * so flags such as `is_read` can be filtered on.
 */
export function filtersFromQuery(query: Record<string, unknown>): RecordFields {
  const filters: RecordFields = {}
  for (const [field, value] of Object.entries(query)) {
    if (typeof value !== "string") continue
    filters[field] = value === "true" ? true : value === "false" ? false : value
  }
  return filters
}

/**
 * Policy denials become 401/403 with the reason and any denied fields.
 * Everything else goes on to Medusa's error handler.
 */
export function sendDenied(res: MedusaResponse, error: unknown): void {
  if (!(error instanceof PolicyDeniedError)) {
    throw error
  }
  const { reason, denied_fields } = error.verdict
  res.status(reason === "not_authenticated" ? 401 : 403).json({
    message: error.message,
    reason,
    denied_fields,
  })
}

export function guardedStore(req: AuthenticatedMedusaRequest): GuardedStore {
  return new GuardedStore(
    req.scope.resolve<BloodDonationModuleService>(BLOOD_DONATION_MODULE),
    req.scope.resolve<AccessPolicyModuleService>(ACCESS_POLICY_MODULE)
  )
}
