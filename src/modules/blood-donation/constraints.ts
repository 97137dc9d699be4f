import {
  BLOOD_GROUPS,
  CAMPAIGN_STATUSES,
  DONATION_TYPES,
  GENDERS,
  REQUEST_STATUSES,
  URGENCY_LEVELS,
  USER_ROLES,
} from "../../lib/enums"
import { ResourceKind } from "../access-policy/types"
import { StoredRecord } from "./resources"

type Counter = { field: string; min: number }

const ENUM_FIELDS: Readonly<Record<ResourceKind, Readonly<Record<string, ReadonlyArray<string>>>>> = {
  User: { blood_group: BLOOD_GROUPS, gender: GENDERS, role: USER_ROLES },
  BloodBank: {},
  Campaign: { status: CAMPAIGN_STATUSES },
  BloodRequest: {
    required_blood_group: BLOOD_GROUPS,
    urgency: URGENCY_LEVELS,
    status: REQUEST_STATUSES,
  },
  Donation: { donation_type: DONATION_TYPES },
  Notification: {},
}

const COUNTERS: Readonly<Record<ResourceKind, ReadonlyArray<Counter>>> = {
  User: [{ field: "total_donations", min: 0 }],
  BloodBank: [],
  Campaign: [
    { field: "goal_units", min: 0 },
    { field: "collected_units", min: 0 },
    { field: "participants_count", min: 0 },
  ],
  BloodRequest: [
    { field: "units_required", min: 1 },
    { field: "units_fulfilled", min: 0 },
  ],
  Donation: [],
  Notification: [],
}

function isPresent(value: unknown): boolean {
  return value !== undefined && value !== null
}

function toTime(value: unknown): number | null {
  if (value instanceof Date) return value.getTime()
  if (typeof value === "string" || typeof value === "number") {
    const time = new Date(value).getTime()
    return Number.isNaN(time) ? null : time
  }
  return null
}

function inventoryProblems(inventory: unknown): string[] {
  if (typeof inventory !== "object" || inventory === null || Array.isArray(inventory)) {
    return ["inventory must map blood groups to unit counts"]
  }
  const groups: ReadonlyArray<string> = BLOOD_GROUPS
  const problems: string[] = []
  for (const [group, units] of Object.entries(inventory)) {
    if (!groups.includes(group)) {
      problems.push(`inventory has unknown blood group ${group}`)
    } else if (typeof units !== "number" || !Number.isInteger(units) || units < 0) {
      problems.push(`inventory[${group}] must be a non-negative integer`)
    }
  }
  return problems
}

/**
 * Record-level constraints the data layer cannot express on its own.
 * Returns one message per violation, empty when the record is valid.
 */
export function recordProblems(kind: ResourceKind, record: StoredRecord): string[] {
  const problems: string[] = []

  for (const [field, allowed] of Object.entries(ENUM_FIELDS[kind])) {
    const value = record[field]
    if (isPresent(value) && (typeof value !== "string" || !allowed.includes(value))) {
      problems.push(`${field} must be one of: ${allowed.join(", ")}`)
    }
  }

  for (const { field, min } of COUNTERS[kind]) {
    const value = record[field]
    if (!isPresent(value)) continue
    if (typeof value !== "number" || !Number.isInteger(value) || value < min) {
      problems.push(`${field} must be an integer >= ${min}`)
    }
  }

  if (kind === "BloodBank" && isPresent(record.inventory)) {
    problems.push(...inventoryProblems(record.inventory))
  }

  if (kind === "Campaign") {
    const groups = record.required_blood_groups
    if (isPresent(groups)) {
      const known: ReadonlyArray<unknown> = BLOOD_GROUPS
      if (!Array.isArray(groups) || !groups.every((group) => known.includes(group))) {
        problems.push(`required_blood_groups must only contain: ${BLOOD_GROUPS.join(", ")}`)
      }
    }

    if (isPresent(record.start_date) && isPresent(record.end_date)) {
      const start = toTime(record.start_date)
      const end = toTime(record.end_date)
      if (start === null || end === null) {
        problems.push("start_date and end_date must be valid dates")
      } else if (end < start) {
        problems.push("end_date must not be before start_date")
      }
    }
  }

  return problems
}
