export const BLOOD_GROUPS = ["A+", "A-", "B+", "B-", "AB+", "AB-", "O+", "O-"] as const

export const GENDERS = ["Male", "Female"] as const

export const USER_ROLES = ["donor", "recipient", "admin"] as const
export type UserRole = (typeof USER_ROLES)[number]

export const REQUEST_STATUSES = [
  "Pending",
  "Pending Verification",
  "Active",
  "Partially Fulfilled",
  "Fulfilled",
  "Cancelled",
  "Expired",
] as const
export type RequestStatus = (typeof REQUEST_STATUSES)[number]

// Owner may still edit a request while it sits in one of these
export const EDITABLE_REQUEST_STATUSES: ReadonlyArray<RequestStatus> = [
  "Pending Verification",
  "Pending",
  "Active",
]

// Visible to every signed-in caller, not just the requester
export const PUBLIC_REQUEST_STATUSES: ReadonlyArray<RequestStatus> = [
  "Active",
  "Partially Fulfilled",
  "Fulfilled",
]

export const URGENCY_LEVELS = ["Critical", "High", "Medium", "Low"] as const

export const CAMPAIGN_STATUSES = ["Upcoming", "Ongoing", "Completed", "Cancelled"] as const

export const DONATION_TYPES = ["Whole Blood", "Platelets", "Plasma", "Power Red"] as const
