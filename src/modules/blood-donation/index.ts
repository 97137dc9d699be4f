import { Module } from "@medusajs/framework/utils"
import { BloodDonationModuleService } from "./service"

export const BLOOD_DONATION_MODULE = "bloodDonation"

export { BloodDonationModuleService }
export { GuardedStore } from "./guarded-store"
export type { RecordSource } from "./guarded-store"
export { PolicyDeniedError } from "./errors"
export type { StoredRecord } from "./resources"

export default Module(BLOOD_DONATION_MODULE, {
  service: BloodDonationModuleService,
})
