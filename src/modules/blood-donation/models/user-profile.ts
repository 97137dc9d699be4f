import { model } from "@medusajs/framework/utils"
import { BLOOD_GROUPS, GENDERS, USER_ROLES } from "../../../lib/enums"

/**
 * UserProfile model - one row per signed-up customer
 * `uid` is the customer's auth actor id, so the row mirrors the auth record 1:1
 */
export const UserProfile = model.define("user_profile", {
  uid: model.text().primaryKey(),
  email: model.text().unique().nullable(),
  first_name: model.text().nullable(),
  last_name: model.text().nullable(),
  phone: model.text().nullable(),
  dob: model.dateTime().nullable(),
  blood_group: model.enum([...BLOOD_GROUPS]).nullable(),
  gender: model.enum([...GENDERS]).nullable(),
  role: model.enum([...USER_ROLES]).default("donor"),
  // Donor specific
  last_donation_date: model.dateTime().nullable(),
  medical_conditions: model.text().nullable(),
  is_eligible: model.boolean().default(true),
  next_eligible_date: model.dateTime().nullable(),
  total_donations: model.number().default(0),
})
