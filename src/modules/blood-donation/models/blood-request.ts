import { model } from "@medusajs/framework/utils"
import { BLOOD_GROUPS, REQUEST_STATUSES, URGENCY_LEVELS } from "../../../lib/enums"

export const BloodRequest = model.define("blood_request", {
  id: model.id({ prefix: "breq" }).primaryKey(),
  // Owner: the profile uid of whoever filed the request
  requester_uid: model.text().index(),
  requester_name: model.text().nullable(), // denormalized for display
  patient_name: model.text(),
  required_blood_group: model.enum([...BLOOD_GROUPS]),
  units_required: model.number(),
  units_fulfilled: model.number().default(0),
  urgency: model.enum([...URGENCY_LEVELS]).default("Medium"),
  hospital_name: model.text(),
  hospital_location: model.text(),
  contact_phone: model.text(),
  additional_details: model.text().nullable(),
  status: model.enum([...REQUEST_STATUSES]).default("Pending Verification").index(),
})
