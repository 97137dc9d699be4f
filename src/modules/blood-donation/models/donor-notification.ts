import { model } from "@medusajs/framework/utils"

export const DonorNotification = model.define("donor_notification", {
  id: model.id({ prefix: "dnotif" }).primaryKey(),
  user_uid: model.text().index(),
  message: model.text(),
  type: model.text().nullable(), // match, campaign, urgent, info, request_update
  link: model.text().nullable(),
  is_read: model.boolean().default(false),
})
