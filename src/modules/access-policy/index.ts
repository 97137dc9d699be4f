import { Module } from "@medusajs/framework/utils"
import { AccessPolicyModuleService } from "./service"

export const ACCESS_POLICY_MODULE = "accessPolicy"

export { AccessPolicyModuleService }
export { evaluatePolicy } from "./engine"
export { resolveIdentity } from "./identity"
export type { RoleResolver } from "./identity"
export * from "./types"

export default Module(ACCESS_POLICY_MODULE, {
  service: AccessPolicyModuleService,
})
