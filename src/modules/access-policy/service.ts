import { Logger } from "@medusajs/framework/types"
import { evaluatePolicy } from "./engine"
import {
  IdentityContext,
  PolicyAction,
  PolicyEvaluator,
  PolicyVerdict,
  ResourceDescriptor,
} from "./types"

type InjectedDependencies = {
  logger: Pick<Logger, "info">
}

export type AccessPolicyModuleOptions = {
  // log every deny through the Medusa logger
  log_denials?: boolean
}

/**
 * Module service around the access policy engine. Holds no state besides its
 * options, so one instance serves every request.
 */
export class AccessPolicyModuleService implements PolicyEvaluator {
  protected logger_: Pick<Logger, "info">
  protected options_: Required<AccessPolicyModuleOptions>

  constructor({ logger }: InjectedDependencies, options: AccessPolicyModuleOptions = {}) {
    this.logger_ = logger
    this.options_ = {
      log_denials: options.log_denials ?? true,
    }
  }

  /**
   * Check whether a caller may perform an action on a resource.
   * Deny is the default: anything no rule grants is refused.
   */
  evaluate(
    ctx: IdentityContext,
    action: PolicyAction,
    descriptor: ResourceDescriptor
  ): PolicyVerdict {
    const result = evaluatePolicy(ctx, action, descriptor)

    if (result.verdict === "deny" && this.options_.log_denials) {
      const subject = ctx.subject_id ?? "anonymous"
      const fields = result.denied_fields.length ? ` [${result.denied_fields.join(", ")}]` : ""
      this.logger_.info(
        `[AccessPolicy] Denied ${action} ${descriptor.kind} for ${subject}: ${result.reason}${fields}`
      )
    }

    return result
  }
}
