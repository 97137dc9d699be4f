import { ANONYMOUS, IdentityContext, UserRole } from "./types"

export type RoleResolver = {
  resolveRole(subjectId: string): Promise<UserRole>
}

/**
 * Identity for an authenticated actor, or anonymous when there is none.
 * The role is looked up once here, so predicates never query it again.
 */
export async function resolveIdentity(
  subjectId: string | null | undefined,
  roles: RoleResolver
): Promise<IdentityContext> {
  if (!subjectId) {
    return ANONYMOUS
  }
  return { subject_id: subjectId, role: await roles.resolveRole(subjectId) }
}
