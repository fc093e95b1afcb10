import type { User } from "./timesheet.js";

/** Display name, else "first last"; null when neither yields text. */
export function userDisplayName(user: User): string | null {
  if (user.displayName != null && user.displayName.length > 0) return user.displayName;
  const full = `${user.firstName ?? ""} ${user.lastName ?? ""}`.trim();
  return full.length > 0 ? full : null;
}

/** Names of the users who logged time; unknown ids are dropped. */
export function resolveEmployeeNames(
  userIds: Iterable<number>,
  usersById: ReadonlyMap<number, User>
): string[] {
  const names: string[] = [];
  for (const id of userIds) {
    const user = usersById.get(id);
    const name = user ? userDisplayName(user) : null;
    if (name != null) names.push(name);
  }
  return names.sort((a, b) => a.localeCompare(b, undefined, { sensitivity: "base" }));
}
