/**
 * Directory user entity.
 * `groups` holds group names in join order, without duplicates.
 */
export interface User {
  readonly username: string;
  readonly passwordHash: string;
  readonly email: string;
  groups: string[];
}

/**
 * Read-only view of a user, without the password hash.
 */
export interface UserSummary {
  readonly username: string;
  readonly email: string;
  readonly groups: readonly string[];
}

export function toUserSummary(user: User): UserSummary {
  return {
    username: user.username,
    email: user.email,
    groups: [...user.groups],
  };
}
