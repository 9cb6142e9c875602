import { type User, type UserSummary, toUserSummary } from '../../domain/directory/user.js';
import { type Group, type GroupSummary, toGroupSummary } from '../../domain/directory/group.js';
import { appendUnique, removeValue } from '../../domain/directory/membership.js';
import type { DirectoryRecord, DirectoryRepo } from '../../domain/directory/record.js';
import { type PasswordHasher, hashModeOf } from '../../domain/auth/password.js';

export type AddUserResult = 'created' | 'already-exists';
export type DeleteUserResult = 'deleted' | 'not-found';
export type CreateGroupResult = 'created' | 'already-exists';
export type AddUserToGroupResult = 'added' | 'not-found';
export type AuthenticateResult = 'authenticated' | 'failed';

/**
 * In-memory directory of users and groups backed by a DirectoryRepo.
 * Every mutation rewrites the whole snapshot. Membership is kept on both
 * sides: user.groups and group.members always agree.
 */
export class DirectoryStore {
  private users = new Map<string, User>();
  private groups = new Map<string, Group>();

  constructor(
    private repo: DirectoryRepo,
    private hasher: PasswordHasher
  ) {}

  /**
   * Replace the current state with the stored snapshot.
   * A missing snapshot yields an empty directory.
   */
  async load(): Promise<void> {
    const record = await this.repo.read();

    const users = new Map<string, User>();
    const groups = new Map<string, Group>();

    if (record) {
      for (const row of record.groups) {
        const group = groups.get(row.name) ?? { name: row.name, members: [] };
        for (const member of row.members ?? []) {
          appendUnique(group.members, member);
        }
        groups.set(row.name, group);
      }

      for (const row of record.users) {
        const user: User = {
          username: row.username,
          passwordHash: row.password_hash,
          email: row.email,
          groups: [],
        };
        for (const groupName of row.groups) {
          appendUnique(user.groups, groupName);
        }
        users.set(row.username, user);
      }

      // Membership is reconciled in both directions. Members naming an
      // unknown user are dropped.
      for (const user of users.values()) {
        for (const groupName of user.groups) {
          let group = groups.get(groupName);
          if (!group) {
            group = { name: groupName, members: [] };
            groups.set(groupName, group);
          }
          appendUnique(group.members, user.username);
        }
      }
      for (const group of groups.values()) {
        group.members = group.members.filter((member) => users.has(member));
        for (const member of group.members) {
          const user = users.get(member);
          if (user) {
            appendUnique(user.groups, group.name);
          }
        }
      }
    }

    this.users = users;
    this.groups = groups;
  }

  async save(): Promise<void> {
    await this.repo.write(this.toRecord());
  }

  async addUser(username: string, password: string, email: string): Promise<AddUserResult> {
    if (this.users.has(username)) {
      return 'already-exists';
    }

    const passwordHash = await this.hasher.hash(password);
    this.users.set(username, { username, passwordHash, email, groups: [] });
    await this.save();
    return 'created';
  }

  listUsers(): UserSummary[] {
    return Array.from(this.users.values()).map(toUserSummary);
  }

  getUser(username: string): UserSummary | undefined {
    const user = this.users.get(username);
    return user ? toUserSummary(user) : undefined;
  }

  async deleteUser(username: string): Promise<DeleteUserResult> {
    const user = this.users.get(username);
    if (!user) {
      return 'not-found';
    }

    this.users.delete(username);
    for (const groupName of user.groups) {
      const group = this.groups.get(groupName);
      if (group) {
        removeValue(group.members, username);
      }
    }

    await this.save();
    return 'deleted';
  }

  async createGroup(name: string): Promise<CreateGroupResult> {
    if (this.groups.has(name)) {
      return 'already-exists';
    }

    this.groups.set(name, { name, members: [] });
    await this.save();
    return 'created';
  }

  listGroups(): GroupSummary[] {
    return Array.from(this.groups.values()).map(toGroupSummary);
  }

  async addUserToGroup(username: string, groupName: string): Promise<AddUserToGroupResult> {
    const user = this.users.get(username);
    const group = this.groups.get(groupName);
    if (!user || !group) {
      return 'not-found';
    }

    appendUnique(user.groups, groupName);
    appendUnique(group.members, username);
    await this.save();
    return 'added';
  }

  /**
   * Check a password. An unknown user and a wrong password give the same
   * result. For an unknown user the password is verified against a stored
   * hash of the algorithm most users have, so both paths cost one verify of
   * that kind.
   */
  async authenticate(username: string, password: string): Promise<AuthenticateResult> {
    const user = this.users.get(username);
    if (!user) {
      const reference = this.referenceHash();
      if (reference === undefined) {
        await this.hasher.hash(password);
      } else {
        await this.hasher.verify(password, reference);
      }
      return 'failed';
    }

    const isValid = await this.hasher.verify(password, user.passwordHash);
    return isValid ? 'authenticated' : 'failed';
  }

  /**
   * A stored hash of the most common algorithm in the directory, or
   * undefined when there are no users. Ties go to argon2.
   */
  private referenceHash(): string | undefined {
    let argon2Hash: string | undefined;
    let sha256Hash: string | undefined;
    let argon2Count = 0;
    let sha256Count = 0;

    for (const user of this.users.values()) {
      if (hashModeOf(user.passwordHash) === 'argon2') {
        argon2Hash = argon2Hash ?? user.passwordHash;
        argon2Count++;
      } else {
        sha256Hash = sha256Hash ?? user.passwordHash;
        sha256Count++;
      }
    }

    if (argon2Hash !== undefined && argon2Count >= sha256Count) {
      return argon2Hash;
    }
    return sha256Hash;
  }

  private toRecord(): DirectoryRecord {
    return {
      users: Array.from(this.users.values()).map((user) => ({
        username: user.username,
        password_hash: user.passwordHash,
        email: user.email,
        groups: [...user.groups],
      })),
      groups: Array.from(this.groups.values()).map((group) => ({
        name: group.name,
        members: [...group.members],
      })),
    };
  }
}
