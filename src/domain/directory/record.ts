/**
 * Persisted shape of the directory file.
 * Field names follow the file format, not the entity types.
 */

export interface DirectoryRecord {
  readonly users: UserRecord[];
  readonly groups: GroupRecord[];
}

export interface UserRecord {
  readonly username: string;
  readonly password_hash: string;
  readonly email: string;
  readonly groups: string[];
}

export interface GroupRecord {
  readonly name: string;
  // Absent in files written before membership was stored per group
  readonly members?: string[];
}

/**
 * Storage for a whole directory snapshot.
 * `read` resolves to null when nothing has been stored yet.
 */
export interface DirectoryRepo {
  read(): Promise<DirectoryRecord | null>;
  write(record: DirectoryRecord): Promise<void>;
}
