/**
 * Directory group entity.
 * `members` holds usernames in join order, without duplicates.
 */
export interface Group {
  readonly name: string;
  members: string[];
}

export interface GroupSummary {
  readonly name: string;
  readonly members: readonly string[];
}

export function toGroupSummary(group: Group): GroupSummary {
  return {
    name: group.name,
    members: [...group.members],
  };
}
