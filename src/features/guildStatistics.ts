/**
 * Conference Bot — src/features/guildStatistics.ts
 * WHAT: Member count per role, highest role first.
 * WHY: Organizers watch registration progress ("how many onsite participants so far?").
 * FLOWS: MemberDirectory → countMembersPerRole() → formatParticipantReport()
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { Guild } from "discord.js";

export interface RoleInfo {
  id: string;
  name: string;
  position: number;
}

/** Read-only view of a guild's roles and members. */
export interface MemberDirectory {
  roles(): RoleInfo[];
  /** Role ids held by each member, one entry per member. */
  memberRoleIds(): Promise<string[][]>;
}

export interface RoleCount {
  name: string;
  count: number;
}

export function countMembersPerRole(roles: readonly RoleInfo[], members: readonly string[][]): RoleCount[] {
  const counts = new Map<string, number>();
  for (const role of roles) counts.set(role.id, 0);
  for (const memberRoles of members) {
    for (const roleId of memberRoles) {
      const current = counts.get(roleId);
      if (current !== undefined) counts.set(roleId, current + 1);
    }
  }

  return [...roles]
    .sort((a, b) => b.position - a.position)
    .map((role) => ({ name: role.name, count: counts.get(role.id) ?? 0 }));
}

export function formatParticipantReport(requesterId: string, counts: readonly RoleCount[]): string {
  // "@everyone" is listed as "everyone"
  const lines = counts.map(({ name, count }) => `* ${count} ${name.replace(/^[<>@]+|[<>@]+$/g, "")}`);
  return [`<@${requesterId}> Participant Statistics:`, ...lines].join("\n");
}

export async function collectRoleCounts(directory: MemberDirectory): Promise<RoleCount[]> {
  return countMembersPerRole(directory.roles(), await directory.memberRoleIds());
}

export function guildMemberDirectory(guild: Guild): MemberDirectory {
  return {
    roles: () =>
      [...guild.roles.cache.values()].map((role) => ({
        id: role.id,
        name: role.name,
        position: role.position,
      })),
    memberRoleIds: async () => {
      const members = await guild.members.fetch();
      return [...members.values()].map((member) => [...member.roles.cache.keys()]);
    },
  };
}
