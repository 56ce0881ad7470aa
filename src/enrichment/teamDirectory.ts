// src/enrichment/teamDirectory.ts
// Owner → email / manager / team lookup, loaded from a JSON file:
//   { "members": { "<owner>": { "email", "manager", "team" } },
//     "managers": { "<manager>": "<email>" } }

import fs from 'node:fs/promises';
import { createLogger } from '../observability/logger.js';

const log = createLogger('enrichment/teamDirectory');

export interface TeamMember {
  email: string;
  manager: string;
  team: string;
}

export interface OwnerProfile extends TeamMember {
  managerEmail: string;
}

const keyOf = (name: string) => name.trim().toLowerCase().replace(/\s+/g, ' ');

function readString(obj: object, key: string): string {
  const value: unknown = Reflect.get(obj, key);
  return typeof value === 'string' ? value.trim() : '';
}

export class TeamDirectory {
  private readonly members = new Map<string, TeamMember>();
  private readonly managers = new Map<string, string>();

  constructor(members: Record<string, TeamMember> = {}, managers: Record<string, string> = {}) {
    for (const [name, member] of Object.entries(members)) this.members.set(keyOf(name), member);
    for (const [name, email] of Object.entries(managers)) this.managers.set(keyOf(name), email);
  }

  static fromJson(raw: unknown): TeamDirectory {
    const members: Record<string, TeamMember> = {};
    const managers: Record<string, string> = {};
    if (raw && typeof raw === 'object') {
      const membersRaw: unknown = Reflect.get(raw, 'members');
      if (membersRaw && typeof membersRaw === 'object') {
        for (const [name, entry] of Object.entries(membersRaw)) {
          if (!entry || typeof entry !== 'object') continue;
          members[name] = {
            email: readString(entry, 'email'),
            manager: readString(entry, 'manager'),
            team: readString(entry, 'team'),
          };
        }
      }
      const managersRaw: unknown = Reflect.get(raw, 'managers');
      if (managersRaw && typeof managersRaw === 'object') {
        for (const [name, email] of Object.entries(managersRaw)) {
          if (typeof email === 'string') managers[name] = email.trim();
        }
      }
    }
    return new TeamDirectory(members, managers);
  }

  /** A missing or malformed file yields an empty directory. */
  static async load(filePath: string): Promise<TeamDirectory> {
    let text: string;
    try {
      text = await fs.readFile(filePath, 'utf8');
    } catch (err) {
      log.warn({ err, filePath }, 'Team directory not found, owner enrichment limited to folder names');
      return new TeamDirectory();
    }
    try {
      const directory = TeamDirectory.fromJson(JSON.parse(text));
      log.info({ filePath, members: directory.size }, 'Loaded team directory');
      return directory;
    } catch (err) {
      log.error({ err, filePath }, 'Team directory is not valid JSON');
      return new TeamDirectory();
    }
  }

  get size(): number {
    return this.members.size;
  }

  lookup(ownerName: string): OwnerProfile | null {
    const member = this.members.get(keyOf(ownerName));
    if (!member) return null;
    return {
      ...member,
      managerEmail: member.manager ? this.managers.get(keyOf(member.manager)) ?? '' : '',
    };
  }
}
