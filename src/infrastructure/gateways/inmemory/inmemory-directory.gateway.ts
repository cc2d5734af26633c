/**
 * InMemoryDirectoryGateway: IDirectoryGateway backed by in-memory Maps.
 *
 * Mirrors the directory's observable behavior: entries come back as raw
 * attribute maps, duplicates raise AlreadyExists, lookups of absent entries
 * raise NotFound. Suitable for testing and lightweight deployments.
 */
import { Injectable } from '@nestjs/common';
import type { IDirectoryGateway } from '../../../domain/gateways/directory.gateway.interface';
import { GatewayError } from '../../../domain/errors/gateway-error';
import { encodeAttributes, type DirectoryEntry } from '../../../domain/models/directory-entry.model';
import {
  makeTeamMachineName,
  type GroupKind,
  type GroupRef,
  type TeamOwningPair,
} from '../../../domain/models/hierarchy.model';
import type { UserCreateInput } from '../../../domain/models/user.model';

const BASE_DN = 'dc=hierarchy,dc=local';

const GROUP_OU: Record<GroupKind, string> = {
  team: 'teams',
  franchise: 'franchises',
  division: 'divisions',
};

@Injectable()
export class InMemoryDirectoryGateway implements IDirectoryGateway {
  private readonly users: Map<string, UserCreateInput> = new Map();
  private readonly groups: Record<GroupKind, Map<string, string>> = {
    team: new Map(),
    franchise: new Map(),
    division: new Map(),
  };
  private readonly members: Map<string, Set<string>> = new Map();
  private available = true;

  async createUser(input: UserCreateInput, _password: string): Promise<DirectoryEntry> {
    this.assertAvailable();
    if (this.users.has(input.uid)) {
      throw GatewayError.alreadyExists(`User ${input.uid}`);
    }
    this.users.set(input.uid, { ...input });
    return this.userEntry(input);
  }

  async getUser(uid: string): Promise<DirectoryEntry> {
    this.assertAvailable();
    const user = this.users.get(uid);
    if (!user) throw GatewayError.notFound(`User ${uid}`);
    return this.userEntry(user);
  }

  async deleteUser(uid: string): Promise<void> {
    this.assertAvailable();
    if (!this.users.delete(uid)) {
      throw GatewayError.notFound(`User ${uid}`);
    }
    for (const set of this.members.values()) {
      set.delete(uid);
    }
  }

  async getUserTeams(uid: string): Promise<DirectoryEntry[]> {
    this.assertAvailable();
    if (!this.users.has(uid)) throw GatewayError.notFound(`User ${uid}`);
    const result: DirectoryEntry[] = [];
    for (const [name, display] of this.groups.team) {
      if (this.members.get(memberKey({ kind: 'team', machineName: name }))?.has(uid)) {
        result.push(this.groupEntry('team', name, display));
      }
    }
    return result;
  }

  async createDivision(machineName: string, displayName: string): Promise<DirectoryEntry> {
    return this.createGroup('division', machineName, displayName);
  }

  async createFranchise(machineName: string): Promise<DirectoryEntry> {
    return this.createGroup('franchise', machineName, labelFranchise(machineName));
  }

  async getDivisions(): Promise<DirectoryEntry[]> {
    return this.listGroups('division');
  }

  async getFranchises(): Promise<DirectoryEntry[]> {
    return this.listGroups('franchise');
  }

  async getTeam(machineName: string): Promise<DirectoryEntry> {
    this.assertAvailable();
    const display = this.groups.team.get(machineName);
    if (display === undefined) throw GatewayError.notFound(`Team ${machineName}`);
    return this.groupEntry('team', machineName, display);
  }

  async createTeam(machineName: string, displayName: string): Promise<DirectoryEntry> {
    return this.createGroup('team', machineName, displayName);
  }

  async addMembership(uid: string, group: GroupRef): Promise<void> {
    this.assertAvailable();
    if (!this.users.has(uid)) throw GatewayError.notFound(`User ${uid}`);
    if (!this.groups[group.kind].has(group.machineName)) {
      throw GatewayError.notFound(`${capitalize(group.kind)} ${group.machineName}`);
    }
    const key = memberKey(group);
    const set = this.members.get(key) ?? new Set<string>();
    if (set.has(uid)) {
      throw GatewayError.alreadyExists(`Membership of ${uid} in ${group.kind} ${group.machineName}`);
    }
    set.add(uid);
    this.members.set(key, set);
  }

  async getTeamOwningPair(teamMachineName: string): Promise<TeamOwningPair | null> {
    this.assertAvailable();
    if (!this.groups.team.has(teamMachineName)) {
      throw GatewayError.notFound(`Team ${teamMachineName}`);
    }
    for (const franchise of this.groups.franchise.keys()) {
      for (const division of this.groups.division.keys()) {
        if (makeTeamMachineName(franchise, division) === teamMachineName) {
          return { franchise, division };
        }
      }
    }
    return null;
  }

  // ─── Inspection helpers (tests / diagnostics) ─────────────────────

  /** Simulate a transport outage (false) or recovery (true). */
  setAvailable(available: boolean): void {
    this.available = available;
  }

  isMember(uid: string, group: GroupRef): boolean {
    return this.members.get(memberKey(group))?.has(uid) ?? false;
  }

  /** Machine names of every team, in creation order. */
  teamNames(): string[] {
    return Array.from(this.groups.team.keys());
  }

  /** Drop all data and restore availability. */
  clear(): void {
    this.users.clear();
    for (const map of Object.values(this.groups)) {
      map.clear();
    }
    this.members.clear();
    this.available = true;
  }

  private async createGroup(kind: GroupKind, machineName: string, displayName: string): Promise<DirectoryEntry> {
    this.assertAvailable();
    const store = this.groups[kind];
    if (store.has(machineName)) {
      throw GatewayError.alreadyExists(`${capitalize(kind)} ${machineName}`);
    }
    store.set(machineName, displayName);
    return this.groupEntry(kind, machineName, displayName);
  }

  private async listGroups(kind: GroupKind): Promise<DirectoryEntry[]> {
    this.assertAvailable();
    return Array.from(this.groups[kind], ([name, display]) => this.groupEntry(kind, name, display));
  }

  private groupEntry(kind: GroupKind, machineName: string, displayName: string): DirectoryEntry {
    return {
      dn: `cn=${machineName},ou=${GROUP_OU[kind]},${BASE_DN}`,
      attributes: encodeAttributes({ cn: machineName, description: displayName }),
    };
  }

  private userEntry(user: UserCreateInput): DirectoryEntry {
    return {
      dn: `uid=${user.uid},ou=people,${BASE_DN}`,
      attributes: encodeAttributes({
        uid: user.uid,
        givenName: user.givenName,
        sn: user.surname,
        mail: user.mail,
      }),
    };
  }

  private assertAvailable(): void {
    if (!this.available) {
      throw GatewayError.unavailable('Directory');
    }
  }
}

function memberKey(group: GroupRef): string {
  return `${group.kind}:${group.machineName}`;
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

/** Franchises are labeled by the directory; here the label is the upper-cased code. */
function labelFranchise(machineName: string): string {
  return machineName.toUpperCase();
}
