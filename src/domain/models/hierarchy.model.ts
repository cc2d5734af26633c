/**
 * HierarchyModel: franchises, divisions and the teams derived from them.
 *
 * One type per concept. `dn` records whether (and where) the entity is
 * materialized in the directory; it is null for values that only exist
 * locally (e.g. a division proposed by configuration).
 *
 * Identity is the machine name, compared case-sensitively. Display names
 * may be relabeled and never take part in equality.
 */
import { firstValue, type DirectoryEntry } from './directory-entry.model';

export interface HierarchyEntity {
  machineName: string;
  displayName: string;
  dn: string | null;
}

export type Division = HierarchyEntity;
export type Franchise = HierarchyEntity;
export type Team = HierarchyEntity;

export type GroupKind = 'team' | 'franchise' | 'division';

/** A membership target. Franchise and division groups live apart from teams. */
export interface GroupRef {
  kind: GroupKind;
  machineName: string;
}

/** The (franchise, division) pair a derived team was created from. */
export interface TeamOwningPair {
  franchise: string;
  division: string;
}

export interface SingletonTeam {
  readonly machineName: string;
  readonly displayName: string;
}

export const EVERYBODY_TEAM: SingletonTeam = { machineName: 'everybody', displayName: 'Everybody' };
export const INTERNATIONAL_TEAM: SingletonTeam = { machineName: 'international', displayName: 'International' };

/** Teams that must exist for the hierarchy to be fully operational. */
export const REQUIRED_SINGLETONS: readonly SingletonTeam[] = [EVERYBODY_TEAM, INTERNATIONAL_TEAM];

export function sameEntity(a: Pick<HierarchyEntity, 'machineName'>, b: Pick<HierarchyEntity, 'machineName'>): boolean {
  return a.machineName === b.machineName;
}

/**
 * Franchise and division names never contain '-', so a team name
 * `${franchise}-${division}` maps back to exactly one pair.
 */
export const MACHINE_NAME_PATTERN = /^[a-z0-9]+(?:_[a-z0-9]+)*$/;

/** A derived team name, or a singleton's. */
export const TEAM_NAME_PATTERN = /^[a-z0-9_]+(?:-[a-z0-9_]+)?$/;

export function isValidMachineName(machineName: string): boolean {
  return MACHINE_NAME_PATTERN.test(machineName);
}

export function invalidMachineNameMessage(what: string, machineName: string): string {
  return `${what} name '${machineName}' must be lowercase letters and digits separated by single underscores`;
}

/** Franchise first, then division. Only injective over valid machine names. */
export function makeTeamMachineName(franchiseMachineName: string, divisionMachineName: string): string {
  return `${franchiseMachineName}-${divisionMachineName}`;
}

export function makeTeamDisplayName(franchiseDisplayName: string, divisionDisplayName: string): string {
  return `${franchiseDisplayName} ${divisionDisplayName}`;
}

export function teamGroup(machineName: string): GroupRef {
  return { kind: 'team', machineName };
}

export function franchiseGroup(machineName: string): GroupRef {
  return { kind: 'franchise', machineName };
}

export function divisionGroup(machineName: string): GroupRef {
  return { kind: 'division', machineName };
}

function decodeEntity(entry: DirectoryEntry): HierarchyEntity {
  const machineName = firstValue(entry, 'cn');
  if (machineName === null) {
    throw new Error(`Directory entry ${entry.dn} has no cn attribute`);
  }
  return {
    machineName,
    displayName: firstValue(entry, 'description') ?? machineName,
    dn: entry.dn,
  };
}

export const decodeDivision: (entry: DirectoryEntry) => Division = decodeEntity;
export const decodeFranchise: (entry: DirectoryEntry) => Franchise = decodeEntity;
export const decodeTeam: (entry: DirectoryEntry) => Team = decodeEntity;
