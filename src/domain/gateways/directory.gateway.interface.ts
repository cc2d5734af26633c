/**
 * IDirectoryGateway: capability port onto the directory service.
 *
 * Implementations throw GatewayError:
 *   - NotFound           when a referenced entry is absent
 *   - AlreadyExists      when creating an entry or membership that exists
 *   - GatewayUnavailable on transport failures
 *
 * Implementations:
 *   - InMemoryDirectoryGateway (testing / lightweight deployments)
 */
import type { DirectoryEntry } from '../models/directory-entry.model';
import type { GroupRef, TeamOwningPair } from '../models/hierarchy.model';
import type { UserCreateInput } from '../models/user.model';

export interface IDirectoryGateway {
  /** Create a user record. The password never leaves the gateway. */
  createUser(input: UserCreateInput, password: string): Promise<DirectoryEntry>;

  getUser(uid: string): Promise<DirectoryEntry>;

  deleteUser(uid: string): Promise<void>;

  /** Team entries the user is a member of. */
  getUserTeams(uid: string): Promise<DirectoryEntry[]>;

  createDivision(machineName: string, displayName: string): Promise<DirectoryEntry>;

  /** Create a franchise; the directory assigns its display label. */
  createFranchise(machineName: string): Promise<DirectoryEntry>;

  getDivisions(): Promise<DirectoryEntry[]>;

  getFranchises(): Promise<DirectoryEntry[]>;

  getTeam(machineName: string): Promise<DirectoryEntry>;

  createTeam(machineName: string, displayName: string): Promise<DirectoryEntry>;

  /** Add a user to a team, franchise or division group. */
  addMembership(uid: string, group: GroupRef): Promise<void>;

  /**
   * The (franchise, division) pair a team was derived from,
   * or null for singleton and unpaired teams.
   */
  getTeamOwningPair(teamMachineName: string): Promise<TeamOwningPair | null>;
}
