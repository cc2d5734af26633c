import { Inject, Injectable } from '@nestjs/common';

import type { IDirectoryGateway } from '../../../domain/gateways/directory.gateway.interface';
import { DIRECTORY_GATEWAY } from '../../../domain/gateways/gateway.tokens';
import { isGatewayError } from '../../../domain/errors/gateway-error';
import {
  EVERYBODY_TEAM,
  decodeTeam,
  divisionGroup,
  franchiseGroup,
  teamGroup,
  type GroupRef,
  type Team,
} from '../../../domain/models/hierarchy.model';
import { decodeUser, type User, type UserCreateInput } from '../../../domain/models/user.model';
import { failed, failedFrom, succeeded, type Outcome } from '../../../domain/models/outcome.model';
import { HierarchyLogger } from '../../logging/hierarchy-logger.service';
import { LogCategory } from '../../logging/log-levels';
import { TeamDerivationService } from './team-derivation.service';

export interface MembershipReport {
  uid: string;
  team: string;
  /** Groups the user was added to by this call. */
  joined: GroupRef[];
  /** Groups the user already belonged to. */
  alreadyMember: GroupRef[];
}

/**
 * Team membership implies membership of the team's franchise and division
 * groups. Membership is only ever granted through a team join, plus the
 * everybody team at provisioning.
 */
@Injectable()
export class MembershipCascadeService {
  constructor(
    @Inject(DIRECTORY_GATEWAY) private readonly directory: IDirectoryGateway,
    private readonly teamDerivation: TeamDerivationService,
    private readonly logger: HierarchyLogger,
  ) {}

  /**
   * Create the user, join each initial team, then join everybody.
   *
   * The everybody team is ensured before the initial teams so it may be
   * listed among them. Its membership is still granted last: a user who
   * exists but is absent from it was only partially provisioned.
   */
  async provisionNewUser(input: UserCreateInput, password: string, initialTeams: string[]): Promise<Outcome<User>> {
    this.logger.info(LogCategory.MEMBERSHIP, 'Provisioning user', { uid: input.uid, teams: initialTeams });

    let user: User;
    try {
      user = decodeUser(await this.directory.createUser(input, password));
    } catch (error) {
      this.logger.error(LogCategory.MEMBERSHIP, 'User creation failed', error, { uid: input.uid });
      return failedFrom(error);
    }

    const everybody = await this.teamDerivation.ensureSingleton(EVERYBODY_TEAM);
    if (everybody.status === 'failed') {
      return failed(everybody.error.kind, `Everybody team unavailable: ${everybody.error.message}`, user);
    }

    for (const team of new Set(initialTeams)) {
      const joined = await this.addUserToTeam(user.uid, team);
      if (joined.status === 'failed') {
        this.logger.warn(LogCategory.MEMBERSHIP, 'Provisioning stopped before everybody membership', {
          uid: user.uid,
          team,
          kind: joined.error.kind,
        });
        return failed(joined.error.kind, `Provisioning ${user.uid} stopped at team ${team}: ${joined.error.message}`, user);
      }
      user.teams.push(team);
    }

    try {
      await this.join(user.uid, teamGroup(EVERYBODY_TEAM.machineName));
    } catch (error) {
      this.logger.error(LogCategory.MEMBERSHIP, 'Everybody membership failed', error, { uid: user.uid });
      return failedFrom(error, user);
    }
    if (!user.teams.includes(EVERYBODY_TEAM.machineName)) {
      user.teams.push(EVERYBODY_TEAM.machineName);
    }

    this.logger.info(LogCategory.MEMBERSHIP, 'User provisioned', { uid: user.uid, teams: user.teams });
    return succeeded(user);
  }

  /**
   * Join a team and, for derived teams, its franchise and division groups,
   * in that order. Memberships that already exist count as success.
   */
  async addUserToTeam(uid: string, teamMachineName: string): Promise<Outcome<MembershipReport>> {
    const report: MembershipReport = { uid, team: teamMachineName, joined: [], alreadyMember: [] };

    let groups: GroupRef[];
    try {
      await this.directory.getTeam(teamMachineName);
      const pair = await this.directory.getTeamOwningPair(teamMachineName);
      groups = [teamGroup(teamMachineName)];
      if (pair) {
        groups.push(franchiseGroup(pair.franchise), divisionGroup(pair.division));
      }
    } catch (error) {
      this.logger.warn(LogCategory.MEMBERSHIP, 'Team lookup failed', { uid, team: teamMachineName });
      return failedFrom(error);
    }

    for (const group of groups) {
      try {
        const added = await this.join(uid, group);
        (added ? report.joined : report.alreadyMember).push(group);
      } catch (error) {
        this.logger.error(LogCategory.MEMBERSHIP, 'Membership call failed', error, { uid, group });
        return failedFrom(error, report);
      }
    }

    this.logger.info(LogCategory.MEMBERSHIP, 'User added to team', {
      uid,
      team: teamMachineName,
      joined: report.joined.length,
      alreadyMember: report.alreadyMember.length,
    });
    return succeeded(report, report.alreadyMember.length);
  }

  async getUserTeams(uid: string): Promise<Outcome<Team[]>> {
    try {
      return succeeded((await this.directory.getUserTeams(uid)).map(decodeTeam));
    } catch (error) {
      return failedFrom(error);
    }
  }

  async removeUser(uid: string): Promise<Outcome<{ uid: string }>> {
    try {
      await this.directory.deleteUser(uid);
    } catch (error) {
      this.logger.warn(LogCategory.MEMBERSHIP, 'User removal failed', { uid });
      return failedFrom(error);
    }
    this.logger.info(LogCategory.MEMBERSHIP, 'User removed', { uid });
    return succeeded({ uid });
  }

  /** Returns false when the user was already a member. */
  private async join(uid: string, group: GroupRef): Promise<boolean> {
    try {
      await this.directory.addMembership(uid, group);
      this.logger.debug(LogCategory.MEMBERSHIP, 'Membership added', { uid, group });
      return true;
    } catch (error) {
      if (isGatewayError(error, 'AlreadyExists')) {
        return false;
      }
      throw error;
    }
  }
}
