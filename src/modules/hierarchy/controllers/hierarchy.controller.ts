import { Body, Controller, Delete, Get, HttpCode, InternalServerErrorException, Param, Post } from '@nestjs/common';

import type { Team } from '../../../domain/models/hierarchy.model';
import type { User } from '../../../domain/models/user.model';
import { unwrapOutcome, type OutcomeResponse } from '../common/outcome-http';
import { DivisionsConfigError } from '../config/divisions-config.service';
import { AddUserToTeamDto } from '../dto/add-user-to-team.dto';
import { CreateDivisionDto } from '../dto/create-division.dto';
import { CreateFranchiseDto } from '../dto/create-franchise.dto';
import { ProvisionUserDto } from '../dto/provision-user.dto';
import { ConsistencyReconcilerService, type ConsistencyCheckResult } from '../services/consistency-reconciler.service';
import { FolderProvisionerService, type FolderProvisionReport } from '../services/folder-provisioner.service';
import { HierarchyService, type DivisionCreation, type FranchiseCreation } from '../services/hierarchy.service';
import { MembershipCascadeService, type MembershipReport } from '../services/membership-cascade.service';

/**
 * Hierarchy API
 * Every route returns `{ status, skipped, result }`; failures are rendered
 * by HierarchyExceptionFilter.
 */
@Controller()
export class HierarchyController {
  constructor(
    private readonly membership: MembershipCascadeService,
    private readonly hierarchy: HierarchyService,
    private readonly folders: FolderProvisionerService,
    private readonly reconciler: ConsistencyReconcilerService,
  ) {}

  /**
   * Provision a user
   * POST /users
   * Body: { uid, givenName, surname, mail?, password, teams? }
   */
  @Post('users')
  async provisionUser(@Body() dto: ProvisionUserDto): Promise<OutcomeResponse<User>> {
    const { password, teams, ...input } = dto;
    return unwrapOutcome(await this.membership.provisionNewUser(input, password, teams ?? []));
  }

  @Delete('users/:uid')
  @HttpCode(204)
  async removeUser(@Param('uid') uid: string): Promise<void> {
    unwrapOutcome(await this.membership.removeUser(uid));
  }

  @Get('users/:uid/teams')
  async getUserTeams(@Param('uid') uid: string): Promise<OutcomeResponse<Team[]>> {
    return unwrapOutcome(await this.membership.getUserTeams(uid));
  }

  /**
   * Join a team and cascade into its franchise and division
   * POST /users/{uid}/teams
   * Body: { team }
   */
  @Post('users/:uid/teams')
  @HttpCode(200)
  async addUserToTeam(@Param('uid') uid: string, @Body() dto: AddUserToTeamDto): Promise<OutcomeResponse<MembershipReport>> {
    return unwrapOutcome(await this.membership.addUserToTeam(uid, dto.team));
  }

  @Post('divisions')
  async createDivision(@Body() dto: CreateDivisionDto): Promise<OutcomeResponse<DivisionCreation>> {
    return unwrapOutcome(await this.hierarchy.createDivision(dto.machineName, dto.displayName));
  }

  @Post('franchises')
  async createFranchise(@Body() dto: CreateFranchiseDto): Promise<OutcomeResponse<FranchiseCreation>> {
    return unwrapOutcome(await this.hierarchy.createFranchise(dto.machineName));
  }

  /**
   * Re-run folder provisioning for an existing franchise
   * POST /franchises/{machineName}/folder
   */
  @Post('franchises/:machineName/folder')
  @HttpCode(200)
  async createFranchiseFolder(@Param('machineName') machineName: string): Promise<OutcomeResponse<FolderProvisionReport>> {
    return unwrapOutcome(await this.folders.createFranchiseFolder(machineName));
  }

  @Get('consistency')
  async runConsistencyCheck(): Promise<OutcomeResponse<ConsistencyCheckResult>> {
    try {
      return unwrapOutcome(await this.reconciler.runConsistencyCheck());
    } catch (error) {
      if (error instanceof DivisionsConfigError) {
        throw new InternalServerErrorException({ kind: 'ConfigError', detail: error.message });
      }
      throw error;
    }
  }
}
