import { Inject, Injectable } from '@nestjs/common';

import type { IDirectoryGateway } from '../../../domain/gateways/directory.gateway.interface';
import { DIRECTORY_GATEWAY } from '../../../domain/gateways/gateway.tokens';
import {
  decodeDivision,
  decodeFranchise,
  invalidMachineNameMessage,
  isValidMachineName,
  type Division,
  type Franchise,
} from '../../../domain/models/hierarchy.model';
import { failed, failedFrom, succeeded, type Outcome } from '../../../domain/models/outcome.model';
import { HierarchyLogger } from '../../logging/hierarchy-logger.service';
import { LogCategory } from '../../logging/log-levels';
import { FolderProvisionerService, type FolderProvisionReport } from './folder-provisioner.service';
import { TeamDerivationService, type DerivationReport } from './team-derivation.service';

export interface DivisionCreation {
  division: Division;
  teams: DerivationReport | null;
}

export interface FranchiseCreation {
  franchise: Franchise;
  teams: DerivationReport | null;
  folder: FolderProvisionReport | null;
}

/**
 * Creates franchises and divisions and brings the derived teams (and, for
 * franchises, the group folder) along before returning.
 */
@Injectable()
export class HierarchyService {
  constructor(
    @Inject(DIRECTORY_GATEWAY) private readonly directory: IDirectoryGateway,
    private readonly teamDerivation: TeamDerivationService,
    private readonly folderProvisioner: FolderProvisionerService,
    private readonly logger: HierarchyLogger,
  ) {}

  /** An existing division is a conflict, not a no-op. */
  async createDivision(machineName: string, displayName: string): Promise<Outcome<DivisionCreation>> {
    if (!isValidMachineName(machineName)) {
      this.logger.warn(LogCategory.DIRECTORY, 'Division name rejected', { machineName });
      return failed('InvalidName', invalidMachineNameMessage('Division', machineName));
    }

    let division: Division;
    try {
      division = decodeDivision(await this.directory.createDivision(machineName, displayName));
    } catch (error) {
      this.logger.warn(LogCategory.DIRECTORY, 'Division creation failed', { machineName });
      return failedFrom(error);
    }
    this.logger.info(LogCategory.DIRECTORY, 'Division created', { machineName, displayName });

    const teams = await this.teamDerivation.ensureTeamsForNewDivision(division);
    const result: DivisionCreation = { division, teams: teams.value ?? null };
    if (teams.status === 'failed') {
      return failed(teams.error.kind, `Division ${machineName} created but ${teams.error.message}`, result);
    }
    return succeeded(result, teams.skipped);
  }

  /** An existing franchise is a conflict, not a no-op. */
  async createFranchise(machineName: string): Promise<Outcome<FranchiseCreation>> {
    if (!isValidMachineName(machineName)) {
      this.logger.warn(LogCategory.DIRECTORY, 'Franchise name rejected', { machineName });
      return failed('InvalidName', invalidMachineNameMessage('Franchise', machineName));
    }

    let franchise: Franchise;
    try {
      franchise = decodeFranchise(await this.directory.createFranchise(machineName));
    } catch (error) {
      this.logger.warn(LogCategory.DIRECTORY, 'Franchise creation failed', { machineName });
      return failedFrom(error);
    }
    this.logger.info(LogCategory.DIRECTORY, 'Franchise created', { machineName, displayName: franchise.displayName });

    const teams = await this.teamDerivation.ensureTeamsForNewFranchise(franchise);
    const folder = await this.folderProvisioner.createFranchiseFolder(franchise.machineName);
    const result: FranchiseCreation = {
      franchise,
      teams: teams.value ?? null,
      folder: folder.value ?? null,
    };

    if (teams.status === 'failed') {
      return failed(teams.error.kind, `Franchise ${machineName} created but ${teams.error.message}`, result);
    }
    if (folder.status === 'failed') {
      return failed(folder.error.kind, `Franchise ${machineName} created but ${folder.error.message}`, result);
    }
    return succeeded(result, teams.skipped);
  }
}
