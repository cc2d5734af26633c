import { Inject, Injectable } from '@nestjs/common';

import type { IDirectoryGateway } from '../../../domain/gateways/directory.gateway.interface';
import { DIRECTORY_GATEWAY } from '../../../domain/gateways/gateway.tokens';
import { classifyError, isGatewayError, type ErrorKind } from '../../../domain/errors/gateway-error';
import {
  decodeDivision,
  decodeFranchise,
  decodeTeam,
  invalidMachineNameMessage,
  isValidMachineName,
  makeTeamDisplayName,
  makeTeamMachineName,
  type Division,
  type Franchise,
  type SingletonTeam,
  type Team,
} from '../../../domain/models/hierarchy.model';
import { failed, failedFrom, succeeded, type Outcome } from '../../../domain/models/outcome.model';
import { HierarchyLogger } from '../../logging/hierarchy-logger.service';
import { LogCategory } from '../../logging/log-levels';

export interface DerivationFailure {
  team: string;
  kind: ErrorKind;
  message: string;
}

export interface DerivationReport {
  created: string[];
  /** Teams that already existed. */
  skipped: string[];
  failed: DerivationFailure[];
}

interface TeamCandidate {
  machineName: string;
  displayName: string;
  /** Set when either side of the pair has a name that cannot form a team name. */
  rejection: string | null;
}

/**
 * Keeps the team set equal to franchises × divisions.
 *
 * Each creation is attempted independently: an existing team is skipped,
 * any other failure is recorded and the batch carries on. A pair whose
 * franchise or division name contains '-' is recorded as InvalidName and
 * never written, since its team name could collide with another pair's.
 */
@Injectable()
export class TeamDerivationService {
  constructor(
    @Inject(DIRECTORY_GATEWAY) private readonly directory: IDirectoryGateway,
    private readonly logger: HierarchyLogger,
  ) {}

  async ensureTeamsForNewFranchise(franchise: Franchise): Promise<Outcome<DerivationReport>> {
    if (!isValidMachineName(franchise.machineName)) {
      return failed('InvalidName', invalidMachineNameMessage('Franchise', franchise.machineName));
    }

    let divisions: Division[];
    try {
      divisions = (await this.directory.getDivisions()).map(decodeDivision);
    } catch (error) {
      this.logger.error(LogCategory.DERIVATION, 'Could not list divisions', error, { franchise: franchise.machineName });
      return failedFrom(error);
    }

    const candidates = divisions.map((division) => toCandidate(franchise, division));
    return this.createTeams(candidates, { franchise: franchise.machineName });
  }

  async ensureTeamsForNewDivision(division: Division): Promise<Outcome<DerivationReport>> {
    if (!isValidMachineName(division.machineName)) {
      return failed('InvalidName', invalidMachineNameMessage('Division', division.machineName));
    }

    let franchises: Franchise[];
    try {
      franchises = (await this.directory.getFranchises()).map(decodeFranchise);
    } catch (error) {
      this.logger.error(LogCategory.DERIVATION, 'Could not list franchises', error, { division: division.machineName });
      return failedFrom(error);
    }

    const candidates = franchises.map((franchise) => toCandidate(franchise, division));
    return this.createTeams(candidates, { division: division.machineName });
  }

  /**
   * Fetch a singleton team, creating it when absent.
   *
   * Concurrent initializers may race; the loser's AlreadyExists counts as
   * success and both converge on the re-fetch.
   */
  async ensureSingleton(singleton: SingletonTeam): Promise<Outcome<Team>> {
    try {
      return succeeded(decodeTeam(await this.directory.getTeam(singleton.machineName)));
    } catch (error) {
      if (!isGatewayError(error, 'NotFound')) {
        return failedFrom(error);
      }
    }

    try {
      await this.directory.createTeam(singleton.machineName, singleton.displayName);
      this.logger.info(LogCategory.DERIVATION, 'Singleton team created', { team: singleton.machineName });
    } catch (error) {
      if (!isGatewayError(error, 'AlreadyExists')) {
        this.logger.error(LogCategory.DERIVATION, 'Could not create singleton team', error, { team: singleton.machineName });
        return failedFrom(error);
      }
      this.logger.debug(LogCategory.DERIVATION, 'Singleton team created concurrently', { team: singleton.machineName });
    }

    try {
      return succeeded(decodeTeam(await this.directory.getTeam(singleton.machineName)));
    } catch (error) {
      return failedFrom(error);
    }
  }

  private async createTeams(
    candidates: TeamCandidate[],
    context: Record<string, string>,
  ): Promise<Outcome<DerivationReport>> {
    const report: DerivationReport = { created: [], skipped: [], failed: [] };

    for (const candidate of candidates) {
      if (candidate.rejection !== null) {
        report.failed.push({ team: candidate.machineName, kind: 'InvalidName', message: candidate.rejection });
        this.logger.warn(LogCategory.DERIVATION, 'Team name rejected', { team: candidate.machineName });
        continue;
      }
      try {
        await this.directory.createTeam(candidate.machineName, candidate.displayName);
        report.created.push(candidate.machineName);
        this.logger.debug(LogCategory.DERIVATION, 'Team created', { team: candidate.machineName });
      } catch (error) {
        if (isGatewayError(error, 'AlreadyExists')) {
          report.skipped.push(candidate.machineName);
          this.logger.debug(LogCategory.DERIVATION, 'Team already exists', { team: candidate.machineName });
          continue;
        }
        const { kind, message } = classifyError(error);
        report.failed.push({ team: candidate.machineName, kind, message });
        this.logger.warn(LogCategory.DERIVATION, 'Team creation failed', { team: candidate.machineName, kind, message });
      }
    }

    this.logger.info(LogCategory.DERIVATION, 'Team derivation finished', {
      ...context,
      created: report.created.length,
      skipped: report.skipped.length,
      failed: report.failed.length,
    });

    if (report.failed.length > 0) {
      return failed(
        'PartialFailure',
        `${report.failed.length} of ${candidates.length} teams could not be created`,
        report,
      );
    }
    return succeeded(report, report.skipped.length);
  }
}

function toCandidate(franchise: Franchise, division: Division): TeamCandidate {
  let rejection: string | null = null;
  if (!isValidMachineName(franchise.machineName)) {
    rejection = invalidMachineNameMessage('Franchise', franchise.machineName);
  } else if (!isValidMachineName(division.machineName)) {
    rejection = invalidMachineNameMessage('Division', division.machineName);
  }
  return {
    machineName: makeTeamMachineName(franchise.machineName, division.machineName),
    displayName: makeTeamDisplayName(franchise.displayName, division.displayName),
    rejection,
  };
}
