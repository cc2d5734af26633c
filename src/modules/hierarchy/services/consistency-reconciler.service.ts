import { Inject, Injectable, OnModuleInit } from '@nestjs/common';

import type { IDirectoryGateway } from '../../../domain/gateways/directory.gateway.interface';
import { DIRECTORY_GATEWAY } from '../../../domain/gateways/gateway.tokens';
import { classifyError, isGatewayError } from '../../../domain/errors/gateway-error';
import { firstValue, type DirectoryEntry } from '../../../domain/models/directory-entry.model';
import { REQUIRED_SINGLETONS } from '../../../domain/models/hierarchy.model';
import { failedFrom, succeeded, type Outcome } from '../../../domain/models/outcome.model';
import { HierarchyLogger } from '../../logging/hierarchy-logger.service';
import { LogCategory } from '../../logging/log-levels';
import { DivisionsConfigService, type ConfigDivisions } from '../config/divisions-config.service';

export interface DivisionConsistency {
  existsInConfig: boolean;
  existsInDirectory: boolean;
  /** Present only when the division is configured. */
  configDisplayName?: string;
  /** Present only when the division is in the directory; null when it carries no description. */
  directoryDisplayName?: string | null;
}

/** Keyed by division machine name. */
export type DivisionConsistencyReport = Record<string, DivisionConsistency>;

export interface SingletonCheck {
  present: string[];
  missing: string[];
}

export interface ConsistencyCheckResult {
  divisions: DivisionConsistencyReport;
  drift: string[];
  singletons: SingletonCheck;
}

/**
 * Merge the configured divisions with the directory's division entries.
 * Directory entries without a `cn` are not divisions and are left out.
 */
export function reconcileDivisions(
  configDivisions: ConfigDivisions,
  directoryDivisions: DirectoryEntry[],
): DivisionConsistencyReport {
  const merged = new Map<string, DivisionConsistency>();

  for (const [machineName, displayName] of Object.entries(configDivisions)) {
    merged.set(machineName, {
      existsInConfig: true,
      existsInDirectory: false,
      configDisplayName: displayName,
    });
  }

  for (const entry of directoryDivisions) {
    const machineName = firstValue(entry, 'cn');
    if (machineName === null) continue;
    const directoryDisplayName = firstValue(entry, 'description');

    const existing = merged.get(machineName);
    if (existing) {
      existing.existsInDirectory = true;
      existing.directoryDisplayName = directoryDisplayName;
    } else {
      merged.set(machineName, {
        existsInConfig: false,
        existsInDirectory: true,
        directoryDisplayName,
      });
    }
  }

  return Object.fromEntries(merged);
}

/** Machine names that are missing on one side or labeled differently on each. */
export function findDrift(report: DivisionConsistencyReport): string[] {
  return Object.entries(report)
    .filter(([, d]) =>
      d.existsInConfig !== d.existsInDirectory ||
      (typeof d.configDisplayName === 'string' && typeof d.directoryDisplayName === 'string' && d.configDisplayName !== d.directoryDisplayName))
    .map(([machineName]) => machineName);
}

/**
 * Surfaces drift between the canonical division list and the directory.
 * Never writes to the directory.
 */
@Injectable()
export class ConsistencyReconcilerService implements OnModuleInit {
  constructor(
    @Inject(DIRECTORY_GATEWAY) private readonly directory: IDirectoryGateway,
    private readonly divisionsConfig: DivisionsConfigService,
    private readonly logger: HierarchyLogger,
  ) {}

  /** Check once at startup; problems are logged and the service keeps running. */
  async onModuleInit(): Promise<void> {
    try {
      const outcome = await this.runConsistencyCheck();
      if (outcome.status === 'failed') {
        this.logger.warn(LogCategory.RECONCILE, 'Startup consistency check failed', { ...outcome.error });
      }
    } catch (error) {
      this.logger.error(LogCategory.RECONCILE, 'Startup consistency check failed', error);
    }
  }

  reconcile(configDivisions: ConfigDivisions, directoryDivisions: DirectoryEntry[]): DivisionConsistencyReport {
    return reconcileDivisions(configDivisions, directoryDivisions);
  }

  /** Degraded, not fatal: each missing singleton is a warning. */
  async checkRequiredSingletons(): Promise<SingletonCheck> {
    const result: SingletonCheck = { present: [], missing: [] };

    for (const singleton of REQUIRED_SINGLETONS) {
      try {
        await this.directory.getTeam(singleton.machineName);
        result.present.push(singleton.machineName);
      } catch (error) {
        result.missing.push(singleton.machineName);
        if (isGatewayError(error, 'NotFound')) {
          this.logger.warn(LogCategory.RECONCILE, `${singleton.displayName} team is missing`, { team: singleton.machineName });
        } else {
          this.logger.warn(LogCategory.RECONCILE, `${singleton.displayName} team could not be checked`, {
            team: singleton.machineName,
            ...classifyError(error),
          });
        }
      }
    }

    return result;
  }

  /**
   * Load the configured divisions, compare them with the directory, and
   * check the singletons. Drifted divisions are logged, not repaired.
   *
   * @throws DivisionsConfigError when the divisions config is malformed.
   */
  async runConsistencyCheck(): Promise<Outcome<ConsistencyCheckResult>> {
    const configDivisions = await this.divisionsConfig.loadDivisions();

    let directoryDivisions: DirectoryEntry[];
    try {
      directoryDivisions = await this.directory.getDivisions();
    } catch (error) {
      this.logger.error(LogCategory.RECONCILE, 'Could not list directory divisions', error);
      return failedFrom(error);
    }

    const divisions = this.reconcile(configDivisions, directoryDivisions);
    const drift = findDrift(divisions);
    for (const machineName of drift) {
      this.logger.warn(LogCategory.RECONCILE, 'Division drift', { machineName, ...divisions[machineName] });
    }

    const singletons = await this.checkRequiredSingletons();
    this.logger.info(LogCategory.RECONCILE, 'Consistency check finished', {
      divisions: Object.keys(divisions).length,
      drift: drift.length,
      missingSingletons: singletons.missing,
    });
    return succeeded({ divisions, drift, singletons });
  }
}
