import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { FolderPermission, type IFolderGateway } from '../../../domain/gateways/folder.gateway.interface';
import { FOLDER_GATEWAY } from '../../../domain/gateways/gateway.tokens';
import { classifyError, isGatewayError } from '../../../domain/errors/gateway-error';
import { EVERYBODY_TEAM } from '../../../domain/models/hierarchy.model';
import { failed, failedFrom, succeeded, type Outcome, type OutcomeError } from '../../../domain/models/outcome.model';
import { HierarchyLogger } from '../../logging/hierarchy-logger.service';
import { LogCategory } from '../../logging/log-levels';

export const DEFAULT_FRANCHISE_FOLDER_ROOT = 'Franchises';

export type FolderStepName =
  | 'createContainer'
  | 'grantContainerToEverybody'
  | 'createFolder'
  | 'grantToFranchise'
  | 'grantToEverybody';

export interface FolderStep {
  step: FolderStepName;
  ok: boolean;
  error?: OutcomeError;
}

export interface FolderProvisionReport {
  path: string;
  folderId: string | null;
  containerCreated: boolean;
  steps: FolderStep[];
}

/**
 * Group folders for franchises, under one shared container.
 *
 * Not atomic: grants already applied stay in place when a later call fails.
 * Every call is safe to re-issue, so a failed run is retried by running it again.
 */
@Injectable()
export class FolderProvisionerService {
  constructor(
    @Inject(FOLDER_GATEWAY) private readonly folders: IFolderGateway,
    private readonly config: ConfigService,
    private readonly logger: HierarchyLogger,
  ) {}

  get containerPath(): string {
    return this.config.get<string>('FRANCHISE_FOLDER_ROOT') ?? DEFAULT_FRANCHISE_FOLDER_ROOT;
  }

  /**
   * Create `<container>/<folderName>`: full access for the franchise group
   * named `folderName`, read access for everybody. The container is created
   * on first use with read access for everybody.
   */
  async createFranchiseFolder(folderName: string): Promise<Outcome<FolderProvisionReport>> {
    const path = `${this.containerPath}/${folderName}`;
    const report: FolderProvisionReport = { path, folderId: null, containerCreated: false, steps: [] };

    let containerId: string | null;
    try {
      containerId = await this.folders.findFolder(this.containerPath);
    } catch (error) {
      return failedFrom(error, report);
    }

    if (containerId === null) {
      containerId = await this.runStep(report, 'createContainer', () => this.createOrFind(this.containerPath));
      if (containerId === null) {
        return this.finish(report);
      }
      report.containerCreated = true;
      const id = containerId;
      await this.runStep(report, 'grantContainerToEverybody', () => this.grantRead(id, EVERYBODY_TEAM.machineName));
    }

    const folderId = await this.runStep(report, 'createFolder', () => this.createOrFind(path));
    if (folderId === null) {
      return this.finish(report);
    }
    report.folderId = folderId;

    await this.runStep(report, 'grantToFranchise', () => this.folders.grantAccess(folderId, folderName));
    await this.runStep(report, 'grantToEverybody', () => this.grantRead(folderId, EVERYBODY_TEAM.machineName));

    return this.finish(report);
  }

  private async createOrFind(path: string): Promise<string> {
    try {
      const id = await this.folders.createFolder(path);
      this.logger.info(LogCategory.FOLDER, 'Folder created', { path, folderId: id });
      return id;
    } catch (error) {
      if (!isGatewayError(error, 'AlreadyExists')) throw error;
    }
    const existing = await this.folders.findFolder(path);
    if (existing === null) {
      throw new Error(`Folder ${path} reported as existing but could not be found`);
    }
    this.logger.debug(LogCategory.FOLDER, 'Folder already exists', { path, folderId: existing });
    return existing;
  }

  private async grantRead(folderId: string, groupId: string): Promise<void> {
    await this.folders.grantAccess(folderId, groupId);
    await this.folders.setPermission(folderId, groupId, FolderPermission.READ);
  }

  /** Run one step, record it, and return its value or null on failure. */
  private async runStep<T>(report: FolderProvisionReport, step: FolderStepName, fn: () => Promise<T>): Promise<T | null> {
    try {
      const value = await fn();
      report.steps.push({ step, ok: true });
      return value;
    } catch (error) {
      const { kind, message } = classifyError(error);
      report.steps.push({ step, ok: false, error: { kind, message } });
      this.logger.warn(LogCategory.FOLDER, 'Folder step failed', { path: report.path, step, kind, message });
      return null;
    }
  }

  private finish(report: FolderProvisionReport): Outcome<FolderProvisionReport> {
    const failure = report.steps.find((s) => !s.ok);
    if (failure?.error) {
      return failed(failure.error.kind, `Folder ${report.path}: ${failure.step} failed: ${failure.error.message}`, report);
    }
    this.logger.info(LogCategory.FOLDER, 'Franchise folder provisioned', { path: report.path, folderId: report.folderId });
    return succeeded(report);
  }
}
