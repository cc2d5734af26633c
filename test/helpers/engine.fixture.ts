import { ConfigService } from '@nestjs/config';
import { Test, type TestingModule } from '@nestjs/testing';

import { DIRECTORY_GATEWAY, FOLDER_GATEWAY } from '@app/domain/gateways/gateway.tokens';
import { InMemoryDirectoryGateway } from '@app/infrastructure/gateways/inmemory/inmemory-directory.gateway';
import { InMemoryFolderGateway } from '@app/infrastructure/gateways/inmemory/inmemory-folder.gateway';
import { DivisionsConfigService } from '@app/modules/hierarchy/config/divisions-config.service';
import { ConsistencyReconcilerService } from '@app/modules/hierarchy/services/consistency-reconciler.service';
import { FolderProvisionerService } from '@app/modules/hierarchy/services/folder-provisioner.service';
import { HierarchyService } from '@app/modules/hierarchy/services/hierarchy.service';
import { MembershipCascadeService } from '@app/modules/hierarchy/services/membership-cascade.service';
import { TeamDerivationService } from '@app/modules/hierarchy/services/team-derivation.service';
import { HierarchyLogger } from '@app/modules/logging/hierarchy-logger.service';
import { LogLevel } from '@app/modules/logging/log-levels';

export interface EngineFixture {
  module: TestingModule;
  directory: InMemoryDirectoryGateway;
  folders: InMemoryFolderGateway;
  logger: HierarchyLogger;
}

/**
 * Wires the hierarchy services against fresh in-memory gateways.
 *
 * Log output is captured in the logger's ring buffer and kept off the
 * console; call `jest.restoreAllMocks()` in `afterEach`.
 */
export async function createEngineFixture(config: Record<string, string> = {}): Promise<EngineFixture> {
  const directory = new InMemoryDirectoryGateway();
  const folders = new InMemoryFolderGateway();
  const logger = new HierarchyLogger();
  logger.updateConfig({ globalLevel: LogLevel.DEBUG, categoryLevels: {}, format: 'json' });
  jest.spyOn(process.stdout, 'write').mockImplementation(() => true);
  jest.spyOn(process.stderr, 'write').mockImplementation(() => true);

  const module = await Test.createTestingModule({
    providers: [
      TeamDerivationService,
      MembershipCascadeService,
      ConsistencyReconcilerService,
      FolderProvisionerService,
      HierarchyService,
      DivisionsConfigService,
      { provide: DIRECTORY_GATEWAY, useValue: directory },
      { provide: FOLDER_GATEWAY, useValue: folders },
      { provide: HierarchyLogger, useValue: logger },
      { provide: ConfigService, useValue: new ConfigService(config) },
    ],
  }).compile();

  return { module, directory, folders, logger };
}

/** Messages logged at WARN or above, oldest first. */
export function warnings(logger: HierarchyLogger): string[] {
  return logger.getRecentLogs({ level: LogLevel.WARN }).map((e) => e.message);
}
