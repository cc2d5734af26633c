import { Module } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';

import { HierarchyExceptionFilter } from './common/hierarchy-exception.filter';
import { DivisionsConfigService } from './config/divisions-config.service';
import { HierarchyController } from './controllers/hierarchy.controller';
import { ConsistencyReconcilerService } from './services/consistency-reconciler.service';
import { FolderProvisionerService } from './services/folder-provisioner.service';
import { HierarchyService } from './services/hierarchy.service';
import { MembershipCascadeService } from './services/membership-cascade.service';
import { TeamDerivationService } from './services/team-derivation.service';

@Module({
  controllers: [HierarchyController],
  providers: [
    DivisionsConfigService,
    TeamDerivationService,
    MembershipCascadeService,
    ConsistencyReconcilerService,
    FolderProvisionerService,
    HierarchyService,
    { provide: APP_FILTER, useClass: HierarchyExceptionFilter },
  ],
  exports: [TeamDerivationService, MembershipCascadeService, ConsistencyReconcilerService, FolderProvisionerService, HierarchyService],
})
export class HierarchyModule {}
