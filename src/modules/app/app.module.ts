import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';

import { GatewayModule } from '../../infrastructure/gateways/gateway.module';
import { HierarchyModule } from '../hierarchy/hierarchy.module';
import { LoggingModule } from '../logging/logging.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true }),
    LoggingModule,
    GatewayModule,
    HierarchyModule
  ]
})
export class AppModule {}
