/**
 * GatewayModule: global module providing IDirectoryGateway and IFolderGateway.
 *
 * Only the in-memory adapters ship with the service; protocol clients for a
 * real directory or groupware server bind to the same tokens.
 *
 * Usage:
 *   imports: [GatewayModule]
 */
import { Global, Module } from '@nestjs/common';
import { DIRECTORY_GATEWAY, FOLDER_GATEWAY } from '../../domain/gateways/gateway.tokens';
import { InMemoryDirectoryGateway } from './inmemory/inmemory-directory.gateway';
import { InMemoryFolderGateway } from './inmemory/inmemory-folder.gateway';

@Global()
@Module({
  providers: [
    { provide: DIRECTORY_GATEWAY, useClass: InMemoryDirectoryGateway },
    { provide: FOLDER_GATEWAY, useClass: InMemoryFolderGateway },
  ],
  exports: [DIRECTORY_GATEWAY, FOLDER_GATEWAY],
})
export class GatewayModule {}
