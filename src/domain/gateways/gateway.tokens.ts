/**
 * NestJS injection tokens for the gateway ports.
 *
 * Usage:
 *   @Inject(DIRECTORY_GATEWAY) private readonly directory: IDirectoryGateway
 */
export const DIRECTORY_GATEWAY = 'DIRECTORY_GATEWAY';
export const FOLDER_GATEWAY = 'FOLDER_GATEWAY';
