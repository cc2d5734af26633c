/**
 * IFolderGateway: group-folder operations of the groupware system.
 *
 * Re-issuing a grant or permission call is harmless; createFolder on an
 * existing path throws GatewayError('AlreadyExists').
 */

/** Permission bit mask understood by the groupware folder service. */
export enum FolderPermission {
  READ = 1,
  UPDATE = 2,
  CREATE = 4,
  DELETE = 8,
  SHARE = 16,
  ALL = 31,
}

export interface IFolderGateway {
  /** Folder id for a path, or null when no such folder exists. */
  findFolder(path: string): Promise<string | null>;

  /** Create a folder and return its id. */
  createFolder(path: string): Promise<string>;

  /** Give a group access to a folder (full permissions until narrowed). */
  grantAccess(folderId: string, groupId: string): Promise<void>;

  setPermission(folderId: string, groupId: string, permission: FolderPermission): Promise<void>;
}
