/**
 * InMemoryFolderGateway: IFolderGateway backed by in-memory Maps.
 *
 * Folder ids are sequential strings, the way the groupware service hands
 * out numeric ids.
 */
import { Injectable } from '@nestjs/common';
import type { IFolderGateway } from '../../../domain/gateways/folder.gateway.interface';
import { FolderPermission } from '../../../domain/gateways/folder.gateway.interface';
import { GatewayError } from '../../../domain/errors/gateway-error';

interface FolderRecord {
  id: string;
  path: string;
  /** groupId → permission mask */
  grants: Map<string, FolderPermission>;
}

@Injectable()
export class InMemoryFolderGateway implements IFolderGateway {
  private readonly folders: Map<string, FolderRecord> = new Map();
  private nextId = 1;
  private available = true;

  async findFolder(path: string): Promise<string | null> {
    this.assertAvailable();
    for (const folder of this.folders.values()) {
      if (folder.path === path) return folder.id;
    }
    return null;
  }

  async createFolder(path: string): Promise<string> {
    this.assertAvailable();
    if ((await this.findFolder(path)) !== null) {
      throw GatewayError.alreadyExists(`Folder ${path}`);
    }
    const id = String(this.nextId++);
    this.folders.set(id, { id, path, grants: new Map() });
    return id;
  }

  async grantAccess(folderId: string, groupId: string): Promise<void> {
    const folder = this.getFolder(folderId);
    if (!folder.grants.has(groupId)) {
      folder.grants.set(groupId, FolderPermission.ALL);
    }
  }

  async setPermission(folderId: string, groupId: string, permission: FolderPermission): Promise<void> {
    const folder = this.getFolder(folderId);
    if (!folder.grants.has(groupId)) {
      throw GatewayError.notFound(`Grant for ${groupId} on folder ${folderId}`);
    }
    folder.grants.set(groupId, permission);
  }

  // ─── Inspection helpers (tests / diagnostics) ─────────────────────

  setAvailable(available: boolean): void {
    this.available = available;
  }

  /** Permission mask a group holds on the folder at `path`, or undefined. */
  permissionOf(path: string, groupId: string): FolderPermission | undefined {
    for (const folder of this.folders.values()) {
      if (folder.path === path) return folder.grants.get(groupId);
    }
    return undefined;
  }

  paths(): string[] {
    return Array.from(this.folders.values(), (f) => f.path);
  }

  clear(): void {
    this.folders.clear();
    this.nextId = 1;
    this.available = true;
  }

  private getFolder(folderId: string): FolderRecord {
    this.assertAvailable();
    const folder = this.folders.get(folderId);
    if (!folder) throw GatewayError.notFound(`Folder ${folderId}`);
    return folder;
  }

  private assertAvailable(): void {
    if (!this.available) {
      throw GatewayError.unavailable('Folder service');
    }
  }
}
