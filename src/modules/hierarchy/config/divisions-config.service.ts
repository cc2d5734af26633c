import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';

import { HierarchyLogger } from '../../logging/hierarchy-logger.service';
import { LogCategory } from '../../logging/log-levels';

export const DEFAULT_DIVISIONS_CONFIG_PATH = 'config/divisions.json';

/** division machine name → display name */
export type ConfigDivisions = Record<string, string>;

export class DivisionsConfigError extends Error {
  constructor(path: string, reason: string) {
    super(`Invalid divisions config at ${path}: ${reason}`);
    this.name = 'DivisionsConfigError';
  }
}

/**
 * Validate a parsed divisions document of the form
 * `{ "divisions": { "<machine name>": "<display name>" } }`.
 */
export function parseDivisionsConfig(raw: unknown, path: string): ConfigDivisions {
  if (typeof raw !== 'object' || raw === null || !('divisions' in raw)) {
    throw new DivisionsConfigError(path, 'missing "divisions" object');
  }
  const divisions: unknown = raw.divisions;
  if (typeof divisions !== 'object' || divisions === null || Array.isArray(divisions)) {
    throw new DivisionsConfigError(path, '"divisions" must be an object');
  }
  const result: ConfigDivisions = {};
  for (const [machineName, displayName] of Object.entries(divisions)) {
    if (typeof displayName !== 'string') {
      throw new DivisionsConfigError(path, `display name of "${machineName}" must be a string`);
    }
    result[machineName] = displayName;
  }
  return result;
}

/**
 * Canonical division list, read from DIVISIONS_CONFIG_PATH on every call.
 */
@Injectable()
export class DivisionsConfigService {
  constructor(
    private readonly config: ConfigService,
    private readonly logger: HierarchyLogger,
  ) {}

  get path(): string {
    return resolve(this.config.get<string>('DIVISIONS_CONFIG_PATH') ?? DEFAULT_DIVISIONS_CONFIG_PATH);
  }

  /**
   * A missing file yields an empty mapping. Any other read error, unparsable
   * JSON or a wrong shape throws DivisionsConfigError.
   */
  async loadDivisions(): Promise<ConfigDivisions> {
    const path = this.path;
    let text: string;
    try {
      text = await readFile(path, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        this.logger.warn(LogCategory.CONFIG, 'Divisions config file not found; treating as empty', { path });
        return {};
      }
      throw new DivisionsConfigError(path, error instanceof Error ? error.message : String(error));
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      throw new DivisionsConfigError(path, error instanceof Error ? error.message : String(error));
    }

    const divisions = parseDivisionsConfig(parsed, path);
    this.logger.debug(LogCategory.CONFIG, 'Loaded divisions config', { path, count: Object.keys(divisions).length });
    return divisions;
  }
}
