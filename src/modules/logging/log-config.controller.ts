import {
  BadRequestException,
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Put,
  Query,
} from '@nestjs/common';

import { UpdateLogConfigDto } from './dto/update-log-config.dto';
import { HierarchyLogger, type StructuredLogEntry } from './hierarchy-logger.service';
import {
  LOG_LEVEL_NAMES,
  LogCategory,
  LogLevel,
  findLogLevel,
  isLogCategory,
  logLevelName,
} from './log-levels';

export interface LogConfigView {
  globalLevel: string;
  categoryLevels: Record<string, string>;
  includeStackTraces: boolean;
  maxPayloadSizeBytes: number;
  format: 'json' | 'pretty';
  availableLevels: string[];
  availableCategories: string[];
}

export interface RecentLogsView {
  count: number;
  entries: StructuredLogEntry[];
}

/**
 * Runtime log management
 *
 * Routes: /api/logs/config, /api/logs/recent
 */
@Controller('logs')
export class LogConfigController {
  constructor(private readonly logger: HierarchyLogger) {}

  @Get('config')
  getConfig(): LogConfigView {
    const config = this.logger.getConfig();
    const categoryLevels: Record<string, string> = {};
    for (const [category, level] of Object.entries(config.categoryLevels)) {
      if (level !== undefined) {
        categoryLevels[category] = logLevelName(level);
      }
    }
    return {
      globalLevel: logLevelName(config.globalLevel),
      categoryLevels,
      includeStackTraces: config.includeStackTraces,
      maxPayloadSizeBytes: config.maxPayloadSizeBytes,
      format: config.format,
      availableLevels: [...LOG_LEVEL_NAMES],
      availableCategories: Object.values(LogCategory),
    };
  }

  /**
   * Every field is checked before any is applied, so a rejected request
   * leaves the configuration untouched.
   */
  @Put('config')
  updateConfig(@Body() body: UpdateLogConfigDto): LogConfigView {
    const globalLevel = body.globalLevel === undefined ? undefined : requireLevel(body.globalLevel);
    const overrides = body.categoryLevels === undefined ? [] : parseOverrides(body.categoryLevels);

    if (globalLevel !== undefined) {
      this.logger.setGlobalLevel(globalLevel);
    }
    for (const [category, level] of overrides) {
      this.logger.setCategoryLevel(category, level);
    }
    if (body.includeStackTraces !== undefined) {
      this.logger.updateConfig({ includeStackTraces: body.includeStackTraces });
    }
    if (body.maxPayloadSizeBytes !== undefined) {
      this.logger.updateConfig({ maxPayloadSizeBytes: body.maxPayloadSizeBytes });
    }
    if (body.format !== undefined) {
      this.logger.updateConfig({ format: body.format });
    }

    const view = this.getConfig();
    this.logger.info(LogCategory.CONFIG, 'Log configuration updated', {
      globalLevel: view.globalLevel,
      categoryLevels: view.categoryLevels,
    });
    return view;
  }

  /** Newest last. `level` is a minimum. */
  @Get('recent')
  getRecent(
    @Query('limit') limit?: string,
    @Query('level') level?: string,
    @Query('category') category?: string,
    @Query('requestId') requestId?: string,
  ): RecentLogsView {
    const entries = this.logger.getRecentLogs({
      limit: limit === undefined ? undefined : requireLimit(limit),
      level: level === undefined ? undefined : requireLevel(level),
      category: category === undefined ? undefined : requireCategory(category),
      requestId,
    });
    return { count: entries.length, entries };
  }

  @Delete('recent')
  @HttpCode(HttpStatus.NO_CONTENT)
  clearRecent(): void {
    this.logger.clearRecentLogs();
  }
}

function requireLevel(value: string): LogLevel {
  const level = findLogLevel(value);
  if (level === undefined) {
    throw new BadRequestException(`Unknown log level '${value}'; expected one of ${LOG_LEVEL_NAMES.join(', ')}`);
  }
  return level;
}

function requireCategory(value: string): LogCategory {
  if (!isLogCategory(value)) {
    throw new BadRequestException(
      `Unknown log category '${value}'; expected one of ${Object.values(LogCategory).join(', ')}`,
    );
  }
  return value;
}

function requireLimit(value: string): number {
  const limit = Number(value);
  if (!Number.isInteger(limit) || limit < 1) {
    throw new BadRequestException(`limit must be a positive integer, got '${value}'`);
  }
  return limit;
}

/** A null level clears the category's override. */
function parseOverrides(raw: Record<string, unknown>): Array<[LogCategory, LogLevel | undefined]> {
  return Object.entries(raw).map(([category, level]): [LogCategory, LogLevel | undefined] => {
    if (level === null) {
      return [requireCategory(category), undefined];
    }
    if (typeof level !== 'string') {
      throw new BadRequestException(`Level of category '${category}' must be a level name or null`);
    }
    return [requireCategory(category), requireLevel(level)];
  });
}
