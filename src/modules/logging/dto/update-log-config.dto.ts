import { Transform } from 'class-transformer';
import { IsBoolean, IsIn, IsInt, IsObject, IsOptional, Min } from 'class-validator';

import { LOG_LEVEL_NAMES } from '../log-levels';

const upperCase = ({ value }: { value: unknown }): unknown => (typeof value === 'string' ? value.toUpperCase() : value);

/** Partial update; omitted fields keep their current value. */
export class UpdateLogConfigDto {
  @IsOptional()
  @Transform(upperCase)
  @IsIn(LOG_LEVEL_NAMES)
  globalLevel?: string;

  /**
   * Category name to level name. Merged into the current overrides; a null
   * level removes the override.
   */
  @IsOptional()
  @IsObject()
  categoryLevels?: Record<string, unknown>;

  @IsOptional()
  @IsBoolean()
  includeStackTraces?: boolean;

  @IsOptional()
  @IsInt()
  @Min(1)
  maxPayloadSizeBytes?: number;

  @IsOptional()
  @IsIn(['json', 'pretty'])
  format?: 'json' | 'pretty';
}
