import { IsNotEmpty, IsString, Matches } from 'class-validator';

import { MACHINE_NAME_PATTERN } from '../../../domain/models/hierarchy.model';

export class CreateDivisionDto {
  @IsString()
  @Matches(MACHINE_NAME_PATTERN, { message: 'machineName must be lowercase letters, digits and underscores' })
  machineName!: string;

  @IsString()
  @IsNotEmpty()
  displayName!: string;
}
