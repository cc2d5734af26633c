import { IsString, Matches } from 'class-validator';

import { MACHINE_NAME_PATTERN } from '../../../domain/models/hierarchy.model';

export class CreateFranchiseDto {
  @IsString()
  @Matches(MACHINE_NAME_PATTERN, { message: 'machineName must be lowercase letters, digits and underscores' })
  machineName!: string;
}
