import { IsString, Matches } from 'class-validator';

import { TEAM_NAME_PATTERN } from '../../../domain/models/hierarchy.model';

export class AddUserToTeamDto {
  @IsString()
  @Matches(TEAM_NAME_PATTERN, { message: 'team must be a team machine name' })
  team!: string;
}
