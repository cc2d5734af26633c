import { ArrayUnique, IsArray, IsEmail, IsNotEmpty, IsOptional, IsString, Matches, MinLength } from 'class-validator';

import { MACHINE_NAME_PATTERN, TEAM_NAME_PATTERN } from '../../../domain/models/hierarchy.model';

export class ProvisionUserDto {
  @IsString()
  @Matches(MACHINE_NAME_PATTERN, { message: 'uid must be a lowercase slug' })
  uid!: string;

  @IsString()
  @IsNotEmpty()
  givenName!: string;

  @IsString()
  @IsNotEmpty()
  surname!: string;

  @IsOptional()
  @IsEmail()
  mail?: string;

  @IsString()
  @MinLength(8)
  password!: string;

  /** Team machine names joined before everybody. */
  @IsOptional()
  @IsArray()
  @ArrayUnique()
  @Matches(TEAM_NAME_PATTERN, { each: true, message: 'each team must be a team machine name' })
  teams?: string[];
}
