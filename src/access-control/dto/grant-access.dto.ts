import {
  IsBoolean,
  IsEnum,
  IsNotEmpty,
  IsObject,
  IsOptional,
  IsString,
  MaxLength,
} from 'class-validator';
import { AccessType } from '../domain/enums/access-type.enum';
import { GrantScope } from '../domain/enums/grant-scope.enum';

export class GrantAccessDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  resourceKey!: string;

  // Only used when the definition does not exist yet
  @IsEnum(AccessType)
  @IsNotEmpty()
  accessType!: AccessType;

  @IsEnum(GrantScope)
  @IsNotEmpty()
  scope!: GrantScope;

  @IsString()
  @IsOptional()
  @MaxLength(255)
  name?: string;

  @IsString()
  @IsOptional()
  description?: string;

  @IsBoolean()
  @IsOptional()
  isEnabled?: boolean;

  @IsObject()
  @IsOptional()
  configData?: Record<string, unknown>;
}
