import { IsEnum, IsNotEmpty, IsString, MaxLength } from 'class-validator';
import { GrantScope } from '../domain/enums/grant-scope.enum';

export class RevokeAccessDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  resourceKey!: string;

  @IsEnum(GrantScope)
  @IsNotEmpty()
  scope!: GrantScope;
}
