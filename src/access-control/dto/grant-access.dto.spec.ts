import { BadRequestException } from '@nestjs/common';
import { getMetadataArgsStorage } from 'typeorm';
import { GrantAccessDto } from './grant-access.dto';
import { AccessType } from '../domain/enums/access-type.enum';
import { GrantScope } from '../domain/enums/grant-scope.enum';
import { AccessDefinitionEntity } from '../infrastructure/persistence/relational/entities/access-definition.entity';
import { validateInput } from '../../utils/validate-input';

function columnLength(propertyName: string): string | number | undefined {
  return getMetadataArgsStorage().columns.find(
    (column) =>
      column.target === AccessDefinitionEntity &&
      column.propertyName === propertyName,
  )?.options.length;
}

function errorsOf(input: object): unknown {
  try {
    validateInput(GrantAccessDto, input);
  } catch (error) {
    if (error instanceof BadRequestException) {
      return error.getResponse();
    }
    throw error;
  }
  return null;
}

describe('GrantAccessDto', () => {
  const base = {
    accessType: AccessType.PERMISSION,
    scope: GrantScope.USER,
  };

  it('should accept a 255 character key and name', () => {
    const dto = validateInput(GrantAccessDto, {
      ...base,
      resourceKey: 'leads.' + 'x'.repeat(249),
      name: 'n'.repeat(255),
    });

    expect(dto.resourceKey).toHaveLength(255);
    expect(dto.name).toHaveLength(255);
  });

  it('should reject a 256 character key and name', () => {
    expect(
      errorsOf({
        ...base,
        resourceKey: 'leads.' + 'x'.repeat(250),
        name: 'n'.repeat(256),
      }),
    ).toEqual({
      status: 400,
      errors: {
        resourceKey:
          'resourceKey must be shorter than or equal to 255 characters',
        name: 'name must be shorter than or equal to 255 characters',
      },
    });
  });

  it('should fit the definition key and name columns', () => {
    expect(columnLength('key')).toBe(255);
    expect(columnLength('name')).toBe(255);
  });
});
