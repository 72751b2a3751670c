import { BadRequestException } from '@nestjs/common';
import { validateInput } from './validate-input';
import { RevokeAccessDto } from '../access-control/dto/revoke-access.dto';
import { GrantAccessDto } from '../access-control/dto/grant-access.dto';

function responseOf(run: () => unknown): unknown {
  try {
    run();
  } catch (error) {
    if (error instanceof BadRequestException) {
      return error.getResponse();
    }
    throw error;
  }
  throw new Error('Expected validation to fail');
}

describe('validateInput', () => {
  it('should return a DTO instance for valid input', () => {
    const dto = validateInput(RevokeAccessDto, {
      resourceKey: 'leads.view',
      scope: 'role',
    });

    expect(dto).toBeInstanceOf(RevokeAccessDto);
    expect(dto).toEqual({ resourceKey: 'leads.view', scope: 'role' });
  });

  it('should strip properties the DTO does not declare', () => {
    const dto = validateInput(RevokeAccessDto, {
      resourceKey: 'leads.view',
      scope: 'user',
      userId: 42,
    });

    expect(dto).toEqual({ resourceKey: 'leads.view', scope: 'user' });
  });

  it('should report an unknown scope', () => {
    expect(
      responseOf(() =>
        validateInput(RevokeAccessDto, {
          resourceKey: 'leads.view',
          scope: 'system',
        }),
      ),
    ).toEqual({
      status: 400,
      errors: {
        scope: 'scope must be one of the following values: tenant, role, user',
      },
    });
  });

  it('should report a config payload that is not an object', () => {
    expect(
      responseOf(() =>
        validateInput(GrantAccessDto, {
          resourceKey: 'leads.view',
          accessType: 'permission',
          scope: 'user',
          configData: 'pageSize=10',
        }),
      ),
    ).toEqual({
      status: 400,
      errors: { configData: 'configData must be an object' },
    });
  });
});
