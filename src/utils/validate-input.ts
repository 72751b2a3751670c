import { ClassConstructor, plainToClass } from 'class-transformer';
import { validateSync } from 'class-validator';
import { validationExceptionFactory } from './validation-options';

/**
 * Validate a service-level input object against its DTO class.
 *
 * Throws `BadRequestException` with `{ status: 400, errors }` where `errors`
 * maps each failing property to its joined constraint messages.
 */
export function validateInput<T extends object>(
  dtoClass: ClassConstructor<T>,
  input: object,
): T {
  const instance = plainToClass(dtoClass, input);
  const errors = validateSync(instance, {
    whitelist: true,
    forbidUnknownValues: true,
  });

  if (errors.length > 0) {
    throw validationExceptionFactory(errors);
  }

  return instance;
}
