import {
  BadRequestException,
  HttpStatus,
  ValidationError,
} from '@nestjs/common';

export type ValidationErrorTree = {
  [property: string]: string | ValidationErrorTree;
};

export function generateErrors(errors: ValidationError[]): ValidationErrorTree {
  return errors.reduce<ValidationErrorTree>(
    (accumulator, currentValue) => ({
      ...accumulator,
      [currentValue.property]:
        (currentValue.children?.length ?? 0) > 0
          ? generateErrors(currentValue.children ?? [])
          : Object.values(currentValue.constraints ?? {}).join(', '),
    }),
    {},
  );
}

export function validationExceptionFactory(
  errors: ValidationError[],
): BadRequestException {
  return new BadRequestException({
    status: HttpStatus.BAD_REQUEST,
    errors: generateErrors(errors),
  });
}
