import { ClassConstructor, plainToInstance } from 'class-transformer';
import { ValidationError, validateSync } from 'class-validator';
import { InvalidParamsError } from '@/shared/common/errors/scrape.errors';
import { TaskParams } from '../interfaces/task.interface';

export function flattenValidationErrors(
  errors: ValidationError[],
  parentPath = '',
): string[] {
  return errors.flatMap((error) => {
    const path = parentPath ? `${parentPath}.${error.property}` : error.property;
    const own = Object.values(error.constraints ?? {});
    const nested = flattenValidationErrors(error.children ?? [], path);
    return [...own, ...nested];
  });
}

/** Builds a validated DTO instance or throws InvalidParamsError. */
export function parseParams<T extends object>(
  dtoClass: ClassConstructor<T>,
  params: TaskParams,
): T {
  const dto = plainToInstance(dtoClass, params);
  const errors = validateSync(dto, { whitelist: true });
  if (errors.length > 0) {
    throw new InvalidParamsError(flattenValidationErrors(errors));
  }
  return dto;
}
