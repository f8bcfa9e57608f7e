import { ClassConstructor, plainToInstance } from 'class-transformer';
import { validateSync, ValidationError } from 'class-validator';

function flatten(errors: ValidationError[], parent = ''): string[] {
  return errors.flatMap((error) => {
    const path = parent ? `${parent}.${error.property}` : error.property;
    const own = Object.values(error.constraints ?? {}).map(
      (message) => `${path}: ${message}`,
    );
    return [...own, ...flatten(error.children ?? [], path)];
  });
}

/**
 * Turns a plain object (parsed JSON, `process.env`) into a validated class
 * instance. Returns the problems instead of throwing so callers pick their
 * own error type.
 */
export function validatePlain<T extends object>(
  cls: ClassConstructor<T>,
  plain: object,
  options: { implicitConversion?: boolean } = {},
): { value: T; problems: string[] } {
  const value = plainToInstance(cls, plain, {
    enableImplicitConversion: options.implicitConversion ?? false,
  });
  const problems = flatten(
    validateSync(value, { skipMissingProperties: false }),
  );
  return { value, problems };
}
