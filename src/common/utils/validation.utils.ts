import { ClassConstructor, plainToInstance } from 'class-transformer';
import { ValidationError, validateSync } from 'class-validator';

export interface FormattedValidationError {
  field: string;
  message: string;
}

/**
 * Flattens nested class-validator errors into dotted field paths,
 * keeping the first message for each field.
 */
export function formatValidationErrors(
  errors: ValidationError[],
  parentPath = '',
): FormattedValidationError[] {
  return errors.flatMap((error) => {
    const field = parentPath ? `${parentPath}.${error.property}` : error.property;
    const messages = Object.values(error.constraints ?? {});
    const own: FormattedValidationError[] =
      messages.length > 0 ? [{ field, message: messages[0] }] : [];
    return [...own, ...formatValidationErrors(error.children ?? [], field)];
  });
}

export interface TransformResult<T> {
  value: T;
  errors: FormattedValidationError[];
}

export function transformAndValidate<T extends object>(
  metatype: ClassConstructor<T>,
  plain: Record<string, unknown>,
): TransformResult<T> {
  const value = plainToInstance(metatype, plain);
  // forbidUnknownValues would reject parameter classes that declare no decorators
  const errors = validateSync(value, { forbidUnknownValues: false });
  return { value, errors: formatValidationErrors(errors) };
}

export function describeValidationErrors(errors: FormattedValidationError[]): string {
  return errors.map((error) => `${error.field}: ${error.message}`).join('; ');
}
