import {
  registerDecorator,
  ValidationArguments,
  ValidationOptions,
  ValidatorConstraint,
  ValidatorConstraintInterface,
} from 'class-validator';
import { parseEpochDay } from '../utils/date.utils';

/**
 * Accepts exactly the dates parseEpochDay understands: YYYY-MM-DD naming a
 * real calendar day, with an optional time part.
 */
@ValidatorConstraint({ name: 'isCalendarDate', async: false })
export class IsCalendarDateConstraint implements ValidatorConstraintInterface {
  validate(value: unknown): boolean {
    return parseEpochDay(value) !== null;
  }

  defaultMessage(args: ValidationArguments): string {
    return `${args.property} must be an ISO date (YYYY-MM-DD)`;
  }
}

export function IsCalendarDate(validationOptions?: ValidationOptions) {
  return function (object: object, propertyName: string) {
    registerDecorator({
      target: object.constructor,
      propertyName: propertyName,
      options: validationOptions,
      constraints: [],
      validator: IsCalendarDateConstraint,
    });
  };
}
