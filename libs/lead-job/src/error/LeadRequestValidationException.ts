import { HttpStatus } from '@nestjs/common';
import { ValidationError } from 'class-validator';
import { DomainException } from '@app/web-common/res/exception/DomainException';

export class LeadRequestValidationException extends DomainException {
  constructor(readonly violations: string[]) {
    super(HttpStatus.BAD_REQUEST, {
      message: `Invalid lead generation request: ${violations.join(', ')}`,
      parameter: { violations },
    });
  }

  static of(errors: ValidationError[]): LeadRequestValidationException {
    return new LeadRequestValidationException(
      errors.flatMap((error) => Object.values(error.constraints ?? {})),
    );
  }
}
