import { ArgumentsHost, Catch, ExceptionFilter, HttpStatus, Logger } from '@nestjs/common';
import { Response } from 'express';
import { InvariantViolationError } from './errors';

@Catch(InvariantViolationError)
export class InvariantViolationFilter implements ExceptionFilter {
  private readonly logger = new Logger('InvariantViolation');

  catch(exception: InvariantViolationError, host: ArgumentsHost): void {
    this.logger.error(`[ALERT] ${exception.message} ${JSON.stringify(exception.context)}`, exception.stack);

    if (host.getType() !== 'http') {
      return;
    }

    const response = host.switchToHttp().getResponse<Response>();
    response.status(HttpStatus.INTERNAL_SERVER_ERROR).json({
      statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
      message: 'Seat inventory invariant violated; the request was rolled back',
    });
  }
}
