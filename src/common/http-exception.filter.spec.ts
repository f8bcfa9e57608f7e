import { BadRequestException, NotFoundException } from '@nestjs/common';
import {
  CollaboratorTimeoutError,
  DesktopActionFailedError,
  TurnCancelledError,
  UnresolvableIntentError,
} from './errors';
import { AllExceptionsFilter } from './http-exception.filter';

describe('AllExceptionsFilter', () => {
  const filter = new AllExceptionsFilter();

  it('keeps validation messages from HTTP exceptions', () => {
    expect(
      filter.toBody(
        new BadRequestException(['text must be shorter than or equal to 2000 characters']),
        '/agent/turn',
      ),
    ).toEqual({
      statusCode: 400,
      error: 'BadRequestException',
      message: ['text must be shorter than or equal to 2000 characters'],
      path: '/agent/turn',
      timestamp: expect.any(String),
    });
  });

  it('uses the exception message for plain HTTP exceptions', () => {
    expect(filter.toBody(new NotFoundException('No such route'), '/nope')).toEqual(
      expect.objectContaining({ statusCode: 404, message: 'No such route' }),
    );
  });

  it.each([
    [new UnresolvableIntentError('hmm'), 422, 'UNRESOLVABLE_INTENT'],
    [new CollaboratorTimeoutError('web-search', 100), 504, 'COLLABORATOR_TIMEOUT'],
    [new DesktopActionFailedError('firefox is not running'), 502, 'DESKTOP_ACTION_FAILED'],
    [new TurnCancelledError(), 409, 'TURN_CANCELLED'],
  ])('maps %p to %i', (error, statusCode, code) => {
    expect(filter.toBody(error, '/agent/turn')).toEqual(
      expect.objectContaining({ statusCode, error: code, message: error.message }),
    );
  });

  it('hides unexpected errors', () => {
    expect(filter.toBody(new Error('secret stack detail'), '/agent/turn')).toEqual(
      expect.objectContaining({
        statusCode: 500,
        error: 'INTERNAL_ERROR',
        message: 'Internal server error',
      }),
    );
  });
});
