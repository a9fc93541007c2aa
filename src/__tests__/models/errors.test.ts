import {
  AnalyticsError,
  DivisionUndefinedError,
  EmptyCandidateSetError,
  InsufficientHistoryError,
  InvalidInputError,
  UndefinedExponentiationError,
  ZeroReturnUndefinedError,
  isAnalyticsError,
} from '../../models/errors';

describe('analytics errors', () => {
  it('should expose a kind per error class', () => {
    const errors: AnalyticsError[] = [
      new InsufficientHistoryError('series', 2, 1, 'distinct calendar years'),
      new EmptyCandidateSetError(),
      new DivisionUndefinedError('Cash', 'volatility'),
      new InvalidInputError('goalAmount', 'a finite number > 0', -5),
      new ZeroReturnUndefinedError(),
      new UndefinedExponentiationError(-0.1, 2.5),
    ];

    expect(errors.map((e) => e.kind)).toEqual([
      'InsufficientHistory',
      'EmptyCandidateSet',
      'DivisionUndefined',
      'InvalidInput',
      'ZeroReturnUndefined',
      'UndefinedExponentiation',
    ]);
    errors.forEach((e) => expect(e).toBeInstanceOf(Error));
  });

  it('should describe the violated precondition', () => {
    const error = new InvalidInputError('goalAmount', 'a finite number > 0', -5);
    expect(error.message).toBe('Invalid goalAmount: expected a finite number > 0, got -5');
    expect(error.name).toBe('InvalidInputError');
    expect(error.details).toEqual({ input: 'goalAmount', constraint: 'a finite number > 0', value: -5 });
  });

  it('should record both inputs of an undefined exponentiation', () => {
    const error = new UndefinedExponentiationError(-0.1, 2.5);
    expect(error.details).toEqual({ input: 'horizonYears', annualReturn: -0.1, horizonYears: 2.5 });
  });

  it('should narrow unknown values', () => {
    expect(isAnalyticsError(new EmptyCandidateSetError())).toBe(true);
    expect(isAnalyticsError(new Error('boom'))).toBe(false);
    expect(isAnalyticsError('InvalidInput')).toBe(false);
  });
});
