import { fromDatedObservations } from '../../models/Forecast';
import { InvalidInputError } from '../../models/errors';

describe('fromDatedObservations', () => {
  it('should keep missing prices as null', () => {
    const points = fromDatedObservations([
      { date: '2024-01-01', price: 10 },
      { date: '2024-01-02', price: null },
      { date: '2024-01-03', price: 12 },
    ]);
    expect(points).toEqual([
      { timestamp: Date.UTC(2024, 0, 1), price: 10 },
      { timestamp: Date.UTC(2024, 0, 2), price: null },
      { timestamp: Date.UTC(2024, 0, 3), price: 12 },
    ]);
  });

  it('should require increasing dates across missing observations', () => {
    expect(() =>
      fromDatedObservations([
        { date: '2024-01-02', price: 10 },
        { date: '2024-01-02', price: null },
      ])
    ).toThrow('Invalid series[1].timestamp');
  });

  it('should reject non-positive prices', () => {
    expect(() =>
      fromDatedObservations([
        { date: '2024-01-01', price: 10 },
        { date: '2024-01-02', price: 0 },
      ])
    ).toThrow(InvalidInputError);
  });

  it('should reject impossible dates', () => {
    expect(() => fromDatedObservations([{ date: '2021-02-30', price: 1 }])).toThrow(
      'Invalid series[0].date: expected an ISO date, got 2021-02-30'
    );
  });
});
