import { forecast } from '../../engine/forecaster';
import { InvalidInputError } from '../../models/errors';
import { dailySeries, seriesOf } from '../fixtures/priceSeries';

const day = (d: number) => Date.UTC(2024, 0, d);

describe('forecast', () => {
  it('should continue a perfectly linear series', () => {
    const points = forecast(dailySeries([10, 12, 14, 16, 18]), 2);

    expect(points).toHaveLength(2);
    expect(points[0].price).toBeCloseTo(20, 10);
    expect(points[1].price).toBeCloseTo(22, 10);
  });

  it('should date forecasts one day apart after the last observation', () => {
    const points = forecast(dailySeries([10, 12, 14, 16, 18]), 3);
    expect(points.map((p) => p.timestamp)).toEqual([day(6), day(7), day(8)]);
  });

  it('should fit on index position, not elapsed time', () => {
    // Yearly spacing: the fit sees positions 0, 1, 2 and steps one day forward
    const series = seriesOf([
      [2020, 12, 31, 100],
      [2021, 12, 31, 110],
      [2022, 12, 31, 120],
    ]);
    const [next] = forecast(series, 1);

    expect(next.price).toBeCloseTo(130, 10);
    expect(next.timestamp).toBe(Date.UTC(2023, 0, 1));
  });

  it('should use the least-squares line for noisy prices', () => {
    // x = 0..3, y = 1, 3, 2, 4 -> slope 0.8, intercept 1.3
    const [next] = forecast(dailySeries([1, 3, 2, 4]), 1);
    expect(next.price).toBeCloseTo(1.3 + 0.8 * 4, 10);
  });

  it('should drop missing prices before fitting', () => {
    const points = forecast(
      [
        { timestamp: day(1), price: 10 },
        { timestamp: day(2), price: null },
        { timestamp: day(3), price: 12 },
        { timestamp: day(4), price: 14 },
        { timestamp: day(5), price: null },
      ],
      1
    );

    expect(points).toHaveLength(1);
    expect(points[0].price).toBeCloseTo(16, 10);
    expect(points[0].timestamp).toBe(day(5));
  });

  it('should return an empty forecast for a single point', () => {
    expect(forecast(dailySeries([42]), 5)).toEqual([]);
  });

  it('should return an empty forecast when fewer than 2 prices remain', () => {
    expect(
      forecast(
        [
          { timestamp: day(1), price: null },
          { timestamp: day(2), price: 7 },
        ],
        3
      )
    ).toEqual([]);
    expect(forecast([], 3)).toEqual([]);
  });

  it('should reject non-positive or fractional periods', () => {
    const series = dailySeries([10, 12]);
    expect(() => forecast(series, 0)).toThrow(InvalidInputError);
    expect(() => forecast(series, -1)).toThrow(InvalidInputError);
    expect(() => forecast(series, 1.5)).toThrow(InvalidInputError);
  });
});
