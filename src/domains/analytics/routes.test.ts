import { describe, it, expect } from 'vitest';
import { ValidationError } from '../../shared/errors';
import { parseGranularity, parseMetric } from './routes';

describe('parseGranularity', () => {
  it('defaults to weekly', () => {
    expect(parseGranularity({})).toBe('weekly');
  });

  it('accepts each granularity', () => {
    expect(parseGranularity({ granularity: 'daily' })).toBe('daily');
    expect(parseGranularity({ granularity: 'monthly' })).toBe('monthly');
  });

  it('rejects anything else', () => {
    expect(() => parseGranularity({ granularity: 'yearly' })).toThrow(ValidationError);
    expect(() => parseGranularity({ granularity: ['daily', 'weekly'] })).toThrow(
      'granularity must be one of daily, weekly, monthly'
    );
  });
});

describe('parseMetric', () => {
  it('accepts catalog metric names', () => {
    expect(parseMetric('churn_rate')).toBe('churn_rate');
  });

  it('rejects unknown names', () => {
    expect(() => parseMetric('revenue')).toThrow('Unknown metric: revenue');
  });
});
