import { describe, it, expect } from 'vitest';
import { findEffectiveMileageRate } from '@/utils/mileageRates';
import { createMileageRate } from '../helpers/fixtures';

describe('findEffectiveMileageRate', () => {
  const history = [
    createMileageRate({ id: 'rate-2024', rate_per_mile: 67, effective_date: '2024-01-01' }),
    createMileageRate({ id: 'rate-2023', rate_per_mile: 65.5, effective_date: '2023-01-01' }),
    createMileageRate({ id: 'rate-2025', rate_per_mile: 70, effective_date: '2025-01-01', end_date: '2025-06-30' }),
  ];

  it('should pick the latest rate effective on or before the date', () => {
    expect(findEffectiveMileageRate(history, '2023-12-31')?.id).toBe('rate-2023');
    expect(findEffectiveMileageRate(history, '2024-01-01')?.id).toBe('rate-2024');
    expect(findEffectiveMileageRate(history, '2025-03-15')?.id).toBe('rate-2025');
  });

  it('should return null before the first rate', () => {
    expect(findEffectiveMileageRate(history, '2022-12-31')).toBeNull();
  });

  it('should return null after an explicit end date', () => {
    expect(findEffectiveMileageRate(history, '2025-07-01')).toBeNull();
  });

  it('should return null for an empty table', () => {
    expect(findEffectiveMileageRate([], '2025-01-01')).toBeNull();
  });
});
