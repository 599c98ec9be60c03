import { describe, it, expect } from 'vitest';
import { HEALTH_TIPS, tipOfTheDay } from './content';

describe('tipOfTheDay', () => {
  it('picks a tip by day of the month', () => {
    expect(tipOfTheDay(new Date(2024, 0, 7))).toBe('Get 7-9 hours of sleep');
    expect(tipOfTheDay(new Date(2024, 0, 12))).toBe(HEALTH_TIPS[0]);
  });
});
