import { formatHour, recommendHours } from './hoursAdvisor';

describe('hoursAdvisor', () => {
  describe('formatHour', () => {
    it.each([
      [0, '12:00 AM'],
      [7, '7:00 AM'],
      [12, '12:00 PM'],
      [13, '1:00 PM'],
      [23, '11:00 PM'],
      [24, '12:00 AM'],
    ])('formats %i as %s', (hour, expected) => {
      expect(formatHour(hour)).toBe(expected);
    });
  });

  describe('recommendHours', () => {
    it('extends restaurant evenings and applies the weekly layout', () => {
      const recommendation = recommendHours('restaurant');

      expect(recommendation.weeklySchedule).toEqual({
        Monday: '8:00 AM - 11:00 PM',
        Tuesday: '8:00 AM - 11:00 PM',
        Wednesday: '8:00 AM - 11:00 PM',
        Thursday: '8:00 AM - 12:00 AM',
        Friday: '8:00 AM - 12:00 AM',
        Saturday: '9:00 AM - 12:00 AM',
        Sunday: '10:00 AM - 10:00 PM',
      });
      expect(recommendation.insights).toHaveLength(3);
      expect(recommendation.peakHours).toEqual({ morning: '8:00-10:00', lunch: '12:00-14:00', evening: '18:00-20:00' });
      expect(recommendation.revenueImpact).toEqual({
        estimatedIncrease: '15-25%',
        peakHourCapture: '85%',
        efficiencyGain: '30%',
      });
    });

    it('uses the retail pattern unchanged', () => {
      expect(recommendHours('retail').weeklySchedule).toEqual({
        Monday: '9:00 AM - 7:00 PM',
        Tuesday: '9:00 AM - 7:00 PM',
        Wednesday: '9:00 AM - 7:00 PM',
        Thursday: '9:00 AM - 8:00 PM',
        Friday: '9:00 AM - 8:00 PM',
        Saturday: '10:00 AM - 8:00 PM',
        Sunday: '11:00 AM - 6:00 PM',
      });
    });

    it('opens fitness centres early without going below the floor', () => {
      expect(recommendHours('fitness').weeklySchedule).toEqual({
        Monday: '5:00 AM - 11:00 PM',
        Tuesday: '5:00 AM - 11:00 PM',
        Wednesday: '5:00 AM - 11:00 PM',
        Thursday: '5:00 AM - 12:00 AM',
        Friday: '5:00 AM - 10:00 PM',
        Saturday: '6:00 AM - 10:00 PM',
        Sunday: '7:00 AM - 8:00 PM',
      });
    });

    it('falls back to the retail pattern and default tables for unknown types', () => {
      const recommendation = recommendHours('bakery');
      expect(recommendation.weeklySchedule).toEqual(recommendHours('retail').weeklySchedule);
      expect(recommendation.insights[0]).toBe('⏰ Hours optimized based on local business patterns');
      expect(recommendation.peakHours).toEqual({ morning: '9:00-11:00', afternoon: '13:00-15:00', evening: '17:00-19:00' });
    });

    it('returns fresh copies of the static tables', () => {
      const first = recommendHours('retail');
      first.insights.push('mutated');
      expect(recommendHours('retail').insights).toHaveLength(3);
    });
  });
});
