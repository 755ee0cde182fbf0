import {
  clampRadius,
  extractCoordinates,
  parseAddress,
  standardizeBusinessType,
  validateRequest,
} from './requestValidator';

const FROZEN = new Date('2024-05-01T12:00:00.000Z');

describe('requestValidator', () => {
  describe('clampRadius', () => {
    it('clamps to [100, 10000]', () => {
      expect(clampRadius(50_000)).toBe(10_000);
      expect(clampRadius(-5)).toBe(100);
      expect(clampRadius(2500)).toBe(2500);
    });
  });

  describe('parseAddress', () => {
    it('splits street, city and state', () => {
      expect(parseAddress('123 Main St, Boston, MA')).toEqual({ street: '123 Main St', city: 'Boston', state: 'MA' });
    });

    it('treats the second-to-last segment as the city', () => {
      expect(parseAddress('Suite 4, 9 Elm Rd, Portland, OR')).toEqual({ street: 'Suite 4', city: 'Portland', state: 'OR' });
    });

    it('handles one and two segments', () => {
      expect(parseAddress('Boston')).toEqual({ street: 'Boston' });
      expect(parseAddress('Main St, Boston')).toEqual({ street: 'Main St', city: 'Main St' });
      expect(parseAddress('')).toEqual({});
    });
  });

  describe('extractCoordinates', () => {
    it('accepts a pair inside the valid ranges', () => {
      expect(extractCoordinates([42.36, -71.06])).toEqual([42.36, -71.06]);
    });

    it.each([
      [[95, 10]],
      [[10, 190]],
      [[1, 2, 3]],
      [['42.3', -71]],
      ['42.3,-71'],
      [null],
    ])('rejects %p', (value) => {
      expect(extractCoordinates(value)).toBeNull();
    });
  });

  describe('standardizeBusinessType', () => {
    it('keeps vocabulary words no rule matches', () => {
      expect(standardizeBusinessType('retail')).toBe('retail');
      expect(standardizeBusinessType('Education')).toBe('education');
    });

    it('runs vocabulary words through the keyword rules too', () => {
      expect(standardizeBusinessType('Healthcare')).toBe('fitness');
    });

    it('maps free text by the first matching keyword', () => {
      expect(standardizeBusinessType('Coffee Shop')).toBe('restaurant');
      expect(standardizeBusinessType('health spa')).toBe('fitness');
      expect(standardizeBusinessType('Medical Clinic')).toBe('healthcare');
    });

    it('returns general for empty input and the lower-cased text when nothing matches', () => {
      expect(standardizeBusinessType('   ')).toBe('general');
      expect(standardizeBusinessType('Bakery')).toBe('bakery');
    });
  });

  describe('validateRequest', () => {
    it('builds the full validated request', () => {
      expect(
        validateRequest(
          {
            location: '123 Main St, Boston, MA!',
            business_type: 'Coffee',
            radius: '1500',
            coordinates: [42.36, -71.06],
          },
          FROZEN,
        ),
      ).toEqual({
        location: {
          original: '123 Main St, Boston, MA!',
          cleaned: '123 Main St, Boston, MA',
          coordinates: [42.36, -71.06],
          addressComponents: { street: '123 Main St', city: 'Boston', state: 'MA!' },
        },
        businessType: {
          original: 'Coffee',
          standardized: 'restaurant',
          categoryKeywords: ['restaurant', 'cafe', 'bar', 'food', 'dining', 'pizza', 'burger', 'coffee'],
        },
        radius: 1500,
        processedAt: '2024-05-01T12:00:00.000Z',
      });
    });

    it('clamps the radius', () => {
      expect(validateRequest({ radius: 50_000 }, FROZEN).radius).toBe(10_000);
      expect(validateRequest({ radius: -5 }, FROZEN).radius).toBe(100);
    });

    it('omits an unparseable radius', () => {
      expect(validateRequest({ radius: 'wide' }, FROZEN)).toEqual({ processedAt: '2024-05-01T12:00:00.000Z' });
    });

    it('omits keys absent from the input', () => {
      expect(validateRequest({}, FROZEN)).toEqual({ processedAt: '2024-05-01T12:00:00.000Z' });
    });

    it('degrades non-string fields to empty values', () => {
      const validated = validateRequest({ location: 12, business_type: null }, FROZEN);
      expect(validated.location).toEqual({ original: '', cleaned: '', coordinates: null, addressComponents: {} });
      expect(validated.businessType).toEqual({ original: '', standardized: 'general', categoryKeywords: [] });
    });

    it('takes competitor keywords from the rule-mapped type', () => {
      expect(validateRequest({ business_type: 'healthcare' }, FROZEN).businessType).toEqual({
        original: 'healthcare',
        standardized: 'fitness',
        categoryKeywords: ['gym', 'fitness', 'yoga', 'studio', 'wellness', 'health club', 'crossfit'],
      });
    });

    it('keeps the location exactly as sent in original', () => {
      expect(validateRequest({ location: '  Boston, MA ' }, FROZEN).location).toEqual({
        original: '  Boston, MA ',
        cleaned: 'Boston, MA',
        coordinates: null,
        addressComponents: { street: 'Boston', city: 'Boston' },
      });
    });

    it('is deterministic for a fixed clock', () => {
      const raw = { location: 'Boston', business_type: 'gym', radius: 800 };
      expect(validateRequest(raw, FROZEN)).toEqual(validateRequest(raw, FROZEN));
    });
  });
});
