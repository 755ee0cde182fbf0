import {
  cleanAddress,
  cleanBusinessRecords,
  cleanPhone,
  cleanText,
  cleanUrl,
  parseHours,
  standardizeCategory,
  toBusiness,
} from './businessRecordCleaner';

describe('businessRecordCleaner', () => {
  describe('cleanText', () => {
    it('strips disallowed characters and collapses whitespace', () => {
      expect(cleanText("  Joe's   Pizza!! ")).toBe('Joes Pizza');
    });

    it('keeps hyphens, periods and commas', () => {
      expect(cleanText('A-1 Cafe, Inc.')).toBe('A-1 Cafe, Inc.');
    });

    it('returns an empty string for non-strings', () => {
      expect(cleanText(42)).toBe('');
      expect(cleanText(null)).toBe('');
    });
  });

  describe('cleanAddress', () => {
    it('expands street suffixes and title-cases', () => {
      expect(cleanAddress('123 main st, boston')).toBe('123 Main Street, Boston');
      expect(cleanAddress('9 ELM BLVD')).toBe('9 Elm Boulevard');
    });

    it('does not expand suffixes inside words', () => {
      expect(cleanAddress('dryden lane')).toBe('Dryden Lane');
    });

    it('returns an empty string for missing input', () => {
      expect(cleanAddress(undefined)).toBe('');
    });
  });

  describe('standardizeCategory', () => {
    it('maps by the first matching keyword', () => {
      expect(standardizeCategory('Downtown Coffee House')).toBe('Coffee Shop');
      expect(standardizeCategory('coffee shop')).toBe('Coffee Shop');
      expect(standardizeCategory('bookstore')).toBe('Retail Store');
    });

    it('labels any category mentioning pizza as a pizza restaurant', () => {
      expect(standardizeCategory('pizza restaurant')).toBe('Pizza Restaurant');
      expect(standardizeCategory('Italian Restaurant')).toBe('Restaurant');
    });

    it('title-cases unmatched categories', () => {
      expect(standardizeCategory('art gallery')).toBe('Art Gallery');
    });

    it('falls back to Other for empty or non-string input', () => {
      expect(standardizeCategory('')).toBe('Other');
      expect(standardizeCategory(7)).toBe('Other');
    });

    it.each(['Coffee Shop', 'Pizza Restaurant', 'Restaurant', 'Fast Food', 'Fitness Center', 'Beauty Salon', 'Retail Store', 'Healthcare', 'Other'])(
      'maps the standardized label %s onto itself',
      (label) => {
        expect(standardizeCategory(label)).toBe(label);
      },
    );
  });

  describe('cleanPhone', () => {
    it('formats ten-digit numbers', () => {
      expect(cleanPhone('5551234567')).toBe('(555) 123-4567');
      expect(cleanPhone(5551234567)).toBe('(555) 123-4567');
    });

    it('drops a leading country code of 1', () => {
      expect(cleanPhone('+1 555 123 4567')).toBe('(555) 123-4567');
    });

    it('returns other input unchanged', () => {
      expect(cleanPhone('abc')).toBe('abc');
      expect(cleanPhone('12345')).toBe('12345');
    });

    it('returns an empty string for missing input', () => {
      expect(cleanPhone(undefined)).toBe('');
    });
  });

  describe('cleanUrl', () => {
    it('adds a scheme when missing', () => {
      expect(cleanUrl('example.com')).toBe('https://example.com');
    });

    it('keeps existing schemes', () => {
      expect(cleanUrl('http://example.com')).toBe('http://example.com');
    });

    it('returns an empty string for non-strings and blanks', () => {
      expect(cleanUrl(42)).toBe('');
      expect(cleanUrl('   ')).toBe('');
    });
  });

  describe('parseHours', () => {
    it('matches weekday keys case-insensitively and ignores unknown keys', () => {
      expect(parseHours({ monday: '9:00 AM - 5:00 PM', SUNDAY: 'Closed', Funday: 'all day' })).toEqual({
        Monday: '9:00 AM - 5:00 PM',
        Sunday: 'Closed',
      });
    });

    it('fills Monday to Friday from a mon-fri string', () => {
      expect(parseHours('Mon-Fri 9AM-5PM')).toEqual({
        Monday: '9AM - 5PM',
        Tuesday: '9AM - 5PM',
        Wednesday: '9AM - 5PM',
        Thursday: '9AM - 5PM',
        Friday: '9AM - 5PM',
      });
    });

    it('returns an empty mapping for anything else', () => {
      expect(parseHours('open late')).toEqual({});
      expect(parseHours(null)).toEqual({});
      expect(parseHours(['Monday'])).toEqual({});
    });
  });

  describe('toBusiness', () => {
    it('normalizes every field', () => {
      expect(
        toBusiness({
          id: 7,
          name: ' Blue  Bottle ',
          category: 'coffee bar',
          address: '12 oak ave',
          distance: '120.7',
          rating: 7,
          latitude: '42.36',
          longitude: 'abc',
          price_level: '2',
          phone: '555.123.4567',
          website: 'bluebottle.example',
          hours: 'Mon-Fri 7AM-6PM',
        }),
      ).toEqual({
        id: '7',
        name: 'Blue Bottle',
        category: 'Coffee Shop',
        address: '12 Oak Avenue',
        distance: 120,
        rating: 5,
        latitude: 42.36,
        longitude: 0,
        priceLevel: 2,
        phone: '(555) 123-4567',
        website: 'https://bluebottle.example',
        hours: {
          Monday: '7AM - 6PM',
          Tuesday: '7AM - 6PM',
          Wednesday: '7AM - 6PM',
          Thursday: '7AM - 6PM',
          Friday: '7AM - 6PM',
        },
      });
    });

    it('clamps coordinates to [-180, 180] and ratings to [0, 5]', () => {
      const business = toBusiness({ name: 'Edge', latitude: 120, longitude: -500, rating: -2 });
      expect(business?.latitude).toBe(120);
      expect(business?.longitude).toBe(-180);
      expect(business?.rating).toBe(0);
    });

    it('drops records without a usable name', () => {
      expect(toBusiness({})).toBeNull();
      expect(toBusiness({ name: 'Unknown Business' })).toBeNull();
      expect(toBusiness({ name: '!!!' })).toBeNull();
    });
  });

  describe('cleanBusinessRecords', () => {
    it('skips non-object entries and keeps order', () => {
      const cleaned = cleanBusinessRecords([null, 'text', 42, [], { name: 'First' }, { name: 'Second' }]);
      expect(cleaned.map((b) => b.name)).toEqual(['First', 'Second']);
      expect(cleaned[0]).toMatchObject({ category: 'Other', distance: 0, rating: 0, priceLevel: 0, hours: {} });
    });

    it('is idempotent', () => {
      const once = cleanBusinessRecords([
        {
          id: 'a1',
          name: "Mario's Pizza!",
          category: 'pizza place',
          address: '5 harbor rd',
          rating: '4.4',
          price_level: 2,
          phone: '1-555-987-6543',
          website: 'marios.example',
          hours: { monday: '11:00 AM - 10:00 PM' },
        },
        { id: 'b2', name: 'Iron Gym', category: 'GYM', distance: 800, rating: 3.9 },
        { id: 'c3', name: 'Glow', category: 'day spa', address: '77 lake dr' },
      ]);
      const twice = cleanBusinessRecords(once);
      expect(twice).toEqual(once);
      expect(once.map((b) => b.category)).toEqual(['Pizza Restaurant', 'Fitness Center', 'Beauty Salon']);
    });
  });
});
