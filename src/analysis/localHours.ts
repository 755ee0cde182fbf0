import { Business, WEEKDAYS, Weekday } from '../types/business';
import { mean } from '../utils/numbers';

export interface DayHoursPattern {
  avgOpen: string;
  avgClose: string;
  earliestOpen: string;
  latestClose: string;
}

export interface PeakTimes {
  weekdayPeaks: string[];
  weekendPeaks: string[];
  seasonalPatterns: string[];
}

export interface LocalHoursAnalysis {
  patterns: Partial<Record<Weekday, DayHoursPattern>>;
  peakTimes: PeakTimes;
  recommendations: string[];
  /** Businesses that reported any hours */
  sampleSize: number;
}

const TIME_PATTERN = /(\d{1,2}):?(\d{0,2})\s*(AM|PM)?/g;

// No foot-traffic source is wired in, so peaks are a static profile
const PEAK_TIMES: Readonly<PeakTimes> = Object.freeze({
  weekdayPeaks: ['8:00-10:00 AM', '12:00-2:00 PM', '5:00-7:00 PM'],
  weekendPeaks: ['10:00 AM-12:00 PM', '2:00-5:00 PM', '7:00-9:00 PM'],
  seasonalPatterns: ['Higher activity in Q4', 'Summer outdoor business boost'],
});

const HOURS_RECOMMENDATIONS: readonly string[] = Object.freeze([
  'Align opening hours with local business patterns',
  'Extend hours during identified peak periods',
  'Consider early morning hours for professional service areas',
  'Weekend hours should reflect leisure activity patterns',
]);

export function to24Hour(hour: number, minute: number, period: 'AM' | 'PM'): number {
  let h = hour;
  if (period === 'PM' && h !== 12) h += 12;
  else if (period === 'AM' && h === 12) h = 0;
  return h + minute / 60;
}

function meridiem(value: string | undefined): 'AM' | 'PM' | undefined {
  return value === 'AM' || value === 'PM' ? value : undefined;
}

/** Decimal hours (e.g. 13.5) → "1:30 PM" */
export function timeToString(decimalTime: number): string {
  const hour = Math.floor(decimalTime);
  const minute = Math.floor((decimalTime - hour) * 60);
  const mm = String(minute).padStart(2, '0');

  if (hour === 0) return `12:${mm} AM`;
  if (hour < 12) return `${hour}:${mm} AM`;
  if (hour === 12) return `12:${mm} PM`;
  return `${hour - 12}:${mm} PM`;
}

/**
 * Opening and closing time, as decimal hours, from text like "9:00 AM - 5:00 PM".
 * A missing meridiem defaults to AM before noon for the opening time and PM for
 * the closing time. Returns null for "closed" or fewer than two times.
 */
export function extractOpenCloseTimes(hoursText: string): [open: number, close: number] | null {
  if (!hoursText || hoursText.toLowerCase().includes('closed')) return null;

  const matches = [...hoursText.toUpperCase().matchAll(TIME_PATTERN)];
  if (matches.length < 2) return null;
  const [openMatch, closeMatch] = matches;

  const openHour = Number(openMatch[1]);
  const openMinute = openMatch[2] ? Number(openMatch[2]) : 0;
  const openPeriod = meridiem(openMatch[3]) ?? (openHour < 12 ? 'AM' : 'PM');

  const closeHour = Number(closeMatch[1]);
  const closeMinute = closeMatch[2] ? Number(closeMatch[2]) : 0;
  const closePeriod = meridiem(closeMatch[3]) ?? 'PM';

  return [to24Hour(openHour, openMinute, openPeriod), to24Hour(closeHour, closeMinute, closePeriod)];
}

export function analyzeLocalHours(businesses: readonly Business[]): LocalHoursAnalysis {
  const withHours = businesses.filter((b) => Object.keys(b.hours).length > 0);
  const patterns: Partial<Record<Weekday, DayHoursPattern>> = {};

  for (const day of WEEKDAYS) {
    const opens: number[] = [];
    const closes: number[] = [];
    for (const business of withHours) {
      const text = business.hours[day];
      const times = text ? extractOpenCloseTimes(text) : null;
      if (times) {
        opens.push(times[0]);
        closes.push(times[1]);
      }
    }
    if (opens.length === 0) continue;

    patterns[day] = {
      avgOpen: timeToString(mean(opens)),
      avgClose: timeToString(mean(closes)),
      earliestOpen: timeToString(Math.min(...opens)),
      latestClose: timeToString(Math.max(...closes)),
    };
  }

  return {
    patterns,
    peakTimes: {
      weekdayPeaks: [...PEAK_TIMES.weekdayPeaks],
      weekendPeaks: [...PEAK_TIMES.weekendPeaks],
      seasonalPatterns: [...PEAK_TIMES.seasonalPatterns],
    },
    recommendations: [...HOURS_RECOMMENDATIONS],
    sampleSize: withHours.length,
  };
}
