import { Weekday } from '../types/business';

interface HourPattern {
  weekday: readonly [open: number, close: number];
  weekend: readonly [open: number, close: number];
}

export type WeeklySchedule = Record<Weekday, string>;

export interface RevenueImpact {
  estimatedIncrease: string;
  peakHourCapture: string;
  efficiencyGain: string;
}

export interface HoursRecommendation {
  weeklySchedule: WeeklySchedule;
  insights: string[];
  peakHours: Record<string, string>;
  revenueImpact: RevenueImpact;
}

const HOUR_PATTERNS: Readonly<Record<string, HourPattern>> = Object.freeze<Record<string, HourPattern>>({
  restaurant: { weekday: [8, 22], weekend: [9, 23] },
  retail: { weekday: [9, 19], weekend: [10, 20] },
  fitness: { weekday: [5, 23], weekend: [7, 22] },
  beauty: { weekday: [9, 19], weekend: [9, 18] },
  professional: { weekday: [8, 18], weekend: [10, 16] },
  healthcare: { weekday: [8, 17], weekend: [9, 15] },
  education: { weekday: [8, 20], weekend: [9, 17] },
});

const DEFAULT_PATTERN = HOUR_PATTERNS.retail;

const HOURS_INSIGHTS: Readonly<Record<string, readonly string[]>> = Object.freeze({
  restaurant: [
    '🍽️ Extended Friday and Saturday hours to capture weekend dining traffic',
    '📅 Thursday evening extension recommended for local happy hour market',
    '☀️ Sunday brunch hours optimized for weekend leisure dining',
  ],
  retail: [
    '🛍️ Weekend hours extended to capture leisure shopping traffic',
    '📈 Consistent weekday hours build customer shopping habits',
    '🕐 Late evening hours on Friday for after-work shopping',
  ],
  fitness: [
    '💪 Early morning hours capture pre-work fitness crowd',
    '🌙 Extended evening hours for after-work fitness enthusiasts',
    '🎯 Weekend hours optimized for flexible fitness schedules',
  ],
  default: [
    '⏰ Hours optimized based on local business patterns',
    '📊 Schedule balances customer convenience with operational efficiency',
    '🎯 Weekend hours adjusted for target demographic preferences',
  ],
});

const PEAK_HOURS: Readonly<Record<string, Readonly<Record<string, string>>>> = Object.freeze({
  restaurant: { morning: '8:00-10:00', lunch: '12:00-14:00', evening: '18:00-20:00' },
  retail: { morning: '10:00-12:00', afternoon: '14:00-16:00', evening: '17:00-19:00' },
  fitness: { morning: '6:00-8:00', lunch: '12:00-13:00', evening: '17:00-20:00' },
  default: { morning: '9:00-11:00', afternoon: '13:00-15:00', evening: '17:00-19:00' },
});

const REVENUE_IMPACT: Readonly<RevenueImpact> = Object.freeze({
  estimatedIncrease: '15-25%',
  peakHourCapture: '85%',
  efficiencyGain: '30%',
});

/** Whole hour on a 0–24 clock in 12-hour notation; 24 is midnight */
export function formatHour(hour: number): string {
  if (hour === 0 || hour === 24) return '12:00 AM';
  if (hour < 12) return `${hour}:00 AM`;
  if (hour === 12) return '12:00 PM';
  return `${hour - 12}:00 PM`;
}

function adjustPattern(pattern: HourPattern, businessType: string): HourPattern {
  let [weekdayOpen, weekdayClose] = pattern.weekday;
  let [weekendOpen, weekendClose] = pattern.weekend;

  switch (businessType) {
    case 'restaurant':
      weekdayClose = Math.min(23, weekdayClose + 1);
      weekendClose = Math.min(24, weekendClose + 1);
      break;
    case 'fitness':
      weekdayOpen = Math.max(5, weekdayOpen - 1);
      weekendOpen = Math.max(6, weekendOpen - 1);
      break;
    case 'professional':
      weekendClose = Math.min(17, weekendClose);
      break;
  }

  return { weekday: [weekdayOpen, weekdayClose], weekend: [weekendOpen, weekendClose] };
}

/**
 * Fixed day-by-day layout: Thursday closes an hour after the other weekdays,
 * Friday closes with the weekend, Sunday opens an hour later and closes two
 * hours earlier than Saturday.
 */
export function buildWeeklySchedule(pattern: HourPattern): WeeklySchedule {
  const [weekdayOpen, weekdayClose] = pattern.weekday;
  const [weekendOpen, weekendClose] = pattern.weekend;
  const range = (open: number, close: number): string => `${formatHour(open)} - ${formatHour(close)}`;

  return {
    Monday: range(weekdayOpen, weekdayClose),
    Tuesday: range(weekdayOpen, weekdayClose),
    Wednesday: range(weekdayOpen, weekdayClose),
    Thursday: range(weekdayOpen, weekdayClose + 1),
    Friday: range(weekdayOpen, weekendClose),
    Saturday: range(weekendOpen, weekendClose),
    Sunday: range(weekendOpen + 1, weekendClose - 2),
  };
}

/** Suggested opening hours for a business type; unknown types get the retail pattern */
export function recommendHours(businessType: string): HoursRecommendation {
  const base = HOUR_PATTERNS[businessType] ?? DEFAULT_PATTERN;

  return {
    weeklySchedule: buildWeeklySchedule(adjustPattern(base, businessType)),
    insights: [...(HOURS_INSIGHTS[businessType] ?? HOURS_INSIGHTS.default)],
    peakHours: { ...(PEAK_HOURS[businessType] ?? PEAK_HOURS.default) },
    revenueImpact: { ...REVENUE_IMPACT },
  };
}
