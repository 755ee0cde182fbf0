import { Business } from '../types/business';

let sequence = 0;

/** A cleaned business with neutral defaults; override only what a test cares about */
export function makeBusiness(overrides: Partial<Business> = {}): Business {
  sequence++;
  return {
    id: `biz-${sequence}`,
    name: `Business ${sequence}`,
    category: 'Other',
    address: '',
    distance: 100,
    rating: 0,
    latitude: 0,
    longitude: 0,
    priceLevel: 0,
    phone: '',
    website: '',
    hours: {},
    ...overrides,
  };
}

export function makeBusinesses(count: number, overrides: Partial<Business> = {}): Business[] {
  return Array.from({ length: count }, () => makeBusiness(overrides));
}
