/**
 * DISCOUNT ASSIGNMENT RULES
 *
 * Each rule selects the customers that should receive a discount. Selection is
 * pure: the campaign coordinator appends the discount to whoever is returned.
 * No rule looks at the discounts a customer already holds.
 */

import {Customer, Discount} from '../domain';
import {cloneForAssignment} from './discounts';
import {DiscountAssignment} from './types';

const MS_PER_DAY = 24 * 60 * 60 * 1000;

export const TENURE_DAYS = 365;

// Month is zero-based, as in Date
export const BLACK_FRIDAY = {month: 10, day: 24} as const;

// Calendar days are read in the process's local zone, the zone pg uses when
// it parses a DATE column, so a signup date and today compare day to day.
const calendarDay = (date: Date): number =>
  Date.UTC(date.getFullYear(), date.getMonth(), date.getDate());

export function daysBetween(earlier: Date, later: Date): number {
  return Math.round((calendarDay(later) - calendarDay(earlier)) / MS_PER_DAY);
}

// ============================================================================
// Rules
// ============================================================================

export function selectByTenure(customers: Customer[], today: Date): Customer[] {
  return customers.filter(customer => daysBetween(customer.signupDate, today) >= TENURE_DAYS);
}

export function isBlackFriday(today: Date): boolean {
  return today.getMonth() === BLACK_FRIDAY.month && today.getDate() === BLACK_FRIDAY.day;
}

export function selectForBlackFriday(customers: Customer[], today: Date): Customer[] {
  return isBlackFriday(today) ? customers : [];
}

export function selectByLocation(customers: Customer[], location: string): Customer[] {
  const target = location.toLowerCase();
  return customers.filter(customer => customer.location.toLowerCase() === target);
}

export function selectEveryone(customers: Customer[]): Customer[] {
  return customers;
}

// ============================================================================
// Assignment
// ============================================================================

/**
 * Pair each selected customer with an independent copy of the discount.
 */
export function assignDiscount(selected: Customer[], discount: Discount): DiscountAssignment[] {
  return selected.map(customer => ({
    username: customer.username,
    discount: cloneForAssignment(discount),
  }));
}
