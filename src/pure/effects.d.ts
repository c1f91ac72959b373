/**
 * EFFECTS LAYER
 *
 * Interfaces for all external IO used by the coordinators. Implementations
 * only move data in and out; pricing and assignment decisions never live here.
 */

import {Book, Customer, Discount, Order} from '../domain';
import {DiscountAssignment, AnalyticsEvent, ShippingUnavailableAlert} from './types';
import {Maybe} from 'purify-ts';

// ============================================================================
// Effect Interfaces
// ============================================================================

export interface BookRepository {
  readonly getByTitles: (titles: string[]) => Promise<Record<string, Book>>;
}

export interface CustomerRepository {
  readonly getByUsername: (username: string) => Promise<Customer | null>;
  readonly getAll: () => Promise<Customer[]>;
  /** Append every assignment in one write, or none of them. */
  readonly appendDiscounts: (assignments: DiscountAssignment[]) => Promise<void>;
  /** Replace the customer's discount list, keeping the given order. */
  readonly replaceDiscounts: (username: string, discounts: Discount[]) => Promise<void>;
  /** Store the order as the customer's current order, replacing any previous one. */
  readonly saveOrder: (order: Order) => Promise<void>;
}

export interface DiscountRepository {
  readonly getById: (id: number) => Promise<Discount | null>;
  readonly getByCouponCode: (couponCode: string) => Promise<Discount | null>;
  readonly save: (discount: Discount) => Promise<void>;
}

/**
 * Quote shipping between two places.
 * Nothing means either place could not be resolved.
 */
export interface ShippingCostProvider {
  readonly getShippingCost: (origin: string, destination: string) => Promise<Maybe<number>>;
}

/**
 * Serializes work per key. Every write to a customer's discounts or order
 * runs under that customer's username.
 */
export interface LockService {
  readonly withLock: <T>(keys: string[], work: () => Promise<T>) => Promise<T>;
}

export interface Clock {
  readonly now: () => Date;
}

export interface MonitoringService {
  readonly sendAlerts: (alerts: ShippingUnavailableAlert[]) => Promise<void>;
}

export interface AnalyticsService {
  readonly trackEvent: (event: AnalyticsEvent) => Promise<void>;
}

// ============================================================================
// Combined Dependencies
// ============================================================================

export type AppEffects = {
  readonly books: BookRepository;
  readonly customers: CustomerRepository;
  readonly discounts: DiscountRepository;
  readonly shipping: ShippingCostProvider;
  readonly locks: LockService;
  readonly clock: Clock;
  readonly monitoring: MonitoringService;
  readonly analytics: AnalyticsService;
}
