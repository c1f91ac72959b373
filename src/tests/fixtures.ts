// Shared test data for the pricing and campaign tests

import {AuthorScopedDiscount, Book, CouponDiscount, Customer, GeneralDiscount, OrderLine} from '../domain';

// Local time, like every date the calendar rules read
export const NOW = new Date(2026, 2, 10, 12);

const openAllYear = {
  validFrom: new Date('2026-01-01T00:00:00Z'),
  validUntil: new Date('2026-12-31T23:59:59Z'),
};

export const hitchhiker: Book = {
  title: "The Hitchhiker's Guide to the Galaxy",
  author: 'Douglas Adams',
  unitPrice: 12.99,
};

export const dune: Book = {title: 'Dune', author: 'Frank Herbert', unitPrice: 14.95};

export const starshipTroopers: Book = {title: 'Starship Troopers', author: 'Robert A. Heinlein', unitPrice: 12.75};

export const bookAt = (unitPrice: number, title = 'Test Book', author = 'Test Author'): Book =>
  ({title, author, unitPrice});

export const line = (book: Book, quantity = 1): OrderLine => ({book, quantity});

export const generalDiscount = (id: number, percentOff: number, usesRemaining = 5): GeneralDiscount =>
  ({id, kind: 'general', percentOff, usesRemaining, ...openAllYear});

export const authorDiscount = (
  id: number,
  author: string,
  percentOff: number,
  usesRemaining = 5
): AuthorScopedDiscount => ({id, kind: 'author', author, percentOff, usesRemaining, ...openAllYear});

export const couponDiscount = (
  id: number,
  couponCode: string,
  percentOff: number,
  usesRemaining = 5
): CouponDiscount => ({id, kind: 'coupon', couponCode, percentOff, usesRemaining, ...openAllYear});

export const customer = (username: string, overrides: Partial<Customer> = {}): Customer => ({
  username,
  location: 'berlin',
  signupDate: new Date(2020, 0, 15),
  activeDiscounts: [],
  currentOrder: null,
  ...overrides,
});
