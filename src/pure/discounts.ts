/**
 * DISCOUNT MODEL
 *
 * Construction, validity and usage bookkeeping for discounts. Every function
 * here returns new values; nothing is mutated in place, so a customer's
 * discount list only changes when a coordinator persists the returned list.
 */

import {AuthorScopedDiscount, Book, Discount, DiscountKind} from '../domain';
import {DiscountRecord, DomainError} from './types';
import {Either, Left, Maybe, NonEmptyList, Right} from 'purify-ts';

export type PricingPhase = 'line' | 'order';

const pricingPhases: Record<DiscountKind, PricingPhase> = {
  author: 'line',
  general: 'order',
  coupon: 'order',
};

// ============================================================================
// Validity
// ============================================================================

export function isValid(
  discount: Pick<Discount, 'validFrom' | 'validUntil'>,
  now: Date
): boolean {
  const instant = now.getTime();
  return discount.validFrom.getTime() <= instant && instant <= discount.validUntil.getTime();
}

/**
 * A discount can be applied when its window covers `now` and it still has
 * uses left. A discount loaded with zero uses is exhausted, not unlimited.
 */
export function isApplicable(discount: Discount, now: Date): boolean {
  return isValid(discount, now) && discount.usesRemaining > 0;
}

export function pricingPhaseOf(discount: Discount): PricingPhase {
  return pricingPhases[discount.kind];
}

export function appliesToBook(discount: Discount, book: Book): boolean {
  switch (discount.kind) {
    case 'author':
      return discount.author === book.author;
    case 'general':
    case 'coupon':
      return false;
  }
}

// ============================================================================
// Construction
// ============================================================================

const isValidDate = (value: Date): boolean =>
  value instanceof Date && !Number.isNaN(value.getTime());

const nonBlank = (value: string | null | undefined): string | null =>
  value != null && value.trim().length > 0 ? value : null;

function validateRecord(record: DiscountRecord): string[] {
  return [
    ...(Number.isFinite(record.percentOff) && record.percentOff >= 0 && record.percentOff < 1
      ? [] : [`percentOff ${record.percentOff} is outside [0, 1)`]),
    ...(Number.isInteger(record.usesRemaining) && record.usesRemaining >= 0
      ? [] : [`usesRemaining ${record.usesRemaining} is not a non-negative integer`]),
    ...(isValidDate(record.validFrom) ? [] : ['validFrom is not a valid date']),
    ...(isValidDate(record.validUntil) ? [] : ['validUntil is not a valid date']),
  ];
}

function toDiscount(record: DiscountRecord): Discount {
  const terms = {
    id: record.id,
    validFrom: record.validFrom,
    validUntil: record.validUntil,
    percentOff: record.percentOff,
    usesRemaining: record.usesRemaining,
  };
  const author = nonBlank(record.author);
  if (author !== null) {
    return {...terms, kind: 'author', author};
  }
  const couponCode = nonBlank(record.couponCode);
  if (couponCode !== null) {
    return {...terms, kind: 'coupon', couponCode};
  }
  return {...terms, kind: 'general'};
}

/**
 * Validate a raw record and build the matching discount variant.
 * An author makes the discount author-scoped; otherwise a coupon code makes
 * it a coupon discount; otherwise it is a general discount.
 * @return every validation failure, or the discount
 */
export function createDiscount(
  record: DiscountRecord
): Either<NonEmptyList<DomainError>, Discount> {
  const errors = validateRecord(record).map((problem): DomainError => ({
    type: 'invalid_discount',
    message: `Discount ${record.id}: ${problem}`,
  }));
  return NonEmptyList.fromArray(errors).caseOf<Either<NonEmptyList<DomainError>, Discount>>({
    Just: (failures) => Left(failures),
    Nothing: () => Right(toDiscount(record)),
  });
}

export function scopeToAuthor(discount: Discount, author: string): AuthorScopedDiscount {
  return {
    id: discount.id,
    validFrom: discount.validFrom,
    validUntil: discount.validUntil,
    percentOff: discount.percentOff,
    usesRemaining: discount.usesRemaining,
    kind: 'author',
    author,
  };
}

// ============================================================================
// Assignment & Usage
// ============================================================================

/**
 * Each customer receives its own copy, so consuming a use for one customer
 * never changes another customer's counter.
 */
export function cloneForAssignment(discount: Discount): Discount {
  return {
    ...discount,
    validFrom: new Date(discount.validFrom.getTime()),
    validUntil: new Date(discount.validUntil.getTime()),
  };
}

/**
 * Spend one use of the discount.
 * @return the discount with one use fewer, or Nothing once it is exhausted
 */
export function useOnce(discount: Discount): Maybe<Discount> {
  const used: Discount = {...discount, usesRemaining: discount.usesRemaining - 1};
  return Maybe.fromPredicate(d => d.usesRemaining > 0, used);
}

export function consumeUse(discounts: Discount[], index: number): Discount[] {
  return discounts.flatMap((discount, i) => (i === index ? useOnce(discount).toList() : [discount]));
}
