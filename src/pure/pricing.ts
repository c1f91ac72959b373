/**
 * ORDER PRICING
 *
 * The pricing algorithm, split into the phases the coordinator runs in order:
 *
 * 1. line phase - each line takes at most one author-scoped discount
 * 2. order phase - every applicable general or coupon discount scales the total
 * 3. shipping phase - the quoted cost is waived above the threshold
 *
 * Discounts are read in the customer's list order throughout, so the
 * author-scoped and order-level subsets keep their relative order and the
 * first eligible match always wins. Each phase hands back the discount list
 * with spent uses taken off and exhausted discounts dropped.
 */

import {Discount, OrderLine} from '../domain';
import {appliesToBook, consumeUse, isApplicable, pricingPhaseOf, useOnce} from './discounts';
import {
  AnalyticsEvent,
  DiscountedOrder,
  LineCharge,
  PricedOrder,
  PricingPolicy,
  ShippingCharge,
  ShippingUnavailableAlert,
} from './types';
import {Maybe} from 'purify-ts';

export const defaultPricingPolicy: PricingPolicy = {
  storeLocation: 'paris',
  freeShippingThreshold: 50,
};

type LinePhase = {
  readonly charges: LineCharge[];
  readonly discounts: Discount[];
};

type OrderPhase = {
  readonly total: number;
  readonly appliedIds: number[];
  readonly discounts: Discount[];
};

// ============================================================================
// Discount Phases
// ============================================================================

export function applyLineDiscounts(
  lines: OrderLine[],
  discounts: Discount[],
  now: Date
): LinePhase {
  return lines.reduce<LinePhase>(
    (acc, line) => {
      const subtotal = line.book.unitPrice * line.quantity;
      const index = acc.discounts.findIndex(discount =>
        pricingPhaseOf(discount) === 'line'
        && appliesToBook(discount, line.book)
        && isApplicable(discount, now)
      );
      const applied: Maybe<Discount> = index >= 0 ? Maybe.of(acc.discounts[index]) : Maybe.empty();

      return {
        charges: [...acc.charges, {
          book: line.book,
          quantity: line.quantity,
          subtotal,
          total: applied.mapOrDefault(discount => subtotal * (1 - discount.percentOff), subtotal),
          appliedDiscountId: applied.map(discount => discount.id),
        }],
        discounts: index >= 0 ? consumeUse(acc.discounts, index) : acc.discounts,
      };
    },
    {charges: [], discounts}
  );
}

export function applyOrderDiscounts(
  runningTotal: number,
  discounts: Discount[],
  now: Date
): OrderPhase {
  return discounts.reduce<OrderPhase>(
    (acc, discount) => {
      // expired or not-yet-open discounts keep their uses
      if (pricingPhaseOf(discount) !== 'order' || !isApplicable(discount, now)) {
        return {...acc, discounts: [...acc.discounts, discount]};
      }
      return {
        total: acc.total * (1 - discount.percentOff),
        appliedIds: [...acc.appliedIds, discount.id],
        discounts: [...acc.discounts, ...useOnce(discount).toList()],
      };
    },
    {total: runningTotal, appliedIds: [], discounts: []}
  );
}

export function calculateLineTotal(charges: LineCharge[]): number {
  return charges.reduce((sum, charge) => sum + charge.total, 0);
}

/**
 * Run the line and order phases against the customer's discounts.
 */
export function applyDiscounts(
  lines: OrderLine[],
  discounts: Discount[],
  now: Date
): DiscountedOrder {
  const linePhase = applyLineDiscounts(lines, discounts, now);
  const lineTotal = calculateLineTotal(linePhase.charges);
  const orderPhase = applyOrderDiscounts(lineTotal, linePhase.discounts, now);

  return {
    lines: linePhase.charges,
    lineTotal,
    orderDiscountIds: orderPhase.appliedIds,
    runningTotal: orderPhase.total,
    remainingDiscounts: orderPhase.discounts,
  };
}

// ============================================================================
// Shipping & Rounding
// ============================================================================

export function applyShipping(
  runningTotal: number,
  quote: Maybe<number>,
  freeShippingThreshold: number
): ShippingCharge {
  const quotedCost = quote.orDefault(0);
  if (runningTotal > freeShippingThreshold) {
    return {status: 'waived', quotedCost, cost: 0};
  }
  return quote.isJust()
    ? {status: 'charged', quotedCost, cost: quotedCost}
    : {status: 'unavailable', quotedCost, cost: 0};
}

/**
 * Round to cents, halves away from zero. The epsilon keeps values such as
 * 1.005, stored as 1.00499..., on the side their decimal form shows.
 */
export function roundMoney(value: number): number {
  return Math.sign(value) * Math.round((Math.abs(value) + Number.EPSILON) * 100) / 100;
}

export function toPricedOrder(
  username: string,
  discounted: DiscountedOrder,
  shipping: ShippingCharge
): PricedOrder {
  return {
    username,
    lines: discounted.lines,
    orderDiscountIds: discounted.orderDiscountIds,
    preShippingTotal: discounted.runningTotal,
    shipping,
    total: roundMoney(discounted.runningTotal + shipping.cost),
  };
}

// ============================================================================
// External Data Preparation
// ============================================================================

export function appliedDiscountIds(priced: PricedOrder): number[] {
  return [
    ...priced.lines.flatMap(line => line.appliedDiscountId.toList()),
    ...priced.orderDiscountIds,
  ];
}

export function buildAnalyticsEvent(priced: PricedOrder): AnalyticsEvent {
  return {
    event: 'order_priced',
    username: priced.username,
    total: priced.total,
    discountIds: appliedDiscountIds(priced),
    shippingStatus: priced.shipping.status,
  };
}

export function buildShippingAlerts(
  priced: PricedOrder,
  origin: string,
  destination: string
): ShippingUnavailableAlert[] {
  return priced.shipping.status === 'unavailable'
    ? [{type: 'shipping_unavailable', username: priced.username, origin, destination}]
    : [];
}
