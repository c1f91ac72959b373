/**
 * ORDER PROCESSOR - The Coordinator
 *
 * The thin effectful shell around order placement and pricing:
 * 1. Calls effects to get data (inputs)
 * 2. Passes data to the pure pricing and assignment functions
 * 3. Calls effects to persist results (outputs)
 *
 * Every write to a customer's discounts or order runs under that customer's
 * lock, so two pricing runs for one customer never consume the same use.
 */

import {BookSelection, Customer, Discount, Order, OrderLine} from '../domain';
import {AppEffects} from './effects';
import {assignDiscount} from './assignmentRules';
import {isApplicable} from './discounts';
import {invalidOrder, invalidState, notFound} from './errors';
import {
  applyDiscounts,
  applyShipping,
  buildAnalyticsEvent,
  buildShippingAlerts,
  defaultPricingPolicy,
  toPricedOrder,
} from './pricing';
import {AssignmentResult, DomainError, PricedOrder, PricingPolicy} from './types';
import {EffectsError} from '../effects/EffectsError';
import {Either, EitherAsync, Left, Maybe, NonEmptyList, Right} from 'purify-ts';

type Outcome<T> = Promise<Either<NonEmptyList<DomainError>, T>>;

const toError = (err: unknown): Error => (err instanceof Error) ? err : new Error(String(err));

/**
 * Place an order for the customer, replacing any order they already hold.
 * @return every unknown title and bad quantity, or the stored order
 */
export function placeOrder(
  username: string,
  selections: BookSelection[]
): (appEffects: AppEffects) => Outcome<Order> {
  return async (appEffects: AppEffects) => {
    const customer = await appEffects.customers.getByUsername(username);
    if (!customer) {
      return Left(NonEmptyList([notFound(`Customer ${username} not found`)]));
    }

    const titles = [...new Set(selections.map(selection => selection.title))];
    const books = await appEffects.books.getByTitles(titles);

    const lines = selections.map((selection): Either<DomainError, OrderLine> =>
      Maybe.fromNullable(books[selection.title])
        .toEither(notFound(`Book "${selection.title}" not found`))
        .chain((book): Either<DomainError, OrderLine> => Number.isInteger(selection.quantity) && selection.quantity > 0
          ? Right({book, quantity: selection.quantity})
          : Left(invalidOrder(`Quantity ${selection.quantity} for "${selection.title}" must be a positive integer`)))
    );

    return NonEmptyList.fromArray(Either.lefts(lines)).caseOf<Outcome<Order>>({
      Just: (errors) => Promise.resolve(Left(errors)),
      Nothing: async () => {
        const order: Order = {
          customerUsername: customer.username,
          lines: Either.rights(lines),
          placedAt: appEffects.clock.now(),
        };
        await appEffects.locks.withLock([customer.username], () => appEffects.customers.saveOrder(order));
        return Right(order);
      },
    });
  };
}

/**
 * Price the customer's current order.
 *
 * Consumes a use of every discount that applies and drops the ones that run
 * out, so calling this twice for the same order gives a different answer the
 * second time.
 * @return the priced order, or why the customer cannot be priced
 * @throws EffectsError when the updated discounts cannot be stored
 */
export function calculateTotal(
  username: string,
  policy: PricingPolicy = defaultPricingPolicy
): (appEffects: AppEffects) => Outcome<PricedOrder> {
  return (appEffects: AppEffects) => appEffects.locks.withLock([username], async (): Outcome<PricedOrder> => {
    const customer = await appEffects.customers.getByUsername(username);
    if (!customer) {
      return Left(NonEmptyList([notFound(`Customer ${username} not found`)]));
    }
    if (!customer.currentOrder) {
      return Left(NonEmptyList([invalidState(`Customer ${username} has no order to price`)]));
    }

    // ========== PURE PRICING (No Effects) ==========
    const discounted = applyDiscounts(customer.currentOrder.lines, customer.activeDiscounts, appEffects.clock.now());

    // ========== SHIPPING QUOTE (Effect) ==========
    const quote = await quoteShipping(policy.storeLocation, customer.location)(appEffects);
    const shipping = applyShipping(discounted.runningTotal, quote, policy.freeShippingThreshold);

    const priced = toPricedOrder(username, discounted, shipping);
    await finalisePricing(customer, discounted.remainingDiscounts, priced, policy)(appEffects);
    return Right(priced);
  });
}

/**
 * Give the customer the discount carrying this coupon code.
 * @return the assignment, or why the coupon cannot be redeemed now
 */
export function redeemCoupon(
  username: string,
  couponCode: string
): (appEffects: AppEffects) => Outcome<AssignmentResult> {
  return (appEffects: AppEffects) => appEffects.locks.withLock([username], async (): Outcome<AssignmentResult> => {
    const [customer, discount] = await Promise.all([
      appEffects.customers.getByUsername(username),
      appEffects.discounts.getByCouponCode(couponCode),
    ]);

    if (!customer) {
      return Left(NonEmptyList([notFound(`Customer ${username} not found`)]));
    }
    if (!discount) {
      return Left(NonEmptyList([notFound(`Coupon ${couponCode} not found`)]));
    }
    if (!isApplicable(discount, appEffects.clock.now())) {
      return Left(NonEmptyList([invalidState(`Coupon ${couponCode} is not redeemable now`)]));
    }

    await appEffects.customers.appendDiscounts(assignDiscount([customer], discount));
    return Right({discountId: discount.id, assignedTo: [customer.username]});
  });
}

/**
 * Ask the provider for a quote once. A failing provider is treated like an
 * unresolvable location.
 */
function quoteShipping(
  origin: string,
  destination: string
): (appEffects: AppEffects) => Promise<Maybe<number>> {
  return async (appEffects: AppEffects) => {
    const quote = await EitherAsync(() => appEffects.shipping.getShippingCost(origin, destination)).run();
    return quote
      .ifLeft(err => console.warn(`Shipping quote ${origin} -> ${destination} failed:`, err))
      .orDefault(Maybe.empty());
  };
}

/**
 * Store the spent discounts, then report the pricing.
 * Storing the discounts must succeed; analytics and alerts are best effort.
 */
function finalisePricing(
  customer: Customer,
  remainingDiscounts: Discount[],
  priced: PricedOrder,
  policy: PricingPolicy
): (appEffects: AppEffects) => Promise<void> {
  return async (appEffects: AppEffects) => {
    const analyticsEvent = buildAnalyticsEvent(priced);
    const shippingAlerts = buildShippingAlerts(priced, policy.storeLocation, customer.location);

    const stored = await EitherAsync(
      () => appEffects.customers.replaceDiscounts(customer.username, remainingDiscounts)
    ).run();
    if (stored.isLeft()) {
      throw new EffectsError([toError(stored.extract())]);
    }

    if (shippingAlerts.length > 0) {
      console.warn(`No shipping quote for ${customer.username} (${customer.location}); shipping not charged`);
    }

    const optionalEffects = [
      () => appEffects.analytics.trackEvent(analyticsEvent),
      ...(shippingAlerts.length > 0 ? [() => appEffects.monitoring.sendAlerts(shippingAlerts)] : []),
    ];
    const results = await Promise.all(optionalEffects.map(e => EitherAsync(e).run()));
    Either.lefts(results).forEach(err => console.warn('Optional effect failed:', toError(err).message));
  };
}
