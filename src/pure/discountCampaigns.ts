/**
 * DISCOUNT CAMPAIGNS - The Coordinator
 *
 * Resolves the discount, lets a pure rule pick the customers, and appends an
 * independent copy of the discount to each of them in a single write.
 * Nothing is written when the discount cannot be resolved.
 */

import {Customer, Discount} from '../domain';
import {AppEffects} from './effects';
import {
  assignDiscount,
  selectByLocation,
  selectByTenure,
  selectEveryone,
  selectForBlackFriday,
} from './assignmentRules';
import {scopeToAuthor} from './discounts';
import {notFound} from './errors';
import {AssignmentResult, DomainError} from './types';
import {Either, Left, Maybe, NonEmptyList, Right} from 'purify-ts';

type CustomerSelector = (customers: Customer[], today: Date) => Customer[];

type CampaignOutcome<T> = Promise<Either<NonEmptyList<DomainError>, T>>;

export const TENURE_DISCOUNT_ID = 1;
export const BLACK_FRIDAY_DISCOUNT_ID = 2;

/**
 * Assign the discount to customers whose account is at least a year old.
 */
export function assignTenureDiscount(
  discountId: number
): (appEffects: AppEffects) => CampaignOutcome<AssignmentResult> {
  return runCampaign(discountId, selectByTenure);
}

/**
 * Assign the discount to everyone, but only on Black Friday.
 */
export function assignBlackFridayDiscount(
  discountId: number
): (appEffects: AppEffects) => CampaignOutcome<AssignmentResult> {
  return runCampaign(discountId, selectForBlackFriday);
}

export function assignLocationDiscount(
  discountId: number,
  location: string
): (appEffects: AppEffects) => CampaignOutcome<AssignmentResult> {
  return runCampaign(discountId, customers => selectByLocation(customers, location));
}

/**
 * Scope the discount to an author in the registry, then give it to every
 * customer. Scoping is stored on the discount itself, so later assignments
 * of the same id stay scoped.
 */
export function assignAuthorDiscount(
  discountId: number,
  author: string
): (appEffects: AppEffects) => CampaignOutcome<AssignmentResult> {
  return async (appEffects: AppEffects) => {
    const discount = await resolveDiscounts([discountId])(appEffects);
    return discount.caseOf<CampaignOutcome<AssignmentResult>>({
      Left: (errors) => Promise.resolve(Left(errors)),
      Right: async ([found]) => {
        const scoped = scopeToAuthor(found, author);
        await appEffects.discounts.save(scoped);
        return Right(await assign(scoped, selectEveryone)(appEffects));
      },
    });
  };
}

/**
 * Run the standing campaigns: tenure (discount 1), then Black Friday
 * (discount 2). Both discounts are resolved before anything is assigned.
 */
export function runAllDiscountRules(): (appEffects: AppEffects) => CampaignOutcome<AssignmentResult[]> {
  return async (appEffects: AppEffects) => {
    const discounts = await resolveDiscounts([TENURE_DISCOUNT_ID, BLACK_FRIDAY_DISCOUNT_ID])(appEffects);
    return discounts.caseOf<CampaignOutcome<AssignmentResult[]>>({
      Left: (errors) => Promise.resolve(Left(errors)),
      Right: async ([tenure, blackFriday]) => {
        const tenureResult = await assign(tenure, selectByTenure)(appEffects);
        const blackFridayResult = await assign(blackFriday, selectForBlackFriday)(appEffects);
        return Right([tenureResult, blackFridayResult]);
      },
    });
  };
}

function runCampaign(
  discountId: number,
  select: CustomerSelector
): (appEffects: AppEffects) => CampaignOutcome<AssignmentResult> {
  return async (appEffects: AppEffects) => {
    const discount = await resolveDiscounts([discountId])(appEffects);
    return discount.caseOf<CampaignOutcome<AssignmentResult>>({
      Left: (errors) => Promise.resolve(Left(errors)),
      Right: async ([found]) => Right(await assign(found, select)(appEffects)),
    });
  };
}

/**
 * Look up every id, reporting all unknown ones together.
 * @return the discounts in the order of the ids
 */
function resolveDiscounts(
  ids: number[]
): (appEffects: AppEffects) => CampaignOutcome<NonEmptyList<Discount>> {
  return async (appEffects: AppEffects) => {
    const found = await Promise.all(ids.map(id => appEffects.discounts.getById(id)));
    const lookups = found.map((discount, i) =>
      Maybe.fromNullable(discount).toEither(notFound(`Discount ${ids[i]} not found`))
    );
    return NonEmptyList.fromArray(Either.lefts(lookups)).caseOf<Either<NonEmptyList<DomainError>, NonEmptyList<Discount>>>({
      Just: (errors) => Left(errors),
      Nothing: () => NonEmptyList.fromArray(Either.rights(lookups))
        .toEither(NonEmptyList([notFound('No discount ids given')])),
    });
  };
}

function assign(
  discount: Discount,
  select: CustomerSelector
): (appEffects: AppEffects) => Promise<AssignmentResult> {
  return async (appEffects: AppEffects) => {
    const customers = await appEffects.customers.getAll();
    const assignments = assignDiscount(select(customers, appEffects.clock.now()), discount);
    const assignedTo = assignments.map(assignment => assignment.username);

    if (assignments.length > 0) {
      await appEffects.locks.withLock(assignedTo, () => appEffects.customers.appendDiscounts(assignments));
    }
    return {discountId: discount.id, assignedTo};
  };
}
