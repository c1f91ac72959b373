import {
  assignAuthorDiscount,
  assignBlackFridayDiscount,
  assignLocationDiscount,
  assignTenureDiscount,
  runAllDiscountRules,
} from '../pure/discountCampaigns';
import {authorDiscount, couponDiscount, customer, generalDiscount} from './fixtures';
import {createTestEffects} from './testEffects';

const blackFriday = new Date(2026, 10, 24, 10);

const customers = [
  customer('john_doe'),
  customer('jane_roe', {location: 'Paris', signupDate: new Date(2026, 0, 2)}),
];

describe('assignTenureDiscount', () => {
  it('assigns the discount to long-standing customers only', async () => {
    const {effects, stores} = createTestEffects({customers, discounts: [generalDiscount(1, 0.1)]});

    const result = await assignTenureDiscount(1)(effects);

    expect(result.extract()).toEqual({discountId: 1, assignedTo: ['john_doe']});
    expect(stores.customers.get('john_doe')?.activeDiscounts).toEqual([generalDiscount(1, 0.1)]);
    expect(stores.customers.get('jane_roe')?.activeDiscounts).toEqual([]);
    expect(effects.customers.appendDiscounts).toHaveBeenCalledTimes(1);
  });

  it('writes nothing for an unknown discount', async () => {
    const {effects} = createTestEffects({customers});

    const result = await assignTenureDiscount(99)(effects);

    expect(result.extract()).toEqual([{type: 'not_found', message: 'Discount 99 not found'}]);
    expect(effects.customers.getAll).not.toHaveBeenCalled();
    expect(effects.customers.appendDiscounts).not.toHaveBeenCalled();
  });
});

describe('assignBlackFridayDiscount', () => {
  it('assigns the discount to everyone on Black Friday', async () => {
    const {effects} = createTestEffects({customers, discounts: [generalDiscount(2, 0.2)], now: blackFriday});

    expect((await assignBlackFridayDiscount(2)(effects)).extract())
      .toEqual({discountId: 2, assignedTo: ['john_doe', 'jane_roe']});
  });

  it('assigns nothing on other days', async () => {
    const {effects} = createTestEffects({customers, discounts: [generalDiscount(2, 0.2)]});

    expect((await assignBlackFridayDiscount(2)(effects)).extract()).toEqual({discountId: 2, assignedTo: []});
    expect(effects.customers.appendDiscounts).not.toHaveBeenCalled();
  });
});

describe('assignLocationDiscount', () => {
  it('matches the location regardless of case', async () => {
    const {effects} = createTestEffects({customers, discounts: [generalDiscount(2, 0.2)]});

    expect((await assignLocationDiscount(2, 'paris')(effects)).extract())
      .toEqual({discountId: 2, assignedTo: ['jane_roe']});
  });
});

describe('assignAuthorDiscount', () => {
  it('scopes the stored discount to the author and gives everyone a copy', async () => {
    const {effects, stores} = createTestEffects({customers, discounts: [couponDiscount(3, 'WELCOME5', 0.4)]});

    const result = await assignAuthorDiscount(3, 'Douglas Adams')(effects);

    const scoped = authorDiscount(3, 'Douglas Adams', 0.4);
    expect(result.extract()).toEqual({discountId: 3, assignedTo: ['john_doe', 'jane_roe']});
    expect(stores.discounts.get(3)).toEqual(scoped);
    expect(stores.customers.get('john_doe')?.activeDiscounts).toEqual([scoped]);
    expect(stores.customers.get('jane_roe')?.activeDiscounts).toEqual([scoped]);
  });

  it('does not save anything for an unknown discount', async () => {
    const {effects} = createTestEffects({customers});

    await assignAuthorDiscount(3, 'Douglas Adams')(effects);

    expect(effects.discounts.save).not.toHaveBeenCalled();
  });
});

describe('runAllDiscountRules', () => {
  const discounts = [generalDiscount(1, 0.1), generalDiscount(2, 0.2)];

  it('runs tenure and then Black Friday', async () => {
    const {effects} = createTestEffects({customers, discounts});

    expect((await runAllDiscountRules()(effects)).extract()).toEqual([
      {discountId: 1, assignedTo: ['john_doe']},
      {discountId: 2, assignedTo: []},
    ]);
  });

  it('adds the Black Friday discount to everyone on the day', async () => {
    const {effects, stores} = createTestEffects({customers, discounts, now: blackFriday});

    expect((await runAllDiscountRules()(effects)).extract()).toEqual([
      {discountId: 1, assignedTo: ['john_doe']},
      {discountId: 2, assignedTo: ['john_doe', 'jane_roe']},
    ]);
    expect(stores.customers.get('john_doe')?.activeDiscounts.map(d => d.id)).toEqual([1, 2]);
    expect(stores.customers.get('jane_roe')?.activeDiscounts.map(d => d.id)).toEqual([2]);
  });

  it('assigns nothing unless both discounts exist', async () => {
    const {effects} = createTestEffects({customers, discounts: [generalDiscount(1, 0.1)]});

    expect((await runAllDiscountRules()(effects)).extract())
      .toEqual([{type: 'not_found', message: 'Discount 2 not found'}]);
    expect(effects.customers.appendDiscounts).not.toHaveBeenCalled();
  });

  it('reports both missing discounts together', async () => {
    const {effects} = createTestEffects({customers});

    expect((await runAllDiscountRules()(effects)).extract()).toEqual([
      {type: 'not_found', message: 'Discount 1 not found'},
      {type: 'not_found', message: 'Discount 2 not found'},
    ]);
  });
});
