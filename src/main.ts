/**
 * PRICING RUN
 *
 * Runs the standing discount campaigns, places john_doe's order and prints
 * the priced total.
 *
 * Run this with: npm start
 */
import {loadConfigFromEnv, makeAppEffects} from './effects/EffectsFactory';
import {assignAuthorDiscount, assignLocationDiscount, assignTenureDiscount} from './pure/discountCampaigns';
import {calculateTotal, placeOrder} from './pure/orderProcessing';
import {DomainError} from './pure/types';
import {EitherAsync, NonEmptyList} from 'purify-ts';

const formatErrors = (errors: NonEmptyList<DomainError>): string =>
  errors.map(error => `${error.type}: ${error.message}`).join('; ');

async function main() {
  const config = loadConfigFromEnv();
  const appEffects = await makeAppEffects(config);

  try {
    const result = await EitherAsync.fromPromise(() => assignTenureDiscount(1)(appEffects))
      .chain(() => EitherAsync.fromPromise(() => assignLocationDiscount(2, 'berlin')(appEffects)))
      .chain(() => EitherAsync.fromPromise(() => assignAuthorDiscount(3, 'Douglas Adams')(appEffects)))
      .chain(() => EitherAsync.fromPromise(() => placeOrder('john_doe', [
        {title: "The Hitchhiker's Guide to the Galaxy", quantity: 1},
        {title: 'Dune', quantity: 2},
        {title: 'Starship Troopers', quantity: 1},
      ])(appEffects)))
      .chain(() => EitherAsync.fromPromise(() => calculateTotal('john_doe', config.pricing)(appEffects)))
      .run();

    result.caseOf({
      Left: (errors) => {
        console.error(`❌ Pricing failed: ${formatErrors(errors)}`);
        process.exitCode = 1;
      },
      Right: (priced) => console.log(priced.total.toFixed(2)),
    });
  } finally {
    await appEffects.shutdown();
  }
}

main().catch((error) => {
  console.error('💥 Unhandled error:', error);
  process.exit(1);
});
