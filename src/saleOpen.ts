import type { Principal } from '@dfinity/principal';

import { DeployError, runStep } from './error';
import { pollUntil } from './poll';
import { describeLifecycle } from './sale';
import type { DeployContext, SaleLifecycleInfo } from './type';
import { SaleLifecycle } from './type';

const STAGE = 'sale-open';

/**
 * Blocks until the sale reports Open. A failed lifecycle query counts as
 * Unspecified for that attempt; running out of attempts is fatal.
 */
export const waitForSaleOpen = async (context: DeployContext, swap: Principal): Promise<SaleLifecycleInfo> => {
  const sale = context.operator.services.sale(swap);
  const budget = context.config.execution.saleOpenPoll;

  console.log();
  console.log('Sale open:');
  console.log(`- sale: ${swap.toText()}`);
  console.log(`- waiting for Open (${budget.attempts} x ${budget.interval} ms) ⏳`);

  const result = await pollUntil<SaleLifecycleInfo>({
    label: 'Sale open',
    budget,
    check: async () => {
      try {
        return await sale.getLifecycle();
      } catch {
        return { lifecycle: SaleLifecycle.Unspecified, openTimestampSeconds: undefined };
      }
    },
    isDone: (info) => info.lifecycle === SaleLifecycle.Open,
    describe: (info) => describeLifecycle(info.lifecycle),
    onMiss: (info, attempt, elapsedMs) => {
      if (attempt % 5 === 0) {
        console.log(
          `- still waiting (lifecycle ${describeLifecycle(info.lifecycle)}, ` +
            `attempt ${attempt}/${budget.attempts}, ${Math.round(elapsedMs / 1000)} secs) 💤`,
        );
      }
    },
  });
  console.log(`- open after ${result.attempts} attempts (${Math.round(result.elapsedMs / 1000)} secs) ✅`);

  const confirmed = await runStep(STAGE, 'Failed to confirm sale lifecycle', () => sale.getLifecycle());
  if (confirmed.lifecycle !== SaleLifecycle.Open) {
    throw new DeployError(
      STAGE,
      `Sale left Open before participation, lifecycle ${describeLifecycle(confirmed.lifecycle)}`,
    );
  }
  if (confirmed.openTimestampSeconds != null) {
    console.log(`- open timestamp: ${confirmed.openTimestampSeconds} secs`);
  }
  return confirmed;
};
