import type { Principal } from '@dfinity/principal';

import { describeError, runStep } from './error';
import { describeLifecycle } from './sale';
import type { ConfigProposalSwap, DeployContext, FinalizeResult, SaleClient, SaleDerivedState } from './type';
import { SaleLifecycle } from './type';
import { formatE8s, sleep } from './util';

const STAGE = 'finalize';

export const thresholdsMet = (state: SaleDerivedState, swap: ConfigProposalSwap): boolean => {
  return (
    state.participantCount >= swap.minimumParticipants && state.participationE8s >= swap.minimumDirectParticipation
  );
};

const logDerivedState = (state: SaleDerivedState, swap: ConfigProposalSwap): void => {
  console.log(`- participants: ${state.participantCount} (minimum ${swap.minimumParticipants})`);
  console.log(
    `- participation: ${formatE8s(state.participationE8s)} (minimum ${formatE8s(swap.minimumDirectParticipation)})`,
  );
};

const tryFinalize = async (sale: SaleClient): Promise<boolean> => {
  try {
    const response = await sale.finalize();
    if (response.errorMessage != null) {
      console.log(`- finalize reported: ${response.errorMessage} ⚠️`);
      return false;
    }
    console.log('- finalized ✅');
    return true;
  } catch (e) {
    console.log(`- finalize failed: ${describeError(e)} ⚠️`);
    return false;
  }
};

/**
 * Waits for the sale to commit and finalizes it. Finalization is only ever requested
 * after a Committed lifecycle has been observed.
 */
export const finalizeSale = async (context: DeployContext, swap: Principal): Promise<FinalizeResult> => {
  const sale = context.operator.services.sale(swap);
  const swapConfig = context.config.proposal.swap;
  const { attempts, interval } = context.config.execution.saleCommitPoll;

  console.log();
  console.log('Sale finalize:');
  const initial = await runStep(STAGE, 'Failed to read sale derived state', () => sale.getDerivedState());
  logDerivedState(initial, swapConfig);

  let met = thresholdsMet(initial, swapConfig);
  console.log(`- thresholds: ${met ? 'met ✅' : 'not met yet ⏳'}`);

  let lifecycle: number = SaleLifecycle.Unspecified;
  for (let attempt = 1; attempt <= attempts; attempt++) {
    await sleep(interval);

    try {
      lifecycle = (await sale.getLifecycle()).lifecycle;
    } catch (e) {
      console.log(`- lifecycle query failed [attempt ${attempt}/${attempts}]: ${describeError(e)} ⚠️`);
      continue;
    }

    if (lifecycle === SaleLifecycle.Committed || lifecycle === SaleLifecycle.Aborted) {
      break;
    }

    if (lifecycle === SaleLifecycle.Open) {
      try {
        met = thresholdsMet(await sale.getDerivedState(), swapConfig);
      } catch (e) {
        console.log(`- derived state query failed [attempt ${attempt}/${attempts}]: ${describeError(e)} ⚠️`);
      }
    }
  }
  console.log(`- lifecycle: ${describeLifecycle(lifecycle)}`);

  if (lifecycle !== SaleLifecycle.Committed && met) {
    // Thresholds reached without a Committed observation: look once more before giving up
    try {
      lifecycle = (await sale.getLifecycle()).lifecycle;
      console.log(`- lifecycle re-checked: ${describeLifecycle(lifecycle)}`);
    } catch (e) {
      console.log(`- lifecycle re-check failed: ${describeError(e)} ⚠️`);
    }
    if (lifecycle !== SaleLifecycle.Committed) {
      console.log('- thresholds met but sale has not committed, not finalizing ⚠️');
    }
  }

  let finalized = false;
  if (lifecycle === SaleLifecycle.Committed) {
    // A committed sale has met its thresholds, whatever the last derived state read said
    met = true;
    finalized = await tryFinalize(sale);
  } else if (!met) {
    console.log('- thresholds not met, sale left as is 💤');
  }
  return { lifecycle, thresholdsMet: met, finalized };
};
