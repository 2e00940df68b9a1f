import { runStep } from './error';
import { neuronStakeSubaccount } from './subaccount';
import type { DeployContext } from './type';
import { formatE8s, sleep } from './util';

const STAGE = 'stake';

/**
 * Mints the stake to the operator, moves it to the operator's neuron staking
 * sub-account of governance and claims the neuron by memo. Nothing here is retried.
 */
export const fundStake = async (context: DeployContext): Promise<bigint> => {
  const { config, operator, minting } = context;
  const { amount, fee, memo } = config.stake;
  const ledgerId = config.canisters.ledger;
  const subaccount = neuronStakeSubaccount(operator.principal, memo);

  console.log();
  console.log('Stake funding:');
  console.log(`- operator: ${operator.principal.toText()}`);
  console.log(`- amount: ${formatE8s(amount)}`);
  console.log(`- memo: ${memo}`);

  const mintBlock = await runStep(STAGE, 'Failed to mint stake to operator', () =>
    minting.services.ledger(ledgerId).transfer({ owner: operator.principal }, amount + fee),
  );
  console.log(`- minted: ${formatE8s(amount + fee)} at block ${mintBlock} ✅`);

  const stakeBlock = await runStep(STAGE, 'Failed to transfer stake to governance', () =>
    operator.services.ledger(ledgerId).transfer({ owner: config.canisters.governance, subaccount }, amount),
  );
  console.log(`- staked: block ${stakeBlock} ✅`);

  await sleep(config.execution.settleDelay);

  const positionId = await runStep(STAGE, `Failed to claim neuron with memo ${memo}`, () =>
    operator.services.governance.claimNeuron(memo),
  );
  console.log(`- neuron: ${positionId} ✅`);
  return positionId;
};
