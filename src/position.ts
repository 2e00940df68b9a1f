import { runStep } from './error';
import type { DeployContext, FundedPosition } from './type';
import { formatDuration } from './util';

const STAGE = 'position';

export const configurePosition = async (context: DeployContext, positionId: bigint): Promise<FundedPosition> => {
  const { dissolveDelay } = context.config.stake;
  const lockSeconds = BigInt(dissolveDelay);

  console.log();
  console.log('Position config:');
  console.log(`- neuron: ${positionId}`);
  console.log(`- dissolve delay: ${dissolveDelay} secs (${formatDuration(lockSeconds)})`);

  // Issued once: a second call would add the delay again
  await runStep(STAGE, `Failed to increase dissolve delay of neuron ${positionId}`, () =>
    context.operator.services.governance.increaseDissolveDelay(positionId, dissolveDelay),
  );
  console.log('- dissolve delay: increased ✅');
  return { positionId, lockSeconds };
};
