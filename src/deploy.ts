import { finalizeSale } from './finalize';
import { runParticipants, validateParticipationAmount } from './participant';
import { configurePosition } from './position';
import { submitProposal } from './propose';
import { buildRecord, saveRecord } from './record';
import { waitForSaleOpen } from './saleOpen';
import { fundStake } from './stake';
import type { DeployContext, DeploymentRecord } from './type';

/**
 * Runs the whole bootstrap: stake, position, proposal, sale open, participants,
 * finalize. The record is written once, after the last stage.
 */
export const runDeployment = async (context: DeployContext): Promise<DeploymentRecord> => {
  const { config } = context;
  validateParticipationAmount(config.participants.amount, config.proposal.swap);

  const positionId = await fundStake(context);
  const position = await configurePosition(context, positionId);
  const proposal = await submitProposal(context, position);
  await waitForSaleOpen(context, proposal.services.swap);
  const participants = await runParticipants(context, proposal.services);
  const sale = await finalizeSale(context, proposal.services.swap);

  const record = buildRecord({
    position,
    proposal,
    owner: context.operator.principal,
    participants,
    sale,
  });
  await saveRecord(config.output.dir, record);

  console.log();
  console.log('Deployment finished 🏁');
  return record;
};
