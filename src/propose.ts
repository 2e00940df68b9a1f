import type { Principal } from '@dfinity/principal';

import { DeployError, PollTimeoutError, runStep } from './error';
import { pollUntil } from './poll';
import type { DeployContext, DeployedServiceSet, FundedPosition, ProposalResult, RequiredServiceSet } from './type';

const STAGE = 'proposal';

const formatPrincipal = (principal: Principal | undefined): string => {
  return principal?.toText() ?? 'missing ❌';
};

export const requireServices = (services: DeployedServiceSet, proposalId: bigint): RequiredServiceSet => {
  const { governance, ledger, swap } = services;
  const missing = [
    governance == null ? 'governance' : undefined,
    ledger == null ? 'ledger' : undefined,
    swap == null ? 'swap' : undefined,
  ].filter((name) => name != null);

  if (governance == null || ledger == null || swap == null) {
    throw new DeployError(
      STAGE,
      `Service deployed by proposal ${proposalId} is missing required endpoints: ${missing.join(', ')}`,
    );
  }
  return { ...services, governance, ledger, swap };
};

/**
 * Submits the service creation proposal from the funded position and waits for the
 * factory to report the deployed service set.
 */
export const submitProposal = async (context: DeployContext, position: FundedPosition): Promise<ProposalResult> => {
  const { config, operator } = context;
  const { governance, factory } = operator.services;

  console.log();
  console.log('Proposal:');
  console.log(`- title: ${config.proposal.title}`);
  console.log(`- neuron: ${position.positionId}`);

  const proposalId = await runStep(STAGE, 'Failed to submit service creation proposal', () =>
    governance.makeProposal(position.positionId, config.proposal, operator.principal),
  );
  console.log(`- proposal: ${proposalId} ✅`);

  const budget = config.execution.proposalPoll;
  console.log(`- waiting for execution (${budget.attempts} x ${budget.interval} ms) ⏳`);

  try {
    const result = await pollUntil<DeployedServiceSet | undefined>({
      label: `Proposal ${proposalId} execution`,
      budget,
      delayFirst: true,
      check: async () => {
        try {
          return await factory.getDeployedByProposal(proposalId);
        } catch {
          // Not deployed yet, or the factory is not answering yet
          return undefined;
        }
      },
      isDone: (services) => services != null,
      describe: (services) => (services == null ? 'not deployed' : 'deployed'),
      onMiss: (_, attempt) => {
        if (attempt % 6 === 1) {
          console.log(`- still waiting (attempt ${attempt}/${budget.attempts}) 💤`);
        }
      },
    });
    console.log(`- executed after ${result.attempts} attempts ✅`);
  } catch (e) {
    if (!(e instanceof PollTimeoutError)) {
      throw e;
    }
    console.log(`- proposal ${proposalId} may not have executed, checking once more ⚠️`);
  }

  const deployed = await runStep(STAGE, `Failed to get service deployed by proposal ${proposalId}`, () =>
    factory.getDeployedByProposal(proposalId),
  );
  const services = requireServices(deployed, proposalId);

  console.log();
  console.log('Deployed service:');
  console.log(`- root: ${formatPrincipal(services.root)}`);
  console.log(`- governance: ${services.governance.toText()}`);
  console.log(`- ledger: ${services.ledger.toText()}`);
  console.log(`- swap: ${services.swap.toText()}`);
  console.log(`- index: ${formatPrincipal(services.index)}`);
  return { proposalId, services };
};
