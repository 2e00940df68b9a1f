import type { ActorSubclass } from '@dfinity/agent';

import { RemoteError } from './error';
import type { DeployedSns, FactoryService } from './idl/factory';
import type { DeployedServiceSet, FactoryClient } from './type';

export const toDeployedServiceSet = (sns: DeployedSns): DeployedServiceSet => {
  return {
    root: sns.root_canister_id[0],
    governance: sns.governance_canister_id[0],
    index: sns.index_canister_id[0],
    swap: sns.swap_canister_id[0],
    ledger: sns.ledger_canister_id[0],
  };
};

export const createFactoryClient = (actor: ActorSubclass<FactoryService>): FactoryClient => {
  const getDeployedByProposal = async (proposalId: bigint): Promise<DeployedServiceSet> => {
    const response = await actor.get_deployed_sns_by_proposal_id({ proposal_id: proposalId });
    const result = response.get_deployed_sns_by_proposal_id_result[0];
    if (result == null) {
      throw new RemoteError('get_deployed_sns_by_proposal_id', `no result for proposal ${proposalId}`);
    }
    if ('Error' in result) {
      throw new RemoteError('get_deployed_sns_by_proposal_id', result.Error.message);
    }
    return toDeployedServiceSet(result.DeployedSns);
  };

  const listDeployed = async (): Promise<DeployedServiceSet[]> => {
    const response = await actor.list_deployed_snses({});
    return response.instances.map(toDeployedServiceSet);
  };

  return { getDeployedByProposal, listDeployed };
};
