import type { ActorSubclass } from '@dfinity/agent';
import type { Principal } from '@dfinity/principal';

import { SNS_NEURON_LIST_LIMIT } from './constant';
import { RemoteError } from './error';
import type {
  SnsCommandRequest,
  SnsCommandResponse,
  SnsGovernanceService,
  SnsNeuron,
  SnsOperation,
} from './idl/snsGovernance';
import { neuronStakeSubaccount } from './subaccount';
import type { DissolveState, SnsGovernanceClient, SnsNeuronSummary } from './type';

export const VOTE_YES = 1;

export const toSnsNeuronSummary = (neuron: SnsNeuron): SnsNeuronSummary => {
  const id = neuron.id[0];
  if (id == null) {
    throw new RemoteError('list_neurons', 'neuron without id');
  }

  const state = neuron.dissolve_state[0];
  let dissolve: DissolveState = { type: 'none' };
  if (state != null && 'DissolveDelaySeconds' in state) {
    dissolve = { type: 'delay', seconds: state.DissolveDelaySeconds };
  } else if (state != null) {
    dissolve = { type: 'dissolving', whenDissolvedSeconds: state.WhenDissolvedTimestampSeconds };
  }

  return {
    id: Uint8Array.from(id.id),
    stake: neuron.cached_neuron_stake_e8s,
    dissolve,
    permissions: neuron.permissions.map((permission) => ({
      principal: permission.principal[0],
      permissionTypes: permission.permission_type,
    })),
  };
};

export const createSnsGovernanceClient = (actor: ActorSubclass<SnsGovernanceService>): SnsGovernanceClient => {
  const manage = async (
    label: string,
    subaccount: Uint8Array,
    command: SnsCommandRequest,
  ): Promise<SnsCommandResponse> => {
    const response = await actor.manage_neuron({ subaccount, command: [command] });

    const result = response.command[0];
    if (result == null) {
      throw new RemoteError(`manage_neuron ${label}`, 'empty response');
    }
    if ('Error' in result) {
      throw new RemoteError(
        `manage_neuron ${label}`,
        `${result.Error.error_message} (type ${result.Error.error_type})`,
      );
    }
    return result;
  };

  const configure = async (label: string, neuronId: Uint8Array, operation: SnsOperation): Promise<void> => {
    const result = await manage(label, neuronId, { Configure: { operation: [operation] } });
    if (!('Configure' in result)) {
      throw new RemoteError(`manage_neuron ${label}`, 'unexpected response');
    }
  };

  const listNeurons = async (owner: Principal): Promise<SnsNeuronSummary[]> => {
    const response = await actor.list_neurons({
      of_principal: [owner],
      limit: SNS_NEURON_LIST_LIMIT,
      start_page_at: [],
    });
    return response.neurons.map(toSnsNeuronSummary);
  };

  const minimumStake = async (): Promise<bigint> => {
    const parameters = await actor.get_nervous_system_parameters(null);
    const stake = parameters.neuron_minimum_stake_e8s[0];
    if (stake == null) {
      throw new RemoteError('get_nervous_system_parameters', 'neuron minimum stake not set');
    }
    return stake;
  };

  const claimNeuron = async (memo: bigint, controller: Principal): Promise<Uint8Array> => {
    const result = await manage('claim', neuronStakeSubaccount(controller, memo), {
      ClaimOrRefresh: { by: [{ MemoAndController: { controller: [controller], memo } }] },
    });
    const id = 'ClaimOrRefresh' in result ? result.ClaimOrRefresh.refreshed_neuron_id[0] : undefined;
    if (id == null) {
      throw new RemoteError('manage_neuron claim', 'no neuron id in response');
    }
    return Uint8Array.from(id.id);
  };

  const addPermissions = async (
    neuronId: Uint8Array,
    principal: Principal,
    permissionTypes: readonly number[],
  ): Promise<void> => {
    const result = await manage('add permissions', neuronId, {
      AddNeuronPermissions: {
        permissions_to_add: [{ permissions: [...permissionTypes] }],
        principal_id: [principal],
      },
    });
    if (!('AddNeuronPermission' in result)) {
      throw new RemoteError('manage_neuron add permissions', 'unexpected response');
    }
  };

  const increaseDissolveDelay = async (neuronId: Uint8Array, seconds: number): Promise<void> => {
    await configure('increase dissolve delay', neuronId, {
      IncreaseDissolveDelay: { additional_dissolve_delay_seconds: seconds },
    });
  };

  const startDissolving = async (neuronId: Uint8Array): Promise<void> => {
    await configure('start dissolving', neuronId, { StartDissolving: {} });
  };

  const stopDissolving = async (neuronId: Uint8Array): Promise<void> => {
    await configure('stop dissolving', neuronId, { StopDissolving: {} });
  };

  const disburse = async (neuronId: Uint8Array, to: Principal, amount: bigint | undefined): Promise<bigint> => {
    const result = await manage('disburse', neuronId, {
      Disburse: {
        to_account: [{ owner: [to], subaccount: [] }],
        amount: amount == null ? [] : [{ e8s: amount }],
      },
    });
    if (!('Disburse' in result)) {
      throw new RemoteError('manage_neuron disburse', 'unexpected response');
    }
    return result.Disburse.transfer_block_height;
  };

  const proposeMint = async (neuronId: Uint8Array, to: Principal, amount: bigint): Promise<bigint> => {
    const result = await manage('make proposal', neuronId, {
      MakeProposal: {
        url: '',
        title: `Mint ${amount} tokens to ${to.toText()}`,
        summary: `Proposal to mint ${amount} e8s tokens to principal ${to.toText()}`,
        action: [{ MintSnsTokens: { to_principal: [to], to_subaccount: [], memo: [], amount_e8s: [amount] } }],
      },
    });
    const id = 'MakeProposal' in result ? result.MakeProposal.proposal_id[0] : undefined;
    if (id == null) {
      throw new RemoteError('manage_neuron make proposal', 'no proposal id in response');
    }
    return id.id;
  };

  const registerVote = async (neuronId: Uint8Array, proposalId: bigint, vote: number): Promise<void> => {
    const result = await manage('register vote', neuronId, {
      RegisterVote: { vote, proposal: [{ id: proposalId }] },
    });
    if (!('RegisterVote' in result)) {
      throw new RemoteError('manage_neuron register vote', 'unexpected response');
    }
  };

  return {
    listNeurons,
    minimumStake,
    claimNeuron,
    addPermissions,
    increaseDissolveDelay,
    startDissolving,
    stopDissolving,
    disburse,
    proposeMint,
    registerVote,
  };
};
