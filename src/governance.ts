import type { ActorSubclass } from '@dfinity/agent';
import type { Principal } from '@dfinity/principal';

import { NEURON_LIST_PAGE_SIZE } from './constant';
import { RemoteError } from './error';
import type {
  GovernanceService,
  ManageNeuronCommandRequest,
  ManageNeuronCommandResponse,
  Neuron,
  Operation,
} from './idl/governance';
import { buildCreateServiceNervousSystem } from './proposal';
import type { ConfigProposal, DissolveState, GovernanceClient, NeuronSummary } from './type';

export const VISIBILITY_PRIVATE = 1;
export const VISIBILITY_PUBLIC = 2;

export const toNeuronSummary = (neuron: Neuron): NeuronSummary => {
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
    id: id.id,
    stake: neuron.cached_neuron_stake_e8s,
    dissolve,
    controller: neuron.controller[0],
    hotKeys: neuron.hot_keys,
    visibility: neuron.visibility[0],
  };
};

export const createGovernanceClient = (actor: ActorSubclass<GovernanceService>): GovernanceClient => {
  const manage = async (
    label: string,
    neuronId: bigint | undefined,
    command: ManageNeuronCommandRequest,
  ): Promise<ManageNeuronCommandResponse> => {
    const response = await actor.manage_neuron({
      id: neuronId == null ? [] : [{ id: neuronId }],
      command: [command],
      neuron_id_or_subaccount: [],
    });

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

  const configure = async (label: string, neuronId: bigint, operation: Operation): Promise<void> => {
    const result = await manage(label, neuronId, { Configure: { operation: [operation] } });
    if (!('Configure' in result)) {
      throw new RemoteError(`manage_neuron ${label}`, 'unexpected response');
    }
  };

  const claimNeuron = async (memo: bigint): Promise<bigint> => {
    const result = await manage('claim', undefined, { ClaimOrRefresh: { by: [{ Memo: memo }] } });
    const id = 'ClaimOrRefresh' in result ? result.ClaimOrRefresh.refreshed_neuron_id[0] : undefined;
    if (id == null) {
      throw new RemoteError('manage_neuron claim', 'no neuron id in response');
    }
    return id.id;
  };

  const increaseDissolveDelay = async (neuronId: bigint, seconds: number): Promise<void> => {
    await configure('increase dissolve delay', neuronId, {
      IncreaseDissolveDelay: { additional_dissolve_delay_seconds: seconds },
    });
  };

  const makeProposal = async (neuronId: bigint, proposal: ConfigProposal, owner: Principal): Promise<bigint> => {
    const result = await manage('make proposal', neuronId, {
      MakeProposal: {
        url: proposal.url,
        title: [proposal.title],
        summary: proposal.summary,
        action: [{ CreateServiceNervousSystem: buildCreateServiceNervousSystem(proposal, owner) }],
      },
    });
    const id = 'MakeProposal' in result ? result.MakeProposal.proposal_id[0] : undefined;
    if (id == null) {
      const message = 'MakeProposal' in result ? result.MakeProposal.message[0] : undefined;
      throw new RemoteError('manage_neuron make proposal', message ?? 'no proposal id in response');
    }
    return id.id;
  };

  const addHotKey = async (neuronId: bigint, hotKey: Principal): Promise<void> => {
    await configure('add hot key', neuronId, { AddHotKey: { new_hot_key: [hotKey] } });
  };

  const setVisibility = async (neuronId: bigint, isPublic: boolean): Promise<void> => {
    const visibility = isPublic ? VISIBILITY_PUBLIC : VISIBILITY_PRIVATE;
    await configure('set visibility', neuronId, { SetVisibility: { visibility: [visibility] } });
  };

  const startDissolving = async (neuronId: bigint): Promise<void> => {
    await configure('start dissolving', neuronId, { StartDissolving: {} });
  };

  const stopDissolving = async (neuronId: bigint): Promise<void> => {
    await configure('stop dissolving', neuronId, { StopDissolving: {} });
  };

  const disburse = async (
    neuronId: bigint,
    toAccount: Uint8Array | undefined,
    amount: bigint | undefined,
  ): Promise<bigint> => {
    const result = await manage('disburse', neuronId, {
      Disburse: {
        to_account: toAccount == null ? [] : [{ hash: toAccount }],
        amount: amount == null ? [] : [{ e8s: amount }],
      },
    });
    if (!('Disburse' in result)) {
      throw new RemoteError('manage_neuron disburse', 'unexpected response');
    }
    return result.Disburse.transfer_block_height;
  };

  const listNeurons = async (): Promise<NeuronSummary[]> => {
    const neurons: NeuronSummary[] = [];
    for (let page = 0n; ; page++) {
      const response = await actor.list_neurons({
        page_size: [NEURON_LIST_PAGE_SIZE],
        include_public_neurons_in_full_neurons: [false],
        neuron_ids: [],
        page_number: [page],
        include_empty_neurons_readable_by_caller: [false],
        neuron_subaccounts: [],
        include_neurons_readable_by_caller: true,
      });
      neurons.push(...response.full_neurons.map(toNeuronSummary));

      const pages = response.total_pages_available[0] ?? 1n;
      if (page + 1n >= pages) {
        return neurons;
      }
    }
  };

  const getNeuron = async (neuronId: bigint): Promise<NeuronSummary> => {
    const result = await actor.get_full_neuron(neuronId);
    if ('Err' in result) {
      throw new RemoteError('get_full_neuron', `${result.Err.error_message} (type ${result.Err.error_type})`);
    }
    return toNeuronSummary(result.Ok);
  };

  return {
    claimNeuron,
    increaseDissolveDelay,
    makeProposal,
    addHotKey,
    setVisibility,
    startDissolving,
    stopDissolving,
    disburse,
    listNeurons,
    getNeuron,
  };
};
