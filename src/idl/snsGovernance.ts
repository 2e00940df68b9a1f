import type { ActorMethod } from '@dfinity/agent';
import type { IDL } from '@dfinity/candid';
import type { Principal } from '@dfinity/principal';

import type { Blob } from './ledger';

// Subset of a deployed service's governance interface: neuron listing, neuron
// management and the nervous system parameters

export type SnsNeuronId = { id: Blob };

export type SnsProposalId = { id: bigint };

export type SnsDissolveState = { DissolveDelaySeconds: bigint } | { WhenDissolvedTimestampSeconds: bigint };

export type NeuronPermission = {
  principal: [] | [Principal];
  permission_type: number[];
};

export type SnsNeuron = {
  id: [] | [SnsNeuronId];
  permissions: NeuronPermission[];
  cached_neuron_stake_e8s: bigint;
  dissolve_state: [] | [SnsDissolveState];
};

export type SnsListNeurons = {
  of_principal: [] | [Principal];
  limit: number;
  start_page_at: [] | [SnsNeuronId];
};

export type SnsAccount = {
  owner: [] | [Principal];
  subaccount: [] | [{ subaccount: Blob }];
};

export type SnsOperation =
  | { StopDissolving: Record<string, never> }
  | { StartDissolving: Record<string, never> }
  | { IncreaseDissolveDelay: { additional_dissolve_delay_seconds: number } };

export type MintSnsTokens = {
  to_principal: [] | [Principal];
  to_subaccount: [] | [{ subaccount: Blob }];
  memo: [] | [bigint];
  amount_e8s: [] | [bigint];
};

export type SnsProposal = {
  url: string;
  title: string;
  action: [] | [{ MintSnsTokens: MintSnsTokens }];
  summary: string;
};

export type SnsCommandRequest =
  | {
      AddNeuronPermissions: {
        permissions_to_add: [] | [{ permissions: number[] }];
        principal_id: [] | [Principal];
      };
    }
  | { Disburse: { to_account: [] | [SnsAccount]; amount: [] | [{ e8s: bigint }] } }
  | { Configure: { operation: [] | [SnsOperation] } }
  | {
      ClaimOrRefresh: {
        by: [] | [{ MemoAndController: { controller: [] | [Principal]; memo: bigint } }];
      };
    }
  | { MakeProposal: SnsProposal }
  | { RegisterVote: { vote: number; proposal: [] | [SnsProposalId] } };

export type SnsManageNeuron = {
  subaccount: Blob;
  command: [] | [SnsCommandRequest];
};

export type SnsGovernanceError = { error_message: string; error_type: number };

export type SnsCommandResponse =
  | { Error: SnsGovernanceError }
  | { AddNeuronPermission: Record<string, never> }
  | { Disburse: { transfer_block_height: bigint } }
  | { Configure: Record<string, never> }
  | { ClaimOrRefresh: { refreshed_neuron_id: [] | [SnsNeuronId] } }
  | { MakeProposal: { proposal_id: [] | [SnsProposalId] } }
  | { RegisterVote: Record<string, never> };

export type SnsManageNeuronResponse = {
  command: [] | [SnsCommandResponse];
};

export type NervousSystemParameters = {
  neuron_minimum_stake_e8s: [] | [bigint];
  transaction_fee_e8s: [] | [bigint];
};

export type SnsGovernanceService = {
  list_neurons: ActorMethod<[SnsListNeurons], { neurons: SnsNeuron[] }>;
  manage_neuron: ActorMethod<[SnsManageNeuron], SnsManageNeuronResponse>;
  get_nervous_system_parameters: ActorMethod<[null], NervousSystemParameters>;
};

export const snsGovernanceIdlFactory: IDL.InterfaceFactory = ({ IDL }) => {
  const NeuronId = IDL.Record({ id: IDL.Vec(IDL.Nat8) });
  const ProposalId = IDL.Record({ id: IDL.Nat64 });
  const Subaccount = IDL.Record({ subaccount: IDL.Vec(IDL.Nat8) });
  const GovernanceError = IDL.Record({ error_message: IDL.Text, error_type: IDL.Int32 });

  const Neuron = IDL.Record({
    id: IDL.Opt(NeuronId),
    permissions: IDL.Vec(
      IDL.Record({
        principal: IDL.Opt(IDL.Principal),
        permission_type: IDL.Vec(IDL.Int32),
      }),
    ),
    cached_neuron_stake_e8s: IDL.Nat64,
    dissolve_state: IDL.Opt(
      IDL.Variant({
        DissolveDelaySeconds: IDL.Nat64,
        WhenDissolvedTimestampSeconds: IDL.Nat64,
      }),
    ),
  });

  const ListNeurons = IDL.Record({
    of_principal: IDL.Opt(IDL.Principal),
    limit: IDL.Nat32,
    start_page_at: IDL.Opt(NeuronId),
  });

  const Command = IDL.Variant({
    AddNeuronPermissions: IDL.Record({
      permissions_to_add: IDL.Opt(IDL.Record({ permissions: IDL.Vec(IDL.Int32) })),
      principal_id: IDL.Opt(IDL.Principal),
    }),
    Disburse: IDL.Record({
      to_account: IDL.Opt(IDL.Record({ owner: IDL.Opt(IDL.Principal), subaccount: IDL.Opt(Subaccount) })),
      amount: IDL.Opt(IDL.Record({ e8s: IDL.Nat64 })),
    }),
    Configure: IDL.Record({
      operation: IDL.Opt(
        IDL.Variant({
          StopDissolving: IDL.Record({}),
          StartDissolving: IDL.Record({}),
          IncreaseDissolveDelay: IDL.Record({ additional_dissolve_delay_seconds: IDL.Nat32 }),
        }),
      ),
    }),
    ClaimOrRefresh: IDL.Record({
      by: IDL.Opt(
        IDL.Variant({
          MemoAndController: IDL.Record({ controller: IDL.Opt(IDL.Principal), memo: IDL.Nat64 }),
        }),
      ),
    }),
    MakeProposal: IDL.Record({
      url: IDL.Text,
      title: IDL.Text,
      action: IDL.Opt(
        IDL.Variant({
          MintSnsTokens: IDL.Record({
            to_principal: IDL.Opt(IDL.Principal),
            to_subaccount: IDL.Opt(Subaccount),
            memo: IDL.Opt(IDL.Nat64),
            amount_e8s: IDL.Opt(IDL.Nat64),
          }),
        }),
      ),
      summary: IDL.Text,
    }),
    RegisterVote: IDL.Record({ vote: IDL.Int32, proposal: IDL.Opt(ProposalId) }),
  });

  const ManageNeuron = IDL.Record({ subaccount: IDL.Vec(IDL.Nat8), command: IDL.Opt(Command) });

  const ManageNeuronResponse = IDL.Record({
    command: IDL.Opt(
      IDL.Variant({
        Error: GovernanceError,
        AddNeuronPermission: IDL.Record({}),
        Disburse: IDL.Record({ transfer_block_height: IDL.Nat64 }),
        Configure: IDL.Record({}),
        ClaimOrRefresh: IDL.Record({ refreshed_neuron_id: IDL.Opt(NeuronId) }),
        MakeProposal: IDL.Record({ proposal_id: IDL.Opt(ProposalId) }),
        RegisterVote: IDL.Record({}),
      }),
    ),
  });

  const NervousSystemParameters = IDL.Record({
    neuron_minimum_stake_e8s: IDL.Opt(IDL.Nat64),
    transaction_fee_e8s: IDL.Opt(IDL.Nat64),
  });

  return IDL.Service({
    list_neurons: IDL.Func([ListNeurons], [IDL.Record({ neurons: IDL.Vec(Neuron) })], ['query']),
    manage_neuron: IDL.Func([ManageNeuron], [ManageNeuronResponse], []),
    get_nervous_system_parameters: IDL.Func([IDL.Null], [NervousSystemParameters], ['query']),
  });
};
