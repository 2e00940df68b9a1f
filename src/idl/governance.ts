import type { ActorMethod } from '@dfinity/agent';
import type { IDL } from '@dfinity/candid';
import type { Principal } from '@dfinity/principal';

import type { Blob } from './ledger';

// Subset of the governance network interface: neuron management, listing and the
// service creation proposal

export type NeuronId = { id: bigint };

export type Tokens = { e8s: [] | [bigint] };
export type Duration = { seconds: [] | [bigint] };
export type Percentage = { basis_points: [] | [bigint] };
export type Image = { base64_encoding: [] | [string] };

export type LedgerParameters = {
  transaction_fee: [] | [Tokens];
  token_symbol: [] | [string];
  token_logo: [] | [Image];
  token_name: [] | [string];
};

export type GovernanceParameters = {
  neuron_maximum_dissolve_delay_bonus: [] | [Percentage];
  neuron_maximum_age_for_age_bonus: [] | [Duration];
  neuron_maximum_dissolve_delay: [] | [Duration];
  neuron_minimum_dissolve_delay_to_vote: [] | [Duration];
  neuron_maximum_age_bonus: [] | [Percentage];
  neuron_minimum_stake: [] | [Tokens];
  proposal_wait_for_quiet_deadline_increase: [] | [Duration];
  proposal_initial_voting_period: [] | [Duration];
  proposal_rejection_fee: [] | [Tokens];
  voting_reward_parameters:
    | []
    | [
        {
          reward_rate_transition_duration: [] | [Duration];
          initial_reward_rate: [] | [Percentage];
          final_reward_rate: [] | [Percentage];
        },
      ];
};

export type SwapParameters = {
  minimum_participants: [] | [bigint];
  neurons_fund_participation: [] | [boolean];
  duration: [] | [Duration];
  neuron_basket_construction_parameters: [] | [{ dissolve_delay_interval: [] | [Duration]; count: [] | [bigint] }];
  maximum_participant_icp: [] | [Tokens];
  minimum_direct_participation_icp: [] | [Tokens];
  minimum_participant_icp: [] | [Tokens];
  maximum_direct_participation_icp: [] | [Tokens];
  restricted_countries: [] | [{ iso_codes: string[] }];
};

export type NeuronDistribution = {
  controller: [] | [Principal];
  dissolve_delay: [] | [Duration];
  memo: [] | [bigint];
  stake: [] | [Tokens];
  vesting_period: [] | [Duration];
};

export type InitialTokenDistribution = {
  treasury_distribution: [] | [{ total: [] | [Tokens] }];
  developer_distribution: [] | [{ developer_neurons: NeuronDistribution[] }];
  swap_distribution: [] | [{ total: [] | [Tokens] }];
};

export type CreateServiceNervousSystem = {
  url: [] | [string];
  governance_parameters: [] | [GovernanceParameters];
  fallback_controller_principal_ids: Principal[];
  logo: [] | [Image];
  name: [] | [string];
  ledger_parameters: [] | [LedgerParameters];
  description: [] | [string];
  dapp_canisters: { id: [] | [Principal] }[];
  swap_parameters: [] | [SwapParameters];
  initial_token_distribution: [] | [InitialTokenDistribution];
};

export type Operation =
  | { AddHotKey: { new_hot_key: [] | [Principal] } }
  | { StopDissolving: Record<string, never> }
  | { StartDissolving: Record<string, never> }
  | { IncreaseDissolveDelay: { additional_dissolve_delay_seconds: number } }
  | { SetVisibility: { visibility: [] | [number] } };

export type ManageNeuronCommandRequest =
  | { ClaimOrRefresh: { by: [] | [{ Memo: bigint }] } }
  | { Configure: { operation: [] | [Operation] } }
  | {
      MakeProposal: {
        url: string;
        title: [] | [string];
        action: [] | [{ CreateServiceNervousSystem: CreateServiceNervousSystem }];
        summary: string;
      };
    }
  | { Disburse: { to_account: [] | [{ hash: Blob }]; amount: [] | [{ e8s: bigint }] } };

export type ManageNeuronRequest = {
  id: [] | [NeuronId];
  command: [] | [ManageNeuronCommandRequest];
  neuron_id_or_subaccount: [] | [{ NeuronId: NeuronId } | { Subaccount: Blob }];
};

export type GovernanceError = { error_message: string; error_type: number };

export type ManageNeuronCommandResponse =
  | { Error: GovernanceError }
  | { Configure: Record<string, never> }
  | { ClaimOrRefresh: { refreshed_neuron_id: [] | [NeuronId] } }
  | { MakeProposal: { message: [] | [string]; proposal_id: [] | [NeuronId] } }
  | { Disburse: { transfer_block_height: bigint } };

export type ManageNeuronResponse = {
  command: [] | [ManageNeuronCommandResponse];
};

export type Neuron = {
  id: [] | [NeuronId];
  controller: [] | [Principal];
  cached_neuron_stake_e8s: bigint;
  hot_keys: Principal[];
  dissolve_state: [] | [{ DissolveDelaySeconds: bigint } | { WhenDissolvedTimestampSeconds: bigint }];
  visibility: [] | [number];
};

export type ListNeurons = {
  page_size: [] | [bigint];
  include_public_neurons_in_full_neurons: [] | [boolean];
  neuron_ids: bigint[];
  page_number: [] | [bigint];
  include_empty_neurons_readable_by_caller: [] | [boolean];
  neuron_subaccounts: [] | [{ subaccount: Blob }[]];
  include_neurons_readable_by_caller: boolean;
};

export type ListNeuronsResponse = {
  full_neurons: Neuron[];
  total_pages_available: [] | [bigint];
};

export type GovernanceService = {
  manage_neuron: ActorMethod<[ManageNeuronRequest], ManageNeuronResponse>;
  list_neurons: ActorMethod<[ListNeurons], ListNeuronsResponse>;
  get_full_neuron: ActorMethod<[bigint], { Ok: Neuron } | { Err: GovernanceError }>;
};

export const governanceIdlFactory: IDL.InterfaceFactory = ({ IDL }) => {
  const NeuronId = IDL.Record({ id: IDL.Nat64 });
  const Tokens = IDL.Record({ e8s: IDL.Opt(IDL.Nat64) });
  const Duration = IDL.Record({ seconds: IDL.Opt(IDL.Nat64) });
  const Percentage = IDL.Record({ basis_points: IDL.Opt(IDL.Nat64) });
  const Image = IDL.Record({ base64_encoding: IDL.Opt(IDL.Text) });
  const GovernanceError = IDL.Record({ error_message: IDL.Text, error_type: IDL.Int32 });

  const CreateServiceNervousSystem = IDL.Record({
    url: IDL.Opt(IDL.Text),
    governance_parameters: IDL.Opt(
      IDL.Record({
        neuron_maximum_dissolve_delay_bonus: IDL.Opt(Percentage),
        neuron_maximum_age_for_age_bonus: IDL.Opt(Duration),
        neuron_maximum_dissolve_delay: IDL.Opt(Duration),
        neuron_minimum_dissolve_delay_to_vote: IDL.Opt(Duration),
        neuron_maximum_age_bonus: IDL.Opt(Percentage),
        neuron_minimum_stake: IDL.Opt(Tokens),
        proposal_wait_for_quiet_deadline_increase: IDL.Opt(Duration),
        proposal_initial_voting_period: IDL.Opt(Duration),
        proposal_rejection_fee: IDL.Opt(Tokens),
        voting_reward_parameters: IDL.Opt(
          IDL.Record({
            reward_rate_transition_duration: IDL.Opt(Duration),
            initial_reward_rate: IDL.Opt(Percentage),
            final_reward_rate: IDL.Opt(Percentage),
          }),
        ),
      }),
    ),
    fallback_controller_principal_ids: IDL.Vec(IDL.Principal),
    logo: IDL.Opt(Image),
    name: IDL.Opt(IDL.Text),
    ledger_parameters: IDL.Opt(
      IDL.Record({
        transaction_fee: IDL.Opt(Tokens),
        token_symbol: IDL.Opt(IDL.Text),
        token_logo: IDL.Opt(Image),
        token_name: IDL.Opt(IDL.Text),
      }),
    ),
    description: IDL.Opt(IDL.Text),
    dapp_canisters: IDL.Vec(IDL.Record({ id: IDL.Opt(IDL.Principal) })),
    swap_parameters: IDL.Opt(
      IDL.Record({
        minimum_participants: IDL.Opt(IDL.Nat64),
        neurons_fund_participation: IDL.Opt(IDL.Bool),
        duration: IDL.Opt(Duration),
        neuron_basket_construction_parameters: IDL.Opt(
          IDL.Record({ dissolve_delay_interval: IDL.Opt(Duration), count: IDL.Opt(IDL.Nat64) }),
        ),
        maximum_participant_icp: IDL.Opt(Tokens),
        minimum_direct_participation_icp: IDL.Opt(Tokens),
        minimum_participant_icp: IDL.Opt(Tokens),
        maximum_direct_participation_icp: IDL.Opt(Tokens),
        restricted_countries: IDL.Opt(IDL.Record({ iso_codes: IDL.Vec(IDL.Text) })),
      }),
    ),
    initial_token_distribution: IDL.Opt(
      IDL.Record({
        treasury_distribution: IDL.Opt(IDL.Record({ total: IDL.Opt(Tokens) })),
        developer_distribution: IDL.Opt(
          IDL.Record({
            developer_neurons: IDL.Vec(
              IDL.Record({
                controller: IDL.Opt(IDL.Principal),
                dissolve_delay: IDL.Opt(Duration),
                memo: IDL.Opt(IDL.Nat64),
                stake: IDL.Opt(Tokens),
                vesting_period: IDL.Opt(Duration),
              }),
            ),
          }),
        ),
        swap_distribution: IDL.Opt(IDL.Record({ total: IDL.Opt(Tokens) })),
      }),
    ),
  });

  const Operation = IDL.Variant({
    AddHotKey: IDL.Record({ new_hot_key: IDL.Opt(IDL.Principal) }),
    StopDissolving: IDL.Record({}),
    StartDissolving: IDL.Record({}),
    IncreaseDissolveDelay: IDL.Record({ additional_dissolve_delay_seconds: IDL.Nat32 }),
    SetVisibility: IDL.Record({ visibility: IDL.Opt(IDL.Int32) }),
  });

  const ManageNeuronCommandRequest = IDL.Variant({
    ClaimOrRefresh: IDL.Record({ by: IDL.Opt(IDL.Variant({ Memo: IDL.Nat64 })) }),
    Configure: IDL.Record({ operation: IDL.Opt(Operation) }),
    MakeProposal: IDL.Record({
      url: IDL.Text,
      title: IDL.Opt(IDL.Text),
      action: IDL.Opt(IDL.Variant({ CreateServiceNervousSystem })),
      summary: IDL.Text,
    }),
    Disburse: IDL.Record({
      to_account: IDL.Opt(IDL.Record({ hash: IDL.Vec(IDL.Nat8) })),
      amount: IDL.Opt(IDL.Record({ e8s: IDL.Nat64 })),
    }),
  });

  const ManageNeuronRequest = IDL.Record({
    id: IDL.Opt(NeuronId),
    command: IDL.Opt(ManageNeuronCommandRequest),
    neuron_id_or_subaccount: IDL.Opt(IDL.Variant({ NeuronId, Subaccount: IDL.Vec(IDL.Nat8) })),
  });

  const ManageNeuronResponse = IDL.Record({
    command: IDL.Opt(
      IDL.Variant({
        Error: GovernanceError,
        Configure: IDL.Record({}),
        ClaimOrRefresh: IDL.Record({ refreshed_neuron_id: IDL.Opt(NeuronId) }),
        MakeProposal: IDL.Record({ message: IDL.Opt(IDL.Text), proposal_id: IDL.Opt(NeuronId) }),
        Disburse: IDL.Record({ transfer_block_height: IDL.Nat64 }),
      }),
    ),
  });

  const Neuron = IDL.Record({
    id: IDL.Opt(NeuronId),
    controller: IDL.Opt(IDL.Principal),
    cached_neuron_stake_e8s: IDL.Nat64,
    hot_keys: IDL.Vec(IDL.Principal),
    dissolve_state: IDL.Opt(
      IDL.Variant({
        DissolveDelaySeconds: IDL.Nat64,
        WhenDissolvedTimestampSeconds: IDL.Nat64,
      }),
    ),
    visibility: IDL.Opt(IDL.Int32),
  });

  const ListNeurons = IDL.Record({
    page_size: IDL.Opt(IDL.Nat64),
    include_public_neurons_in_full_neurons: IDL.Opt(IDL.Bool),
    neuron_ids: IDL.Vec(IDL.Nat64),
    page_number: IDL.Opt(IDL.Nat64),
    include_empty_neurons_readable_by_caller: IDL.Opt(IDL.Bool),
    neuron_subaccounts: IDL.Opt(IDL.Vec(IDL.Record({ subaccount: IDL.Vec(IDL.Nat8) }))),
    include_neurons_readable_by_caller: IDL.Bool,
  });

  return IDL.Service({
    manage_neuron: IDL.Func([ManageNeuronRequest], [ManageNeuronResponse], []),
    list_neurons: IDL.Func(
      [ListNeurons],
      [IDL.Record({ full_neurons: IDL.Vec(Neuron), total_pages_available: IDL.Opt(IDL.Nat64) })],
      ['query'],
    ),
    get_full_neuron: IDL.Func([IDL.Nat64], [IDL.Variant({ Ok: Neuron, Err: GovernanceError })], ['query']),
  });
};
