import type { ActorMethod } from '@dfinity/agent';
import type { IDL } from '@dfinity/candid';
import type { Principal } from '@dfinity/principal';

export type DeployedSns = {
  root_canister_id: [] | [Principal];
  governance_canister_id: [] | [Principal];
  index_canister_id: [] | [Principal];
  swap_canister_id: [] | [Principal];
  ledger_canister_id: [] | [Principal];
};

export type GetDeployedSnsByProposalIdResult = { Error: { message: string } } | { DeployedSns: DeployedSns };

export type GetDeployedSnsByProposalIdResponse = {
  get_deployed_sns_by_proposal_id_result: [] | [GetDeployedSnsByProposalIdResult];
};

export type FactoryService = {
  get_deployed_sns_by_proposal_id: ActorMethod<[{ proposal_id: bigint }], GetDeployedSnsByProposalIdResponse>;
  list_deployed_snses: ActorMethod<[Record<string, never>], { instances: DeployedSns[] }>;
};

export const factoryIdlFactory: IDL.InterfaceFactory = ({ IDL }) => {
  const DeployedSns = IDL.Record({
    root_canister_id: IDL.Opt(IDL.Principal),
    governance_canister_id: IDL.Opt(IDL.Principal),
    index_canister_id: IDL.Opt(IDL.Principal),
    swap_canister_id: IDL.Opt(IDL.Principal),
    ledger_canister_id: IDL.Opt(IDL.Principal),
  });
  const GetDeployedSnsByProposalIdResult = IDL.Variant({
    Error: IDL.Record({ message: IDL.Text }),
    DeployedSns: DeployedSns,
  });

  return IDL.Service({
    get_deployed_sns_by_proposal_id: IDL.Func(
      [IDL.Record({ proposal_id: IDL.Nat64 })],
      [IDL.Record({ get_deployed_sns_by_proposal_id_result: IDL.Opt(GetDeployedSnsByProposalIdResult) })],
      ['query'],
    ),
    list_deployed_snses: IDL.Func([IDL.Record({})], [IDL.Record({ instances: IDL.Vec(DeployedSns) })], ['query']),
  });
};
