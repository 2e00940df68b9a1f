import type { ActorMethod } from '@dfinity/agent';
import type { IDL } from '@dfinity/candid';
import type { Principal } from '@dfinity/principal';

import type { Blob } from './ledger';

export type GetLifecycleResponse = {
  decentralization_sale_open_timestamp_seconds: [] | [bigint];
  lifecycle: [] | [number];
  decentralization_swap_termination_timestamp_seconds: [] | [bigint];
};

export type GetDerivedStateResponse = {
  direct_participant_count: [] | [bigint];
  direct_participation_icp_e8s: [] | [bigint];
  buyer_total_icp_e8s: [] | [bigint];
};

export type Ticket = {
  creation_time: bigint;
  ticket_id: bigint;
  account: [] | [{ owner: [] | [Principal]; subaccount: [] | [Blob] }];
  amount_icp_e8s: bigint;
};

export type NewSaleTicketError = {
  invalid_user_amount: [] | [{ min_amount_icp_e8s_included: bigint; max_amount_icp_e8s_included: bigint }];
  existing_ticket: [] | [Ticket];
  error_type: number;
};

export type NewSaleTicketResponse = {
  result: [] | [{ Ok: { ticket: [] | [Ticket] } } | { Err: NewSaleTicketError }];
};

export type RefreshBuyerTokensResponse = {
  icp_accepted_participation_e8s: bigint;
  icp_ledger_account_balance_e8s: bigint;
};

export type FinalizeSwapResponse = {
  error_message: [] | [string];
};

export type SaleService = {
  get_lifecycle: ActorMethod<[Record<string, never>], GetLifecycleResponse>;
  get_derived_state: ActorMethod<[Record<string, never>], GetDerivedStateResponse>;
  new_sale_ticket: ActorMethod<[{ subaccount: [] | [Blob]; amount_icp_e8s: bigint }], NewSaleTicketResponse>;
  refresh_buyer_tokens: ActorMethod<
    [{ confirmation_text: [] | [string]; buyer: string }],
    RefreshBuyerTokensResponse
  >;
  finalize_swap: ActorMethod<[Record<string, never>], FinalizeSwapResponse>;
};

export const saleIdlFactory: IDL.InterfaceFactory = ({ IDL }) => {
  const Ticket = IDL.Record({
    creation_time: IDL.Nat64,
    ticket_id: IDL.Nat64,
    account: IDL.Opt(
      IDL.Record({
        owner: IDL.Opt(IDL.Principal),
        subaccount: IDL.Opt(IDL.Vec(IDL.Nat8)),
      }),
    ),
    amount_icp_e8s: IDL.Nat64,
  });
  const NewSaleTicketError = IDL.Record({
    invalid_user_amount: IDL.Opt(
      IDL.Record({
        min_amount_icp_e8s_included: IDL.Nat64,
        max_amount_icp_e8s_included: IDL.Nat64,
      }),
    ),
    existing_ticket: IDL.Opt(Ticket),
    error_type: IDL.Int32,
  });

  return IDL.Service({
    get_lifecycle: IDL.Func(
      [IDL.Record({})],
      [
        IDL.Record({
          decentralization_sale_open_timestamp_seconds: IDL.Opt(IDL.Nat64),
          lifecycle: IDL.Opt(IDL.Int32),
          decentralization_swap_termination_timestamp_seconds: IDL.Opt(IDL.Nat64),
        }),
      ],
      ['query'],
    ),
    get_derived_state: IDL.Func(
      [IDL.Record({})],
      [
        IDL.Record({
          direct_participant_count: IDL.Opt(IDL.Nat64),
          direct_participation_icp_e8s: IDL.Opt(IDL.Nat64),
          buyer_total_icp_e8s: IDL.Opt(IDL.Nat64),
        }),
      ],
      ['query'],
    ),
    new_sale_ticket: IDL.Func(
      [IDL.Record({ subaccount: IDL.Opt(IDL.Vec(IDL.Nat8)), amount_icp_e8s: IDL.Nat64 })],
      [
        IDL.Record({
          result: IDL.Opt(
            IDL.Variant({
              Ok: IDL.Record({ ticket: IDL.Opt(Ticket) }),
              Err: NewSaleTicketError,
            }),
          ),
        }),
      ],
      [],
    ),
    refresh_buyer_tokens: IDL.Func(
      [IDL.Record({ confirmation_text: IDL.Opt(IDL.Text), buyer: IDL.Text })],
      [
        IDL.Record({
          icp_accepted_participation_e8s: IDL.Nat64,
          icp_ledger_account_balance_e8s: IDL.Nat64,
        }),
      ],
      [],
    ),
    finalize_swap: IDL.Func([IDL.Record({})], [IDL.Record({ error_message: IDL.Opt(IDL.Text) })], []),
  });
};
