import type { ActorSubclass } from '@dfinity/agent';
import type { Principal } from '@dfinity/principal';

import { RemoteError } from './error';
import type { SaleService } from './idl/sale';
import type {
  SaleClient,
  SaleDerivedState,
  SaleFinalize,
  SaleLifecycleInfo,
  SaleRefresh,
  SaleTicketOutcome,
} from './type';
import { SaleLifecycle } from './type';

export const describeLifecycle = (lifecycle: number): string => {
  const name = SaleLifecycle[lifecycle];
  return name ? `${name} (${lifecycle})` : `unknown (${lifecycle})`;
};

export const createSaleClient = (actor: ActorSubclass<SaleService>): SaleClient => {
  const getLifecycle = async (): Promise<SaleLifecycleInfo> => {
    const response = await actor.get_lifecycle({});
    return {
      lifecycle: response.lifecycle[0] ?? SaleLifecycle.Unspecified,
      openTimestampSeconds: response.decentralization_sale_open_timestamp_seconds[0],
    };
  };

  const getDerivedState = async (): Promise<SaleDerivedState> => {
    const response = await actor.get_derived_state({});
    return {
      participantCount: response.direct_participant_count[0] ?? 0n,
      participationE8s: response.direct_participation_icp_e8s[0] ?? response.buyer_total_icp_e8s[0] ?? 0n,
    };
  };

  const newSaleTicket = async (amount: bigint, subaccount: Uint8Array): Promise<SaleTicketOutcome> => {
    const response = await actor.new_sale_ticket({ subaccount: [subaccount], amount_icp_e8s: amount });
    const result = response.result[0];
    if (result == null) {
      throw new RemoteError('new_sale_ticket', 'empty result');
    }
    if ('Ok' in result) {
      const ticket = result.Ok.ticket[0];
      if (ticket == null) {
        throw new RemoteError('new_sale_ticket', 'ticket missing in Ok result');
      }
      return { type: 'created', ticketId: ticket.ticket_id };
    }

    const existing = result.Err.existing_ticket[0];
    if (existing != null) {
      return { type: 'existing', ticketId: existing.ticket_id };
    }
    const invalid = result.Err.invalid_user_amount[0];
    if (invalid != null) {
      return {
        type: 'invalid-amount',
        min: invalid.min_amount_icp_e8s_included,
        max: invalid.max_amount_icp_e8s_included,
      };
    }
    return { type: 'rejected', errorType: result.Err.error_type };
  };

  const refreshBuyerTokens = async (buyer: Principal): Promise<SaleRefresh> => {
    const response = await actor.refresh_buyer_tokens({ confirmation_text: [], buyer: buyer.toText() });
    return {
      accepted: response.icp_accepted_participation_e8s,
      balance: response.icp_ledger_account_balance_e8s,
    };
  };

  const finalize = async (): Promise<SaleFinalize> => {
    const response = await actor.finalize_swap({});
    return { errorMessage: response.error_message[0] };
  };

  return { getLifecycle, getDerivedState, newSaleTicket, refreshBuyerTokens, finalize };
};
