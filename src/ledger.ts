import type { ActorSubclass } from '@dfinity/agent';

import { RemoteError } from './error';
import type { LedgerAccount, LedgerService, TransferError } from './idl/ledger';
import type { Account, LedgerClient } from './type';
import { jsonStringify } from './util';

export const toLedgerAccount = (account: Account): LedgerAccount => {
  return {
    owner: account.owner,
    subaccount: account.subaccount ? [account.subaccount] : [],
  };
};

export const describeTransferError = (error: TransferError): string => {
  if ('InsufficientFunds' in error) {
    return `insufficient funds (balance ${error.InsufficientFunds.balance})`;
  }
  if ('BadFee' in error) {
    return `bad fee (expected ${error.BadFee.expected_fee})`;
  }
  if ('GenericError' in error) {
    return `${error.GenericError.message} (code ${error.GenericError.error_code})`;
  }
  return jsonStringify(error);
};

export const createLedgerClient = (actor: ActorSubclass<LedgerService>): LedgerClient => {
  const transfer = async (to: Account, amount: bigint): Promise<bigint> => {
    const result = await actor.icrc1_transfer({
      to: toLedgerAccount(to),
      fee: [],
      memo: [],
      from_subaccount: [],
      created_at_time: [],
      amount,
    });
    if ('Err' in result) {
      throw new RemoteError('icrc1_transfer', describeTransferError(result.Err));
    }
    return result.Ok;
  };

  const balanceOf = async (account: Account): Promise<bigint> => {
    return await actor.icrc1_balance_of(toLedgerAccount(account));
  };

  const fee = async (): Promise<bigint> => {
    return await actor.icrc1_fee();
  };

  return { transfer, balanceOf, fee };
};
