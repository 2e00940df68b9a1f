import type { Identity } from '@dfinity/agent';
import type { Principal } from '@dfinity/principal';

import { DeployError, describeError, runStep } from './error';
import { identityFromSeed, participantSeed, participantSeedPath, saveSeed } from './identity';
import { runPool } from './pool';
import { principalSubaccount } from './subaccount';
import type {
  ConfigProposalSwap,
  DeployContext,
  Participant,
  RegistrationOutcome,
  RequiredServiceSet,
  Services,
} from './type';
import { formatE8s, sleep } from './util';

const STAGE = 'participants';

type ParticipantKey = {
  ordinal: number;
  seed: Uint8Array;
  seedFile: string;
  identity: Identity;
  principal: Principal;
  saleSubaccount: Uint8Array;
};

/**
 * Local check of the participation amount against the sale's per-participant bounds.
 */
export const validateParticipationAmount = (amount: bigint, swap: ConfigProposalSwap): void => {
  if (amount < swap.minimumParticipant) {
    throw new DeployError(
      STAGE,
      `Participation amount ${formatE8s(amount)} is below the per-participant minimum ` +
        formatE8s(swap.minimumParticipant),
    );
  }
  if (amount > swap.maximumParticipant) {
    throw new DeployError(
      STAGE,
      `Participation amount ${formatE8s(amount)} is above the per-participant maximum ` +
        formatE8s(swap.maximumParticipant),
    );
  }
};

export const deriveParticipantKey = (outputDir: string, ordinal: number): ParticipantKey => {
  const seed = participantSeed(ordinal);
  const identity = identityFromSeed(seed);
  const principal = identity.getPrincipal();
  return {
    ordinal,
    seed,
    seedFile: participantSeedPath(outputDir, ordinal),
    identity,
    principal,
    saleSubaccount: principalSubaccount(principal),
  };
};

const logParticipant = (key: ParticipantKey, total: number, message: string): void => {
  console.log(`Participant #${key.ordinal} (${total}): ${message}`);
};

const registerParticipant = async (
  context: DeployContext,
  services: Services,
  key: ParticipantKey,
  swap: Principal,
  total: number,
): Promise<RegistrationOutcome> => {
  const { attempts, interval } = context.config.execution.refresh;
  const sale = services.sale(swap);

  let outcome: RegistrationOutcome = 'failed';
  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      const refresh = await sale.refreshBuyerTokens(key.principal);
      if (refresh.accepted > 0n) {
        logParticipant(key, total, `registered, accepted ${formatE8s(refresh.accepted)} ✅`);
        return 'registered';
      }

      if (refresh.balance > 0n) {
        outcome = 'subaccount-mismatch';
        logParticipant(
          key,
          total,
          `sale accepted 0 while seeing ${formatE8s(refresh.balance)} (sub-account mismatch?) ` +
            `[attempt ${attempt}/${attempts}] ⚠️`,
        );
      } else {
        outcome = 'zero-balance';
        logParticipant(key, total, `sale accepted 0 and sees zero balance [attempt ${attempt}/${attempts}] ⚠️`);
      }
    } catch (e) {
      outcome = 'failed';
      logParticipant(key, total, `refresh failed [attempt ${attempt}/${attempts}]: ${describeError(e)} ⚠️`);
    }

    if (attempt < attempts) {
      await sleep(interval);
    }
  }

  logParticipant(key, total, `not registered (${outcome}) ❌`);
  return outcome;
};

const runParticipant = async (
  context: DeployContext,
  services: RequiredServiceSet,
  key: ParticipantKey,
  total: number,
): Promise<Participant> => {
  const { config, minting } = context;
  const amount = config.participants.amount;
  const fee = config.stake.fee;
  const ledgerId = config.canisters.ledger;
  const saleAccount = { owner: services.swap, subaccount: key.saleSubaccount };
  const label = `participant #${key.ordinal}`;

  logParticipant(key, total, `started ${key.principal.toText()} ⏳`);

  // Seed goes to disk before any funds move to the identity
  await saveSeed(key.seedFile, key.seed);
  logParticipant(key, total, `seed saved to "${key.seedFile}"`);

  const session = await runStep(STAGE, `Failed to connect as ${label}`, () => context.connect(key.identity));
  const ledger = session.ledger(ledgerId);

  const deposited = await runStep(STAGE, `Failed to read sale sub-account balance of ${label}`, () =>
    ledger.balanceOf(saleAccount),
  );

  if (deposited >= amount) {
    logParticipant(key, total, `sale sub-account already holds ${formatE8s(deposited)}, reusing 👻`);
  } else {
    const funding = amount + 2n * fee;
    const available = await runStep(STAGE, `Failed to read balance of ${label}`, () =>
      ledger.balanceOf({ owner: key.principal }),
    );

    if (available >= funding) {
      logParticipant(key, total, `already funded with ${formatE8s(available)}, reusing 👻`);
    } else {
      await runStep(STAGE, `Failed to fund ${label}`, () =>
        minting.services.ledger(ledgerId).transfer({ owner: key.principal }, funding),
      );
      logParticipant(key, total, `funded with ${formatE8s(funding)}`);
      await sleep(config.execution.settleDelay);
    }

    const ticketAmount =
      amount < config.proposal.swap.maximumParticipant ? amount : config.proposal.swap.maximumParticipant;
    try {
      const ticket = await session.sale(services.swap).newSaleTicket(ticketAmount, key.saleSubaccount);
      switch (ticket.type) {
        case 'created':
        case 'existing':
          logParticipant(key, total, `sale ticket ${ticket.ticketId} (${ticket.type})`);
          break;
        case 'invalid-amount':
          logParticipant(
            key,
            total,
            `sale ticket refused, amount must be within ${formatE8s(ticket.min)} .. ${formatE8s(ticket.max)} ⚠️`,
          );
          break;
        case 'rejected':
          logParticipant(key, total, `sale ticket refused (error type ${ticket.errorType}) ⚠️`);
          break;
      }
    } catch (e) {
      logParticipant(key, total, `sale ticket not created, continuing: ${describeError(e)} ⚠️`);
    }

    await runStep(STAGE, `Failed to transfer participation of ${label}`, () =>
      ledger.transfer(saleAccount, amount + fee),
    );
    logParticipant(key, total, `transferred ${formatE8s(amount + fee)} to sale sub-account`);
    await sleep(config.execution.settleDelay);
  }

  const observed = await runStep(STAGE, `Failed to verify sale sub-account balance of ${label}`, () =>
    ledger.balanceOf(saleAccount),
  );
  if (observed < amount) {
    logParticipant(key, total, `sale sub-account holds ${formatE8s(observed)}, less than expected ⚠️`);
  }

  const registration = await registerParticipant(context, session, key, services.swap, total);
  return {
    ordinal: key.ordinal,
    seed: key.seed,
    seedFile: key.seedFile,
    principal: key.principal,
    saleSubaccount: key.saleSubaccount,
    funded: true,
    registered: registration === 'registered',
    registration,
  };
};

/**
 * Creates, funds and registers the configured number of sale participants.
 * Registration problems leave a participant unregistered; funding problems are fatal.
 */
export const runParticipants = async (
  context: DeployContext,
  services: RequiredServiceSet,
): Promise<Participant[]> => {
  const { count, amount, concurrency } = context.config.participants;

  console.log();
  console.log('Participants:');
  console.log(`- count: ${count}`);
  console.log(`- amount: ${formatE8s(amount)}`);
  console.log(`- concurrency: ${concurrency}`);

  validateParticipationAmount(amount, context.config.proposal.swap);

  const outputDir = context.config.output.dir;
  const keys = Array.from({ length: count }, (_, index) => deriveParticipantKey(outputDir, index + 1));
  const participants = await runPool(keys, concurrency, (key) => runParticipant(context, services, key, count));

  const registered = participants.filter((participant) => participant.registered).length;
  console.log();
  console.log(`Participants registered: ${registered} of ${count} ${registered === count ? '✅' : '⚠️'}`);
  return participants;
};
