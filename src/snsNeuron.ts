import { Principal } from '@dfinity/principal';

import { createCaller } from './context';
import { identityFromSeed, loadSeed } from './identity';
import { formatNeuronId, selectMainNeuron } from './neuron';
import { loadRecord } from './record';
import { VOTE_YES } from './snsGovernance';
import { neuronStakeSubaccount } from './subaccount';
import type { Caller, Connector, DeploymentRecord, ParticipantRecord, SnsGovernanceClient } from './type';
import { formatDuration, formatE8s, sleep } from './util';

/**
 * A deployed service as the deployment record describes it: the governance and
 * ledger the neuron commands talk to, and the participants whose seeds sign for them.
 */
export type SnsDeployment = {
  record: DeploymentRecord;
  governance: Principal;
  ledger: Principal;
};

type ServiceKey = 'governance_canister_id' | 'ledger_canister_id';

const readServiceId = (record: DeploymentRecord, key: ServiceKey): Principal => {
  const text = record.deployed_sns[key];
  if (text == null) {
    throw new Error(`Deployment record has no "deployed_sns.${key}"`);
  }
  try {
    return Principal.fromText(text);
  } catch {
    throw new Error(`Invalid record "deployed_sns.${key}" field (principal text expected)`);
  }
};

export const resolveSnsDeployment = (record: DeploymentRecord): SnsDeployment => {
  return {
    record,
    governance: readServiceId(record, 'governance_canister_id'),
    ledger: readServiceId(record, 'ledger_canister_id'),
  };
};

export const loadSnsDeployment = async (outputDir: string): Promise<SnsDeployment> => {
  const record = await loadRecord(outputDir);
  if (record == null) {
    throw new Error(`No deployment record in "${outputDir}", run deploy first`);
  }
  return resolveSnsDeployment(record);
};

export const findParticipant = (record: DeploymentRecord, principal: Principal): ParticipantRecord | undefined => {
  return record.participants.find((participant) => participant.principal === principal.toText());
};

export const connectParticipant = async (participant: ParticipantRecord, connect: Connector): Promise<Caller> => {
  const seed = await loadSeed(participant.seed_file);
  const caller = await createCaller(identityFromSeed(seed), connect);
  if (caller.principal.toText() !== participant.principal) {
    throw new Error(
      `Seed file "${participant.seed_file}" belongs to ${caller.principal.toText()}, not ${participant.principal}`,
    );
  }
  return caller;
};

export const requireMainNeuron = async (sns: SnsGovernanceClient, owner: Principal): Promise<Uint8Array> => {
  const neuron = selectMainNeuron(await sns.listNeurons(owner));
  if (neuron == null) {
    throw new Error(`Principal ${owner.toText()} has no neurons, make sure the sale has been finalized`);
  }
  return neuron.id;
};

//

export type CreateSnsNeuronOptions = {
  // Whole balance less the transfer fee when not given
  amount?: bigint;
  // Neuron count + 1 when not given
  memo?: bigint;
  dissolveDelay?: number;
  settleDelay: number;
};

/**
 * Stakes tokens of the caller on the deployed ledger and claims the neuron: checks the
 * stake against the governance minimum, transfers it to the caller's stake sub-account
 * of the governance, then claims by memo and controller.
 */
export const createSnsNeuron = async (
  caller: Caller,
  deployment: SnsDeployment,
  options: CreateSnsNeuronOptions,
): Promise<Uint8Array> => {
  const sns = caller.services.snsGovernance(deployment.governance);
  const ledger = caller.services.ledger(deployment.ledger);

  const minimum = await sns.minimumStake();
  const fee = await ledger.fee();
  const balance = await ledger.balanceOf({ owner: caller.principal });

  let amount: bigint;
  if (options.amount != null) {
    if (options.amount + fee > balance) {
      throw new Error(
        `Insufficient balance: ${options.amount} e8s requested plus ${fee} e8s fee, ${balance} e8s available`,
      );
    }
    amount = options.amount;
  } else {
    if (balance < minimum + fee) {
      throw new Error(`Insufficient balance: ${balance} e8s available, ${minimum + fee} e8s needed (stake and fee)`);
    }
    amount = balance - fee;
  }
  if (amount < minimum) {
    throw new Error(`Stake of ${amount} e8s is below the minimum stake of ${minimum} e8s`);
  }

  const memo = options.memo ?? BigInt((await sns.listNeurons(caller.principal)).length + 1);

  console.log();
  console.log('Create service neuron:');
  console.log(`- controller: ${caller.principal.toText()}`);
  console.log(`- amount: ${formatE8s(amount)}`);
  console.log(`- fee: ${formatE8s(fee)}`);
  console.log(`- memo: ${memo}${options.memo == null ? ' (neuron count + 1)' : ''}`);

  const subaccount = neuronStakeSubaccount(caller.principal, memo);
  const block = await ledger.transfer({ owner: deployment.governance, subaccount }, amount);
  console.log(`- staked: block ${block} ✅`);

  await sleep(options.settleDelay);
  const neuronId = await sns.claimNeuron(memo, caller.principal);
  console.log(`- neuron: ${formatNeuronId(neuronId)} ✅`);

  if (options.dissolveDelay != null && options.dissolveDelay > 0) {
    await sns.increaseDissolveDelay(neuronId, options.dissolveDelay);
    console.log(`- dissolve delay: ${formatDuration(BigInt(options.dissolveDelay))} ✅`);
  }
  return neuronId;
};

//

export type MintResult = {
  proposalId: bigint;
  voters: string[];
};

/**
 * Proposes a mint of deployed tokens from the proposer's main neuron, then has the
 * main neuron of every other registered participant vote yes. Participants that never
 * registered in the sale hold no neurons and are skipped.
 */
export const mintSnsTokens = async (
  deployment: SnsDeployment,
  connect: Connector,
  proposer: Principal,
  receiver: Principal,
  amount: bigint,
): Promise<MintResult> => {
  const proposerRecord = findParticipant(deployment.record, proposer);
  if (proposerRecord == null) {
    throw new Error(`Proposer ${proposer.toText()} is not a recorded participant`);
  }

  console.log();
  console.log('Mint service tokens:');
  console.log(`- proposer: ${proposer.toText()}`);
  console.log(`- receiver: ${receiver.toText()}`);
  console.log(`- amount: ${formatE8s(amount)}`);

  const proposerCaller = await connectParticipant(proposerRecord, connect);
  const proposerGovernance = proposerCaller.services.snsGovernance(deployment.governance);
  const proposerNeuron = await requireMainNeuron(proposerGovernance, proposer);
  const proposalId = await proposerGovernance.proposeMint(proposerNeuron, receiver, amount);
  console.log(`- proposal: ${proposalId} (neuron ${formatNeuronId(proposerNeuron)}) ✅`);

  const voters: string[] = [];
  for (const participant of deployment.record.participants) {
    if (participant.principal === proposer.toText()) {
      continue;
    }
    if (!participant.registered) {
      console.log(`- ${participant.principal}: not registered in the sale, skipped`);
      continue;
    }

    const caller = await connectParticipant(participant, connect);
    const governance = caller.services.snsGovernance(deployment.governance);
    const neuronId = await requireMainNeuron(governance, caller.principal);
    await governance.registerVote(neuronId, proposalId, VOTE_YES);
    voters.push(participant.principal);
    console.log(`- ${participant.principal}: voted yes (neuron ${formatNeuronId(neuronId)}) ✅`);
  }
  return { proposalId, voters };
};
