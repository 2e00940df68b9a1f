import { Principal } from '@dfinity/principal';
import { hexToBytes } from 'viem';

import { DEFAULT_HOTKEY_PERMISSIONS } from './constant';
import { buildDeployContext, connectMinting, connectOperator, openReplica } from './context';
import type { Replica } from './context';
import { runDeployment } from './deploy';
import { ConfigError } from './error';
import { describeDissolve, formatNeuronId, parseNeuronId, selectLowestNeuron, sortNeurons } from './neuron';
import { loadRecord } from './record';
import {
  connectParticipant,
  createSnsNeuron,
  findParticipant,
  loadSnsDeployment,
  mintSnsTokens,
  requireMainNeuron,
} from './snsNeuron';
import type { SnsDeployment } from './snsNeuron';
import { accountIdentifier, neuronStakeSubaccount, SUBACCOUNT_SIZE } from './subaccount';
import type {
  Args,
  Caller,
  CommandName,
  CommandTarget,
  Config,
  DeploymentRecord,
  NeuronSummary,
  SnsGovernanceClient,
  SnsNeuronSummary,
} from './type';
import { formatDuration, formatE8s, joinComma, sleep } from './util';

type Command = (args: Args, config: Config) => Promise<number>;

//

const requireOption = (args: Args, name: string): string => {
  const value = args.options.get(name);
  if (value == null) {
    throw new ConfigError(`Command "${args.command}" requires "--${name} <value>"`);
  }
  return value;
};

const parseUnsigned = (name: string, value: string): bigint => {
  if (!/^\d+$/.test(value)) {
    throw new ConfigError(`Invalid "--${name}" value "${value}" (non-negative integer expected)`);
  }
  return BigInt(value);
};

const parsePrincipal = (name: string, value: string): Principal => {
  try {
    return Principal.fromText(value);
  } catch {
    throw new ConfigError(`Invalid "--${name}" value "${value}" (principal text expected)`);
  }
};

const readUnsigned = (args: Args, name: string): bigint => {
  return parseUnsigned(name, requireOption(args, name));
};

const readOptionalUnsigned = (args: Args, name: string): bigint | undefined => {
  const value = args.options.get(name);
  return value == null ? undefined : parseUnsigned(name, value);
};

const readPrincipal = (args: Args, name: string): Principal => {
  return parsePrincipal(name, requireOption(args, name));
};

const readOptionalPrincipal = (args: Args, name: string): Principal | undefined => {
  const value = args.options.get(name);
  return value == null ? undefined : parsePrincipal(name, value);
};

const readSeconds = (args: Args, name: string): number => {
  const seconds = readUnsigned(args, name);
  if (seconds > 0xffff_ffffn) {
    throw new ConfigError(`Invalid "--${name}" value (at most ${0xffff_ffff} seconds expected)`);
  }
  return Number(seconds);
};

const readOptionalSeconds = (args: Args, name: string): number | undefined => {
  return args.options.has(name) ? readSeconds(args, name) : undefined;
};

const parseChoice = <T extends string>(name: string, value: string, choices: readonly T[]): T => {
  const choice = choices.find((item) => item === value);
  if (choice == null) {
    throw new ConfigError(`Invalid "--${name}" value "${value}" (one of ${joinComma(choices)} expected)`);
  }
  return choice;
};

const readChoice = <T extends string>(args: Args, name: string, choices: readonly T[]): T => {
  return parseChoice(name, requireOption(args, name), choices);
};

const TARGETS: readonly CommandTarget[] = ['icp', 'sns'];

export const readTarget = (args: Args): CommandTarget => {
  const value = args.options.get('target');
  return value == null ? 'icp' : parseChoice('target', value, TARGETS);
};

const readOptionalNeuronId = (args: Args): Uint8Array | undefined => {
  const value = args.options.get('neuron');
  return value == null ? undefined : parseNeuronId('neuron', value);
};

export const readPermissions = (args: Args): number[] => {
  const value = args.options.get('permissions');
  if (value == null) {
    return [...DEFAULT_HOTKEY_PERMISSIONS];
  }
  const items = value.split(',').map((item) => item.trim());
  if (items.some((item) => !/^\d+$/.test(item))) {
    throw new ConfigError(`Invalid "--permissions" value "${value}" (comma separated permission types expected)`);
  }
  return items.map(Number);
};

const readOptionalSubaccount = (args: Args): Uint8Array | undefined => {
  const value = args.options.get('subaccount');
  if (value == null) {
    return undefined;
  }
  const hex = value.startsWith('0x') ? value.slice(2) : value;
  if (hex.length !== SUBACCOUNT_SIZE * 2 || !/^[0-9a-fA-F]+$/.test(hex)) {
    throw new ConfigError(`Invalid "--subaccount" value "${value}" (${SUBACCOUNT_SIZE} bytes as hex expected)`);
  }
  return hexToBytes(`0x${hex}`);
};

/**
 * Identity the neuron commands act as: the participant given by `--as` (seed file
 * from the deployment record), or the operator.
 */
const resolveCaller = async (
  args: Args,
  config: Config,
  replica: Replica,
  knownRecord?: DeploymentRecord,
): Promise<Caller> => {
  const as = readOptionalPrincipal(args, 'as');
  if (as == null) {
    return await connectOperator(config, replica);
  }

  const record = knownRecord ?? (await loadRecord(config.output.dir));
  if (record == null) {
    throw new ConfigError(`No deployment record in "${config.output.dir}" to look up "--as ${as.toText()}"`);
  }
  if (record.owner_principal === as.toText()) {
    return await connectOperator(config, replica);
  }

  const participant = findParticipant(record, as);
  if (participant == null) {
    throw new ConfigError(`Principal ${as.toText()} is neither the owner nor a recorded participant`);
  }
  const caller = await connectParticipant(participant, replica.connect);
  console.log(`- caller: ${caller.principal.toText()} (participant)`);
  return caller;
};

type SnsSession = {
  deployment: SnsDeployment;
  caller: Caller;
  governance: SnsGovernanceClient;
};

// Deployed service commands take the governance and ledger ids from the deployment record
const openSnsSession = async (args: Args, config: Config): Promise<SnsSession> => {
  const deployment = await loadSnsDeployment(config.output.dir);
  const replica = await openReplica(config);
  const caller = await resolveCaller(args, config, replica, deployment.record);
  console.log(`- service governance: ${deployment.governance.toText()}`);
  return { deployment, caller, governance: caller.services.snsGovernance(deployment.governance) };
};

//

const describeNeuron = (neuron: NeuronSummary): string[] => {
  return [
    `- neuron ${neuron.id}:`,
    `  - stake: ${formatE8s(neuron.stake)}`,
    `  - dissolve: ${describeDissolve(neuron.dissolve)}`,
    `  - controller: ${neuron.controller?.toText() ?? 'hidden'}`,
    `  - hot keys: ${neuron.hotKeys.length > 0 ? joinComma(neuron.hotKeys.map((key) => key.toText())) : 'none'}`,
    `  - visibility: ${neuron.visibility ?? 'unspecified'}`,
  ];
};

const describeSnsNeuron = (neuron: SnsNeuronSummary): string[] => {
  const lines = [
    `- neuron ${formatNeuronId(neuron.id)}:`,
    `  - stake: ${formatE8s(neuron.stake)}`,
    `  - dissolve: ${describeDissolve(neuron.dissolve)}`,
  ];
  for (const permission of neuron.permissions) {
    const principal = permission.principal?.toText() ?? 'unknown';
    lines.push(`  - permissions of ${principal}: ${joinComma(permission.permissionTypes.map(String))}`);
  }
  return lines;
};

const printLines = (lines: readonly string[]): void => {
  for (const line of lines) {
    console.log(line);
  }
};

//

const deploy: Command = async (_args, config) => {
  const context = await buildDeployContext(config);
  await runDeployment(context);
  return 0;
};

const addHotKey: Command = async (args, config) => {
  const hotKey = readPrincipal(args, 'principal');

  if (readTarget(args) === 'sns') {
    const explicitNeuron = readOptionalNeuronId(args);
    const permissions = readPermissions(args);
    const { caller, governance } = await openSnsSession(args, config);

    const neuronId = explicitNeuron ?? (await requireMainNeuron(governance, caller.principal));
    await governance.addPermissions(neuronId, hotKey, permissions);
    console.log();
    console.log(
      `Hot key ${hotKey.toText()} added to neuron ${formatNeuronId(neuronId)} ` +
        `with permissions ${joinComma(permissions.map(String))} ✅`,
    );
    return 0;
  }

  const neuronId = readUnsigned(args, 'neuron');
  const caller = await resolveCaller(args, config, await openReplica(config));

  await caller.services.governance.addHotKey(neuronId, hotKey);
  console.log();
  console.log(`Hot key ${hotKey.toText()} added to neuron ${neuronId} ✅`);
  return 0;
};

const listNeurons: Command = async (args, config) => {
  if (readTarget(args) === 'sns') {
    const owner = readOptionalPrincipal(args, 'principal');
    const { caller, governance } = await openSnsSession(args, config);
    const principal = owner ?? caller.principal;
    const neurons = sortNeurons(await governance.listNeurons(principal));

    console.log();
    console.log(`Service neurons of ${principal.toText()} (${neurons.length}):`);
    for (const neuron of neurons) {
      printLines(describeSnsNeuron(neuron));
    }
    return 0;
  }

  const caller = await resolveCaller(args, config, await openReplica(config));
  const neurons = sortNeurons(await caller.services.governance.listNeurons());

  console.log();
  console.log(`Neurons of ${caller.principal.toText()} (${neurons.length}):`);
  for (const neuron of neurons) {
    printLines(describeNeuron(neuron));
  }
  return 0;
};

const mint: Command = async (args, config) => {
  const to = readPrincipal(args, 'principal');
  const amount = readUnsigned(args, 'amount');
  const ledgerId = readOptionalPrincipal(args, 'ledger') ?? config.canisters.ledger;
  const minting = await connectMinting(config, await openReplica(config));

  const block = await minting.services.ledger(ledgerId).transfer({ owner: to }, amount);
  console.log();
  console.log(`Minted ${formatE8s(amount)} to ${to.toText()} at block ${block} ✅`);
  return 0;
};

const createNeuron: Command = async (args, config) => {
  const explicitMemo = readOptionalUnsigned(args, 'memo');
  const dissolveDelay = readOptionalSeconds(args, 'dissolve-delay');

  if (readTarget(args) === 'sns') {
    const amount = readOptionalUnsigned(args, 'amount');
    const { deployment, caller } = await openSnsSession(args, config);
    await createSnsNeuron(caller, deployment, {
      amount,
      memo: explicitMemo,
      dissolveDelay,
      settleDelay: config.execution.settleDelay,
    });
    return 0;
  }

  const amount = readUnsigned(args, 'amount');
  const caller = await resolveCaller(args, config, await openReplica(config));
  const { governance } = caller.services;

  const memo = explicitMemo ?? BigInt((await governance.listNeurons()).length + 1);
  const subaccount = neuronStakeSubaccount(caller.principal, memo);

  console.log();
  console.log('Create neuron:');
  console.log(`- controller: ${caller.principal.toText()}`);
  console.log(`- amount: ${formatE8s(amount)}`);
  console.log(`- memo: ${memo}${explicitMemo == null ? ' (neuron count + 1)' : ''}`);

  const block = await caller.services
    .ledger(config.canisters.ledger)
    .transfer({ owner: config.canisters.governance, subaccount }, amount);
  console.log(`- staked: block ${block} ✅`);

  await sleep(config.execution.settleDelay);
  const neuronId = await governance.claimNeuron(memo);
  console.log(`- neuron: ${neuronId} ✅`);

  if (dissolveDelay != null && dissolveDelay > 0) {
    await governance.increaseDissolveDelay(neuronId, dissolveDelay);
    console.log(`- dissolve delay: ${formatDuration(BigInt(dissolveDelay))} ✅`);
  }
  return 0;
};

const disburse: Command = async (args, config) => {
  const to = readOptionalPrincipal(args, 'to');
  const amount = readOptionalUnsigned(args, 'amount');

  if (readTarget(args) === 'sns') {
    const explicitNeuron = readOptionalNeuronId(args);
    const { caller, governance } = await openSnsSession(args, config);

    // Without --neuron, the neuron that unlocks soonest
    const neuronId = explicitNeuron ?? selectLowestNeuron(await governance.listNeurons(caller.principal))?.id;
    if (neuronId == null) {
      throw new Error(`Principal ${caller.principal.toText()} has no neurons to disburse`);
    }
    const receiver = to ?? caller.principal;
    const block = await governance.disburse(neuronId, receiver, amount);
    console.log();
    console.log(`Neuron ${formatNeuronId(neuronId)} disbursed to ${receiver.toText()} at block ${block} ✅`);
    return 0;
  }

  const neuronId = readUnsigned(args, 'neuron');
  const caller = await resolveCaller(args, config, await openReplica(config));

  const block = await caller.services.governance.disburse(
    neuronId,
    to == null ? undefined : accountIdentifier(to),
    amount,
  );
  console.log();
  console.log(`Neuron ${neuronId} disbursed to ${(to ?? caller.principal).toText()} at block ${block} ✅`);
  return 0;
};

const increaseDissolveDelay: Command = async (args, config) => {
  const seconds = readSeconds(args, 'seconds');
  const increase = formatDuration(BigInt(seconds));

  if (readTarget(args) === 'sns') {
    const explicitNeuron = readOptionalNeuronId(args);
    const { caller, governance } = await openSnsSession(args, config);

    const neuronId = explicitNeuron ?? (await requireMainNeuron(governance, caller.principal));
    await governance.increaseDissolveDelay(neuronId, seconds);
    console.log();
    console.log(`Dissolve delay of neuron ${formatNeuronId(neuronId)} increased by ${increase} ✅`);
    return 0;
  }

  const neuronId = readUnsigned(args, 'neuron');
  const caller = await resolveCaller(args, config, await openReplica(config));

  await caller.services.governance.increaseDissolveDelay(neuronId, seconds);
  console.log();
  console.log(`Dissolve delay of neuron ${neuronId} increased by ${increase} ✅`);
  return 0;
};

const manageDissolving: Command = async (args, config) => {
  const mode = readChoice(args, 'mode', ['start', 'stop']);
  const done = mode === 'start' ? 'started' : 'stopped';

  if (readTarget(args) === 'sns') {
    const explicitNeuron = readOptionalNeuronId(args);
    const { caller, governance } = await openSnsSession(args, config);

    const neuronId = explicitNeuron ?? (await requireMainNeuron(governance, caller.principal));
    if (mode === 'start') {
      await governance.startDissolving(neuronId);
    } else {
      await governance.stopDissolving(neuronId);
    }
    console.log();
    console.log(`Neuron ${formatNeuronId(neuronId)} ${done} dissolving ✅`);
    return 0;
  }

  const neuronId = readUnsigned(args, 'neuron');
  const caller = await resolveCaller(args, config, await openReplica(config));

  if (mode === 'start') {
    await caller.services.governance.startDissolving(neuronId);
  } else {
    await caller.services.governance.stopDissolving(neuronId);
  }
  console.log();
  console.log(`Neuron ${neuronId} ${done} dissolving ✅`);
  return 0;
};

const setVisibility: Command = async (args, config) => {
  const neuronId = readUnsigned(args, 'neuron');
  const visibility = readChoice(args, 'visibility', ['public', 'private']);
  const caller = await resolveCaller(args, config, await openReplica(config));

  await caller.services.governance.setVisibility(neuronId, visibility === 'public');
  console.log();
  console.log(`Neuron ${neuronId} is now ${visibility} ✅`);
  return 0;
};

const getNeuron: Command = async (args, config) => {
  const neuronId = readUnsigned(args, 'neuron');
  const caller = await resolveCaller(args, config, await openReplica(config));

  const neuron = await caller.services.governance.getNeuron(neuronId);
  console.log();
  console.log('Neuron:');
  printLines(describeNeuron(neuron));
  return 0;
};

const getBalance: Command = async (args, config) => {
  const explicitLedger = readOptionalPrincipal(args, 'ledger');
  const subaccount = readOptionalSubaccount(args);
  const target = readTarget(args);

  let ledgerId = explicitLedger ?? config.canisters.ledger;
  let record: DeploymentRecord | undefined;
  if (target === 'sns') {
    const deployment = await loadSnsDeployment(config.output.dir);
    ledgerId = explicitLedger ?? deployment.ledger;
    record = deployment.record;
  }

  const caller = await resolveCaller(args, config, await openReplica(config), record);
  const owner = readOptionalPrincipal(args, 'principal') ?? caller.principal;

  const balance = await caller.services.ledger(ledgerId).balanceOf({ owner, subaccount });
  console.log();
  console.log('Balance:');
  console.log(`- ledger: ${ledgerId.toText()}${target === 'sns' ? ' (deployed service)' : ''}`);
  console.log(`- owner: ${owner.toText()}`);
  console.log(`- subaccount: ${subaccount == null ? 'default' : formatNeuronId(subaccount)}`);
  console.log(`- balance: ${formatE8s(balance)}`);
  return 0;
};

const checkDeployed: Command = async (args, config) => {
  const caller = await resolveCaller(args, config, await openReplica(config));
  const instances = await caller.services.factory.listDeployed();

  console.log();
  console.log(`Deployed services (${instances.length}):`);
  for (const instance of instances) {
    const root = instance.root?.toText() ?? 'unknown';
    const governance = instance.governance?.toText() ?? 'unknown';
    console.log(`- root ${root}, governance ${governance}`);
  }
  if (instances.length === 0) {
    console.log('- none 👻');
    return 1;
  }
  return 0;
};

const mintServiceTokens: Command = async (args, config) => {
  const proposer = readPrincipal(args, 'proposer');
  const receiver = readPrincipal(args, 'principal');
  const amount = readUnsigned(args, 'amount');
  const deployment = await loadSnsDeployment(config.output.dir);
  const replica = await openReplica(config);

  const { proposalId, voters } = await mintSnsTokens(deployment, replica.connect, proposer, receiver, amount);
  console.log();
  console.log(`Mint proposal ${proposalId} submitted, ${voters.length} other participant neurons voted yes ✅`);
  return 0;
};

const COMMANDS: Record<CommandName, Command> = {
  deploy,
  'add-hotkey': addHotKey,
  'list-neurons': listNeurons,
  mint,
  'create-neuron': createNeuron,
  disburse,
  'increase-dissolve-delay': increaseDissolveDelay,
  'manage-dissolving': manageDissolving,
  'set-visibility': setVisibility,
  'get-neuron': getNeuron,
  'get-balance': getBalance,
  'check-deployed': checkDeployed,
  'mint-sns-tokens': mintServiceTokens,
};

export const runCommand = async (args: Args, config: Config): Promise<number> => {
  return await COMMANDS[args.command](args, config);
};
