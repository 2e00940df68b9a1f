import { Principal } from '@dfinity/principal';

import {
  DEFAULT_DISSOLVE_DELAY,
  DEFAULT_FACTORY_CANISTER,
  DEFAULT_FETCH_ROOT_KEY,
  DEFAULT_GOVERNANCE_CANISTER,
  DEFAULT_LEDGER_CANISTER,
  DEFAULT_MINTING_PEM,
  DEFAULT_OPERATOR_IDENTITY,
  DEFAULT_OUTPUT_DIR,
  DEFAULT_PARTICIPANT_AMOUNT,
  DEFAULT_PARTICIPANT_CONCURRENCY,
  DEFAULT_PARTICIPANT_COUNT,
  DEFAULT_PROPOSAL,
  DEFAULT_PROPOSAL_POLL_ATTEMPTS,
  DEFAULT_PROPOSAL_POLL_INTERVAL,
  DEFAULT_REFRESH_ATTEMPTS,
  DEFAULT_REFRESH_DELAY,
  DEFAULT_SALE_COMMIT_POLL_ATTEMPTS,
  DEFAULT_SALE_COMMIT_POLL_INTERVAL,
  DEFAULT_SALE_OPEN_POLL_ATTEMPTS,
  DEFAULT_SALE_OPEN_POLL_INTERVAL,
  DEFAULT_SETTLE_DELAY,
  DEFAULT_STAKE_AMOUNT,
  DEFAULT_STAKE_MEMO,
  DEFAULT_TRANSFER_FEE,
} from './constant';
import { ConfigError } from './error';
import { checkFileExists, loadYaml } from './file';
import { Config, ConfigPoll, ConfigProposal } from './type';
import { formatE8s } from './util';

type Section = Record<string, unknown>;

const MAX_NAT32 = 0xffff_ffff;

const isSection = (value: unknown): value is Section => {
  return typeof value === 'object' && value != null && !Array.isArray(value);
};

const readSection = (parent: Section, key: string, path: string): Section => {
  const value = parent[key];
  if (value == null) {
    return {};
  }
  if (!isSection(value)) {
    throw new ConfigError(`Invalid config "${path}" field (object expected)`);
  }
  return value;
};

const readString = (section: Section, key: string, path: string, fallback: string): string => {
  const value = section[key];
  if (value == null) {
    return fallback;
  }
  if (typeof value !== 'string' || value.length === 0) {
    throw new ConfigError(`Invalid config "${path}" field (non-empty string expected)`);
  }
  return value;
};

const readOptionalString = (section: Section, key: string, path: string): string | undefined => {
  if (section[key] == null) {
    return undefined;
  }
  return readString(section, key, path, '');
};

const readBoolean = (section: Section, key: string, path: string, fallback: boolean): boolean => {
  const value = section[key];
  if (value == null) {
    return fallback;
  }
  if (typeof value !== 'boolean') {
    throw new ConfigError(`Invalid config "${path}" field (boolean expected)`);
  }
  return value;
};

const readInteger = (section: Section, key: string, path: string, fallback: number, min = 0): number => {
  const value = section[key];
  if (value == null) {
    return fallback;
  }
  if (typeof value !== 'number' || !Number.isSafeInteger(value) || value < min) {
    throw new ConfigError(`Invalid config "${path}" field (integer not less than ${min} expected)`);
  }
  return value;
};

const readAmount = (section: Section, key: string, path: string, fallback: bigint): bigint => {
  const value = section[key];
  if (value == null) {
    return fallback;
  }
  if (typeof value === 'number' && Number.isSafeInteger(value) && value >= 0) {
    return BigInt(value);
  }
  if (typeof value === 'string' && /^\d+$/.test(value)) {
    return BigInt(value);
  }
  throw new ConfigError(`Invalid config "${path}" field (non-negative integer or decimal string expected)`);
};

const readPrincipal = (section: Section, key: string, path: string, fallback: string): Principal => {
  const text = readString(section, key, path, fallback);
  try {
    return Principal.fromText(text);
  } catch {
    throw new ConfigError(`Invalid config "${path}" field (principal text expected, got "${text}")`);
  }
};

const readStrings = (section: Section, key: string, path: string, fallback: readonly string[]): string[] => {
  const value = section[key];
  if (value == null) {
    return [...fallback];
  }
  if (!Array.isArray(value) || value.some((item) => typeof item !== 'string')) {
    throw new ConfigError(`Invalid config "${path}" field (list of strings expected)`);
  }
  return value.map(String);
};

const readPoll = (parent: Section, key: string, path: string, attempts: number, interval: number): ConfigPoll => {
  const section = readSection(parent, key, path);
  return {
    attempts: readInteger(section, 'attempts', `${path}.attempts`, attempts, 1),
    interval: readInteger(section, 'interval', `${path}.interval`, interval),
  };
};

const readProposal = (root: Section): ConfigProposal => {
  const defaults = DEFAULT_PROPOSAL;
  const section = readSection(root, 'proposal', 'proposal');
  const token = readSection(section, 'token', 'proposal.token');
  const governance = readSection(section, 'governance', 'proposal.governance');
  const swap = readSection(section, 'swap', 'proposal.swap');
  const distribution = readSection(section, 'distribution', 'proposal.distribution');

  const g = (key: keyof ConfigProposal['governance']): bigint =>
    readAmount(governance, key, `proposal.governance.${key}`, defaults.governance[key]);
  const d = (key: keyof ConfigProposal['distribution']): bigint =>
    readAmount(distribution, key, `proposal.distribution.${key}`, defaults.distribution[key]);

  const proposal: ConfigProposal = {
    title: readString(section, 'title', 'proposal.title', defaults.title),
    summary: readString(section, 'summary', 'proposal.summary', defaults.summary),
    name: readString(section, 'name', 'proposal.name', defaults.name),
    description: readString(section, 'description', 'proposal.description', defaults.description),
    url: readString(section, 'url', 'proposal.url', defaults.url),
    logo: readString(section, 'logo', 'proposal.logo', defaults.logo),
    token: {
      name: readString(token, 'name', 'proposal.token.name', defaults.token.name),
      symbol: readString(token, 'symbol', 'proposal.token.symbol', defaults.token.symbol),
      fee: readAmount(token, 'fee', 'proposal.token.fee', defaults.token.fee),
    },
    governance: {
      minimumStake: g('minimumStake'),
      maximumDissolveDelay: g('maximumDissolveDelay'),
      minimumDissolveDelayToVote: g('minimumDissolveDelayToVote'),
      maximumDissolveDelayBonus: g('maximumDissolveDelayBonus'),
      maximumAgeBonus: g('maximumAgeBonus'),
      maximumAgeForAgeBonus: g('maximumAgeForAgeBonus'),
      initialVotingPeriod: g('initialVotingPeriod'),
      waitForQuietDeadlineIncrease: g('waitForQuietDeadlineIncrease'),
      rejectionFee: g('rejectionFee'),
      initialRewardRate: g('initialRewardRate'),
      finalRewardRate: g('finalRewardRate'),
      rewardRateTransitionDuration: g('rewardRateTransitionDuration'),
    },
    swap: {
      minimumParticipants: readAmount(
        swap,
        'minimumParticipants',
        'proposal.swap.minimumParticipants',
        defaults.swap.minimumParticipants,
      ),
      minimumDirectParticipation: readAmount(
        swap,
        'minimumDirectParticipation',
        'proposal.swap.minimumDirectParticipation',
        defaults.swap.minimumDirectParticipation,
      ),
      maximumDirectParticipation: readAmount(
        swap,
        'maximumDirectParticipation',
        'proposal.swap.maximumDirectParticipation',
        defaults.swap.maximumDirectParticipation,
      ),
      minimumParticipant: readAmount(
        swap,
        'minimumParticipant',
        'proposal.swap.minimumParticipant',
        defaults.swap.minimumParticipant,
      ),
      maximumParticipant: readAmount(
        swap,
        'maximumParticipant',
        'proposal.swap.maximumParticipant',
        defaults.swap.maximumParticipant,
      ),
      duration: readAmount(swap, 'duration', 'proposal.swap.duration', defaults.swap.duration),
      neuronsFundParticipation: readBoolean(
        swap,
        'neuronsFundParticipation',
        'proposal.swap.neuronsFundParticipation',
        defaults.swap.neuronsFundParticipation,
      ),
      basketCount: readAmount(swap, 'basketCount', 'proposal.swap.basketCount', defaults.swap.basketCount),
      basketDissolveDelayInterval: readAmount(
        swap,
        'basketDissolveDelayInterval',
        'proposal.swap.basketDissolveDelayInterval',
        defaults.swap.basketDissolveDelayInterval,
      ),
      restrictedCountries: readStrings(
        swap,
        'restrictedCountries',
        'proposal.swap.restrictedCountries',
        defaults.swap.restrictedCountries,
      ),
    },
    distribution: {
      treasury: d('treasury'),
      swap: d('swap'),
      developerStake: d('developerStake'),
      developerDissolveDelay: d('developerDissolveDelay'),
      developerVestingPeriod: d('developerVestingPeriod'),
    },
  };

  if (proposal.swap.minimumParticipant > proposal.swap.maximumParticipant) {
    throw new ConfigError(
      'Invalid config "proposal.swap" section (minimumParticipant must not exceed maximumParticipant)',
    );
  }
  if (proposal.swap.minimumDirectParticipation > proposal.swap.maximumDirectParticipation) {
    throw new ConfigError(
      'Invalid config "proposal.swap" section (minimumDirectParticipation must not exceed maximumDirectParticipation)',
    );
  }
  return proposal;
};

export const parseConfig = (raw: unknown): Config => {
  if (raw != null && !isSection(raw)) {
    throw new ConfigError('Invalid config (object expected)');
  }
  const root: Section = isSection(raw) ? raw : {};

  const network = readSection(root, 'network', 'network');
  const identity = readSection(root, 'identity', 'identity');
  const canisters = readSection(root, 'canisters', 'canisters');
  const stake = readSection(root, 'stake', 'stake');
  const participants = readSection(root, 'participants', 'participants');
  const execution = readSection(root, 'execution', 'execution');
  const output = readSection(root, 'output', 'output');

  const dissolveDelay = readInteger(stake, 'dissolveDelay', 'stake.dissolveDelay', DEFAULT_DISSOLVE_DELAY);
  if (dissolveDelay > MAX_NAT32) {
    throw new ConfigError(`Invalid config "stake.dissolveDelay" field (at most ${MAX_NAT32} seconds expected)`);
  }

  return {
    network: {
      url: readOptionalString(network, 'url', 'network.url'),
      fetchRootKey: readBoolean(network, 'fetchRootKey', 'network.fetchRootKey', DEFAULT_FETCH_ROOT_KEY),
    },
    identity: {
      operator: readString(identity, 'operator', 'identity.operator', DEFAULT_OPERATOR_IDENTITY),
      mintingPem: readString(identity, 'mintingPem', 'identity.mintingPem', DEFAULT_MINTING_PEM),
    },
    canisters: {
      governance: readPrincipal(canisters, 'governance', 'canisters.governance', DEFAULT_GOVERNANCE_CANISTER),
      ledger: readPrincipal(canisters, 'ledger', 'canisters.ledger', DEFAULT_LEDGER_CANISTER),
      factory: readPrincipal(canisters, 'factory', 'canisters.factory', DEFAULT_FACTORY_CANISTER),
    },
    stake: {
      amount: readAmount(stake, 'amount', 'stake.amount', DEFAULT_STAKE_AMOUNT),
      fee: readAmount(stake, 'fee', 'stake.fee', DEFAULT_TRANSFER_FEE),
      memo: readAmount(stake, 'memo', 'stake.memo', DEFAULT_STAKE_MEMO),
      dissolveDelay,
    },
    participants: {
      count: readInteger(participants, 'count', 'participants.count', DEFAULT_PARTICIPANT_COUNT, 1),
      amount: readAmount(participants, 'amount', 'participants.amount', DEFAULT_PARTICIPANT_AMOUNT),
      concurrency: readInteger(
        participants,
        'concurrency',
        'participants.concurrency',
        DEFAULT_PARTICIPANT_CONCURRENCY,
        1,
      ),
    },
    execution: {
      proposalPoll: readPoll(
        execution,
        'proposalPoll',
        'execution.proposalPoll',
        DEFAULT_PROPOSAL_POLL_ATTEMPTS,
        DEFAULT_PROPOSAL_POLL_INTERVAL,
      ),
      saleOpenPoll: readPoll(
        execution,
        'saleOpenPoll',
        'execution.saleOpenPoll',
        DEFAULT_SALE_OPEN_POLL_ATTEMPTS,
        DEFAULT_SALE_OPEN_POLL_INTERVAL,
      ),
      saleCommitPoll: readPoll(
        execution,
        'saleCommitPoll',
        'execution.saleCommitPoll',
        DEFAULT_SALE_COMMIT_POLL_ATTEMPTS,
        DEFAULT_SALE_COMMIT_POLL_INTERVAL,
      ),
      refresh: readPoll(execution, 'refresh', 'execution.refresh', DEFAULT_REFRESH_ATTEMPTS, DEFAULT_REFRESH_DELAY),
      settleDelay: readInteger(execution, 'settleDelay', 'execution.settleDelay', DEFAULT_SETTLE_DELAY),
    },
    output: {
      dir: readString(output, 'dir', 'output.dir', DEFAULT_OUTPUT_DIR),
    },
    proposal: readProposal(root),
  };
};

const formatPoll = (poll: ConfigPoll): string => {
  return `${poll.attempts} x ${poll.interval} ms`;
};

export const loadConfig = async (path: string): Promise<Config> => {
  const exists = await checkFileExists(path);
  const config = parseConfig(exists ? await loadYaml(path) : {});

  console.log();
  console.log('Config:');
  console.log(`- path: ${path} ${exists ? '📄' : '(does not exist, defaults used 👻)'}`);
  console.log(`- replica: ${config.network.url ?? 'resolved from dfx environment'}`);
  console.log(`- fetch root key: ${config.network.fetchRootKey ? 'enabled' : 'disabled'}`);
  console.log(`- operator identity: ${config.identity.operator}`);
  console.log(`- minting pem: ${config.identity.mintingPem}`);
  console.log(`- governance: ${config.canisters.governance.toText()}`);
  console.log(`- ledger: ${config.canisters.ledger.toText()}`);
  console.log(`- factory: ${config.canisters.factory.toText()}`);
  console.log(`- stake: ${formatE8s(config.stake.amount)}, memo ${config.stake.memo}`);
  console.log(`- dissolve delay: ${config.stake.dissolveDelay} secs`);
  console.log(
    `- participants: ${config.participants.count} x ${formatE8s(config.participants.amount)}` +
      ` (concurrency ${config.participants.concurrency})`,
  );
  console.log(`- proposal poll: ${formatPoll(config.execution.proposalPoll)}`);
  console.log(`- sale open poll: ${formatPoll(config.execution.saleOpenPoll)}`);
  console.log(`- sale commit poll: ${formatPoll(config.execution.saleCommitPoll)}`);
  console.log(`- refresh: ${formatPoll(config.execution.refresh)}`);
  console.log(`- output: ${config.output.dir}`);
  return config;
};
