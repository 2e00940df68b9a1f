import { ConfigProposal } from './type';

export const DEFAULT_CONFIG_PATH = 'config.yaml';

export const DEFAULT_FETCH_ROOT_KEY = true;
export const DEFAULT_REPLICA_URL = 'http://127.0.0.1:4943';
export const DEFAULT_DFX_NETWORK = 'local';
export const DEFAULT_OPERATOR_IDENTITY = 'default';
export const DEFAULT_MINTING_PEM = 'minting.pem';

// Fixed ids of the local governance network install
export const DEFAULT_GOVERNANCE_CANISTER = 'rrkah-fqaaa-aaaaa-aaaaq-cai';
export const DEFAULT_LEDGER_CANISTER = 'ryjl3-tyaaa-aaaaa-aaaba-cai';
export const DEFAULT_FACTORY_CANISTER = 'qaa6y-5yaaa-aaaaa-aaafa-cai';

export const E8S_PER_TOKEN = 100_000_000n;

export const DEFAULT_TRANSFER_FEE = 10_000n;
export const DEFAULT_STAKE_AMOUNT = 1_000_000n * E8S_PER_TOKEN;
export const DEFAULT_STAKE_MEMO = 1n;
export const DEFAULT_DISSOLVE_DELAY = 252_460_800; // 8 years

export const DEFAULT_PARTICIPANT_COUNT = 5;
export const DEFAULT_PARTICIPANT_AMOUNT = E8S_PER_TOKEN;
export const DEFAULT_PARTICIPANT_CONCURRENCY = 1;

export const DEFAULT_PROPOSAL_POLL_ATTEMPTS = 60;
export const DEFAULT_PROPOSAL_POLL_INTERVAL = 10_000; // 10 secs
export const DEFAULT_SALE_OPEN_POLL_ATTEMPTS = 300;
export const DEFAULT_SALE_OPEN_POLL_INTERVAL = 2_000; // 2 secs
export const DEFAULT_SALE_COMMIT_POLL_ATTEMPTS = 30;
export const DEFAULT_SALE_COMMIT_POLL_INTERVAL = 1_000; // 1 sec
export const DEFAULT_REFRESH_ATTEMPTS = 3;
export const DEFAULT_REFRESH_DELAY = 3_000; // 3 secs
export const DEFAULT_SETTLE_DELAY = 2_000; // 2 secs

export const DEFAULT_OUTPUT_DIR = 'generated';
export const RECORD_FILE = 'deployment.json';
export const PARTICIPANTS_DIR = 'participants';

export const NEURON_STAKE_DOMAIN = 'neuron-stake';
export const PARTICIPANT_SEED_PREFIX = 'sale-participant-';

export const NEURON_LIST_PAGE_SIZE = 100n;
export const SNS_NEURON_LIST_LIMIT = 100;

// Submit proposal and vote
export const DEFAULT_HOTKEY_PERMISSIONS: readonly number[] = [3, 4];

const DAY = 24n * 60n * 60n;
const YEAR = 365n * DAY;

const DEFAULT_LOGO =
  'data:image/png;base64,iVBORw0KGgoAAAANSUhEUgAAAAEAAAABCAQAAAC1HAwCAAAAC0lEQVR42mNkYAAAAAYAAjCB0C8AAAAASUVORK5CYII=';

export const DEFAULT_PROPOSAL: ConfigProposal = {
  title: 'Deploy AcmeDAO SNS',
  summary:
    'This proposal creates a new Service Nervous System (SNS) for AcmeDAO with configured governance ' +
    'parameters, token distribution, and swap mechanics.',
  name: 'AcmeDAO',
  description:
    'AcmeDAO is a decentralized autonomous organization governed by its community through ' +
    'transparent on-chain voting.',
  url: 'https://acmedao.example',
  logo: DEFAULT_LOGO,
  token: {
    name: 'Acme Token',
    symbol: 'ACME',
    fee: 10_000n,
  },
  governance: {
    minimumStake: 10_000_000n,
    maximumDissolveDelay: 8n * YEAR,
    minimumDissolveDelayToVote: 30n * DAY,
    maximumDissolveDelayBonus: 10_000n, // basis points
    maximumAgeBonus: 0n,
    maximumAgeForAgeBonus: 4n * YEAR,
    initialVotingPeriod: 4n * DAY,
    waitForQuietDeadlineIncrease: DAY,
    rejectionFee: 11_000_000n,
    initialRewardRate: 0n,
    finalRewardRate: 0n,
    rewardRateTransitionDuration: 0n,
  },
  swap: {
    minimumParticipants: 5n,
    minimumDirectParticipation: 5n * E8S_PER_TOKEN,
    maximumDirectParticipation: 50n * E8S_PER_TOKEN,
    minimumParticipant: E8S_PER_TOKEN,
    maximumParticipant: 10n * E8S_PER_TOKEN,
    duration: 7n * DAY,
    neuronsFundParticipation: false,
    basketCount: 3n,
    basketDissolveDelayInterval: 30n * DAY,
    restrictedCountries: ['AQ'],
  },
  distribution: {
    treasury: 10n * E8S_PER_TOKEN,
    swap: 20n * E8S_PER_TOKEN,
    developerStake: E8S_PER_TOKEN,
    developerDissolveDelay: 2n * YEAR,
    developerVestingPeriod: 4n * YEAR,
  },
};
