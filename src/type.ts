import type { Identity } from '@dfinity/agent';
import type { Principal } from '@dfinity/principal';

export type CommandName =
  | 'deploy'
  | 'add-hotkey'
  | 'list-neurons'
  | 'mint'
  | 'create-neuron'
  | 'disburse'
  | 'increase-dissolve-delay'
  | 'manage-dissolving'
  | 'set-visibility'
  | 'get-neuron'
  | 'get-balance'
  | 'check-deployed'
  | 'mint-sns-tokens';

// Which governance a neuron command acts on: the deployed service's or the network's
export type CommandTarget = 'sns' | 'icp';

export type Args = {
  command: CommandName;
  configPath: string;
  options: ReadonlyMap<string, string>;
};

export type ConfigNetwork = {
  url: string | undefined;
  fetchRootKey: boolean;
};

export type ConfigIdentity = {
  operator: string;
  mintingPem: string;
};

export type ConfigCanisters = {
  governance: Principal;
  ledger: Principal;
  factory: Principal;
};

export type ConfigStake = {
  amount: bigint;
  fee: bigint;
  memo: bigint;
  dissolveDelay: number;
};

export type ConfigParticipants = {
  count: number;
  amount: bigint;
  concurrency: number;
};

export type ConfigPoll = {
  attempts: number;
  interval: number;
};

export type ConfigExecution = {
  proposalPoll: ConfigPoll;
  saleOpenPoll: ConfigPoll;
  saleCommitPoll: ConfigPoll;
  refresh: ConfigPoll;
  settleDelay: number;
};

export type ConfigOutput = {
  dir: string;
};

export type ConfigProposalToken = {
  name: string;
  symbol: string;
  fee: bigint;
};

export type ConfigProposalGovernance = {
  minimumStake: bigint;
  maximumDissolveDelay: bigint;
  minimumDissolveDelayToVote: bigint;
  maximumDissolveDelayBonus: bigint;
  maximumAgeBonus: bigint;
  maximumAgeForAgeBonus: bigint;
  initialVotingPeriod: bigint;
  waitForQuietDeadlineIncrease: bigint;
  rejectionFee: bigint;
  initialRewardRate: bigint;
  finalRewardRate: bigint;
  rewardRateTransitionDuration: bigint;
};

export type ConfigProposalSwap = {
  minimumParticipants: bigint;
  minimumDirectParticipation: bigint;
  maximumDirectParticipation: bigint;
  minimumParticipant: bigint;
  maximumParticipant: bigint;
  duration: bigint;
  neuronsFundParticipation: boolean;
  basketCount: bigint;
  basketDissolveDelayInterval: bigint;
  restrictedCountries: readonly string[];
};

export type ConfigProposalDistribution = {
  treasury: bigint;
  swap: bigint;
  developerStake: bigint;
  developerDissolveDelay: bigint;
  developerVestingPeriod: bigint;
};

export type ConfigProposal = {
  title: string;
  summary: string;
  name: string;
  description: string;
  url: string;
  logo: string;
  token: ConfigProposalToken;
  governance: ConfigProposalGovernance;
  swap: ConfigProposalSwap;
  distribution: ConfigProposalDistribution;
};

export type Config = {
  network: ConfigNetwork;
  identity: ConfigIdentity;
  canisters: ConfigCanisters;
  stake: ConfigStake;
  participants: ConfigParticipants;
  execution: ConfigExecution;
  output: ConfigOutput;
  proposal: ConfigProposal;
};

export type Account = {
  owner: Principal;
  subaccount?: Uint8Array;
};

export type LedgerClient = {
  transfer: (to: Account, amount: bigint) => Promise<bigint>;
  balanceOf: (account: Account) => Promise<bigint>;
  fee: () => Promise<bigint>;
};

export type DissolveState =
  | { type: 'delay'; seconds: bigint }
  | { type: 'dissolving'; whenDissolvedSeconds: bigint }
  | { type: 'none' };

export type NeuronSummary = {
  id: bigint;
  stake: bigint;
  dissolve: DissolveState;
  controller: Principal | undefined;
  hotKeys: Principal[];
  visibility: number | undefined;
};

export type GovernanceClient = {
  claimNeuron: (memo: bigint) => Promise<bigint>;
  increaseDissolveDelay: (neuronId: bigint, seconds: number) => Promise<void>;
  makeProposal: (neuronId: bigint, proposal: ConfigProposal, owner: Principal) => Promise<bigint>;
  addHotKey: (neuronId: bigint, hotKey: Principal) => Promise<void>;
  setVisibility: (neuronId: bigint, isPublic: boolean) => Promise<void>;
  startDissolving: (neuronId: bigint) => Promise<void>;
  stopDissolving: (neuronId: bigint) => Promise<void>;
  disburse: (neuronId: bigint, toAccount: Uint8Array | undefined, amount: bigint | undefined) => Promise<bigint>;
  listNeurons: () => Promise<NeuronSummary[]>;
  getNeuron: (neuronId: bigint) => Promise<NeuronSummary>;
};

export type SnsNeuronPermission = {
  principal: Principal | undefined;
  permissionTypes: number[];
};

export type SnsNeuronSummary = {
  id: Uint8Array;
  stake: bigint;
  dissolve: DissolveState;
  permissions: SnsNeuronPermission[];
};

export type SnsGovernanceClient = {
  listNeurons: (owner: Principal) => Promise<SnsNeuronSummary[]>;
  minimumStake: () => Promise<bigint>;
  claimNeuron: (memo: bigint, controller: Principal) => Promise<Uint8Array>;
  addPermissions: (neuronId: Uint8Array, principal: Principal, permissionTypes: readonly number[]) => Promise<void>;
  increaseDissolveDelay: (neuronId: Uint8Array, seconds: number) => Promise<void>;
  startDissolving: (neuronId: Uint8Array) => Promise<void>;
  stopDissolving: (neuronId: Uint8Array) => Promise<void>;
  disburse: (neuronId: Uint8Array, to: Principal, amount: bigint | undefined) => Promise<bigint>;
  proposeMint: (neuronId: Uint8Array, to: Principal, amount: bigint) => Promise<bigint>;
  registerVote: (neuronId: Uint8Array, proposalId: bigint, vote: number) => Promise<void>;
};

export type DeployedServiceSet = {
  root: Principal | undefined;
  governance: Principal | undefined;
  index: Principal | undefined;
  swap: Principal | undefined;
  ledger: Principal | undefined;
};

export type RequiredServiceSet = DeployedServiceSet & {
  governance: Principal;
  ledger: Principal;
  swap: Principal;
};

export type FactoryClient = {
  getDeployedByProposal: (proposalId: bigint) => Promise<DeployedServiceSet>;
  listDeployed: () => Promise<DeployedServiceSet[]>;
};

export enum SaleLifecycle {
  Unspecified = 0,
  Pending = 1,
  Open = 2,
  Committed = 3,
  Aborted = 4,
  Adopted = 5,
}

export type SaleLifecycleInfo = {
  lifecycle: number;
  openTimestampSeconds: bigint | undefined;
};

export type SaleDerivedState = {
  participantCount: bigint;
  participationE8s: bigint;
};

export type SaleTicketOutcome =
  | { type: 'created'; ticketId: bigint }
  | { type: 'existing'; ticketId: bigint }
  | { type: 'invalid-amount'; min: bigint; max: bigint }
  | { type: 'rejected'; errorType: number };

export type SaleRefresh = {
  accepted: bigint;
  balance: bigint;
};

export type SaleFinalize = {
  errorMessage: string | undefined;
};

export type SaleClient = {
  getLifecycle: () => Promise<SaleLifecycleInfo>;
  getDerivedState: () => Promise<SaleDerivedState>;
  newSaleTicket: (amount: bigint, subaccount: Uint8Array) => Promise<SaleTicketOutcome>;
  refreshBuyerTokens: (buyer: Principal) => Promise<SaleRefresh>;
  finalize: () => Promise<SaleFinalize>;
};

export type Services = {
  ledger: (canisterId: Principal) => LedgerClient;
  governance: GovernanceClient;
  factory: FactoryClient;
  sale: (canisterId: Principal) => SaleClient;
  snsGovernance: (canisterId: Principal) => SnsGovernanceClient;
};

export type Connector = (identity: Identity) => Promise<Services>;

export type Caller = {
  identity: Identity;
  principal: Principal;
  services: Services;
};

export type DeployContext = {
  config: Config;
  operator: Caller;
  minting: Caller;
  connect: Connector;
};

export type FundedPosition = {
  positionId: bigint;
  lockSeconds: bigint;
};

export type ProposalResult = {
  proposalId: bigint;
  services: RequiredServiceSet;
};

export type RegistrationOutcome = 'registered' | 'zero-balance' | 'subaccount-mismatch' | 'failed';

export type Participant = {
  ordinal: number;
  seed: Uint8Array;
  seedFile: string;
  principal: Principal;
  saleSubaccount: Uint8Array;
  funded: boolean;
  registered: boolean;
  registration: RegistrationOutcome;
};

export type FinalizeResult = {
  lifecycle: number;
  thresholdsMet: boolean;
  finalized: boolean;
};

export type ParticipantRecord = {
  principal: string;
  seed_file: string;
  registered: boolean;
};

export type DeployedServiceRecord = {
  root_canister_id?: string;
  governance_canister_id?: string;
  index_canister_id?: string;
  swap_canister_id?: string;
  ledger_canister_id?: string;
};

export type SaleRecord = {
  lifecycle: number;
  finalized: boolean;
};

export type DeploymentRecord = {
  icp_neuron_id: number | string;
  proposal_id: number | string;
  owner_principal: string;
  deployed_sns: DeployedServiceRecord;
  participants: ParticipantRecord[];
  sale: SaleRecord;
};
