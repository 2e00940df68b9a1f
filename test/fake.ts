import type { Identity } from '@dfinity/agent';
import { Ed25519KeyIdentity } from '@dfinity/identity';
import { Principal } from '@dfinity/principal';
import { bytesToHex, sha256, toBytes } from 'viem';
import { vi } from 'vitest';

import { parseConfig } from '../src/config';
import { createCaller } from '../src/context';
import { RemoteError } from '../src/error';
import { neuronStakeSubaccount, principalSubaccount, SUBACCOUNT_SIZE } from '../src/subaccount';
import type {
  Account,
  Config,
  ConfigProposalSwap,
  DeployContext,
  DeployedServiceSet,
  DissolveState,
  FactoryClient,
  GovernanceClient,
  NeuronSummary,
  RequiredServiceSet,
  SaleClient,
  SaleDerivedState,
  SaleRefresh,
  Services,
  SnsGovernanceClient,
  SnsNeuronSummary,
} from '../src/type';
import { SaleLifecycle } from '../src/type';

export const E8S = 100_000_000n;
export const TEST_FEE = 10_000n;
export const SNS_TEST_FEE = 1_000n;

export const silenceLogs = () => vi.spyOn(console, 'log').mockImplementation(() => {});

export const testIdentity = (name: string): Identity => {
  return Ed25519KeyIdentity.generate(sha256(toBytes(`test-${name}`), 'bytes'));
};

export const testCanister = (n: number): Principal => {
  return Principal.fromUint8Array(Uint8Array.of(0, 0, 0, 0, 0, 0x20, 0, n, 1, 1));
};

export const testServices = (): RequiredServiceSet => ({
  root: testCanister(1),
  governance: testCanister(2),
  index: testCanister(3),
  swap: testCanister(4),
  ledger: testCanister(5),
});

/**
 * Small, fast deployment: three participants of one token each, sale thresholds
 * reached exactly by three registrations, no sleeping between steps.
 */
export const testConfig = (outputDir: string): Config => {
  const poll = { attempts: 3, interval: 0 };
  return parseConfig({
    identity: { operator: 'test-operator', mintingPem: 'test-minting.pem' },
    stake: { amount: Number(10n * E8S), fee: Number(TEST_FEE), memo: 1, dissolveDelay: 15_778_800 },
    participants: { count: 3, amount: Number(E8S), concurrency: 2 },
    execution: {
      proposalPoll: poll,
      saleOpenPoll: poll,
      saleCommitPoll: poll,
      refresh: poll,
      settleDelay: 0,
    },
    output: { dir: outputDir },
    proposal: {
      swap: {
        minimumParticipants: 3,
        minimumDirectParticipation: Number(3n * E8S),
        maximumDirectParticipation: Number(50n * E8S),
        minimumParticipant: Number(E8S),
        maximumParticipant: Number(10n * E8S),
      },
    },
  });
};

//

const accountKey = (account: Account): string => {
  return `${account.owner.toText()}:${bytesToHex(account.subaccount ?? new Uint8Array(SUBACCOUNT_SIZE))}`;
};

export class FakeLedger {
  public readonly balances = new Map<string, bigint>();
  public readonly transfers: { from: string; to: string; amount: bigint }[] = [];
  private block = 0n;

  public constructor(
    private readonly minting: Principal,
    public readonly fee: bigint,
  ) {}

  public balanceOf(account: Account): bigint {
    return this.balances.get(accountKey(account)) ?? 0n;
  }

  public credit(account: Account, amount: bigint): void {
    this.balances.set(accountKey(account), this.balanceOf(account) + amount);
  }

  public transfer(caller: Principal, to: Account, amount: bigint): bigint {
    // Minting account transfers create funds and pay no fee
    if (caller.compareTo(this.minting) !== 'eq') {
      const from: Account = { owner: caller };
      const balance = this.balanceOf(from);
      if (balance < amount + this.fee) {
        throw new RemoteError('icrc1_transfer', `insufficient funds (balance ${balance})`);
      }
      this.balances.set(accountKey(from), balance - amount - this.fee);
    }
    this.credit(to, amount);
    this.transfers.push({ from: caller.toText(), to: accountKey(to), amount });
    this.block += 1n;
    return this.block;
  }
}

//

export class FakeFactory {
  public readonly deployments = new Map<bigint, DeployedServiceSet>();
  public deployed: DeployedServiceSet = testServices();
  // Lookups failing before the deployment shows up
  public readyAfter = 0;
  public lookups = 0;

  public execute(proposalId: bigint): void {
    this.deployments.set(proposalId, this.deployed);
  }

  public client(): FactoryClient {
    return {
      getDeployedByProposal: async (proposalId) => {
        this.lookups++;
        const deployed = this.deployments.get(proposalId);
        if (this.lookups <= this.readyAfter || deployed == null) {
          throw new RemoteError('get_deployed_sns_by_proposal_id', 'not found');
        }
        return deployed;
      },
      listDeployed: async () => [...this.deployments.values()],
    };
  }
}

//

export class FakeGovernance {
  public readonly neurons = new Map<bigint, NeuronSummary>();
  public readonly claims = new Map<string, bigint>();
  public readonly dissolveDelayCalls: { neuronId: bigint; seconds: number }[] = [];
  public readonly proposals: { neuronId: bigint; title: string; owner: string }[] = [];
  public nextNeuronId = 1000n;
  public proposalId = 7n;

  public constructor(
    private readonly ledger: FakeLedger,
    private readonly factory: FakeFactory,
    private readonly governanceId: Principal,
  ) {}

  private owned(caller: Principal, neuronId: bigint): NeuronSummary {
    const neuron = this.neurons.get(neuronId);
    if (neuron == null) {
      throw new RemoteError('manage_neuron', `neuron ${neuronId} not found`);
    }
    if (neuron.controller == null || neuron.controller.compareTo(caller) !== 'eq') {
      throw new RemoteError('manage_neuron', `caller is not authorized to control neuron ${neuronId}`);
    }
    return neuron;
  }

  public client(caller: Principal): GovernanceClient {
    return {
      claimNeuron: async (memo) => {
        const key = `${caller.toText()}:${memo}`;
        const claimed = this.claims.get(key);
        if (claimed != null) {
          return claimed;
        }

        const subaccount = neuronStakeSubaccount(caller, memo);
        const stake = this.ledger.balanceOf({ owner: this.governanceId, subaccount });
        if (stake === 0n) {
          throw new RemoteError('manage_neuron claim', `no stake for memo ${memo}`);
        }

        const id = this.nextNeuronId++;
        this.neurons.set(id, {
          id,
          stake,
          dissolve: { type: 'delay', seconds: 0n },
          controller: caller,
          hotKeys: [],
          visibility: 1,
        });
        this.claims.set(key, id);
        return id;
      },
      increaseDissolveDelay: async (neuronId, seconds) => {
        const neuron = this.owned(caller, neuronId);
        this.dissolveDelayCalls.push({ neuronId, seconds });
        if (neuron.dissolve.type === 'delay') {
          neuron.dissolve = { type: 'delay', seconds: neuron.dissolve.seconds + BigInt(seconds) };
        }
      },
      makeProposal: async (neuronId, proposal, owner) => {
        this.owned(caller, neuronId);
        this.proposals.push({ neuronId, title: proposal.title, owner: owner.toText() });
        this.factory.execute(this.proposalId);
        return this.proposalId;
      },
      addHotKey: async (neuronId, hotKey) => {
        this.owned(caller, neuronId).hotKeys.push(hotKey);
      },
      setVisibility: async (neuronId, isPublic) => {
        this.owned(caller, neuronId).visibility = isPublic ? 2 : 1;
      },
      startDissolving: async (neuronId) => {
        const neuron = this.owned(caller, neuronId);
        if (neuron.dissolve.type === 'delay') {
          neuron.dissolve = { type: 'dissolving', whenDissolvedSeconds: neuron.dissolve.seconds };
        }
      },
      stopDissolving: async (neuronId) => {
        const neuron = this.owned(caller, neuronId);
        if (neuron.dissolve.type === 'dissolving') {
          neuron.dissolve = { type: 'delay', seconds: neuron.dissolve.whenDissolvedSeconds };
        }
      },
      disburse: async (neuronId) => {
        this.owned(caller, neuronId).stake = 0n;
        return 1n;
      },
      listNeurons: async () => {
        return [...this.neurons.values()].filter(
          (neuron) =>
            neuron.controller?.compareTo(caller) === 'eq' ||
            neuron.hotKeys.some((key) => key.compareTo(caller) === 'eq'),
        );
      },
      getNeuron: async (neuronId) => {
        const neuron = this.neurons.get(neuronId);
        if (neuron == null) {
          throw new RemoteError('get_full_neuron', `neuron ${neuronId} not found`);
        }
        return neuron;
      },
    };
  }
}

//

// Permission types of service neurons
export const SnsPermission = {
  ConfigureDissolveState: 1,
  ManagePrincipals: 2,
  SubmitProposal: 3,
  Vote: 4,
  Disburse: 5,
} as const;

const ALL_PERMISSIONS = Object.values(SnsPermission);

/**
 * Governance of the deployed service. Neurons are keyed by their id, which is the
 * stake sub-account, and every command checks the caller holds the permission for it.
 */
export class FakeSnsGovernance {
  public readonly neurons = new Map<string, SnsNeuronSummary>();
  public readonly proposals: { id: bigint; neuron: string; to: string; amount: bigint }[] = [];
  public readonly votes: { proposalId: bigint; neuron: string; voter: string; vote: number }[] = [];
  public readonly disbursements: { neuron: string; to: string; amount: bigint }[] = [];
  public minimumStake = E8S;
  private nextProposalId = 1n;

  public constructor(
    private readonly ledger: FakeLedger,
    private readonly governanceId: Principal,
  ) {}

  // A neuron handed out by the sale, fully controlled by its owner
  public addNeuron(owner: Principal, id: Uint8Array, stake: bigint, dissolve: DissolveState): SnsNeuronSummary {
    const neuron: SnsNeuronSummary = {
      id,
      stake,
      dissolve,
      permissions: [{ principal: owner, permissionTypes: [...ALL_PERMISSIONS] }],
    };
    this.neurons.set(bytesToHex(id), neuron);
    return neuron;
  }

  public neuron(id: Uint8Array): SnsNeuronSummary | undefined {
    return this.neurons.get(bytesToHex(id));
  }

  private permitted(caller: Principal, neuronId: Uint8Array, permission: number): SnsNeuronSummary {
    const neuron = this.neuron(neuronId);
    if (neuron == null) {
      throw new RemoteError('manage_neuron', `neuron ${bytesToHex(neuronId)} not found`);
    }
    const granted = neuron.permissions.some(
      (entry) => entry.principal?.compareTo(caller) === 'eq' && entry.permissionTypes.includes(permission),
    );
    if (!granted) {
      throw new RemoteError('manage_neuron', `caller lacks permission ${permission} on ${bytesToHex(neuronId)}`);
    }
    return neuron;
  }

  public client(caller: Principal): SnsGovernanceClient {
    return {
      listNeurons: async (owner) => {
        return [...this.neurons.values()].filter((neuron) =>
          neuron.permissions.some((entry) => entry.principal?.compareTo(owner) === 'eq'),
        );
      },
      minimumStake: async () => this.minimumStake,
      claimNeuron: async (memo, controller) => {
        const subaccount = neuronStakeSubaccount(controller, memo);
        const stake = this.ledger.balanceOf({ owner: this.governanceId, subaccount });
        if (stake < this.minimumStake) {
          throw new RemoteError('manage_neuron claim', `stake of ${stake} below the minimum`);
        }

        const existing = this.neuron(subaccount);
        if (existing != null) {
          existing.stake = stake;
          return existing.id;
        }
        return this.addNeuron(controller, subaccount, stake, { type: 'delay', seconds: 0n }).id;
      },
      addPermissions: async (neuronId, principal, permissionTypes) => {
        const neuron = this.permitted(caller, neuronId, SnsPermission.ManagePrincipals);
        const entry = neuron.permissions.find((permission) => permission.principal?.compareTo(principal) === 'eq');
        if (entry == null) {
          neuron.permissions.push({ principal, permissionTypes: [...permissionTypes] });
          return;
        }
        for (const type of permissionTypes) {
          if (!entry.permissionTypes.includes(type)) {
            entry.permissionTypes.push(type);
          }
        }
      },
      increaseDissolveDelay: async (neuronId, seconds) => {
        const neuron = this.permitted(caller, neuronId, SnsPermission.ConfigureDissolveState);
        if (neuron.dissolve.type !== 'dissolving') {
          const current = neuron.dissolve.type === 'delay' ? neuron.dissolve.seconds : 0n;
          neuron.dissolve = { type: 'delay', seconds: current + BigInt(seconds) };
        }
      },
      startDissolving: async (neuronId) => {
        const neuron = this.permitted(caller, neuronId, SnsPermission.ConfigureDissolveState);
        if (neuron.dissolve.type !== 'delay') {
          throw new RemoteError('manage_neuron start dissolving', 'neuron is not locked');
        }
        neuron.dissolve = { type: 'dissolving', whenDissolvedSeconds: neuron.dissolve.seconds };
      },
      stopDissolving: async (neuronId) => {
        const neuron = this.permitted(caller, neuronId, SnsPermission.ConfigureDissolveState);
        if (neuron.dissolve.type !== 'dissolving') {
          throw new RemoteError('manage_neuron stop dissolving', 'neuron is not dissolving');
        }
        neuron.dissolve = { type: 'delay', seconds: neuron.dissolve.whenDissolvedSeconds };
      },
      disburse: async (neuronId, to, amount) => {
        const neuron = this.permitted(caller, neuronId, SnsPermission.Disburse);
        const value = amount ?? neuron.stake;
        if (value > neuron.stake) {
          throw new RemoteError('manage_neuron disburse', `${value} exceeds the stake of ${neuron.stake}`);
        }
        neuron.stake -= value;
        this.ledger.credit({ owner: to }, value - this.ledger.fee);
        this.disbursements.push({ neuron: bytesToHex(neuronId), to: to.toText(), amount: value });
        return BigInt(this.disbursements.length);
      },
      proposeMint: async (neuronId, to, amount) => {
        this.permitted(caller, neuronId, SnsPermission.SubmitProposal);
        const id = this.nextProposalId++;
        this.proposals.push({ id, neuron: bytesToHex(neuronId), to: to.toText(), amount });
        return id;
      },
      registerVote: async (neuronId, proposalId, vote) => {
        this.permitted(caller, neuronId, SnsPermission.Vote);
        if (!this.proposals.some((proposal) => proposal.id === proposalId)) {
          throw new RemoteError('manage_neuron register vote', `proposal ${proposalId} not found`);
        }
        this.votes.push({ proposalId, neuron: bytesToHex(neuronId), voter: caller.toText(), vote });
      },
    };
  }
}

//

export class FakeSale {
  public readonly buyers = new Map<string, bigint>();
  public readonly refreshOverrides = new Map<string, SaleRefresh>();
  public readonly refreshCalls = new Map<string, number>();
  public readonly tickets: { amount: bigint; subaccount: Uint8Array }[] = [];
  // Lifecycle queries answering Pending before the sale opens
  public pendingQueries = 0;
  // Lifecycle queries failing before answering
  public failingQueries = 0;
  public lifecycleOverride: number | undefined;
  public failDerivedState = false;
  public lifecycleCalls = 0;
  public finalizeCalls = 0;
  public finalizeError: string | undefined;

  public constructor(
    private readonly ledger: FakeLedger,
    private readonly swapId: Principal,
    private readonly swap: ConfigProposalSwap,
  ) {}

  public derivedState(): SaleDerivedState {
    let participationE8s = 0n;
    for (const accepted of this.buyers.values()) {
      participationE8s += accepted;
    }
    return { participantCount: BigInt(this.buyers.size), participationE8s };
  }

  private lifecycle(): number {
    this.lifecycleCalls++;
    if (this.failingQueries > 0) {
      this.failingQueries--;
      throw new RemoteError('get_lifecycle', 'replica unavailable');
    }
    if (this.pendingQueries > 0) {
      this.pendingQueries--;
      return SaleLifecycle.Pending;
    }
    if (this.lifecycleOverride != null) {
      return this.lifecycleOverride;
    }

    const state = this.derivedState();
    const met =
      state.participantCount >= this.swap.minimumParticipants &&
      state.participationE8s >= this.swap.minimumDirectParticipation;
    return met ? SaleLifecycle.Committed : SaleLifecycle.Open;
  }

  public client(): SaleClient {
    return {
      getLifecycle: async () => ({ lifecycle: this.lifecycle(), openTimestampSeconds: 1_700_000_000n }),
      getDerivedState: async () => {
        if (this.failDerivedState) {
          throw new RemoteError('get_derived_state', 'replica unavailable');
        }
        return this.derivedState();
      },
      newSaleTicket: async (amount, subaccount) => {
        this.tickets.push({ amount, subaccount });
        return { type: 'created', ticketId: BigInt(this.tickets.length) };
      },
      refreshBuyerTokens: async (buyer) => {
        const key = buyer.toText();
        this.refreshCalls.set(key, (this.refreshCalls.get(key) ?? 0) + 1);

        const override = this.refreshOverrides.get(key);
        if (override != null) {
          return override;
        }

        const balance = this.ledger.balanceOf({ owner: this.swapId, subaccount: principalSubaccount(buyer) });
        if (balance > 0n) {
          this.buyers.set(key, balance);
        }
        return { accepted: balance, balance };
      },
      finalize: async () => {
        this.finalizeCalls++;
        return { errorMessage: this.finalizeError };
      },
    };
  }
}

//

/**
 * In-process stand-in for the replica: one ledger, governance, factory and sale
 * shared by every identity that connects, plus the deployed service's own ledger
 * and governance under the ids of testServices().
 */
export class FakeNetwork {
  public readonly ledger: FakeLedger;
  public readonly factory = new FakeFactory();
  public readonly governance: FakeGovernance;
  public readonly sale: FakeSale;
  public readonly snsLedger: FakeLedger;
  public readonly snsGovernance: FakeSnsGovernance;
  public readonly connections: string[] = [];

  public constructor(config: Config, minting: Principal) {
    const services = testServices();
    this.ledger = new FakeLedger(minting, config.stake.fee);
    this.governance = new FakeGovernance(this.ledger, this.factory, config.canisters.governance);
    this.sale = new FakeSale(this.ledger, services.swap, config.proposal.swap);
    this.snsLedger = new FakeLedger(services.governance, SNS_TEST_FEE);
    this.snsGovernance = new FakeSnsGovernance(this.snsLedger, services.governance);
  }

  public connect = async (identity: Identity): Promise<Services> => {
    const caller = identity.getPrincipal();
    this.connections.push(caller.toText());
    return {
      ledger: (canisterId) => {
        const ledger = canisterId.compareTo(testServices().ledger) === 'eq' ? this.snsLedger : this.ledger;
        return {
          transfer: async (to, amount) => ledger.transfer(caller, to, amount),
          balanceOf: async (account) => ledger.balanceOf(account),
          fee: async () => ledger.fee,
        };
      },
      governance: this.governance.client(caller),
      factory: this.factory.client(),
      sale: () => this.sale.client(),
      snsGovernance: () => this.snsGovernance.client(caller),
    };
  };
}

export type TestDeployment = {
  network: FakeNetwork;
  context: DeployContext;
};

export const createTestDeployment = async (config: Config): Promise<TestDeployment> => {
  const operatorIdentity = testIdentity('operator');
  const mintingIdentity = testIdentity('minting');
  const network = new FakeNetwork(config, mintingIdentity.getPrincipal());
  const context: DeployContext = {
    config,
    operator: await createCaller(operatorIdentity, network.connect),
    minting: await createCaller(mintingIdentity, network.connect),
    connect: network.connect,
  };
  return { network, context };
};
