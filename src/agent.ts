import { Actor, HttpAgent } from '@dfinity/agent';
import type { Identity } from '@dfinity/agent';
import type { Principal } from '@dfinity/principal';

import { DEFAULT_DFX_NETWORK, DEFAULT_REPLICA_URL } from './constant';
import { describeError } from './error';
import { createFactoryClient } from './factory';
import { checkFileExists, joinPath, loadJson } from './file';
import { createGovernanceClient } from './governance';
import { factoryIdlFactory } from './idl/factory';
import type { FactoryService } from './idl/factory';
import { governanceIdlFactory } from './idl/governance';
import type { GovernanceService } from './idl/governance';
import { ledgerIdlFactory } from './idl/ledger';
import type { LedgerService } from './idl/ledger';
import { saleIdlFactory } from './idl/sale';
import type { SaleService } from './idl/sale';
import { snsGovernanceIdlFactory } from './idl/snsGovernance';
import type { SnsGovernanceService } from './idl/snsGovernance';
import { resolveDfxConfigDir } from './identity';
import type { Env } from './identity';
import { createLedgerClient } from './ledger';
import { createSaleClient } from './sale';
import { createSnsGovernanceClient } from './snsGovernance';
import type { ConfigCanisters, ConfigNetwork, Connector, Services } from './type';

const readNetworkBind = (networks: unknown, name: string): string | undefined => {
  if (typeof networks !== 'object' || networks == null) {
    return undefined;
  }
  const network: unknown = Reflect.get(networks, name);
  if (typeof network !== 'object' || network == null) {
    return undefined;
  }
  const bind: unknown = Reflect.get(network, 'bind');
  return typeof bind === 'string' ? bind : undefined;
};

/**
 * Replica URL: configured URL, then `DFX_REPLICA_URL`, `DFX_REPLICA_PORT`, the bind
 * address of `DFX_NETWORK` (or `local`) in the dfx `networks.json`, then the default.
 */
export const resolveReplicaUrl = async (configUrl: string | undefined, env: Env = process.env): Promise<string> => {
  if (configUrl) {
    return configUrl;
  }
  if (env.DFX_REPLICA_URL) {
    return env.DFX_REPLICA_URL;
  }
  if (env.DFX_REPLICA_PORT) {
    return `http://127.0.0.1:${env.DFX_REPLICA_PORT}`;
  }

  const networksPath = joinPath(resolveDfxConfigDir(env), 'networks.json');
  const exists = await checkFileExists(networksPath);
  if (exists) {
    let networks: unknown;
    try {
      networks = await loadJson(networksPath);
    } catch (e) {
      console.log(`⚠️ Ignoring unreadable "${networksPath}": ${describeError(e)}`);
    }
    const networkName = env.DFX_NETWORK || DEFAULT_DFX_NETWORK;
    const bind = readNetworkBind(networks, networkName) ?? readNetworkBind(networks, DEFAULT_DFX_NETWORK);
    if (bind) {
      return `http://${bind}`;
    }
  }
  return DEFAULT_REPLICA_URL;
};

/**
 * Connector that opens one agent per identity against `host`. Root key is fetched
 * for local replicas.
 */
export const createConnector = (host: string, network: ConfigNetwork, canisters: ConfigCanisters): Connector => {
  return async (identity: Identity): Promise<Services> => {
    const agent = await HttpAgent.create({
      host,
      identity,
      shouldFetchRootKey: network.fetchRootKey,
    });

    const governanceActor = Actor.createActor<GovernanceService>(governanceIdlFactory, {
      agent,
      canisterId: canisters.governance,
    });
    const factoryActor = Actor.createActor<FactoryService>(factoryIdlFactory, {
      agent,
      canisterId: canisters.factory,
    });

    const ledger = (canisterId: Principal) =>
      createLedgerClient(Actor.createActor<LedgerService>(ledgerIdlFactory, { agent, canisterId }));
    const sale = (canisterId: Principal) =>
      createSaleClient(Actor.createActor<SaleService>(saleIdlFactory, { agent, canisterId }));
    const snsGovernance = (canisterId: Principal) =>
      createSnsGovernanceClient(
        Actor.createActor<SnsGovernanceService>(snsGovernanceIdlFactory, { agent, canisterId }),
      );

    return {
      ledger,
      governance: createGovernanceClient(governanceActor),
      factory: createFactoryClient(factoryActor),
      sale,
      snsGovernance,
    };
  };
};
