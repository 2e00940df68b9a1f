import type { Identity } from '@dfinity/agent';

import { createConnector, resolveReplicaUrl } from './agent';
import { DeployError, runStep } from './error';
import { loadDfxIdentity, loadPemIdentity } from './identity';
import type { Caller, Config, Connector, DeployContext } from './type';

const STAGE = 'connection';

export type Replica = {
  host: string;
  connect: Connector;
};

export const openReplica = async (config: Config): Promise<Replica> => {
  const host = await resolveReplicaUrl(config.network.url);
  const connect = createConnector(host, config.network, config.canisters);

  console.log();
  console.log('Replica:');
  console.log(`- host: ${host}`);
  return { host, connect };
};

export const createCaller = async (identity: Identity, connect: Connector): Promise<Caller> => {
  const services = await connect(identity);
  return {
    identity,
    principal: identity.getPrincipal(),
    services,
  };
};

export const connectOperator = async (config: Config, replica: Replica): Promise<Caller> => {
  const identity = await runStep(STAGE, `Failed to load operator identity "${config.identity.operator}"`, () =>
    loadDfxIdentity(config.identity.operator),
  );
  const operator = await runStep(STAGE, `Failed to connect to replica at ${replica.host}`, () =>
    createCaller(identity, replica.connect),
  );
  console.log(`- operator: ${operator.principal.toText()} (identity "${config.identity.operator}")`);
  return operator;
};

export const connectMinting = async (config: Config, replica: Replica): Promise<Caller> => {
  const identity = await runStep(STAGE, `Failed to load minting identity "${config.identity.mintingPem}"`, () =>
    loadPemIdentity(config.identity.mintingPem),
  );
  const minting = await runStep(STAGE, `Failed to connect to replica at ${replica.host}`, () =>
    createCaller(identity, replica.connect),
  );
  console.log(`- minting: ${minting.principal.toText()}`);
  return minting;
};

/**
 * Loads the operator and minting identities and opens a session for each. Any
 * failure here is fatal for the run.
 */
export const buildDeployContext = async (config: Config): Promise<DeployContext> => {
  const replica = await openReplica(config);
  const operator = await connectOperator(config, replica);
  const minting = await connectMinting(config, replica);
  if (operator.principal.compareTo(minting.principal) === 'eq') {
    throw new DeployError(STAGE, 'Operator and minting identities must differ');
  }
  return { config, operator, minting, connect: replica.connect };
};
