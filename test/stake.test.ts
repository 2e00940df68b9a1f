import { beforeEach, describe, expect, it } from 'vitest';

import { DeployError } from '../src/error';
import { configurePosition } from '../src/position';
import { fundStake } from '../src/stake';
import { neuronStakeSubaccount } from '../src/subaccount';
import { createTestDeployment, E8S, silenceLogs, TEST_FEE, testConfig } from './fake';

describe('fundStake', () => {
  beforeEach(() => {
    silenceLogs();
  });

  it('mints, stakes into the neuron sub-account and claims by memo', async () => {
    const { network, context } = await createTestDeployment(testConfig('unused'));
    const { governance } = context.config.canisters;

    const positionId = await fundStake(context);

    expect(positionId).toBe(1000n);
    const subaccount = neuronStakeSubaccount(context.operator.principal, 1n);
    expect(network.ledger.balanceOf({ owner: governance, subaccount })).toBe(10n * E8S);
    expect(network.ledger.transfers.map((transfer) => transfer.amount)).toEqual([10n * E8S + TEST_FEE, 10n * E8S]);
  });

  it('fails the stage when the claim finds no stake', async () => {
    const config = testConfig('unused');
    const { context } = await createTestDeployment(config);
    const claimOnly = {
      ...context,
      operator: {
        ...context.operator,
        services: {
          ...context.operator.services,
          ledger: () => ({
            transfer: async () => 1n,
            balanceOf: async () => 0n,
            fee: async () => TEST_FEE,
          }),
        },
      },
    };

    const error = await fundStake(claimOnly).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DeployError);
    expect(error).toHaveProperty(
      'message',
      '[stake] Failed to claim neuron with memo 1: manage_neuron claim: no stake for memo 1',
    );
  });
});

describe('configurePosition', () => {
  beforeEach(() => {
    silenceLogs();
  });

  it('increases the dissolve delay exactly once', async () => {
    const { network, context } = await createTestDeployment(testConfig('unused'));
    const positionId = await fundStake(context);

    const position = await configurePosition(context, positionId);

    expect(position).toEqual({ positionId, lockSeconds: 15_778_800n });
    expect(network.governance.dissolveDelayCalls).toHaveLength(1);
    expect(network.governance.neurons.get(positionId)?.dissolve).toEqual({ type: 'delay', seconds: 15_778_800n });
  });

  it('fails the stage for a neuron the operator does not control', async () => {
    const { context } = await createTestDeployment(testConfig('unused'));

    const error = await configurePosition(context, 42n).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DeployError);
    expect(error).toHaveProperty('stage', 'position');
  });
});
