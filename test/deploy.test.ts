import fs from 'fs/promises';
import os from 'os';
import fp from 'path';
import { bytesToHex } from 'viem';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { runDeployment } from '../src/deploy';
import { DeployError } from '../src/error';
import { finalizeSale } from '../src/finalize';
import { participantSeed } from '../src/identity';
import { deriveParticipantKey, runParticipants } from '../src/participant';
import { loadRecord } from '../src/record';
import type { Config } from '../src/type';
import { SaleLifecycle } from '../src/type';
import { createTestDeployment, E8S, silenceLogs, TEST_FEE, testConfig, testServices } from './fake';

// Five participants of one token each, thresholds reached only when all five register
const fiveParticipantConfig = (dir: string): Config => {
  const config = testConfig(dir);
  config.participants.count = 5;
  config.proposal.swap.minimumParticipants = 5n;
  config.proposal.swap.minimumDirectParticipation = 5n * 100_000_000n;
  return config;
};

describe('runDeployment', () => {
  let dir: string;

  beforeEach(async () => {
    silenceLogs();
    dir = await fs.mkdtemp(fp.join(os.tmpdir(), 'sns-bootstrap-deploy-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('runs every stage and writes the deployment record', async () => {
    const { network, context } = await createTestDeployment(testConfig(dir));
    network.sale.pendingQueries = 2;

    const record = await runDeployment(context);

    expect(record.icp_neuron_id).toBe(1000);
    expect(record.proposal_id).toBe(7);
    expect(record.owner_principal).toBe(context.operator.principal.toText());
    expect(record.participants).toHaveLength(3);
    expect(record.participants.every((participant) => participant.registered)).toBe(true);
    expect(record.sale).toEqual({ lifecycle: SaleLifecycle.Committed, finalized: true });
    expect(network.sale.finalizeCalls).toBe(1);

    const saved = await loadRecord(dir);
    expect(saved).toEqual(record);
  });

  it('stakes the configured amount and sets the dissolve delay once', async () => {
    const { network, context } = await createTestDeployment(testConfig(dir));

    await runDeployment(context);

    expect(network.governance.neurons.get(1000n)?.stake).toBe(10n * E8S);
    expect(network.governance.dissolveDelayCalls).toEqual([{ neuronId: 1000n, seconds: 15_778_800 }]);
    expect(network.governance.proposals).toEqual([
      { neuronId: 1000n, title: context.config.proposal.title, owner: context.operator.principal.toText() },
    ]);
    expect(network.ledger.balanceOf({ owner: context.operator.principal })).toBe(0n);
  });

  it('writes a seed file per participant before funding', async () => {
    const { context } = await createTestDeployment(testConfig(dir));

    const record = await runDeployment(context);

    expect(record.participants[0].seed_file).toBe(fp.join(dir, 'participants', 'participant_1.seed'));
    const text = await fs.readFile(fp.join(dir, 'participants', 'participant_2.seed'), 'utf-8');
    expect(text).toBe(bytesToHex(participantSeed(2)).slice(2));
  });

  it('rejects a participation amount below the sale minimum before any remote call', async () => {
    const config = testConfig(dir);
    config.participants.amount = E8S - 1n;
    const { network, context } = await createTestDeployment(config);

    const error = await runDeployment(context).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DeployError);
    expect(error).toHaveProperty('stage', 'participants');
    expect(network.ledger.transfers).toHaveLength(0);
    expect(network.governance.neurons.size).toBe(0);
  });

  it('leaves the sale unfinalized when a participant is not registered', async () => {
    const { network, context } = await createTestDeployment(testConfig(dir));
    const third = deriveParticipantKey(dir, 3);
    network.sale.refreshOverrides.set(third.principal.toText(), { accepted: 0n, balance: 0n });

    const record = await runDeployment(context);

    expect(record.participants.map((participant) => participant.registered)).toEqual([true, true, false]);
    expect(record.sale).toEqual({ lifecycle: SaleLifecycle.Open, finalized: false });
    expect(network.sale.finalizeCalls).toBe(0);
  });

  it('registers all five participants and finalizes the committed sale', async () => {
    const config = fiveParticipantConfig(dir);
    const { network, context } = await createTestDeployment(config);
    const services = testServices();

    const record = await runDeployment(context);

    expect(record.participants.map((participant) => participant.registered)).toEqual([true, true, true, true, true]);
    expect(record.sale).toEqual({ lifecycle: SaleLifecycle.Committed, finalized: true });
    for (let ordinal = 1; ordinal <= 5; ordinal++) {
      const key = deriveParticipantKey(dir, ordinal);
      expect(network.ledger.balanceOf({ owner: services.swap, subaccount: key.saleSubaccount })).toBe(E8S + TEST_FEE);
    }
    expect(network.sale.derivedState()).toEqual({ participantCount: 5n, participationE8s: 5n * (E8S + TEST_FEE) });
    expect(network.sale.finalizeCalls).toBe(1);
  });

  it('reports the thresholds met once all five participants are in', async () => {
    const { context } = await createTestDeployment(fiveParticipantConfig(dir));
    const services = testServices();

    await runParticipants(context, services);
    const result = await finalizeSale(context, services.swap);

    expect(result).toEqual({ lifecycle: SaleLifecycle.Committed, thresholdsMet: true, finalized: true });
  });

  it('carries on past a participant the sale never credits', async () => {
    const { network, context } = await createTestDeployment(fiveParticipantConfig(dir));
    const keys = [1, 2, 3, 4, 5].map((ordinal) => deriveParticipantKey(dir, ordinal));
    network.sale.refreshOverrides.set(keys[2].principal.toText(), { accepted: 0n, balance: 0n });

    const record = await runDeployment(context);

    expect(record.participants).toHaveLength(5);
    expect(record.participants.map((participant) => participant.registered)).toEqual([true, true, false, true, true]);
    expect(keys.map((key) => network.sale.refreshCalls.get(key.principal.toText()))).toEqual([1, 1, 3, 1, 1]);
    expect(record.sale).toEqual({ lifecycle: SaleLifecycle.Open, finalized: false });
    expect(network.sale.finalizeCalls).toBe(0);
  });
});
