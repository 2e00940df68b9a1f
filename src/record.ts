import type { Principal } from '@dfinity/principal';

import { RECORD_FILE } from './constant';
import { checkFileExists, joinPath, loadJson, saveJson } from './file';
import type {
  DeployedServiceRecord,
  DeployedServiceSet,
  DeploymentRecord,
  FinalizeResult,
  FundedPosition,
  Participant,
  ParticipantRecord,
  ProposalResult,
} from './type';
import { toJsonInteger } from './util';

export type RecordInput = {
  position: FundedPosition;
  proposal: ProposalResult;
  owner: Principal;
  participants: readonly Participant[];
  sale: FinalizeResult;
};

export const recordPath = (outputDir: string): string => {
  return joinPath(outputDir, RECORD_FILE);
};

const toServiceRecord = (services: DeployedServiceSet): DeployedServiceRecord => {
  const entries: [keyof DeployedServiceRecord, Principal | undefined][] = [
    ['root_canister_id', services.root],
    ['governance_canister_id', services.governance],
    ['index_canister_id', services.index],
    ['swap_canister_id', services.swap],
    ['ledger_canister_id', services.ledger],
  ];

  const record: DeployedServiceRecord = {};
  for (const [key, principal] of entries) {
    if (principal != null) {
      record[key] = principal.toText();
    }
  }
  return record;
};

export const buildRecord = (input: RecordInput): DeploymentRecord => {
  return {
    icp_neuron_id: toJsonInteger(input.position.positionId),
    proposal_id: toJsonInteger(input.proposal.proposalId),
    owner_principal: input.owner.toText(),
    deployed_sns: toServiceRecord(input.proposal.services),
    participants: input.participants.map(
      (participant): ParticipantRecord => ({
        principal: participant.principal.toText(),
        seed_file: participant.seedFile,
        registered: participant.registered,
      }),
    ),
    sale: {
      lifecycle: input.sale.lifecycle,
      finalized: input.sale.finalized,
    },
  };
};

export const saveRecord = async (outputDir: string, record: DeploymentRecord): Promise<string> => {
  const path = recordPath(outputDir);
  await saveJson(path, record);

  console.log();
  console.log('Deployment record:');
  console.log(`- path: ${path}`);
  console.log(`- neuron: ${record.icp_neuron_id}`);
  console.log(`- proposal: ${record.proposal_id}`);
  const registered = record.participants.filter((participant) => participant.registered).length;
  console.log(`- participants: ${registered} of ${record.participants.length} registered`);
  console.log(`- sale lifecycle: ${record.sale.lifecycle}`);
  console.log(`- sale finalized: ${record.sale.finalized ? 'yes ✅' : 'no'}`);
  return path;
};

//

type Section = Record<string, unknown>;

const isSection = (value: unknown): value is Section => {
  return typeof value === 'object' && value != null && !Array.isArray(value);
};

const readInteger = (section: Section, key: string, path: string): number | string => {
  const value = section[key];
  if (typeof value === 'number' && Number.isSafeInteger(value)) {
    return value;
  }
  if (typeof value === 'string' && /^\d+$/.test(value)) {
    return value;
  }
  throw new Error(`Invalid record "${path}" field (integer expected)`);
};

const readText = (section: Section, key: string, path: string): string => {
  const value = section[key];
  if (typeof value !== 'string') {
    throw new Error(`Invalid record "${path}" field (string expected)`);
  }
  return value;
};

const readFlag = (section: Section, key: string, path: string): boolean => {
  const value = section[key];
  if (typeof value !== 'boolean') {
    throw new Error(`Invalid record "${path}" field (boolean expected)`);
  }
  return value;
};

const SERVICE_KEYS = [
  'root_canister_id',
  'governance_canister_id',
  'index_canister_id',
  'swap_canister_id',
  'ledger_canister_id',
] as const;

export const parseRecord = (raw: unknown): DeploymentRecord => {
  if (!isSection(raw)) {
    throw new Error('Invalid record (object expected)');
  }

  const services = raw.deployed_sns;
  if (!isSection(services)) {
    throw new Error('Invalid record "deployed_sns" field (object expected)');
  }
  const deployed: DeployedServiceRecord = {};
  for (const key of SERVICE_KEYS) {
    if (services[key] != null) {
      deployed[key] = readText(services, key, `deployed_sns.${key}`);
    }
  }

  const participants = raw.participants;
  if (!Array.isArray(participants)) {
    throw new Error('Invalid record "participants" field (list expected)');
  }

  const sale = raw.sale;
  if (!isSection(sale)) {
    throw new Error('Invalid record "sale" field (object expected)');
  }
  const lifecycle = sale.lifecycle;
  if (typeof lifecycle !== 'number' || !Number.isInteger(lifecycle)) {
    throw new Error('Invalid record "sale.lifecycle" field (integer expected)');
  }

  return {
    icp_neuron_id: readInteger(raw, 'icp_neuron_id', 'icp_neuron_id'),
    proposal_id: readInteger(raw, 'proposal_id', 'proposal_id'),
    owner_principal: readText(raw, 'owner_principal', 'owner_principal'),
    deployed_sns: deployed,
    participants: participants.map((item: unknown, index): ParticipantRecord => {
      const path = `participants[${index}]`;
      if (!isSection(item)) {
        throw new Error(`Invalid record "${path}" field (object expected)`);
      }
      return {
        principal: readText(item, 'principal', `${path}.principal`),
        seed_file: readText(item, 'seed_file', `${path}.seed_file`),
        registered: readFlag(item, 'registered', `${path}.registered`),
      };
    }),
    sale: {
      lifecycle,
      finalized: readFlag(sale, 'finalized', 'sale.finalized'),
    },
  };
};

export const loadRecord = async (outputDir: string): Promise<DeploymentRecord | undefined> => {
  const path = recordPath(outputDir);
  const exists = await checkFileExists(path);
  if (!exists) {
    return undefined;
  }
  return parseRecord(await loadJson(path));
};
