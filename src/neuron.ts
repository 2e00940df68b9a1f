import { bytesToHex, hexToBytes } from 'viem';

import { ConfigError } from './error';
import type { DissolveState } from './type';
import { formatDuration } from './util';

type Sortable = {
  stake: bigint;
  dissolve: DissolveState;
};

const dissolveRank = (dissolve: DissolveState): bigint | undefined => {
  switch (dissolve.type) {
    case 'delay':
      return dissolve.seconds;
    case 'dissolving':
      return 0n;
    case 'none':
      return undefined;
  }
};

/**
 * Dissolve delay ascending (dissolving counts as zero, no dissolve state last), then
 * stake descending.
 */
export const sortNeurons = <T extends Sortable>(neurons: readonly T[]): T[] => {
  const compare = (a: bigint, b: bigint): number => (a < b ? -1 : a > b ? 1 : 0);
  return [...neurons].sort((a, b) => {
    const rankA = dissolveRank(a.dissolve);
    const rankB = dissolveRank(b.dissolve);
    if (rankA === rankB) {
      return compare(b.stake, a.stake);
    }
    if (rankA == null) {
      return 1;
    }
    if (rankB == null) {
      return -1;
    }
    return compare(rankA, rankB);
  });
};

/**
 * Neuron with the longest non-dissolving delay, or the last in sort order when none
 * has one. This is the neuron others follow, so it is the one that proposes and votes.
 */
export const selectMainNeuron = <T extends Sortable>(neurons: readonly T[]): T | undefined => {
  const sorted = sortNeurons(neurons);
  const delayed = sorted.filter((neuron) => neuron.dissolve.type === 'delay');
  return delayed[delayed.length - 1] ?? sorted[sorted.length - 1];
};

// Lowest dissolve delay first, the neuron that unlocks soonest
export const selectLowestNeuron = <T extends Sortable>(neurons: readonly T[]): T | undefined => {
  return sortNeurons(neurons)[0];
};

export const describeDissolve = (dissolve: DissolveState): string => {
  switch (dissolve.type) {
    case 'delay':
      return `delay ${formatDuration(dissolve.seconds)}`;
    case 'dissolving':
      return `dissolving until ${dissolve.whenDissolvedSeconds}`;
    case 'none':
      return 'none';
  }
};

export const formatNeuronId = (id: Uint8Array): string => {
  return bytesToHex(id).slice(2);
};

export const parseNeuronId = (name: string, value: string): Uint8Array => {
  const hex = value.startsWith('0x') ? value.slice(2) : value;
  if (hex.length === 0 || hex.length % 2 !== 0 || !/^[0-9a-fA-F]+$/.test(hex)) {
    throw new ConfigError(`Invalid "--${name}" value "${value}" (neuron id as hex expected)`);
  }
  return hexToBytes(`0x${hex}`);
};
