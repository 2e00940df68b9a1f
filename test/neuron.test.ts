import { describe, expect, it } from 'vitest';

import { ConfigError } from '../src/error';
import { formatNeuronId, parseNeuronId, selectLowestNeuron, selectMainNeuron, sortNeurons } from '../src/neuron';
import type { DissolveState, NeuronSummary } from '../src/type';

const neuron = (id: bigint, stake: bigint, dissolve: DissolveState): NeuronSummary => ({
  id,
  stake,
  dissolve,
  controller: undefined,
  hotKeys: [],
  visibility: undefined,
});

describe('sortNeurons', () => {
  it('orders by dissolve delay, then by stake', () => {
    const neurons = [
      neuron(1n, 100n, { type: 'none' }),
      neuron(2n, 100n, { type: 'delay', seconds: 600n }),
      neuron(3n, 500n, { type: 'delay', seconds: 60n }),
      neuron(4n, 900n, { type: 'delay', seconds: 60n }),
      neuron(5n, 100n, { type: 'dissolving', whenDissolvedSeconds: 1_700_000_000n }),
    ];

    expect(sortNeurons(neurons).map((item) => item.id)).toEqual([5n, 4n, 3n, 2n, 1n]);
  });

  it('leaves the input untouched', () => {
    const neurons = [neuron(1n, 1n, { type: 'none' }), neuron(2n, 1n, { type: 'delay', seconds: 1n })];

    sortNeurons(neurons);

    expect(neurons.map((item) => item.id)).toEqual([1n, 2n]);
  });
});

describe('selectMainNeuron', () => {
  it('picks the longest non-dissolving delay', () => {
    const neurons = [
      neuron(1n, 5n, { type: 'delay', seconds: 60n }),
      neuron(2n, 1n, { type: 'delay', seconds: 600n }),
      neuron(3n, 9n, { type: 'dissolving', whenDissolvedSeconds: 1_700_000_000n }),
      neuron(4n, 9n, { type: 'none' }),
    ];

    expect(selectMainNeuron(neurons)?.id).toBe(2n);
  });

  it('falls back to the last neuron in order when none is locked', () => {
    const neurons = [
      neuron(1n, 9n, { type: 'none' }),
      neuron(2n, 1n, { type: 'dissolving', whenDissolvedSeconds: 1_700_000_000n }),
    ];

    expect(selectMainNeuron(neurons)?.id).toBe(1n);
  });

  it('returns nothing for no neurons', () => {
    expect(selectMainNeuron([])).toBeUndefined();
  });
});

describe('selectLowestNeuron', () => {
  it('picks the neuron that unlocks soonest', () => {
    const neurons = [
      neuron(1n, 5n, { type: 'delay', seconds: 60n }),
      neuron(2n, 1n, { type: 'delay', seconds: 600n }),
      neuron(3n, 9n, { type: 'dissolving', whenDissolvedSeconds: 1_700_000_000n }),
    ];

    expect(selectLowestNeuron(neurons)?.id).toBe(3n);
    expect(selectLowestNeuron([])).toBeUndefined();
  });
});

describe('neuron ids', () => {
  it('parses hex with or without prefix', () => {
    expect(parseNeuronId('neuron', '0xab01')).toEqual(Uint8Array.of(0xab, 0x01));
    expect(parseNeuronId('neuron', 'AB01')).toEqual(Uint8Array.of(0xab, 0x01));
  });

  it('rejects odd length and non-hex values', () => {
    expect(() => parseNeuronId('neuron', 'abc')).toThrow(ConfigError);
    expect(() => parseNeuronId('neuron', 'xyz0')).toThrow(
      'Invalid "--neuron" value "xyz0" (neuron id as hex expected)',
    );
    expect(() => parseNeuronId('neuron', '')).toThrow(ConfigError);
  });

  it('formats as bare hex', () => {
    expect(formatNeuronId(Uint8Array.of(0xab, 0x01, 0x00))).toBe('ab0100');
  });
});
