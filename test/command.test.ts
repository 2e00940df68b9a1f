import { describe, expect, it } from 'vitest';

import { readPermissions, readTarget } from '../src/command';
import { ConfigError } from '../src/error';
import type { Args } from '../src/type';

const args = (options: Record<string, string>): Args => ({
  command: 'add-hotkey',
  configPath: 'sns-bootstrap.yaml',
  options: new Map(Object.entries(options)),
});

describe('readTarget', () => {
  it('defaults to the ICP governance', () => {
    expect(readTarget(args({}))).toBe('icp');
  });

  it('accepts the deployed service', () => {
    expect(readTarget(args({ target: 'sns' }))).toBe('sns');
  });

  it('rejects anything else', () => {
    expect(() => readTarget(args({ target: 'nns' }))).toThrow(
      'Invalid "--target" value "nns" (one of icp, sns expected)',
    );
  });
});

describe('readPermissions', () => {
  it('defaults to submitting proposals and voting', () => {
    expect(readPermissions(args({}))).toEqual([3, 4]);
  });

  it('reads a comma separated list', () => {
    expect(readPermissions(args({ permissions: '1, 2,5' }))).toEqual([1, 2, 5]);
  });

  it('rejects non-numeric entries', () => {
    expect(() => readPermissions(args({ permissions: '3,vote' }))).toThrow(ConfigError);
  });
});
