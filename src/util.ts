import { E8S_PER_TOKEN } from './constant';

export const sleep = (ms: number): Promise<void> => {
  return new Promise((r) => setTimeout(r, ms));
};

export const jsonStringify = (value: unknown, prettify = false): string => {
  return JSON.stringify(value, replacer, prettify ? 2 : undefined);
};

export const joinComma = (strings: readonly string[]): string => {
  return strings.join(', ');
};

export const formatE8s = (e8s: bigint): string => {
  const whole = e8s / E8S_PER_TOKEN;
  const fraction = (e8s % E8S_PER_TOKEN).toString().padStart(8, '0').replace(/0+$/, '');
  return `${fraction ? `${whole}.${fraction}` : whole} (${e8s} e8s)`;
};

export const formatDuration = (seconds: bigint): string => {
  const days = seconds / 86_400n;
  const hours = (seconds % 86_400n) / 3_600n;
  return `${days}d ${hours}h`;
};

// u64 values go to JSON as numbers while exact, as decimal strings beyond that
export const toJsonInteger = (value: bigint): number | string => {
  return value <= BigInt(Number.MAX_SAFE_INTEGER) ? Number(value) : value.toString();
};

const replacer = (_key: string, value: unknown): unknown => {
  return typeof value === 'bigint' ? value.toString() : value;
};
