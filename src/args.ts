import { DEFAULT_CONFIG_PATH } from './constant';
import { ConfigError } from './error';
import type { Args, CommandName } from './type';

const COMMANDS: readonly CommandName[] = [
  'deploy',
  'add-hotkey',
  'list-neurons',
  'mint',
  'create-neuron',
  'disburse',
  'increase-dissolve-delay',
  'manage-dissolving',
  'set-visibility',
  'get-neuron',
  'get-balance',
  'check-deployed',
  'mint-sns-tokens',
];

const isCommandName = (value: string): value is CommandName => {
  return COMMANDS.some((command) => command === value);
};

export const USAGE =
  'Usage: sns-bootstrap [<command>] [--config <config-path>] [--<option> <value> ...]\n' +
  `Commands: ${COMMANDS.join(', ')} (default: deploy)`;

export const parseArgs = (argv: readonly string[] = process.argv.slice(2)): Args => {
  console.log();
  console.log('SNS bootstrap 🌱');

  const usage = (problem: string): ConfigError => {
    return new ConfigError(`${problem}\n${USAGE}`);
  };

  let command: CommandName = 'deploy';
  let index = 0;
  const first = argv[0];
  if (first != null && !first.startsWith('-')) {
    if (!isCommandName(first)) {
      throw usage(`Unknown command "${first}"`);
    }
    command = first;
    index = 1;
  }

  let configPath = DEFAULT_CONFIG_PATH;
  const options = new Map<string, string>();
  for (; index < argv.length; index += 2) {
    const flag = argv[index];
    const value = argv[index + 1];
    if (!flag.startsWith('--') && flag !== '-c') {
      throw usage(`Unexpected argument "${flag}"`);
    }
    if (value == null || value.startsWith('--')) {
      throw usage(`Missing value for "${flag}"`);
    }

    if (flag === '--config' || flag === '-c') {
      configPath = value;
    } else {
      options.set(flag.slice(2), value);
    }
  }

  console.log();
  console.log('Arguments:');
  console.log(`- command: ${command}`);
  console.log(`- config path: ${configPath}`);
  for (const [name, value] of options) {
    console.log(`- ${name}: ${value}`);
  }
  return { command, configPath, options };
};
