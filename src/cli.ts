import { Authenticator } from './authenticator';
import { decode, encode } from './base32';
import { loadConfig, type AppConfig } from './config';
import { isOtpError } from './errors';
import { createChildLogger, createLogger, type Logger } from './logger';
import { chainSecretStores } from './storage/chain';
import { envSecretStore } from './storage/env';
import { JsonFileSecretStore } from './storage/jsonFile';
import { generate, secondsRemaining } from './totp';
import type { AlphabetName, Clock } from './types';

export const VERSION = '0.1.0';

export interface CliIO {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
  env: Record<string, string | undefined>;
  now: Clock;
  logger?: Logger;
}

const defaultIO: CliIO = {
  stdout: (line) => process.stdout.write(`${line}\n`),
  stderr: (line) => process.stderr.write(`${line}\n`),
  env: process.env,
  now: Date.now,
};

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

type Command = 'code' | 'encode' | 'decode' | 'list' | 'help' | 'version';

export interface ParsedArgs {
  command: Command;
  positionals: string[];
  secret?: string;
  time?: number;
  remaining: boolean;
  alphabet: AlphabetName;
  wrap: boolean;
}

const SUBCOMMANDS = new Map<string, Command>([
  ['encode', 'encode'],
  ['decode', 'decode'],
  ['list', 'list'],
  ['help', 'help'],
  ['version', 'version'],
]);

export function parseArgs(argv: string[]): ParsedArgs {
  const parsed: ParsedArgs = { command: 'code', positionals: [], remaining: false, alphabet: 'standard', wrap: false };
  let flagCommand: Command | undefined;

  const takeValue = (flag: string, i: number): string => {
    const value = argv[i + 1];
    if (value === undefined || value.startsWith('--')) throw new UsageError(`${flag} requires a value`);
    return value;
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--secret':
        parsed.secret = takeValue(arg, i++);
        break;
      case '--time': {
        const raw = takeValue(arg, i++);
        const time = Number(raw);
        if (raw.trim() === '' || !Number.isFinite(time) || time < 0) {
          throw new UsageError(`--time expects Unix seconds, got "${raw}"`);
        }
        parsed.time = time;
        break;
      }
      case '--remaining':
        parsed.remaining = true;
        break;
      case '--hex':
        parsed.alphabet = 'hex';
        break;
      case '--wrap':
        parsed.wrap = true;
        break;
      case '-h':
      case '--help':
        flagCommand = 'help';
        break;
      case '-v':
      case '--version':
        flagCommand = flagCommand ?? 'version';
        break;
      default:
        if (arg.startsWith('-') && arg.length > 1) throw new UsageError(`Unknown option ${arg}`);
        parsed.positionals.push(arg);
    }
  }

  const first = parsed.positionals[0];
  const subcommand = first === undefined ? undefined : SUBCOMMANDS.get(first);
  if (flagCommand) {
    parsed.command = flagCommand;
  } else if (subcommand) {
    parsed.command = subcommand;
    parsed.positionals = parsed.positionals.slice(1);
  } else if (first === undefined && parsed.secret === undefined) {
    parsed.command = 'help';
  }
  return parsed;
}

export function helpText(): string[] {
  return [
    `totp v${VERSION}`,
    '',
    'Usage:',
    '  totp <account> [--time <unix-seconds>] [--remaining]   Print the current code for <account>',
    '  totp --secret <base32> [--time <unix-seconds>]          Print the code for a raw secret',
    '  totp list                                               List accounts in the secrets file',
    '  totp encode <text> [--hex] [--wrap]                     Base32-encode UTF-8 text',
    '  totp decode <base32> [--hex]                            Decode base32 to UTF-8 text',
    '  totp version                                            Show version',
    '  totp help                                               Show this help',
    '',
    'Secrets are read from TOTP_SECRET_<ACCOUNT> variables, then from TOTP_SECRETS_FILE.',
  ];
}

function expectPositionals(args: ParsedArgs, count: number, what: string): string[] {
  if (args.positionals.length !== count) throw new UsageError(`Expected ${what}`);
  return args.positionals;
}

async function printCode(args: ParsedArgs, cfg: AppConfig, io: CliIO, log: Logger): Promise<void> {
  const fixedTime = args.time;
  const now: Clock = fixedTime === undefined ? io.now : () => fixedTime * 1000;

  if (args.secret !== undefined) {
    if (args.positionals.length > 0) throw new UsageError('An account cannot be combined with --secret');
    const time = Math.floor(now() / 1000);
    io.stdout(generate(args.secret, time, cfg.step, cfg.digits));
    if (args.remaining) io.stdout(`${secondsRemaining(time, cfg.step)}s`);
    return;
  }

  const [accountId] = expectPositionals(args, 1, 'exactly one account');
  const authenticator = new Authenticator({
    store: chainSecretStores(envSecretStore(io.env), new JsonFileSecretStore(cfg.secretsFile)),
    now,
    step: cfg.step,
    digits: cfg.digits,
    logger: createChildLogger(log, { accountId }),
  });
  const snapshot = await authenticator.current(accountId);
  io.stdout(snapshot.code);
  if (args.remaining) io.stdout(`${snapshot.secondsRemaining}s`);
}

/**
 * Run the CLI and resolve to its exit code. Never calls `process.exit`.
 */
export async function run(argv: string[], overrides: Partial<CliIO> = {}): Promise<number> {
  const io: CliIO = { ...defaultIO, ...overrides };
  try {
    const args = parseArgs(argv);
    if (args.command === 'help') {
      helpText().forEach((line) => io.stdout(line));
      return EXIT_OK;
    }
    if (args.command === 'version') {
      io.stdout(`totp v${VERSION}`);
      return EXIT_OK;
    }

    const cfg = loadConfig(io.env);
    const log = createChildLogger(io.logger ?? createLogger({ level: cfg.logLevel }), { command: args.command });
    log.debug({ argv }, 'running command');

    switch (args.command) {
      case 'encode': {
        const [text] = expectPositionals(args, 1, 'text to encode');
        const encoded = encode(Buffer.from(text, 'utf8'), { alphabet: args.alphabet, wrapLines: args.wrap });
        io.stdout(encoded.replace(/\n$/, ''));
        break;
      }
      case 'decode': {
        const [text] = expectPositionals(args, 1, 'base32 text to decode');
        io.stdout(Buffer.from(decode(text.toUpperCase(), { alphabet: args.alphabet })).toString('utf8'));
        break;
      }
      case 'list':
        expectPositionals(args, 0, 'no arguments');
        new JsonFileSecretStore(cfg.secretsFile).listAccounts().forEach((id) => io.stdout(id));
        break;
      case 'code':
        await printCode(args, cfg, io, log);
        break;
    }
    return EXIT_OK;
  } catch (e) {
    if (e instanceof UsageError || e instanceof RangeError) {
      io.stderr(`error: ${e.message}`);
      io.stderr('Run "totp help" for usage.');
      return EXIT_USAGE;
    }
    if (isOtpError(e)) {
      io.stderr(`error: ${e.message}`);
      return EXIT_FAILURE;
    }
    throw e;
  }
}
