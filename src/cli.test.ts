import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { EXIT_FAILURE, EXIT_OK, EXIT_USAGE, VERSION, parseArgs, run, type CliIO } from './cli';
import { silentLogger } from './logger';
import { generate } from './totp';

const RFC_SECRET = 'GEZDGNBVGY3TQOJQGEZDGNBVGY3TQOJQ';

describe('parseArgs', () => {
  it('treats a bare positional as an account', () => {
    expect(parseArgs(['github', '--time', '59', '--remaining'])).toEqual({
      command: 'code',
      positionals: ['github'],
      time: 59,
      remaining: true,
      alphabet: 'standard',
      wrap: false,
    });
  });

  it('recognises subcommands and flags', () => {
    expect(parseArgs(['encode', 'hi', '--hex', '--wrap'])).toMatchObject({
      command: 'encode',
      positionals: ['hi'],
      alphabet: 'hex',
      wrap: true,
    });
    expect(parseArgs(['--secret', RFC_SECRET])).toMatchObject({ command: 'code', secret: RFC_SECRET, positionals: [] });
    expect(parseArgs([]).command).toBe('help');
    expect(parseArgs(['github', '-h']).command).toBe('help');
    expect(parseArgs(['-v']).command).toBe('version');
  });

  it('rejects unknown options and missing values', () => {
    expect(() => parseArgs(['--bogus'])).toThrow('Unknown option --bogus');
    expect(() => parseArgs(['github', '--time'])).toThrow('--time requires a value');
    expect(() => parseArgs(['github', '--time', 'soon'])).toThrow('--time expects Unix seconds, got "soon"');
    expect(() => parseArgs(['github', '--time', '-5'])).toThrow('--time expects Unix seconds, got "-5"');
  });
});

describe('run', () => {
  let dir: string;
  let stdout: string[];
  let stderr: string[];
  let env: Record<string, string | undefined>;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'totp-cli-'));
    stdout = [];
    stderr = [];
    env = { TOTP_SECRETS_FILE: path.join(dir, 'secrets.json'), TOTP_SECRET_RFC: RFC_SECRET };
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  const io = (overrides: Partial<CliIO> = {}): Partial<CliIO> => ({
    stdout: (line) => stdout.push(line),
    stderr: (line) => stderr.push(line),
    env,
    now: () => 59_000,
    logger: silentLogger,
    ...overrides,
  });

  it('prints the code for an account from the environment', async () => {
    await expect(run(['rfc'], io())).resolves.toBe(EXIT_OK);
    expect(stdout).toEqual(['287082']);
    expect(stderr).toEqual([]);
  });

  it('evaluates at a fixed time and prints the remaining seconds', async () => {
    await expect(run(['rfc', '--time', '1111111109', '--remaining'], io({ now: () => 0 }))).resolves.toBe(EXIT_OK);
    expect(stdout).toEqual(['081804', '1s']);
  });

  it('honours TOTP_DIGITS', async () => {
    env.TOTP_DIGITS = '8';
    await run(['rfc'], io());
    expect(stdout).toEqual(['94287082']);
  });

  it('reads accounts from the secrets file', async () => {
    fs.writeFileSync(env.TOTP_SECRETS_FILE ?? '', JSON.stringify({ accounts: { work: 'JBSWY3DPEHPK3PXP', bank: 'MZXW6YTB' } }));
    await expect(run(['work', '--time', '1700000000'], io())).resolves.toBe(EXIT_OK);
    expect(stdout).toEqual([generate('JBSWY3DPEHPK3PXP', 1700000000)]);

    stdout.length = 0;
    await expect(run(['list'], io())).resolves.toBe(EXIT_OK);
    expect(stdout).toEqual(['bank', 'work']);
  });

  it('prefers the environment over the secrets file', async () => {
    fs.writeFileSync(env.TOTP_SECRETS_FILE ?? '', JSON.stringify({ accounts: { rfc: 'JBSWY3DPEHPK3PXP' } }));
    await run(['rfc'], io());
    expect(stdout).toEqual(['287082']);
  });

  it('prints the code for a raw secret', async () => {
    await expect(run(['--secret', RFC_SECRET, '--remaining'], io())).resolves.toBe(EXIT_OK);
    expect(stdout).toEqual(['287082', '1s']);
  });

  it('reports unknown accounts with exit code 1', async () => {
    await expect(run(['nobody'], io())).resolves.toBe(EXIT_FAILURE);
    expect(stdout).toEqual([]);
    expect(stderr).toEqual(['error: No secret found for account "nobody"']);
  });

  it('reports invalid secrets with exit code 1', async () => {
    await expect(run(['--secret', 'MZX'], io())).resolves.toBe(EXIT_FAILURE);
    expect(stderr).toEqual(['error: TOTP secret is not valid base32']);
  });

  it('reports invalid configuration with exit code 1', async () => {
    env.TOTP_STEP = 'zero';
    await expect(run(['rfc'], io())).resolves.toBe(EXIT_FAILURE);
    expect(stderr).toHaveLength(1);
    expect(stderr[0]).toMatch(/^error: Invalid configuration: TOTP_STEP: /);
  });

  it('reports a step beyond the safe integer range as configuration, not usage', async () => {
    env.TOTP_STEP = '1e16';
    await expect(run(['--secret', RFC_SECRET], io())).resolves.toBe(EXIT_FAILURE);
    expect(stderr).toEqual(['error: Invalid configuration: TOTP_STEP: Number must be less than or equal to 9007199254740991']);
  });

  it('encodes and decodes text', async () => {
    await run(['encode', 'foobar'], io());
    await run(['encode', 'foobar', '--hex'], io());
    await run(['decode', 'MZXW6YTBOI======'], io());
    await run(['encode', 'fooba', '--wrap'], io());
    expect(stdout).toEqual(['MZXW6YTBOI======', 'CPNMUOJ1E8======', 'foobar', 'MZXW6YTB']);
  });

  it('decodes lowercase input', async () => {
    await expect(run(['decode', 'mzxw6ytboi======'], io())).resolves.toBe(EXIT_OK);
    await run(['decode', 'cpnmuoj1e8======', '--hex'], io());
    expect(stdout).toEqual(['foobar', 'foobar']);
  });

  it('reports truncated base32 on decode', async () => {
    await expect(run(['decode', 'MZX'], io())).resolves.toBe(EXIT_FAILURE);
    expect(stderr).toEqual(['error: Base32 input is truncated: 25 bits missing']);
  });

  it('exits with 2 on usage errors', async () => {
    await expect(run(['--bogus'], io())).resolves.toBe(EXIT_USAGE);
    expect(stderr).toEqual(['error: Unknown option --bogus', 'Run "totp help" for usage.']);

    stderr.length = 0;
    await expect(run(['a', 'b'], io())).resolves.toBe(EXIT_USAGE);
    expect(stderr[0]).toBe('error: Expected exactly one account');

    stderr.length = 0;
    await expect(run(['rfc', '--secret', RFC_SECRET], io())).resolves.toBe(EXIT_USAGE);
    expect(stderr[0]).toBe('error: An account cannot be combined with --secret');
  });

  it('prints help and version', async () => {
    await expect(run([], io())).resolves.toBe(EXIT_OK);
    expect(stdout[0]).toBe(`totp v${VERSION}`);

    stdout.length = 0;
    await run(['--version'], io());
    expect(stdout).toEqual([`totp v${VERSION}`]);
  });
});
