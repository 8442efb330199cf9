import { nodeHmacSha1 } from './hmac';
import { silentLogger, type Logger } from './logger';
import type { SecretStore } from './secrets';
import { counterAt, DEFAULT_DIGITS, DEFAULT_STEP, DEFAULT_WINDOW, generate, secondsRemaining, verify } from './totp';
import type { AccountId, Clock, HmacSha1, TotpSnapshot } from './types';

export interface AuthenticatorOptions {
  store: SecretStore;
  hmac?: HmacSha1;
  now?: Clock;
  step?: number;
  digits?: number;
  logger?: Logger;
}

/**
 * Generates and checks codes for named accounts, resolving each secret through
 * a `SecretStore`. Store errors such as `SecretNotFoundError` reach the caller
 * unchanged.
 */
export class Authenticator {
  private readonly store: SecretStore;
  private readonly hmac: HmacSha1;
  private readonly now: Clock;
  private readonly log: Logger;
  readonly step: number;
  readonly digits: number;

  constructor(opts: AuthenticatorOptions) {
    this.store = opts.store;
    this.hmac = opts.hmac ?? nodeHmacSha1;
    this.now = opts.now ?? Date.now;
    this.log = opts.logger ?? silentLogger;
    this.step = opts.step ?? DEFAULT_STEP;
    this.digits = opts.digits ?? DEFAULT_DIGITS;
  }

  private unixSeconds(): number {
    return Math.floor(this.now() / 1000);
  }

  private async resolveSecret(accountId: AccountId): Promise<string> {
    this.log.debug({ accountId }, 'looking up secret');
    return this.store.lookupSecret(accountId);
  }

  async totpFor(accountId: AccountId): Promise<string> {
    return (await this.current(accountId)).code;
  }

  async current(accountId: AccountId): Promise<TotpSnapshot> {
    const secret = await this.resolveSecret(accountId);
    const time = this.unixSeconds();
    const code = generate(secret, time, { step: this.step, digits: this.digits, hmac: this.hmac });
    const counter = counterAt(time, this.step);
    this.log.debug({ accountId, counter }, 'generated code');
    return {
      code,
      counter,
      secondsRemaining: secondsRemaining(time, this.step),
      step: this.step,
      digits: this.digits,
    };
  }

  async verify(accountId: AccountId, token: string, window = DEFAULT_WINDOW): Promise<boolean> {
    const secret = await this.resolveSecret(accountId);
    const ok = verify(token, secret, this.unixSeconds(), { step: this.step, digits: this.digits, hmac: this.hmac, window });
    this.log.debug({ accountId, ok }, 'verified code');
    return ok;
  }
}
