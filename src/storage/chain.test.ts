import { describe, it, expect } from 'vitest';
import { ConfigError, SecretNotFoundError } from '../errors';
import type { SecretStore } from '../secrets';
import { chainSecretStores } from './chain';
import { InMemorySecretStore } from './inMemory';

describe('chainSecretStores', () => {
  it('returns the first secret found', async () => {
    const store = chainSecretStores(
      new InMemorySecretStore({ a: 'MY======' }),
      new InMemorySecretStore({ a: 'MZXW6YTB', b: 'JBSWY3DPEHPK3PXP' })
    );
    await expect(store.lookupSecret('a')).resolves.toBe('MY======');
    await expect(store.lookupSecret('b')).resolves.toBe('JBSWY3DPEHPK3PXP');
  });

  it('awaits asynchronous stores', async () => {
    const asyncStore: SecretStore = { lookupSecret: async () => 'MZXW6YTB' };
    await expect(chainSecretStores(new InMemorySecretStore(), asyncStore).lookupSecret('x')).resolves.toBe('MZXW6YTB');
  });

  it('rethrows the last not-found error when no store has the account', async () => {
    const last = new SecretNotFoundError({ accountId: 'x' });
    const store = chainSecretStores(new InMemorySecretStore(), {
      lookupSecret: () => {
        throw last;
      },
    });
    await expect(store.lookupSecret('x')).rejects.toBe(last);
    await expect(chainSecretStores().lookupSecret('y')).rejects.toBeInstanceOf(SecretNotFoundError);
  });

  it('stops at errors other than not-found', async () => {
    const broken: SecretStore = {
      lookupSecret: () => {
        throw new ConfigError({ message: 'unreadable' });
      },
    };
    const store = chainSecretStores(broken, new InMemorySecretStore({ a: 'MY======' }));
    await expect(store.lookupSecret('a')).rejects.toThrow('unreadable');
  });
});
