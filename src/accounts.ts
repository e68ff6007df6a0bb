/**
 * Local account keys
 *
 * Keeps one Ed25519 key and its virtual account address per network in a
 * JSON file, for scripts that need a persistent test account.
 */

import { randomBytes } from 'node:crypto';
import { chmod, mkdir, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { bytesToHex, hexToBytes } from '@noble/hashes/utils';
import { PrivateKey, RadixEngineToolkit } from '@radixdlt/radix-engine-toolkit';
import { z } from 'zod';
import { SurgeError } from './errors.js';
import type { Gateway } from './gateway.js';
import { createLogger } from './logger.js';
import { faucetManifest } from './manifests.js';
import type { AccountSigner, StoredAccount } from './types.js';
import { NetworkId } from './types.js';

const StoredAccountSchema = z.object({
  networkId: z.number().int().positive(),
  privateKey: z.string().regex(/^[0-9a-f]{64}$/i, 'expected 32 bytes of hex'),
  account: z.string().min(1),
});

const logger = createLogger('accounts');

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class AccountStore {
  readonly dir: string;

  constructor(dir: string) {
    this.dir = dir;
  }

  /**
   * File holding the account for a network
   */
  pathFor(networkId: number): string {
    return join(this.dir, `account-${networkId}.json`);
  }

  /**
   * Read the stored account for a network, or null if there is none
   */
  async load(networkId: number): Promise<StoredAccount | null> {
    const path = this.pathFor(networkId);
    let text: string;
    try {
      text = await readFile(path, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      throw SurgeError.accountStoreFailed(path, error instanceof Error ? error.message : String(error));
    }

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch {
      throw SurgeError.accountStoreFailed(path, 'file is not JSON');
    }
    const result = StoredAccountSchema.safeParse(json);
    if (!result.success) {
      const issue = result.error.issues[0];
      throw SurgeError.accountStoreFailed(path, issue ? `${issue.path.join('.')}: ${issue.message}` : 'invalid account');
    }
    if (result.data.networkId !== networkId) {
      throw SurgeError.accountStoreFailed(path, `stored for network ${result.data.networkId}, not ${networkId}`);
    }
    return result.data;
  }

  async save(account: StoredAccount): Promise<void> {
    const path = this.pathFor(account.networkId);
    try {
      await mkdir(this.dir, { recursive: true });
      await writeFile(path, JSON.stringify(account, null, 2) + '\n', { mode: 0o600 });
      // The mode above only applies when the file is created
      await chmod(path, 0o600);
    } catch (error) {
      throw SurgeError.accountStoreFailed(path, error instanceof Error ? error.message : String(error));
    }
  }
}

/**
 * Generate a key, derive its virtual account and store both
 */
export async function newAccount(networkId: number, store: AccountStore): Promise<AccountSigner> {
  const seed = new Uint8Array(randomBytes(32));
  const privateKey = new PrivateKey.Ed25519(seed);
  const account = await RadixEngineToolkit.Derive.virtualAccountAddressFromPublicKey(
    privateKey.publicKey(),
    networkId
  );

  await store.save({ networkId, privateKey: bytesToHex(seed), account });
  logger.info({ networkId, account }, 'Created new account');
  return { account, privateKey };
}

/**
 * Load the stored account for a network
 */
export async function loadAccount(networkId: number, store: AccountStore): Promise<AccountSigner | null> {
  const stored = await store.load(networkId);
  if (!stored) {
    return null;
  }
  return {
    account: stored.account,
    privateKey: new PrivateKey.Ed25519(hexToBytes(stored.privateKey)),
  };
}

/**
 * Claim test XRD from the faucet into the signer's account
 *
 * The faucet only exists on test networks.
 */
export async function requestTestTokens(gateway: Gateway, signer: AccountSigner): Promise<string> {
  if (gateway.networkId === NetworkId.MAINNET) {
    throw SurgeError.invalidRequest('the faucet is not available on mainnet');
  }
  const { faucet } = await gateway.networkConfiguration();
  const { intent } = await gateway.submitAndWait(faucetManifest(faucet, signer.account), signer.privateKey);
  logger.info({ account: signer.account, intent }, 'Received test tokens');
  return intent;
}
