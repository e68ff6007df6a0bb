/**
 * Surge exchange interface
 *
 * Reads protocol state through Gateway previews and submits signed requests
 * to the exchange component.
 */

import type { PublicKey } from '@radixdlt/radix-engine-toolkit';
import { parseAccountDetails, getPairIds, parsePermissions } from './account.js';
import { SurgeError } from './errors.js';
import type { Gateway } from './gateway.js';
import { createLogger } from './logger.js';
import * as manifests from './manifests.js';
import type { Oracle } from './oracle.js';
import { parsePairDetails } from './pair.js';
import { parsePoolDetails } from './pool.js';
import type {
  AccountDetails,
  AccountSigner,
  AddCollateralParams,
  MarginOrderParams,
  MarginOrderTpSlParams,
  PairDetails,
  Permissions,
  PoolDetails,
  ProtocolVariables,
  RegistryVariable,
  RemoveCollateralParams,
} from './types.js';
import { NETWORKS, NetworkId, REGISTRY_VARIABLES } from './types.js';
import { signatureBadgeId } from './utils/keys.js';
import { elementsOf, entriesOf, scalarValue } from './utils/programmatic.js';

const logger = createLogger('exchange');

const KNOWN_VARIABLES: ReadonlySet<string> = new Set<string>(REGISTRY_VARIABLES);

function isRegistryVariable(name: string): name is RegistryVariable {
  return KNOWN_VARIABLES.has(name);
}

/**
 * Registry address for a network id
 */
export function defaultEnvRegistry(networkId: number): string {
  return networkId === NetworkId.STOKENET ? NETWORKS.stokenet.envRegistry : NETWORKS.mainnet.envRegistry;
}

export class Exchange {
  readonly gateway: Gateway;
  readonly oracle: Oracle;
  readonly envRegistry: string;
  private variables: ProtocolVariables | null = null;

  constructor(gateway: Gateway, oracle: Oracle, envRegistry?: string) {
    this.gateway = gateway;
    this.oracle = oracle;
    this.envRegistry = envRegistry ?? defaultEnvRegistry(gateway.networkId);
  }

  /**
   * Resolve protocol addresses from the environment registry
   */
  async loadVariables(): Promise<ProtocolVariables> {
    const manifest = manifests.getVariablesManifest(this.envRegistry, REGISTRY_VARIABLES);
    const output = await this.gateway.previewOutput(manifest);

    const variables: ProtocolVariables = {};
    for (const entry of entriesOf(output, 'variables')) {
      const key = scalarValue(entry.key, 'variables.key');
      if (!isRegistryVariable(key)) {
        logger.debug({ key }, 'Ignoring unknown registry variable');
        continue;
      }
      variables[key] = scalarValue(entry.value, `variables.${key}`);
    }

    this.variables = variables;
    logger.info({ registry: this.envRegistry, count: Object.keys(variables).length }, 'Loaded protocol variables');
    return variables;
  }

  /**
   * Address of a loaded protocol variable
   */
  variable(name: RegistryVariable): string {
    if (!this.variables) {
      throw SurgeError.variablesNotLoaded();
    }
    const value = this.variables[name];
    if (value === undefined) {
      throw SurgeError.invalidResponse('variables', `registry has no ${name}`);
    }
    return value;
  }

  get exchangeComponent(): string {
    return this.variable('exchange_component');
  }

  /**
   * Positions, collateral and requests of a margin account, valued at oracle prices
   */
  async accountDetails(marginAccount: string): Promise<AccountDetails> {
    const manifest = manifests.getAccountDetailsManifest(this.exchangeComponent, marginAccount);
    const output = await this.gateway.previewOutput(manifest);
    const prices = await this.oracle.getPrices(getPairIds(output));
    return parseAccountDetails(output, prices);
  }

  async poolDetails(): Promise<PoolDetails> {
    const output = await this.gateway.previewOutput(manifests.getPoolDetailsManifest(this.exchangeComponent));
    return parsePoolDetails(output);
  }

  /**
   * State and funding rates of trading pairs
   */
  async pairDetails(pairIds: string[]): Promise<PairDetails[]> {
    const manifest = manifests.getPairDetailsManifest(this.exchangeComponent, pairIds);
    const output = await this.gateway.previewOutput(manifest);
    const prices = await this.oracle.getPrices(pairIds);
    return elementsOf(output, 'pair details').map(node => parsePairDetails(node, prices));
  }

  /**
   * Margin accounts an Ed25519 key has permissions over
   */
  async getPermissions(publicKey: PublicKey | Uint8Array): Promise<Permissions> {
    const exchange = this.exchangeComponent;
    const badgeId = await this.badgeId(publicKey instanceof Uint8Array ? publicKey : publicKey.bytes);
    const output = await this.gateway.previewOutput(manifests.getPermissionsManifest(exchange, badgeId));
    return parsePermissions(output);
  }

  /**
   * Create a margin account controlled by the signer's key
   *
   * Returns the new margin account address.
   */
  async createMarginAccount(signer: AccountSigner): Promise<string> {
    const exchange = this.exchangeComponent;
    const badgeId = await this.badgeId(signer.privateKey.publicKeyBytes());
    const manifest = manifests.createAccountManifest(exchange, signer.account, badgeId);

    const committed = await this.gateway.submitAndWait(manifest, signer.privateKey);
    const marginAccount = committed.newGlobalEntities[0];
    if (marginAccount === undefined) {
      throw SurgeError.invalidResponse('create_account', 'transaction created no global entity');
    }
    logger.info({ marginAccount }, 'Created margin account');
    return marginAccount;
  }

  async createRecoveryKey(signer: AccountSigner, marginAccount: string): Promise<string> {
    const manifest = manifests.createRecoveryKeyManifest(this.exchangeComponent, signer.account, marginAccount);
    return this.submit(manifest, signer);
  }

  async addCollateral(signer: AccountSigner, params: AddCollateralParams): Promise<string> {
    const manifest = manifests.addCollateralManifest(this.exchangeComponent, signer.account, params);
    return this.submit(manifest, signer);
  }

  async removeCollateralRequest(signer: AccountSigner, params: RemoveCollateralParams): Promise<string> {
    const manifest = manifests.removeCollateralRequestManifest(this.exchangeComponent, signer.account, params);
    return this.submit(manifest, signer);
  }

  async marginOrderRequest(signer: AccountSigner, params: MarginOrderParams): Promise<string> {
    const manifest = manifests.marginOrderRequestManifest(this.exchangeComponent, signer.account, params);
    return this.submit(manifest, signer);
  }

  /**
   * Margin order with optional take-profit and stop-loss prices
   */
  async marginOrderTpSlRequest(signer: AccountSigner, params: MarginOrderTpSlParams): Promise<string> {
    const manifest = manifests.marginOrderTpSlRequestManifest(this.exchangeComponent, signer.account, params);
    return this.submit(manifest, signer);
  }

  async cancelRequests(
    signer: AccountSigner,
    marginAccount: string,
    indexes: Array<number | bigint>
  ): Promise<string> {
    const manifest = manifests.cancelRequestsManifest(this.exchangeComponent, signer.account, marginAccount, indexes);
    return this.submit(manifest, signer);
  }

  private async badgeId(publicKey: Uint8Array): Promise<string> {
    const { ed25519VirtualBadge } = await this.gateway.networkConfiguration();
    return signatureBadgeId(ed25519VirtualBadge, publicKey);
  }

  private async submit(manifest: string, signer: AccountSigner): Promise<string> {
    const { intent } = await this.gateway.submitAndWait(manifest, signer.privateKey);
    return intent;
  }
}
