/**
 * Radix Gateway API client
 *
 * Reads ledger state, previews manifests and builds, submits and tracks
 * signed transactions.
 */

import { randomInt } from 'node:crypto';
import type { AxiosInstance } from 'axios';
import { z } from 'zod';
import { Convert, RadixEngineToolkit, TransactionBuilder } from '@radixdlt/radix-engine-toolkit';
import type { PrivateKey, TransactionHeader, TransactionManifest } from '@radixdlt/radix-engine-toolkit';
import { Api } from './api.js';
import { SurgeError } from './errors.js';
import { createLogger } from './logger.js';
import type {
  BuiltTransaction,
  LedgerState,
  NetworkConfiguration,
  NetworkName,
  TransactionStatus,
} from './types.js';
import { NETWORKS } from './types.js';
import { ProgrammaticValueSchema } from './utils/programmatic.js';
import type { ProgrammaticValue } from './utils/programmatic.js';
import { pollUntil } from './utils/retry.js';

export const DEFAULT_GATEWAY_URL = NETWORKS.mainnet.gatewayUrl;
export const DEFAULT_NETWORK_ID = NETWORKS.mainnet.networkId;

export interface GatewayOptions {
  baseUrl: string;
  networkId: number;
  epochsValid: number;          // Epochs a built transaction stays valid for
  pollIntervalMs: number;       // Delay between commit checks
  maxPollAttempts: number;
}

const DEFAULT_OPTIONS: GatewayOptions = {
  baseUrl: DEFAULT_GATEWAY_URL,
  networkId: DEFAULT_NETWORK_ID,
  epochsValid: 2,
  pollIntervalMs: 1000,
  maxPollAttempts: 60,
};

const TRANSACTION_STATUSES = ['Unknown', 'CommittedSuccess', 'CommittedFailure', 'Pending', 'Rejected'] as const;

const ConstructionSchema = z.object({
  ledger_state: z.object({
    network: z.string(),
    state_version: z.number(),
    epoch: z.number(),
  }),
});

const NetworkConfigurationSchema = z.object({
  network_id: z.number(),
  network_name: z.string(),
  well_known_addresses: z.object({
    xrd: z.string(),
    faucet: z.string(),
    ed25519_signature_virtual_badge: z.string(),
    secp256k1_signature_virtual_badge: z.string(),
  }),
});

const FungibleVaultsSchema = z.object({
  items: z.array(z.object({ amount: z.string() })),
});

const StreamSchema = z.object({
  items: z.array(z.record(z.string(), z.unknown())),
  next_cursor: z.string().nullish(),
});

const SubmitSchema = z.object({
  duplicate: z.boolean(),
});

const CommittedDetailsSchema = z.object({
  transaction: z.object({
    transaction_status: z.enum(TRANSACTION_STATUSES),
    receipt: z.object({
      error_message: z.string().nullish(),
      state_updates: z.object({
        new_global_entities: z.array(z.object({ entity_address: z.string() })),
      }).optional(),
    }).optional(),
  }),
});

const PreviewSchema = z.object({
  receipt: z.object({
    status: z.string(),
    error_message: z.string().nullish(),
    output: z.array(z.object({ programmatic_json: ProgrammaticValueSchema })).nullish(),
  }),
});

export type TransactionPreview = z.output<typeof PreviewSchema>;

export interface ComponentHistory {
  items: Record<string, unknown>[];
  nextCursor: string | null;
}

/** A committed transaction as reported by the Gateway */
export interface CommittedTransaction {
  intent: string;
  status: TransactionStatus;
  errorMessage: string | null;
  newGlobalEntities: string[];
}

const logger = createLogger('gateway');

export class Gateway extends Api {
  readonly networkId: number;
  private readonly options: GatewayOptions;
  private networkConfig: NetworkConfiguration | null = null;

  constructor(http: AxiosInstance, options: Partial<GatewayOptions> = {}) {
    const resolved = { ...DEFAULT_OPTIONS, ...options };
    super(http, resolved.baseUrl, logger);
    this.options = resolved;
    this.networkId = resolved.networkId;
  }

  /**
   * Random 32-bit transaction nonce
   */
  randomNonce(): number {
    return randomInt(0, 0x1_0000_0000);
  }

  /**
   * Current network, state version and epoch
   */
  async ledgerState(): Promise<LedgerState> {
    const data = await this.postRequired(ConstructionSchema, 'transaction/construction');
    const { network, state_version, epoch } = data.ledger_state;

    if (network !== 'mainnet' && network !== 'stokenet') {
      throw SurgeError.unknownNetwork(network);
    }
    const name: NetworkName = network;

    return {
      network: name,
      networkId: NETWORKS[name].networkId,
      stateVersion: state_version,
      epoch,
    };
  }

  /**
   * Network id and well-known addresses, fetched once
   */
  async networkConfiguration(): Promise<NetworkConfiguration> {
    if (this.networkConfig) {
      return this.networkConfig;
    }
    const data = await this.postRequired(NetworkConfigurationSchema, 'status/network-configuration');
    this.networkConfig = {
      networkId: data.network_id,
      networkName: data.network_name,
      xrd: data.well_known_addresses.xrd,
      faucet: data.well_known_addresses.faucet,
      ed25519VirtualBadge: data.well_known_addresses.ed25519_signature_virtual_badge,
      secp256k1VirtualBadge: data.well_known_addresses.secp256k1_signature_virtual_badge,
    };
    return this.networkConfig;
  }

  /**
   * Total XRD held across an account's vaults
   */
  async getXrdBalance(account: string): Promise<number> {
    const { xrd } = await this.networkConfiguration();
    const data = await this.postRequired(FungibleVaultsSchema, 'state/entity/page/fungible-vaults/', {
      address: account,
      resource_address: xrd,
    });
    return data.items.reduce((sum, item) => sum + Number(item.amount), 0);
  }

  /**
   * Recent transactions touching a component, with receipt events
   */
  async getComponentHistory(component: string, limit = 30): Promise<ComponentHistory> {
    const data = await this.postRequired(StreamSchema, 'stream/transactions', {
      limit_per_page: limit,
      affected_global_entities_filter: [component],
      opt_ins: {
        receipt_events: true,
      },
    });
    return { items: data.items, nextCursor: data.next_cursor ?? null };
  }

  /**
   * Submit a compiled notarized transaction
   */
  async submitTransaction(payload: string): Promise<{ duplicate: boolean }> {
    const result = await this.postRequired(SubmitSchema, 'transaction/submit', {
      notarized_transaction_hex: payload,
    });
    logger.info({ duplicate: result.duplicate }, 'Transaction submitted');
    return result;
  }

  /**
   * Committed details of a transaction, or null while it is not committed
   */
  async getTransactionDetails(intent: string): Promise<CommittedTransaction | null> {
    const data = await this.postParsed(CommittedDetailsSchema, 'transaction/committed-details', {
      intent_hash: intent,
      opt_ins: {
        receipt_state_changes: true,
      },
    });
    if (data === null) {
      return null;
    }

    const { transaction } = data;
    return {
      intent,
      status: transaction.transaction_status,
      errorMessage: transaction.receipt?.error_message ?? null,
      newGlobalEntities: (transaction.receipt?.state_updates?.new_global_entities ?? [])
        .map(entity => entity.entity_address),
    };
  }

  /**
   * Poll until a transaction is committed
   */
  async waitForCommit(intent: string): Promise<CommittedTransaction> {
    const { pollIntervalMs, maxPollAttempts } = this.options;
    const details = await pollUntil(
      attempt => {
        logger.debug({ intent, attempt }, 'Checking transaction commit');
        return this.getTransactionDetails(intent);
      },
      { intervalMs: pollIntervalMs, maxAttempts: maxPollAttempts }
    );
    if (details === null) {
      throw SurgeError.transactionTimeout(intent, maxPollAttempts);
    }
    return details;
  }

  /**
   * Status of a transaction once committed
   */
  async getTransactionStatus(intent: string): Promise<TransactionStatus> {
    const details = await this.waitForCommit(intent);
    return details.status;
  }

  /**
   * Addresses of the global entities a committed transaction created
   */
  async getNewAddresses(intent: string): Promise<string[]> {
    const details = await this.waitForCommit(intent);
    return details.newGlobalEntities;
  }

  /**
   * Preview a manifest without signatures or fees
   */
  async previewTransaction(manifest: string): Promise<TransactionPreview> {
    return this.postRequired(PreviewSchema, 'transaction/preview', {
      manifest,
      start_epoch_inclusive: 0,
      end_epoch_exclusive: 1,
      tip_percentage: 0,
      nonce: this.randomNonce(),
      signer_public_keys: [],
      flags: {
        use_free_credit: true,
        assume_all_signature_proofs: true,
        skip_epoch_check: true,
      },
    });
  }

  /**
   * Preview a manifest and return the output of its first instruction
   */
  async previewOutput(manifest: string): Promise<ProgrammaticValue> {
    const { receipt } = await this.previewTransaction(manifest);
    if (receipt.status !== 'Succeeded') {
      logger.warn({ status: receipt.status, error: receipt.error_message }, 'Preview did not succeed');
      throw SurgeError.previewFailed(receipt.status, receipt.error_message);
    }
    const output = receipt.output?.[0];
    if (!output) {
      throw SurgeError.invalidResponse('transaction/preview', 'receipt has no output');
    }
    return output.programmatic_json;
  }

  /**
   * Compile, sign and notarize a manifest
   */
  async buildTransaction(
    manifest: string,
    privateKey: PrivateKey,
    epochsValid: number = this.options.epochsValid
  ): Promise<BuiltTransaction> {
    const { epoch } = await this.ledgerState();

    const header: TransactionHeader = {
      networkId: this.networkId,
      startEpochInclusive: epoch,
      endEpochExclusive: epoch + epochsValid,
      nonce: this.randomNonce(),
      notaryPublicKey: privateKey.publicKey(),
      notaryIsSignatory: false,
      tipPercentage: 0,
    };
    const transactionManifest: TransactionManifest = {
      instructions: { kind: 'String', value: manifest },
      blobs: [],
    };

    try {
      const transaction = await TransactionBuilder.new().then(builder =>
        builder
          .header(header)
          .manifest(transactionManifest)
          .sign(privateKey)
          .notarize(privateKey)
      );
      const intentHash = await RadixEngineToolkit.NotarizedTransaction.intentHash(transaction);
      const compiled = await RadixEngineToolkit.NotarizedTransaction.compile(transaction);

      return {
        payload: Convert.Uint8Array.toHexString(compiled),
        intent: intentHash.id,
      };
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      logger.error({ err: error }, 'Transaction build failed');
      throw SurgeError.transactionBuildFailed(reason);
    }
  }

  /**
   * Build, submit and wait for a manifest to commit successfully
   */
  async submitAndWait(manifest: string, privateKey: PrivateKey): Promise<CommittedTransaction> {
    const { payload, intent } = await this.buildTransaction(manifest, privateKey);
    await this.submitTransaction(payload);
    logger.info({ intent }, 'Waiting for transaction commit');

    const committed = await this.waitForCommit(intent);
    if (committed.status !== 'CommittedSuccess') {
      logger.error({ intent, status: committed.status, error: committed.errorMessage }, 'Transaction failed');
      throw SurgeError.transactionFailed(intent, committed.status);
    }
    logger.info({ intent }, 'Transaction committed');
    return committed;
  }
}
