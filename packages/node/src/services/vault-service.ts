/**
 * VaultService: composition root for the vault and its collaborators.
 *
 * Route handlers delegate to this service; they never import domain
 * packages directly. Mutating calls are queued through a Serializer so
 * concurrent requests never trip the vault's re-entrancy guard; once
 * stop() has been called they are refused.
 */

import type { Logger } from "pino";
import { NATIVE_ASSET } from "@strongroom/types";
import type { Address, AssetId } from "@strongroom/types";
import { InMemoryEventStore } from "@strongroom/event-store";
import type {
  CeilingName,
  EventStore,
  EventStoreIntegrityResult,
  HashedStoredEvent,
} from "@strongroom/event-store";
import type { AssetBalance, LedgerTotals } from "@strongroom/ledger";
import { systemClock } from "@strongroom/price-oracle";
import type { Clock } from "@strongroom/price-oracle";
import {
  CustodialVault,
  InMemoryNativeRail,
  InMemoryStableToken,
} from "@strongroom/vault";
import type {
  HeldValue,
  NativeAssetRail,
  StableToken,
  VaultParameters,
} from "@strongroom/vault";
import type { AppConfig } from "../config.js";
import type { AssetName } from "../types/dto.js";
import { ApiError } from "../types/error.js";
import { Faucet } from "./faucet.js";
import { chainlinkFeedFactory, manualFeedFactory } from "./feed-factory.js";
import type { FeedFactory } from "./feed-factory.js";
import { Serializer } from "./serializer.js";

// =============================================================================
// Configuration
// =============================================================================

export interface VaultServiceOptions {
  readonly vault: CustodialVault;
  readonly eventStore: EventStore;
  readonly feedFactory: FeedFactory;
  readonly nativeRail: NativeAssetRail;
  readonly stableToken: StableToken;
  /** Present only when the rails are in-process */
  readonly faucet?: Faucet | undefined;
}

export interface FromConfigOptions {
  readonly logger?: Logger | undefined;
  readonly clock?: Clock | undefined;
  /** Overrides the factory chosen from RPC_URL */
  readonly feedFactory?: FeedFactory | undefined;
  /** Settlement rails; in-memory rails are created when absent */
  readonly nativeRail?: NativeAssetRail | undefined;
  readonly stableToken?: StableToken | undefined;
}

export interface VaultStats {
  readonly totals: LedgerTotals;
  readonly parameters: VaultParameters;
  readonly oracleReference: Address;
}

// =============================================================================
// Service
// =============================================================================

export class VaultService {
  readonly vault: CustodialVault;
  readonly eventStore: EventStore;
  readonly nativeRail: NativeAssetRail;
  readonly stableToken: StableToken;
  readonly faucet: Faucet | undefined;

  private readonly feedFactory: FeedFactory;
  private readonly serializer = new Serializer();
  private _ready = true;

  constructor(options: VaultServiceOptions) {
    this.vault = options.vault;
    this.eventStore = options.eventStore;
    this.feedFactory = options.feedFactory;
    this.nativeRail = options.nativeRail;
    this.stableToken = options.stableToken;
    this.faucet = options.faucet;
  }

  /**
   * Build a service from environment configuration. Settlement runs on
   * in-memory rails unless others are given, with a faucet when both are
   * in-memory and FAUCET_ENABLED holds; the price feed is on-chain when
   * RPC_URL is set.
   */
  static fromConfig(config: AppConfig, options: FromConfigOptions = {}): VaultService {
    const clock = options.clock ?? systemClock;
    const feedFactory =
      options.feedFactory ??
      (config.RPC_URL !== undefined
        ? chainlinkFeedFactory(config.RPC_URL, config.RPC_TIMEOUT_MS)
        : manualFeedFactory(config.MANUAL_PRICE, clock));

    const logger = options.logger;
    const eventStore = new InMemoryEventStore({
      onSubscriberError: (err, event) => {
        logger?.error(
          { err, eventType: event.event.type, globalPosition: event.globalPosition },
          "audit subscriber failed",
        );
      },
    });
    const nativeRail = options.nativeRail ?? new InMemoryNativeRail();
    const stableToken =
      options.stableToken ?? new InMemoryStableToken(config.STABLE_TOKEN_ADDRESS);

    const vault = new CustodialVault({
      admin: config.ADMIN_ADDRESS,
      vaultAddress: config.VAULT_ADDRESS,
      stableToken,
      feed: feedFactory(config.PRICE_FEED_ADDRESS),
      nativeRail,
      ceilings: {
        bankCapital: config.BANK_CAPITAL_CEILING,
        globalDeposit: config.GLOBAL_DEPOSIT_CEILING,
      },
      perWithdrawalCeiling: config.PER_WITHDRAWAL_CEILING,
      heartbeatSeconds: config.ORACLE_HEARTBEAT_SECONDS,
      clock,
      eventStore,
      logger,
    });

    const faucet =
      config.FAUCET_ENABLED &&
      nativeRail instanceof InMemoryNativeRail &&
      stableToken instanceof InMemoryStableToken
        ? new Faucet(nativeRail, stableToken, config.VAULT_ADDRESS)
        : undefined;

    return new VaultService({ vault, eventStore, feedFactory, nativeRail, stableToken, faucet });
  }

  // ─── Operations ────────────────────────────────────────────────────

  /**
   * Deposit and return the user's resulting balance of that asset.
   */
  deposit(
    user: Address,
    asset: AssetName,
    amount: bigint,
    correlationId: string,
  ): Promise<AssetBalance> {
    const assetId = this.assetId(asset);
    return this.enqueue(async () => {
      await this.vault.deposit(user, assetId, amount, { correlationId });
      return { asset: assetId, amount: this.vault.balanceOf(user, assetId) };
    });
  }

  /**
   * Withdraw and return the user's resulting balance of that asset.
   */
  withdraw(
    user: Address,
    asset: AssetName,
    amount: bigint,
    correlationId: string,
  ): Promise<AssetBalance> {
    const assetId = this.assetId(asset);
    return this.enqueue(async () => {
      await this.vault.withdraw(user, assetId, amount, { correlationId });
      return { asset: assetId, amount: this.vault.balanceOf(user, assetId) };
    });
  }

  // ─── Administration ────────────────────────────────────────────────

  setOracleReference(caller: Address, feedAddress: Address, correlationId: string): Promise<Address> {
    return this.enqueue(() => {
      this.vault.setOracleReference(caller, this.feedFactory(feedAddress), { correlationId });
      return this.vault.oracleReference();
    });
  }

  setCeiling(
    caller: Address,
    ceiling: CeilingName,
    value: bigint,
    correlationId: string,
  ): Promise<VaultParameters> {
    return this.enqueue(() => {
      if (ceiling === "bankCapital") {
        this.vault.setBankCapitalCeiling(caller, value, { correlationId });
      } else {
        this.vault.setGlobalDepositCeiling(caller, value, { correlationId });
      }
      return this.vault.parameters();
    });
  }

  /**
   * Hand `amount` of `asset` to `user` through the faucet.
   */
  fund(user: Address, asset: AssetName, amount: bigint): Promise<void> {
    const faucet = this.faucet;
    if (faucet === undefined) {
      return Promise.reject(new ApiError("NOT_FOUND", 404, "Faucet is disabled on this node"));
    }
    return this.enqueue(() => faucet.drip(user, asset, amount));
  }

  // ─── Reads ─────────────────────────────────────────────────────────

  balancesOf(user: Address): readonly AssetBalance[] {
    return this.vault.balancesOf(user);
  }

  balanceOf(user: Address, asset: AssetName): AssetBalance {
    const assetId = this.assetId(asset);
    return { asset: assetId, amount: this.vault.balanceOf(user, assetId) };
  }

  stats(): VaultStats {
    return {
      totals: this.vault.totals(),
      parameters: this.vault.parameters(),
      oracleReference: this.vault.oracleReference(),
    };
  }

  holdings(): Promise<HeldValue> {
    return this.vault.totalHeldValue();
  }

  readEvents(afterPosition?: number): readonly HashedStoredEvent[] {
    return this.eventStore.readAll(
      afterPosition !== undefined ? { fromPosition: afterPosition + 1 } : undefined,
    );
  }

  // ─── Health & Integrity ──────────────────────────────────────────

  /**
   * Verify the audit log's hash chain. Called by /ready.
   */
  checkIntegrity(): EventStoreIntegrityResult {
    return this.eventStore.verifyIntegrity();
  }

  isReady(): boolean {
    return this._ready;
  }

  /**
   * Stop accepting work and wait for queued operations to settle.
   */
  async stop(): Promise<void> {
    this._ready = false;
    await this.serializer.run(() => undefined);
  }

  private enqueue<T>(task: () => Promise<T> | T): Promise<T> {
    if (!this._ready) {
      return Promise.reject(
        new ApiError("SERVICE_UNAVAILABLE", 503, "Service is stopping; no new operations are accepted"),
      );
    }
    return this.serializer.run(task);
  }

  private assetId(asset: AssetName): AssetId {
    return asset === "native" ? NATIVE_ASSET : this.vault.stableAsset;
  }
}
