/**
 * CustodialVault: top-level coordinator.
 *
 * Composes:
 * - VaultLedger (balances and aggregate counters)
 * - PriceOracleAdapter (volatile → stable conversion)
 * - Limit policy (pure checks before any mutation)
 * - AdminControl (administrator and tunable ceilings)
 * - SettlementShim (the only code that moves value)
 * - ReentrancyGuard (one operation at a time)
 *
 * Every user operation runs checks → ledger effects → settlement, inside
 * the guard and inside a ledger transaction, so a failed settlement
 * leaves no trace. Exactly one event is appended per accepted operation;
 * rejected operations append nothing. Once settlement has committed the
 * operation succeeds, whatever the audit sink does.
 */

import type { Logger } from "pino";
import { NATIVE_ASSET, assetKey, sameAddress, stableAsset } from "@strongroom/types";
import type { Address, AssetId, DomainEvent, StableAsset } from "@strongroom/types";
import { InMemoryEventStore, VAULT_EVENTS } from "@strongroom/event-store";
import type { CeilingName, EventStore, HashedStoredEvent } from "@strongroom/event-store";
import { VaultLedger } from "@strongroom/ledger";
import type { AssetBalance, LedgerTotals } from "@strongroom/ledger";
import { PriceOracleAdapter } from "@strongroom/price-oracle";
import type { PriceFeed } from "@strongroom/price-oracle";
import { AdminControl } from "./admin.js";
import { VaultError, errorCode } from "./errors.js";
import { buildVaultEvent } from "./events.js";
import type { EventContext } from "./events.js";
import { checkAmount, checkDeposit, checkWithdrawal, enforce } from "./limit-policy.js";
import { ReentrancyGuard } from "./reentrancy-guard.js";
import { SettlementShim } from "./settlement.js";
import type {
  CustodialVaultConfig,
  HeldValue,
  OperationContext,
  VaultParameters,
  VaultSnapshot,
} from "./types.js";

// =============================================================================
// Vault
// =============================================================================

export class CustodialVault {
  readonly vaultAddress: Address;
  readonly stableAsset: StableAsset;
  private ledger = new VaultLedger();
  private readonly oracle: PriceOracleAdapter;
  private readonly admin: AdminControl;
  private readonly settlement: SettlementShim;
  private readonly guard = new ReentrancyGuard();
  private readonly eventStore: EventStore;
  private readonly streamId: string;
  private readonly logger: Logger | undefined;

  constructor(config: CustodialVaultConfig) {
    this.vaultAddress = config.vaultAddress;
    this.stableAsset = stableAsset(config.stableToken.address);
    this.oracle = new PriceOracleAdapter(config.feed, {
      heartbeatSeconds: config.heartbeatSeconds,
      clock: config.clock,
    });
    this.admin = new AdminControl({
      admin: config.admin,
      oracleReference: config.feed.reference,
      bankCapitalCeiling: config.ceilings.bankCapital,
      globalDepositCeiling: config.ceilings.globalDeposit,
      perWithdrawalCeiling: config.perWithdrawalCeiling,
    });
    this.settlement = new SettlementShim(config.vaultAddress, config.nativeRail, config.stableToken);
    this.eventStore = config.eventStore ?? new InMemoryEventStore();
    this.streamId = `vault:${config.vaultAddress.toLowerCase()}`;
    this.logger = config.logger;
  }

  /**
   * Rebuild a vault from a snapshot. Rails, feed and sinks come from
   * `config`; balances, counters and ceilings come from the snapshot.
   */
  static fromSnapshot(config: CustodialVaultConfig, snapshot: VaultSnapshot): CustodialVault {
    const vault = new CustodialVault({
      ...config,
      ceilings: {
        bankCapital: BigInt(snapshot.parameters.bankCapitalCeiling),
        globalDeposit: BigInt(snapshot.parameters.globalDepositCeiling),
      },
      perWithdrawalCeiling: BigInt(snapshot.parameters.perWithdrawalCeiling),
    });
    vault.ledger = VaultLedger.fromSnapshot(snapshot.ledger);
    return vault;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Deposits
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Credit `amount` of `asset` to `user` and collect it into the vault.
   * Native deposits are valued through a fresh oracle read; stable
   * deposits count at face value.
   */
  async deposit(
    user: Address,
    asset: AssetId,
    amount: bigint,
    context: OperationContext = {},
  ): Promise<void> {
    await this.audited("deposit", user, asset, amount, async () => {
      enforce(checkAmount(amount));
      const resolved = this.resolveAsset(asset);

      const stableValue =
        resolved.kind === "native" ? await this.oracle.convertVolatileToStable(amount) : amount;

      const params = this.admin.parameters();
      enforce(
        checkDeposit({
          amount: stableValue,
          totalDeposits: this.ledger.totals().totalDeposits,
          globalDepositCeiling: params.globalDepositCeiling,
          bankCapitalCeiling: params.bankCapitalCeiling,
        }),
      );

      await this.ledger.atomically(async () => {
        this.ledger.recordDeposit(user, resolved, amount, stableValue);
        await this.settlement.collect(user, resolved, amount);
      });

      this.append(
        buildVaultEvent(
          VAULT_EVENTS.DEPOSIT_RECORDED,
          {
            user,
            assetId: assetKey(resolved),
            amount: amount.toString(),
            stableValue: stableValue.toString(),
          },
          this.eventContext(user, "vault", context),
        ),
      );
    });
  }

  async depositNative(user: Address, amount: bigint, context?: OperationContext): Promise<void> {
    await this.deposit(user, NATIVE_ASSET, amount, context);
  }

  async depositStable(user: Address, amount: bigint, context?: OperationContext): Promise<void> {
    await this.deposit(user, this.stableAsset, amount, context);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Withdrawals
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Debit `amount` of `asset` from `user` and pay it out. The ledger is
   * debited before the transfer and restored if the transfer fails.
   */
  async withdraw(
    user: Address,
    asset: AssetId,
    amount: bigint,
    context: OperationContext = {},
  ): Promise<void> {
    await this.audited("withdraw", user, asset, amount, async () => {
      enforce(checkAmount(amount));
      const resolved = this.resolveAsset(asset);

      enforce(
        checkWithdrawal({
          amount,
          balance: this.ledger.balanceOf(user, resolved),
          perWithdrawalCeiling: this.admin.perWithdrawalCeiling,
        }),
      );

      await this.ledger.atomically(async () => {
        this.ledger.recordWithdrawal(user, resolved, amount);
        await this.settlement.pay(user, resolved, amount);
      });

      this.append(
        buildVaultEvent(
          VAULT_EVENTS.WITHDRAWAL_RECORDED,
          { user, assetId: assetKey(resolved), amount: amount.toString() },
          this.eventContext(user, "vault", context),
        ),
      );
    });
  }

  async withdrawNative(user: Address, amount: bigint, context?: OperationContext): Promise<void> {
    await this.withdraw(user, NATIVE_ASSET, amount, context);
  }

  async withdrawStable(user: Address, amount: bigint, context?: OperationContext): Promise<void> {
    await this.withdraw(user, this.stableAsset, amount, context);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Administration
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Point the oracle at a new feed. The next conversion reads from it.
   */
  setOracleReference(caller: Address, feed: PriceFeed, context: OperationContext = {}): void {
    const previous = this.admin.setOracleReference(caller, feed.reference);
    this.oracle.setFeed(feed);

    this.append(
      buildVaultEvent(
        VAULT_EVENTS.ORACLE_REFERENCE_CHANGED,
        { newReference: feed.reference, previousReference: previous },
        this.eventContext(caller, "admin", context),
      ),
    );
    this.logger?.info(
      { op: "setOracleReference", caller, previous, next: feed.reference },
      "oracle reference changed",
    );
  }

  setBankCapitalCeiling(caller: Address, value: bigint, context: OperationContext = {}): void {
    const previous = this.admin.setBankCapitalCeiling(caller, value);
    this.ceilingChanged(caller, "bankCapital", previous, value, context);
  }

  setGlobalDepositCeiling(caller: Address, value: bigint, context: OperationContext = {}): void {
    const previous = this.admin.setGlobalDepositCeiling(caller, value);
    this.ceilingChanged(caller, "globalDeposit", previous, value, context);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Reads
  // ───────────────────────────────────────────────────────────────────────

  balanceOf(user: Address, asset: AssetId): bigint {
    return this.ledger.balanceOf(user, asset);
  }

  balancesOf(user: Address): readonly AssetBalance[] {
    return this.ledger.balancesOf(user);
  }

  totals(): LedgerTotals {
    return this.ledger.totals();
  }

  parameters(): VaultParameters {
    return this.admin.parameters();
  }

  oracleReference(): Address {
    return this.admin.oracleReference;
  }

  /**
   * What the vault actually holds, valued at a fresh oracle price.
   */
  async totalHeldValue(): Promise<HeldValue> {
    const nativeOnHand = await this.settlement.onHand(NATIVE_ASSET);
    const stableOnHand = await this.settlement.onHand(this.stableAsset);
    const nativeValue = await this.oracle.convertVolatileToStable(nativeOnHand);

    return { nativeOnHand, stableOnHand, totalValue: nativeValue + stableOnHand };
  }

  /**
   * The vault's audit stream, oldest first.
   */
  events(): readonly HashedStoredEvent[] {
    return this.eventStore.read(this.streamId);
  }

  snapshot(): VaultSnapshot {
    const params = this.admin.parameters();
    return {
      version: 1,
      vaultAddress: this.vaultAddress,
      oracleReference: this.admin.oracleReference,
      parameters: {
        admin: params.admin,
        bankCapitalCeiling: params.bankCapitalCeiling.toString(),
        globalDepositCeiling: params.globalDepositCeiling.toString(),
        perWithdrawalCeiling: params.perWithdrawalCeiling.toString(),
      },
      ledger: this.ledger.snapshot(),
    };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internal
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Accept only the native asset and the configured stable token.
   */
  private resolveAsset(asset: AssetId): AssetId {
    if (asset.kind === "native") {
      return NATIVE_ASSET;
    }
    if (!sameAddress(asset.token, this.stableAsset.token)) {
      throw new VaultError("UNSUPPORTED_ASSET", "Asset is not held by this vault", {
        details: { token: asset.token },
      });
    }
    return this.stableAsset;
  }

  /**
   * Run a user operation inside the guard and log its outcome.
   */
  private async audited(
    op: "deposit" | "withdraw",
    user: Address,
    asset: AssetId,
    amount: bigint,
    body: () => Promise<void>,
  ): Promise<void> {
    const fields = { op, user, asset: assetKey(asset), amount: amount.toString() };
    try {
      await this.guard.run(body);
    } catch (err) {
      this.logger?.warn({ ...fields, code: errorCode(err) }, `${op} rejected`);
      throw err;
    }
    this.logger?.info(fields, `${op} accepted`);
  }

  private ceilingChanged(
    caller: Address,
    ceiling: CeilingName,
    previous: bigint,
    next: bigint,
    context: OperationContext,
  ): void {
    this.append(
      buildVaultEvent(
        VAULT_EVENTS.CEILING_CHANGED,
        { ceiling, previousValue: previous.toString(), newValue: next.toString() },
        this.eventContext(caller, "admin", context),
      ),
    );
    this.logger?.info(
      { op: "setCeiling", caller, ceiling, previous: previous.toString(), next: next.toString() },
      "ceiling changed",
    );
  }

  private eventContext(
    actor: Address,
    source: EventContext["source"],
    context: OperationContext,
  ): EventContext {
    return { actor, source, correlationId: context.correlationId };
  }

  /**
   * Record an operation that has already committed. A failing audit sink
   * is logged and never turns the committed operation into a rejection.
   */
  private append(event: DomainEvent): void {
    try {
      this.eventStore.append(this.streamId, [event]);
    } catch (err) {
      this.logger?.error(
        { err, eventType: event.type, eventId: event.metadata.eventId, code: errorCode(err) },
        "audit append failed after commit",
      );
    }
  }
}
