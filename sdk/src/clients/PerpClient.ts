import {
  AccountMeta,
  PublicKey,
  SYSVAR_CLOCK_PUBKEY,
  TransactionInstruction,
} from '@solana/web3.js';
import { TOKEN_PROGRAM_ID } from '@solana/spl-token';
import {
  AddBudgetParams,
  AddInstanceParams,
  AddPageParams,
  CloseAccountParams,
  ClosePositionParams,
  CollectGarbageParams,
  CrankLiquidationParams,
  CreateMarketParams,
  FundingExtractionParams,
  IncreasePositionParams,
  InstanceContext,
  MarketContext,
  OpenPositionParams,
  PerpInstruction,
  RebalanceParams,
  TransferPositionParams,
  TransferUserAccountParams,
  U64Input,
  UpdateOracleAccountParams,
  WithdrawBudgetParams,
} from '../types/perp';
import { AccountListBuilder } from '../instructions/accounts';
import { encodePerpInstruction } from '../instructions/layout';
import { InvalidInstanceIndexError } from '../utils/errors';
import { toU64 } from '../utils/serialization';
import { LABEL_ACCOUNTS, LabelAccounts } from '../constants';

/**
 * Builds instructions for the vAMM perpetuals program of one market
 *
 * Every builder is pure: it reads the market context, validates its inputs and
 * returns an unsigned TransactionInstruction. Signing and submission are left
 * to the caller.
 */
export class PerpClient {
  /**
   * Create a new PerpClient
   * @param market Market accounts and instances
   * @param labels Label accounts referenced by trade, liquidation and funding instructions
   */
  constructor(
    private readonly market: MarketContext,
    private readonly labels: LabelAccounts = LABEL_ACCOUNTS
  ) {}

  get programId(): PublicKey {
    return this.market.programId;
  }

  /**
   * Look up an instance of the market
   * @throws InvalidInstanceIndexError if no instance exists at that index
   */
  getInstance(instanceIndex: number): InstanceContext {
    const { instances } = this.market;
    if (
      !Number.isInteger(instanceIndex) ||
      instanceIndex < 0 ||
      instanceIndex >= instances.length
    ) {
      throw new InvalidInstanceIndexError(instanceIndex, instances.length);
    }
    return instances[instanceIndex];
  }

  // ============================================================================
  // Market administration
  // ============================================================================

  /**
   * Build CreateMarket instruction
   * The signer nonce is taken from the market context.
   */
  buildCreateMarketInstruction(params: CreateMarketParams): TransactionInstruction {
    const { market } = this;
    const data = encodePerpInstruction({
      kind: PerpInstruction.CreateMarket,
      signerNonce: market.signerNonce,
      marketSymbol: params.marketSymbol,
      initialVPcAmount: toU64(params.initialVPcAmount, 'initialVPcAmount'),
      coinDecimals: params.coinDecimals,
      quoteDecimals: params.quoteDecimals,
    });

    const keys = new AccountListBuilder()
      .writable(market.marketAccount)
      .readonly(SYSVAR_CLOCK_PUBKEY)
      .readonly(market.oracleAccount)
      .readonly(market.adminAccount)
      .readonly(market.marketVault)
      .build();

    return this.instruction(keys, data);
  }

  /**
   * Build AddInstance instruction
   * Registers a new instance together with its initial positions book pages.
   */
  buildAddInstanceInstruction(params: AddInstanceParams): TransactionInstruction {
    const { market } = this;
    const data = encodePerpInstruction({ kind: PerpInstruction.AddInstance });

    const keys = new AccountListBuilder()
      .writable(market.marketAccount)
      .writable(market.adminAccount, true)
      .writable(params.instanceAccount)
      .pages({
        instanceAccount: params.instanceAccount,
        memoryPages: params.memoryPages,
      })
      .build();

    return this.instruction(keys, data);
  }

  /**
   * Build UpdateOracleAccount instruction
   * The program follows the oracle mapping, product and price accounts.
   */
  buildUpdateOracleAccountInstruction(
    params: UpdateOracleAccountParams
  ): TransactionInstruction {
    const data = encodePerpInstruction({ kind: PerpInstruction.UpdateOracleAccount });

    const keys = new AccountListBuilder()
      .writable(this.market.marketAccount)
      .readonly(params.oracleMappingAccount)
      .readonly(params.oracleProductAccount)
      .readonly(params.oraclePriceAccount)
      .build();

    return this.instruction(keys, data);
  }

  /**
   * Build ChangeK instruction
   * @param factor vAMM invariant multiplier (u64)
   */
  buildChangeKInstruction(factor: U64Input): TransactionInstruction {
    const data = encodePerpInstruction({
      kind: PerpInstruction.ChangeK,
      factor: toU64(factor, 'factor'),
    });

    const keys = new AccountListBuilder()
      .writable(this.market.marketAccount)
      .readonly(this.market.adminAccount, true)
      .build();

    return this.instruction(keys, data);
  }

  /**
   * Build AddPage instruction
   * Appends a new positions book page to an existing instance.
   */
  buildAddPageInstruction(params: AddPageParams): TransactionInstruction {
    const instance = this.getInstance(params.instanceIndex);
    const data = encodePerpInstruction({
      kind: PerpInstruction.AddPage,
      instanceIndex: params.instanceIndex,
    });

    const keys = new AccountListBuilder()
      .readonly(this.market.marketAccount)
      .readonly(this.market.adminAccount, true)
      .writable(instance.instanceAccount)
      .readonly(params.newMemoryPage)
      .build();

    return this.instruction(keys, data);
  }

  // ============================================================================
  // User budget
  // ============================================================================

  /**
   * Build AddBudget instruction
   * Moves quote tokens from the source token account into the market vault
   * and credits the user account.
   */
  buildAddBudgetInstruction(params: AddBudgetParams): TransactionInstruction {
    const { market } = this;
    const data = encodePerpInstruction({
      kind: PerpInstruction.AddBudget,
      amount: toU64(params.amount, 'amount'),
    });

    const keys = new AccountListBuilder()
      .readonly(TOKEN_PROGRAM_ID)
      .writable(market.marketAccount)
      .writable(market.marketVault)
      .writable(params.userAccount)
      .readonly(params.sourceOwner, true)
      .writable(params.sourceTokenAccount)
      .build();

    return this.instruction(keys, data);
  }

  /**
   * Build WithdrawBudget instruction
   * Debits the user account and pays quote tokens out of the market vault.
   */
  buildWithdrawBudgetInstruction(params: WithdrawBudgetParams): TransactionInstruction {
    const { market } = this;
    const data = encodePerpInstruction({
      kind: PerpInstruction.WithdrawBudget,
      amount: toU64(params.amount, 'amount'),
    });

    const keys = new AccountListBuilder()
      .readonly(TOKEN_PROGRAM_ID)
      .writable(market.marketAccount)
      .readonly(market.marketSignerAccount)
      .writable(market.marketVault)
      .readonly(params.userAccountOwner, true)
      .writable(params.userAccount)
      .writable(params.targetTokenAccount)
      .build();

    return this.instruction(keys, data);
  }

  // ============================================================================
  // Trading
  // ============================================================================

  /**
   * Build OpenPosition instruction
   *
   * Accounts: token program, clock, market, instance, market signer, vault,
   * fee sink, owner (signer), user account, trade label, oracle, then the
   * instance pages, the optional discount pair and the optional referrer.
   *
   * Prices, leverage and slippage are 32-bit fixed-point values the caller
   * has already scaled.
   */
  buildOpenPositionInstruction(params: OpenPositionParams): TransactionInstruction {
    const { market } = this;
    const { position } = params;
    const instance = this.getInstance(position.instanceIndex);

    const data = encodePerpInstruction({
      kind: PerpInstruction.OpenPosition,
      side: position.side,
      collateral: toU64(params.collateral, 'collateral'),
      instanceIndex: position.instanceIndex,
      leverage: toU64(params.leverage, 'leverage'),
      predictedEntryPrice: toU64(params.predictedEntryPrice, 'predictedEntryPrice'),
      maximumSlippageMargin: toU64(params.maximumSlippageMargin, 'maximumSlippageMargin'),
    });

    const keys = new AccountListBuilder()
      .readonly(TOKEN_PROGRAM_ID)
      .readonly(SYSVAR_CLOCK_PUBKEY)
      .writable(market.marketAccount)
      .writable(instance.instanceAccount)
      .readonly(market.marketSignerAccount)
      .writable(market.marketVault)
      .writable(market.feeSink)
      .readonly(position.userAccountOwner, true)
      .writable(position.userAccount)
      .readonly(this.labels.trade)
      .readonly(market.oracleAccount)
      .pages(instance)
      .feeAccounts(params)
      .build();

    return this.instruction(keys, data);
  }

  /**
   * Build IncreasePosition instruction
   * Adds collateral to an existing position at `positionIndex`.
   */
  buildIncreasePositionInstruction(params: IncreasePositionParams): TransactionInstruction {
    const { market } = this;
    const instance = this.getInstance(params.instanceIndex);

    const data = encodePerpInstruction({
      kind: PerpInstruction.IncreasePosition,
      addCollateral: toU64(params.addCollateral, 'addCollateral'),
      instanceIndex: params.instanceIndex,
      leverage: toU64(params.leverage, 'leverage'),
      positionIndex: params.positionIndex,
      predictedEntryPrice: toU64(params.predictedEntryPrice, 'predictedEntryPrice'),
      maximumSlippageMargin: toU64(params.maximumSlippageMargin, 'maximumSlippageMargin'),
    });

    const keys = new AccountListBuilder()
      .readonly(TOKEN_PROGRAM_ID)
      .readonly(SYSVAR_CLOCK_PUBKEY)
      .writable(market.marketAccount)
      .readonly(market.marketSignerAccount)
      .writable(market.marketVault)
      .writable(market.feeSink)
      .writable(instance.instanceAccount)
      .readonly(params.userAccountOwner, true)
      .writable(params.userAccount)
      .readonly(this.labels.trade)
      .readonly(market.oracleAccount)
      .pages(instance)
      .feeAccounts(params)
      .build();

    return this.instruction(keys, data);
  }

  /**
   * Build ClosePosition instruction
   * Closes `closingCollateral` / `closingVCoin` of the position at `positionIndex`.
   */
  buildClosePositionInstruction(params: ClosePositionParams): TransactionInstruction {
    const { market } = this;
    const { position } = params;
    const instance = this.getInstance(position.instanceIndex);

    const data = encodePerpInstruction({
      kind: PerpInstruction.ClosePosition,
      positionIndex: params.positionIndex,
      closingCollateral: toU64(params.closingCollateral, 'closingCollateral'),
      closingVCoin: toU64(params.closingVCoin, 'closingVCoin'),
      predictedEntryPrice: toU64(params.predictedEntryPrice, 'predictedEntryPrice'),
      maximumSlippageMargin: toU64(params.maximumSlippageMargin, 'maximumSlippageMargin'),
    });

    const keys = new AccountListBuilder()
      .readonly(TOKEN_PROGRAM_ID)
      .readonly(SYSVAR_CLOCK_PUBKEY)
      .writable(market.marketAccount)
      .writable(instance.instanceAccount)
      .readonly(market.marketSignerAccount)
      .writable(market.marketVault)
      .writable(market.feeSink)
      .readonly(market.oracleAccount)
      .readonly(position.userAccountOwner, true)
      .writable(position.userAccount)
      .readonly(this.labels.trade)
      .pages(instance)
      .feeAccounts(params)
      .build();

    return this.instruction(keys, data);
  }

  /**
   * Build Rebalance instruction
   * Requires both the position owner and the market admin to sign.
   */
  buildRebalanceInstruction(params: RebalanceParams): TransactionInstruction {
    const { market } = this;
    const instance = this.getInstance(params.instanceIndex);

    const data = encodePerpInstruction({
      kind: PerpInstruction.Rebalance,
      collateral: toU64(params.collateral, 'collateral'),
      instanceIndex: params.instanceIndex,
    });

    // The program reads the first instance account here; only the pages
    // come from the rebalanced instance.
    const keys = new AccountListBuilder()
      .readonly(TOKEN_PROGRAM_ID)
      .readonly(SYSVAR_CLOCK_PUBKEY)
      .writable(market.marketAccount)
      .writable(this.getInstance(0).instanceAccount)
      .readonly(market.marketSignerAccount)
      .writable(market.marketVault)
      .writable(market.feeSink)
      .readonly(params.userAccountOwner, true)
      .writable(params.userAccount)
      .readonly(market.adminAccount, true)
      .pages(instance)
      .build();

    return this.instruction(keys, data);
  }

  // ============================================================================
  // Cranks
  // ============================================================================

  /**
   * Build CollectGarbage instruction
   * Frees closed slots of the positions book; the reward goes to `targetTokenAccount`.
   */
  buildCollectGarbageInstruction(params: CollectGarbageParams): TransactionInstruction {
    const { market } = this;
    const instance = this.getInstance(params.instanceIndex);

    const data = encodePerpInstruction({
      kind: PerpInstruction.CollectGarbage,
      instanceIndex: params.instanceIndex,
      maxIterations: toU64(params.maxIterations, 'maxIterations'),
    });

    const keys = new AccountListBuilder()
      .readonly(TOKEN_PROGRAM_ID)
      .writable(market.marketAccount)
      .writable(instance.instanceAccount)
      .writable(market.marketVault)
      .readonly(market.marketSignerAccount)
      .writable(params.targetTokenAccount)
      .pages(instance)
      .build();

    return this.instruction(keys, data);
  }

  /**
   * Build CrankLiquidation instruction
   * Liquidates losing positions of an instance; the reward goes to `targetTokenAccount`.
   */
  buildCrankLiquidationInstruction(params: CrankLiquidationParams): TransactionInstruction {
    const { market } = this;
    const instance = this.getInstance(params.instanceIndex);

    const data = encodePerpInstruction({
      kind: PerpInstruction.CrankLiquidation,
      instanceIndex: params.instanceIndex,
    });

    const keys = new AccountListBuilder()
      .readonly(TOKEN_PROGRAM_ID)
      .writable(market.marketAccount)
      .writable(instance.instanceAccount)
      .readonly(market.marketSignerAccount)
      .writable(market.feeSink)
      .writable(market.marketVault)
      .readonly(market.oracleAccount)
      .writable(params.targetTokenAccount)
      .readonly(this.labels.liquidation)
      .pages(instance)
      .build();

    return this.instruction(keys, data);
  }

  /**
   * Build CrankFunding instruction
   */
  buildCrankFundingInstruction(): TransactionInstruction {
    const data = encodePerpInstruction({ kind: PerpInstruction.CrankFunding });

    const keys = new AccountListBuilder()
      .readonly(SYSVAR_CLOCK_PUBKEY)
      .writable(this.market.marketAccount)
      .readonly(this.market.oracleAccount)
      .readonly(this.labels.funding)
      .build();

    return this.instruction(keys, data);
  }

  /**
   * Build FundingExtraction instruction
   * Settles accrued funding for the positions of one user account.
   */
  buildFundingExtractionInstruction(params: FundingExtractionParams): TransactionInstruction {
    const { market } = this;
    const instance = this.getInstance(params.instanceIndex);

    const data = encodePerpInstruction({
      kind: PerpInstruction.FundingExtraction,
      instanceIndex: params.instanceIndex,
    });

    const keys = new AccountListBuilder()
      .writable(market.marketAccount)
      .writable(instance.instanceAccount)
      .writable(params.userAccount)
      .readonly(this.labels.fundingExtraction)
      .readonly(market.oracleAccount)
      .pages(instance)
      .build();

    return this.instruction(keys, data);
  }

  // ============================================================================
  // User accounts
  // ============================================================================

  /**
   * Build CloseAccount instruction
   * Closes an empty user account and sends its lamports to `lamportsTarget`.
   */
  buildCloseAccountInstruction(params: CloseAccountParams): TransactionInstruction {
    const data = encodePerpInstruction({ kind: PerpInstruction.CloseAccount });

    const keys = new AccountListBuilder()
      .writable(params.userAccount)
      .readonly(params.userAccountOwner, true)
      .writable(params.lamportsTarget)
      .build();

    return this.instruction(keys, data);
  }

  /**
   * Build TransferUserAccount instruction
   */
  buildTransferUserAccountInstruction(
    params: TransferUserAccountParams
  ): TransactionInstruction {
    const data = encodePerpInstruction({ kind: PerpInstruction.TransferUserAccount });

    const keys = new AccountListBuilder()
      .readonly(params.userAccountOwner, true)
      .writable(params.userAccount)
      .readonly(params.newUserAccountOwner)
      .build();

    return this.instruction(keys, data);
  }

  /**
   * Build TransferPosition instruction
   * Both owners must sign.
   */
  buildTransferPositionInstruction(params: TransferPositionParams): TransactionInstruction {
    const data = encodePerpInstruction({
      kind: PerpInstruction.TransferPosition,
      positionIndex: params.positionIndex,
    });

    const keys = new AccountListBuilder()
      .readonly(params.sourceUserAccountOwner, true)
      .writable(params.sourceUserAccount)
      .readonly(params.destinationUserAccountOwner, true)
      .writable(params.destinationUserAccount)
      .build();

    return this.instruction(keys, data);
  }

  private instruction(keys: AccountMeta[], data: Buffer): TransactionInstruction {
    return new TransactionInstruction({
      programId: this.market.programId,
      keys,
      data,
    });
  }
}
