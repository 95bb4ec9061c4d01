import { AccountMeta, PublicKey } from '@solana/web3.js';
import { DiscountAccount, InstanceContext } from '../types/perp';
import { MissingOptionalAccountError, PerpSdkError } from '../utils/errors';

/**
 * Account list segments, in the order the program reads them
 */
export type AccountSegment = 'fixed' | 'pages' | 'discount' | 'referrer';

const SEGMENT_ORDER: Record<AccountSegment, number> = {
  fixed: 0,
  pages: 1,
  discount: 2,
  referrer: 3,
};

/**
 * Builds an instruction account list segment by segment
 *
 * Layout: fixed prefix, positions book pages, optional discount pair
 * (discount account, then its signing owner), optional referrer. The program
 * indexes accounts positionally, so segments can only be appended in that
 * order and each variable segment at most once.
 */
export class AccountListBuilder {
  private readonly keys: AccountMeta[] = [];
  private segment: AccountSegment = 'fixed';

  /**
   * Append a writable fixed-prefix account
   */
  writable(pubkey: PublicKey, isSigner: boolean = false): this {
    this.enter('fixed');
    this.keys.push({ pubkey, isSigner, isWritable: true });
    return this;
  }

  /**
   * Append a read-only fixed-prefix account
   */
  readonly(pubkey: PublicKey, isSigner: boolean = false): this {
    this.enter('fixed');
    this.keys.push({ pubkey, isSigner, isWritable: false });
    return this;
  }

  /**
   * Append every positions book page of an instance (writable, stored order)
   */
  pages(instance: InstanceContext): this {
    this.enter('pages');
    for (const page of instance.memoryPages) {
      this.keys.push({ pubkey: page, isSigner: false, isWritable: true });
    }
    return this;
  }

  /**
   * Append the discount account and its owner when a discount is supplied
   */
  discount(discountAccount?: DiscountAccount): this {
    this.enter('discount');
    if (!discountAccount) {
      return this;
    }

    const { address, owner } = discountAccount;
    if (!address || !owner) {
      throw new MissingOptionalAccountError(
        'Discount account requires both an address and an owner'
      );
    }

    this.keys.push({ pubkey: address, isSigner: false, isWritable: false });
    this.keys.push({ pubkey: owner, isSigner: true, isWritable: false });
    return this;
  }

  /**
   * Append the referrer token account when one is supplied
   */
  referrer(referrerAccount?: PublicKey): this {
    this.enter('referrer');
    if (referrerAccount) {
      this.keys.push({ pubkey: referrerAccount, isSigner: false, isWritable: true });
    }
    return this;
  }

  /**
   * Append the optional fee segments (discount pair, then referrer)
   */
  feeAccounts(fees: { discountAccount?: DiscountAccount; referrerAccount?: PublicKey }): this {
    return this.discount(fees.discountAccount).referrer(fees.referrerAccount);
  }

  /**
   * @returns A copy of the accounts appended so far
   */
  build(): AccountMeta[] {
    return this.keys.map((key) => ({ ...key }));
  }

  private enter(segment: AccountSegment): void {
    const current = SEGMENT_ORDER[this.segment];
    const next = SEGMENT_ORDER[segment];
    const repeated = next === current && segment !== 'fixed';

    if (next < current || repeated) {
      const message = `Cannot append ${segment} accounts after ${this.segment} accounts`;
      if (segment === 'discount' || segment === 'referrer') {
        throw new MissingOptionalAccountError(message);
      }
      throw new PerpSdkError(message);
    }
    this.segment = segment;
  }
}
