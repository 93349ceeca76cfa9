/**
 * Transaction: all-or-nothing unit of work over the ReserveStore
 *
 * Reserves touched for writing are accrued on a private draft; positions are
 * staged the same way. Nothing reaches the store until commit(), so any throw
 * before that leaves the store exactly as it was.
 *
 * Every access is recorded in a read or write set (the footprint), which a host
 * running operations optimistically in parallel can use to detect conflicts.
 */

import type {
  AccountId,
  AssetId,
  DepositPosition,
  Footprint,
  PositionSide,
  Reserve,
  UserPosition
} from '../types/index.js';
import type { PriceGuard } from '../risk/PriceGuard.js';
import { LendingError } from './errors.js';
import { accrue, projectReserve } from './AccrualEngine.js';
import type { ReserveStore } from './ReserveStore.js';

/**
 * Read access the health factor calculation needs
 */
export interface AccountView {
  readonly now: number;
  reserve(asset: AssetId): Reserve;
  deposit(user: AccountId, asset: AssetId): DepositPosition | undefined;
  borrow(user: AccountId, asset: AssetId): UserPosition | undefined;
  userAssets(user: AccountId, side: PositionSide): AssetId[];
  price(asset: AssetId): bigint;
}

export const reserveKey = (asset: AssetId): string => `reserve:${asset}`;
export const positionKey = (side: PositionSide, user: AccountId, asset: AssetId): string =>
  `position:${side}:${user}:${asset}`;
export const accountKey = (side: PositionSide, user: AccountId): string =>
  `account:${side}:${user}`;

type Staged<P> = Map<string, { user: AccountId; asset: AssetId; position: P | null }>;

export class Transaction implements AccountView {
  private readonly reads = new Set<string>();
  private readonly writes = new Set<string>();

  private readonly reserveDrafts = new Map<AssetId, Reserve>();
  private readonly reserveViews = new Map<AssetId, Reserve>();
  private readonly depositDrafts: Staged<DepositPosition> = new Map();
  private readonly borrowDrafts: Staged<UserPosition> = new Map();
  private readonly prices = new Map<AssetId, bigint>();

  private committed = false;

  constructor(
    private readonly store: ReserveStore,
    private readonly priceGuard: PriceGuard,
    public readonly now: number
  ) {}

  /**
   * Accrued draft of a reserve this transaction will write
   * @throws LendingError UnsupportedAsset
   */
  reserveForWrite(asset: AssetId): Reserve {
    const draft = this.reserveDrafts.get(asset);
    if (draft) {
      return draft;
    }

    const stored = this.requireStoredReserve(asset);
    accrue(stored, this.now);
    this.reserveDrafts.set(asset, stored);
    this.reserveViews.delete(asset);
    this.writes.add(reserveKey(asset));
    return stored;
  }

  /**
   * Reserve as of `now` for reading. Writable drafts win over projections.
   */
  reserve(asset: AssetId): Reserve {
    const draft = this.reserveDrafts.get(asset);
    if (draft) {
      return draft;
    }

    let view = this.reserveViews.get(asset);
    if (!view) {
      view = projectReserve(this.requireStoredReserve(asset), this.now);
      this.reserveViews.set(asset, view);
    }
    return view;
  }

  deposit(user: AccountId, asset: AssetId): DepositPosition | undefined {
    const key = positionKey('deposit', user, asset);
    this.reads.add(key);
    const staged = this.depositDrafts.get(key);
    if (staged) {
      return staged.position ?? undefined;
    }
    return this.store.getDeposit(user, asset);
  }

  borrow(user: AccountId, asset: AssetId): UserPosition | undefined {
    const key = positionKey('borrow', user, asset);
    this.reads.add(key);
    const staged = this.borrowDrafts.get(key);
    if (staged) {
      return staged.position ?? undefined;
    }
    return this.store.getBorrow(user, asset);
  }

  /** Stage a deposit position; zero principal removes it */
  setDeposit(user: AccountId, asset: AssetId, position: DepositPosition): void {
    this.stage(this.depositDrafts, 'deposit', user, asset, position.principal === 0n ? null : position);
  }

  /** Stage a borrow position; zero principal removes it */
  setBorrow(user: AccountId, asset: AssetId, position: UserPosition): void {
    this.stage(this.borrowDrafts, 'borrow', user, asset, position.principal === 0n ? null : position);
  }

  userAssets(user: AccountId, side: PositionSide): AssetId[] {
    this.reads.add(accountKey(side, user));
    const assets = new Set(this.store.userAssets(user, side));
    const drafts = side === 'deposit' ? this.depositDrafts : this.borrowDrafts;

    for (const staged of drafts.values()) {
      if (staged.user !== user) continue;
      if (staged.position === null) {
        assets.delete(staged.asset);
      } else {
        assets.add(staged.asset);
      }
    }
    return [...assets];
  }

  /**
   * Guarded price, fetched at most once per transaction
   */
  price(asset: AssetId): bigint {
    let price = this.prices.get(asset);
    if (price === undefined) {
      price = this.priceGuard.getPrice(asset, this.now);
      this.prices.set(asset, price);
    }
    return price;
  }

  /** Accrued reserve drafts this transaction will write */
  touchedReserves(): Reserve[] {
    return [...this.reserveDrafts.values()];
  }

  footprint(): Footprint {
    return {
      reads: [...this.reads].filter((key) => !this.writes.has(key)).sort(),
      writes: [...this.writes].sort()
    };
  }

  commit(): void {
    if (this.committed) {
      throw new Error('Transaction already committed');
    }
    this.committed = true;

    for (const reserve of this.reserveDrafts.values()) {
      this.store.putReserve(reserve);
    }
    for (const { user, asset, position } of this.depositDrafts.values()) {
      this.store.putDeposit(user, asset, position);
    }
    for (const { user, asset, position } of this.borrowDrafts.values()) {
      this.store.putBorrow(user, asset, position);
    }
  }

  private requireStoredReserve(asset: AssetId): Reserve {
    this.reads.add(reserveKey(asset));
    const stored = this.store.getReserve(asset);
    if (!stored) {
      throw new LendingError('UnsupportedAsset', `Asset ${asset} is not listed`);
    }
    return stored;
  }

  private stage<P extends UserPosition>(
    drafts: Staged<P>,
    side: PositionSide,
    user: AccountId,
    asset: AssetId,
    position: P | null
  ): void {
    const key = positionKey(side, user, asset);
    const existed = this.store.userAssets(user, side).includes(asset);
    drafts.set(key, { user, asset, position: position ? { ...position } : null });
    this.writes.add(key);
    // creating or removing a position changes the account's asset list
    if (existed !== (position !== null)) {
      this.writes.add(accountKey(side, user));
    }
  }
}
