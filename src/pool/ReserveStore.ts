/**
 * ReserveStore: the pool's world state
 *
 * Reserves are keyed by asset; positions are keyed by account, then asset, one
 * map per side. There are no pool-wide running totals: the only state shared
 * between unrelated accounts is the per-asset Reserve.
 *
 * Getters hand out copies. Writes go through Transaction.commit().
 */

import type {
  AccountId,
  AssetId,
  DepositPosition,
  PositionSide,
  Reserve,
  UserPosition
} from '../types/index.js';
import { cloneReserve } from './AccrualEngine.js';

export interface StoreSnapshot {
  reserves: Record<AssetId, Reserve>;
  deposits: Record<AccountId, Record<AssetId, DepositPosition>>;
  borrows: Record<AccountId, Record<AssetId, UserPosition>>;
  admin: AccountId;
}

export class ReserveStore {
  private readonly reserves = new Map<AssetId, Reserve>();
  private readonly deposits = new Map<AccountId, Map<AssetId, DepositPosition>>();
  private readonly borrows = new Map<AccountId, Map<AssetId, UserPosition>>();

  constructor(private admin: AccountId) {}

  getAdmin(): AccountId {
    return this.admin;
  }

  setAdmin(admin: AccountId): void {
    this.admin = admin;
  }

  hasReserve(asset: AssetId): boolean {
    return this.reserves.has(asset);
  }

  getReserve(asset: AssetId): Reserve | undefined {
    const reserve = this.reserves.get(asset);
    return reserve ? cloneReserve(reserve) : undefined;
  }

  putReserve(reserve: Reserve): void {
    this.reserves.set(reserve.asset, cloneReserve(reserve));
  }

  listAssets(): AssetId[] {
    return [...this.reserves.keys()];
  }

  getDeposit(user: AccountId, asset: AssetId): DepositPosition | undefined {
    const position = this.deposits.get(user)?.get(asset);
    return position ? { ...position } : undefined;
  }

  getBorrow(user: AccountId, asset: AssetId): UserPosition | undefined {
    const position = this.borrows.get(user)?.get(asset);
    return position ? { ...position } : undefined;
  }

  /** `null` removes the position */
  putDeposit(user: AccountId, asset: AssetId, position: DepositPosition | null): void {
    putPosition(this.deposits, user, asset, position);
  }

  /** `null` removes the position */
  putBorrow(user: AccountId, asset: AssetId, position: UserPosition | null): void {
    putPosition(this.borrows, user, asset, position);
  }

  userAssets(user: AccountId, side: PositionSide): AssetId[] {
    const book = side === 'deposit' ? this.deposits : this.borrows;
    return [...(book.get(user)?.keys() ?? [])];
  }

  /**
   * Deep copy of the whole state, for inspection and tests
   */
  snapshot(): StoreSnapshot {
    const reserves: Record<AssetId, Reserve> = {};
    for (const [asset, reserve] of this.reserves) {
      reserves[asset] = cloneReserve(reserve);
    }
    return {
      reserves,
      deposits: copyBook(this.deposits),
      borrows: copyBook(this.borrows),
      admin: this.admin
    };
  }
}

function putPosition<P extends UserPosition>(
  book: Map<AccountId, Map<AssetId, P>>,
  user: AccountId,
  asset: AssetId,
  position: P | null
): void {
  let positions = book.get(user);

  if (position === null) {
    positions?.delete(asset);
    if (positions && positions.size === 0) {
      book.delete(user);
    }
    return;
  }

  if (!positions) {
    positions = new Map();
    book.set(user, positions);
  }
  positions.set(asset, { ...position });
}

function copyBook<P extends UserPosition>(
  book: Map<AccountId, Map<AssetId, P>>
): Record<AccountId, Record<AssetId, P>> {
  const out: Record<AccountId, Record<AssetId, P>> = {};
  for (const [user, positions] of book) {
    const entry: Record<AssetId, P> = {};
    for (const [asset, position] of positions) {
      entry[asset] = { ...position };
    }
    out[user] = entry;
  }
  return out;
}
