import { LedgerError, LedgerErrorCode } from '../model/Errors';
import { MinterConfig } from '../model/LedgerConfig';
import logger from '../utils/Logger';
import { assertAmount, toAddress } from '../utils/TokenUtils';
import { Authorizer, CoreRoles, requireRole } from './Authorization';
import { Clock } from './Clock';
import { GovernanceToken } from './GovernanceToken';
import { LedgerStore, StagedCell } from './LedgerStore';

export interface RateLimitedMinterOptions extends MinterConfig {
  /** identity the minter uses towards the token, needs the TOKEN_MINTER role */
  address: string;
}

/**
 * Mints through a buffer that refills at `rateLimitPerSecond` up to `bufferCap`.
 */
export class RateLimitedMinter {
  readonly address: string;
  readonly maxRateLimitPerSecond: bigint;
  private readonly store: LedgerStore;
  private readonly clock: Clock;
  private readonly token: GovernanceToken;
  private readonly authorizer: Authorizer;
  private readonly rateLimit: StagedCell<bigint>;
  private readonly cap: StagedCell<bigint>;
  private readonly stored: StagedCell<bigint>;
  private readonly lastUsed: StagedCell<number>;

  constructor(
    store: LedgerStore,
    clock: Clock,
    token: GovernanceToken,
    authorizer: Authorizer,
    options: RateLimitedMinterOptions
  ) {
    if (options.rateLimitPerSecond > options.maxRateLimitPerSecond) {
      throw new LedgerError(
        LedgerErrorCode.RateLimitTooHigh,
        `RateLimitedMinter: rateLimitPerSecond ${options.rateLimitPerSecond} above ${options.maxRateLimitPerSecond}`
      );
    }
    assertAmount(options.bufferCap, 'RateLimitedMinter.bufferCap');
    assertAmount(options.rateLimitPerSecond, 'RateLimitedMinter.rateLimitPerSecond');
    this.address = toAddress(options.address);
    this.maxRateLimitPerSecond = options.maxRateLimitPerSecond;
    this.store = store;
    this.clock = clock;
    this.token = token;
    this.authorizer = authorizer;
    this.rateLimit = store.cell('rateLimitPerSecond', options.rateLimitPerSecond);
    this.cap = store.cell('bufferCap', options.bufferCap);
    this.stored = store.cell('bufferStored', options.bufferCap);
    this.lastUsed = store.cell('lastBufferUsedTime', clock.now());
  }

  /** amount that can be minted right now */
  buffer(): bigint {
    const elapsed = BigInt(this.clock.now() - this.lastUsed.get());
    const accrued = this.stored.get() + this.rateLimit.get() * elapsed;
    return accrued < this.cap.get() ? accrued : this.cap.get();
  }

  bufferCap(): bigint {
    return this.cap.get();
  }

  bufferStored(): bigint {
    return this.stored.get();
  }

  rateLimitPerSecond(): bigint {
    return this.rateLimit.get();
  }

  lastBufferUsedTime(): number {
    return this.lastUsed.get();
  }

  mint(caller: string, to: string, amount: bigint) {
    this.store.transact(() => {
      requireRole(this.authorizer, CoreRoles.RATE_LIMITED_MINTER, caller, 'RateLimitedMinter');
      this.depleteBuffer(amount);
      this.token.mint(this.address, to, amount);
    });
  }

  replenishBuffer(caller: string, amount: bigint) {
    this.store.transact(() => {
      requireRole(this.authorizer, CoreRoles.RATE_LIMITED_MINTER, caller, 'RateLimitedMinter');
      assertAmount(amount, 'RateLimitedMinter.replenishBuffer');
      const newBuffer = this.buffer();
      const room = this.cap.get() - newBuffer;
      const replenishable = room < amount ? room : amount;
      if (replenishable == 0n) {
        return;
      }
      this.lastUsed.set(this.clock.now());
      this.stored.set(newBuffer + replenishable);
      this.store.emit({
        name: 'BufferReplenished',
        amountReplenished: replenishable,
        bufferRemaining: newBuffer + replenishable
      });
    });
  }

  setRateLimitPerSecond(caller: string, newRateLimitPerSecond: bigint) {
    this.store.transact(() => {
      requireRole(this.authorizer, CoreRoles.GAUGE_PARAMETERS, caller, 'RateLimitedMinter');
      assertAmount(newRateLimitPerSecond, 'RateLimitedMinter.setRateLimitPerSecond');
      if (newRateLimitPerSecond > this.maxRateLimitPerSecond) {
        throw new LedgerError(
          LedgerErrorCode.RateLimitTooHigh,
          `RateLimitedMinter: rateLimitPerSecond ${newRateLimitPerSecond} above ${this.maxRateLimitPerSecond}`
        );
      }
      // accrue at the old rate up to now
      this.updateBufferStored();
      const oldRateLimitPerSecond = this.rateLimit.get();
      this.rateLimit.set(newRateLimitPerSecond);
      this.store.emit({ name: 'RateLimitPerSecondUpdate', oldRateLimitPerSecond, newRateLimitPerSecond });
    });
  }

  setBufferCap(caller: string, newBufferCap: bigint) {
    this.store.transact(() => {
      requireRole(this.authorizer, CoreRoles.GAUGE_PARAMETERS, caller, 'RateLimitedMinter');
      assertAmount(newBufferCap, 'RateLimitedMinter.setBufferCap');
      this.updateBufferStored();
      const oldBufferCap = this.cap.get();
      this.cap.set(newBufferCap);
      if (this.stored.get() > newBufferCap) {
        this.stored.set(newBufferCap);
      }
      this.store.emit({ name: 'BufferCapUpdate', oldBufferCap, newBufferCap });
    });
  }

  private depleteBuffer(amount: bigint) {
    assertAmount(amount, 'RateLimitedMinter.mint');
    const newBuffer = this.buffer();
    if (amount > newBuffer) {
      throw new LedgerError(
        LedgerErrorCode.RateLimitHit,
        `RateLimitedMinter: rate limit hit, ${amount} requested with ${newBuffer} available`
      );
    }
    this.lastUsed.set(this.clock.now());
    this.stored.set(newBuffer - amount);
    this.store.emit({ name: 'BufferUsed', amountUsed: amount, bufferRemaining: newBuffer - amount });
    logger.debug(`RateLimitedMinter: used ${amount} of buffer, ${newBuffer - amount} remaining`);
  }

  private updateBufferStored() {
    this.stored.set(this.buffer());
    this.lastUsed.set(this.clock.now());
  }
}
