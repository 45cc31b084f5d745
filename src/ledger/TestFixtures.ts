import { LedgerConfig } from '../model/LedgerConfig';
import { CoreRoles, RoleRegistry } from './Authorization';
import { ManualClock } from './Clock';
import { DebtCeilingOracle, ExemptionPolicy } from './Collaborators';
import { GaugeSystem, createGaugeSystem } from './GaugeSystem';

// digit only addresses are their own checksum form
export const GOVERNOR = '0x1000000000000000000000000000000000000001';
export const MINTER = '0x1000000000000000000000000000000000000002';
export const ALICE = '0x2000000000000000000000000000000000000001';
export const BOB = '0x2000000000000000000000000000000000000002';
export const CAROL = '0x2000000000000000000000000000000000000003';
export const DAVE = '0x2000000000000000000000000000000000000004';
export const GAUGE_1 = '0x3000000000000000000000000000000000000001';
export const GAUGE_2 = '0x3000000000000000000000000000000000000002';
export const GAUGE_3 = '0x3000000000000000000000000000000000000003';
export const GAUGE_4 = '0x3000000000000000000000000000000000000004';

// 800s into a one hour cycle ending at 1_700_002_800, outside the 600s freeze window
export const START = 1_700_000_000;
export const FIRST_CYCLE_END = 1_700_002_800;

export const TEST_LEDGER_CONFIG: LedgerConfig = {
  cycleLength: 3600,
  freezeWindow: 600,
  maxGauges: 3,
  maxLiveGauges: 10,
  maxDelegates: 2,
  transferable: true,
  minter: {
    maxRateLimitPerSecond: 1000n,
    rateLimitPerSecond: 10n,
    bufferCap: 1000n
  }
};

export interface TestSystem {
  system: GaugeSystem;
  clock: ManualClock;
  roles: RoleRegistry;
}

export interface TestDependencies {
  debtCeiling?: DebtCeilingOracle;
  exemptionPolicy?: ExemptionPolicy;
}

/** GOVERNOR holds every role, MINTER can mint on the token */
export function createTestSystem(config: Partial<LedgerConfig> = {}, deps: TestDependencies = {}): TestSystem {
  const clock = new ManualClock(START);
  const roles = new RoleRegistry();
  for (const role of Object.values(CoreRoles)) {
    roles.grantRole(role, GOVERNOR);
  }
  roles.grantRole(CoreRoles.TOKEN_MINTER, MINTER);
  const system = createGaugeSystem(
    { ...TEST_LEDGER_CONFIG, ...config },
    { authorizer: roles, minterAddress: MINTER, clock, ...deps }
  );
  return { system, clock, roles };
}

export function fund(system: GaugeSystem, user: string, amount: bigint) {
  system.token.mint(GOVERNOR, user, amount);
}

export function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (e) {
    return e;
  }
  throw new Error('expected an error');
}
