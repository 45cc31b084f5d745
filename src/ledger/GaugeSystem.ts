import { LedgerConfig } from '../model/LedgerConfig';
import { Authorizer } from './Authorization';
import { Clock, SystemClock } from './Clock';
import { DebtCeilingOracle, ExemptionPolicy } from './Collaborators';
import { CycleClock } from './CycleClock';
import { DelegationLedger } from './DelegationLedger';
import { GaugeRegistry } from './GaugeRegistry';
import { GovernanceToken } from './GovernanceToken';
import { LedgerStore } from './LedgerStore';
import { LossTracker } from './LossTracker';
import { RateLimitedMinter } from './RateLimitedMinter';
import { WeightLedger } from './WeightLedger';

export interface GaugeSystemDependencies {
  authorizer: Authorizer;
  /** identity of the rate limited minter, give it TOKEN_MINTER to let it mint */
  minterAddress: string;
  clock?: Clock;
  debtCeiling?: DebtCeilingOracle;
  exemptionPolicy?: ExemptionPolicy;
}

export interface GaugeSystem {
  store: LedgerStore;
  clock: Clock;
  cycles: CycleClock;
  registry: GaugeRegistry;
  token: GovernanceToken;
  weights: WeightLedger;
  losses: LossTracker;
  delegation: DelegationLedger;
  minter: RateLimitedMinter;
}

export function createGaugeSystem(config: LedgerConfig, deps: GaugeSystemDependencies): GaugeSystem {
  const clock = deps.clock || new SystemClock();
  const store = new LedgerStore();
  const cycles = new CycleClock(config.cycleLength, config.freezeWindow);
  const registry = new GaugeRegistry(store, deps.authorizer, config.maxLiveGauges);
  const token = new GovernanceToken(store, deps.authorizer, config.transferable);
  const weights = new WeightLedger(store, clock, cycles, registry, token, deps.authorizer, {
    maxGauges: config.maxGauges,
    debtCeiling: deps.debtCeiling,
    exemptionPolicy: deps.exemptionPolicy
  });
  const losses = new LossTracker(store, clock, registry, weights, token, deps.authorizer);
  const delegation = new DelegationLedger(store, clock, token, deps.authorizer, losses, {
    maxDelegates: config.maxDelegates,
    exemptionPolicy: deps.exemptionPolicy
  });
  const minter = new RateLimitedMinter(store, clock, token, deps.authorizer, {
    ...config.minter,
    address: deps.minterAddress
  });

  // the loss gate has to reject a transfer before any weight or vote is freed
  token.registerHook(losses);
  token.registerHook(weights);
  token.registerHook(delegation);

  return { store, clock, cycles, registry, token, weights, losses, delegation, minter };
}
