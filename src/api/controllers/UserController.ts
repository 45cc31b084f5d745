import { GaugeSystem } from '../../ledger/GaugeSystem';
import { toAddress } from '../../utils/TokenUtils';
import { UserResponse } from '../model/UserResponse';

class UserController {
  private readonly system: GaugeSystem;

  constructor(system: GaugeSystem) {
    this.system = system;
  }

  GetUser(user: string): UserResponse {
    const address = toAddress(user);
    const { token, weights, losses, delegation } = this.system;
    return {
      address,
      balance: token.balanceOf(address).toString(),
      weight: weights.getUserWeight(address).toString(),
      freeWeight: weights.freeWeight(address).toString(),
      gauges: weights.userGauges(address).map((gauge) => ({
        gauge,
        weight: weights.getUserGaugeWeight(address, gauge).toString(),
        pendingLoss: losses.hasPendingLoss(address, gauge),
        lastLossApplied: losses.lastGaugeLossApplied(gauge, address)
      })),
      votes: delegation.getVotes(address).toString(),
      delegatedVotes: delegation.userDelegatedVotes(address).toString(),
      delegates: delegation.delegates(address).map((delegatee) => ({
        delegatee,
        votes: delegation.delegatesVotesCount(address, delegatee).toString()
      }))
    };
  }
}

export default UserController;
