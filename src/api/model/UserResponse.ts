export interface UserResponse {
  address: string;
  balance: string;
  weight: string;
  freeWeight: string;
  gauges: UserGaugeResponse[];
  votes: string;
  delegatedVotes: string;
  delegates: UserDelegationResponse[];
}

export interface UserGaugeResponse {
  gauge: string;
  weight: string;
  pendingLoss: boolean;
  lastLossApplied: number;
}

export interface UserDelegationResponse {
  delegatee: string;
  votes: string;
}
