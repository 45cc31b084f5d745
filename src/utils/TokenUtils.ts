import { ethers } from 'ethers';
import { ArithmeticFault, LedgerError, LedgerErrorCode } from '../model/Errors';

/**
 * Checksum an address, throw InvalidAddress if it is not one
 */
export function toAddress(value: string): string {
  if (!ethers.isAddress(value)) {
    throw new LedgerError(LedgerErrorCode.InvalidAddress, `Invalid address: ${value}`);
  }
  return ethers.getAddress(value);
}

export function isNullAddress(address: string) {
  return address == ethers.ZeroAddress;
}

export function assertAmount(amount: bigint, label: string) {
  if (amount < 0n) {
    throw new ArithmeticFault(`${label}: negative amount ${amount}`);
  }
}
