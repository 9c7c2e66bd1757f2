import { ethers } from 'ethers';
import { invalidInput } from './errors.js';
import type { Principal } from './types.js';

/**
 * Normalise an account address to its EIP-55 checksum form.
 * Throws InvalidInput when the value is not an address.
 */
export function toPrincipal(value: string, field = 'principal'): Principal {
  if (typeof value !== 'string' || !ethers.isAddress(value)) {
    throw invalidInput(`${field} is not a valid address: ${String(value)}`);
  }
  return ethers.getAddress(value);
}

export function samePrincipal(a: Principal, b: Principal): boolean {
  return a.toLowerCase() === b.toLowerCase();
}
