import { lookup } from 'node:dns/promises';

import { ResolutionError, errorMessage } from '../errors.js';

/**
 * Resolves a hostname to its addresses. Rejects with `ResolutionError` when
 * the name does not resolve.
 */
export type HostResolver = (hostname: string) => Promise<string[]>;

/**
 * Default `HostResolver`: the platform resolver via `dns.lookup`, IPv4 only.
 */
export async function lookupIPv4(hostname: string): Promise<string[]> {
  try {
    const records = await lookup(hostname, { all: true, family: 4 });
    return records.map((record) => record.address);
  } catch (error) {
    throw new ResolutionError(`${hostname}: ${errorMessage(error)}`, { cause: error });
  }
}
