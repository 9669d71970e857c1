import { promises as dns } from 'dns';
import { ResolutionError, getErrorCode, getErrorMessage } from '../utils/errors.js';

export type HostLookup = (host: string) => Promise<string>;

// IPv4 only: the scanner connects over plain IPv4 TCP
export const lookupIPv4: HostLookup = async (host) => {
  const { address } = await dns.lookup(host, { family: 4 });
  return address;
};

/**
 * Resolves a hostname or IP literal to an IPv4 address.
 * Throws ResolutionError when the name cannot be resolved.
 */
export async function resolveHost(host: string, lookup: HostLookup = lookupIPv4): Promise<string> {
  const target = host.trim();
  if (target.length === 0) {
    throw new ResolutionError(host, 'empty host');
  }

  try {
    return await lookup(target);
  } catch (error) {
    throw new ResolutionError(target, getErrorCode(error) ?? getErrorMessage(error));
  }
}
