import {
  DEFAULT_CLASSIFICATION_RULES,
  type ClassificationRules,
} from "../constants/ipRanges";
import type { AddressClass, AddressClassifier } from "../types";

export interface ParsedCidr {
  cidr: string;
  network: number;
  prefix: number;
  blockSize: number;
}

const OCTET_PATTERN = /^\d{1,3}$/;
const IPV4_SPACE = 2 ** 32;

/**
 * Parse a dotted-quad IPv4 address into its 32-bit value.
 * Leading zeros are accepted ("010" is 10); anything else malformed gives null.
 */
export function parseIPv4(candidate: string): number | null {
  const parts = candidate.split(".");
  if (parts.length !== 4) {
    return null;
  }

  let value = 0;
  for (const part of parts) {
    if (!OCTET_PATTERN.test(part)) {
      return null;
    }
    const octet = Number(part);
    if (octet > 255) {
      return null;
    }
    value = value * 256 + octet;
  }
  return value;
}

export function parseCidr(cidr: string): ParsedCidr | null {
  const [address, prefixText, ...rest] = cidr.split("/");
  if (prefixText === undefined || rest.length > 0 || !/^\d{1,2}$/.test(prefixText)) {
    return null;
  }

  const prefix = Number(prefixText);
  const network = parseIPv4(address);
  if (network === null || prefix > 32) {
    return null;
  }

  const blockSize = 2 ** (32 - prefix);
  // Host bits must be zero
  if (network % blockSize !== 0) {
    return null;
  }

  return { cidr, network, prefix, blockSize };
}

export function isInNetwork(address: number, network: ParsedCidr): boolean {
  if (address < 0 || address >= IPV4_SPACE) {
    return false;
  }
  return Math.floor(address / network.blockSize) === network.network / network.blockSize;
}

function parseNetworks(cidrs: readonly string[]): ParsedCidr[] {
  return cidrs.map((cidr) => {
    const parsed = parseCidr(cidr);
    if (!parsed) {
      throw new Error(`Invalid CIDR in classification rules: ${cidr}`);
    }
    return parsed;
  });
}

/**
 * Build a classifier over a fixed set of rules.
 *
 * Excluded networks win over private ones; anything valid that is neither
 * excluded nor private is public, loopback and link-local included.
 */
export function createAddressClassifier(
  rules: ClassificationRules = DEFAULT_CLASSIFICATION_RULES
): AddressClassifier {
  const privateNetworks = parseNetworks(rules.privateNetworks);
  const excludedNetworks = parseNetworks(rules.excludedNetworks);

  return (candidate: string): AddressClass => {
    const address = parseIPv4(candidate);
    if (address === null) {
      return "invalid";
    }
    if (excludedNetworks.some((network) => isInNetwork(address, network))) {
      return "invalid";
    }
    return privateNetworks.some((network) => isInNetwork(address, network))
      ? "private"
      : "public";
  };
}
