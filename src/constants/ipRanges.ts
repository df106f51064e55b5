/**
 * IPv4 address ranges and the literal pattern used by the extractor
 */

/**
 * Private IP address ranges (RFC 1918)
 */
export const PRIVATE_NETWORKS = [
  // 10.0.0.0 to 10.255.255.255
  "10.0.0.0/8",
  // 172.16.0.0 to 172.31.255.255
  "172.16.0.0/12",
  // 192.168.0.0 to 192.168.255.255
  "192.168.0.0/16",
] as const;

/**
 * Addresses dropped from both result sets.
 * Loopback (127.0.0.0/8) and link-local (169.254.0.0/16) are deliberately absent.
 */
export const EXCLUDED_NETWORKS = {
  UNSPECIFIED: "0.0.0.0/32",
  MULTICAST: "224.0.0.0/4",
  // 240.0.0.0/4, includes the limited broadcast address
  RESERVED: "240.0.0.0/4",
} as const;

/**
 * Four dotted octets, each restricted to 0-255 by the grammar itself.
 * Kept as a source string so a fresh RegExp (with its own lastIndex) is built per scan.
 */
export const IPV4_LITERAL_SOURCE =
  "\\b(?:(?:25[0-5]|2[0-4][0-9]|[01]?[0-9][0-9]?)\\.){3}" +
  "(?:25[0-5]|2[0-4][0-9]|[01]?[0-9][0-9]?)\\b";

export interface ClassificationRules {
  readonly privateNetworks: readonly string[];
  readonly excludedNetworks: readonly string[];
}

export const DEFAULT_CLASSIFICATION_RULES: ClassificationRules = Object.freeze({
  privateNetworks: Object.freeze([...PRIVATE_NETWORKS]),
  excludedNetworks: Object.freeze(Object.values(EXCLUDED_NETWORKS)),
});

export const DEFAULT_CHUNK_SIZE = 1024 * 1024;
