import { IPV4_LITERAL_SOURCE } from "../constants/ipRanges";
import type { AddressClassifier, ChunkResult } from "../types";

/**
 * Find every distinct IPv4 literal in a chunk of raw log bytes.
 *
 * Bytes are decoded as latin1, one character per byte, so decoding never fails.
 * Non-ASCII bytes turn into non-word characters and can only act as boundaries.
 * A literal cut in two by the chunk edge is not reassembled.
 */
export function scanChunk(chunk: Uint8Array): Set<string> {
  const text = Buffer.from(chunk.buffer, chunk.byteOffset, chunk.byteLength).toString("latin1");
  const pattern = new RegExp(IPV4_LITERAL_SOURCE, "g");
  return new Set(text.match(pattern) ?? []);
}

/**
 * Scan a chunk and split its candidates into private and public addresses.
 * Invalid candidates (unspecified, multicast, reserved) are dropped.
 */
export function processChunk(chunk: Uint8Array, classify: AddressClassifier): ChunkResult {
  const privateIps: string[] = [];
  const publicIps: string[] = [];

  for (const candidate of scanChunk(chunk)) {
    const kind = classify(candidate);
    if (kind === "private") {
      privateIps.push(candidate);
    } else if (kind === "public") {
      publicIps.push(candidate);
    }
  }

  return { privateIps, publicIps };
}
