/**
 * Shared types for the extraction pipeline, the result store and the scheduler
 */

export type AddressClass = "private" | "public" | "invalid";

export type AddressClassifier = (candidate: string) => AddressClass;

/** Storage side of a classification; invalid addresses are never stored. */
export type AddressKind = Exclude<AddressClass, "invalid">;

export interface ChunkResult {
  privateIps: string[];
  publicIps: string[];
}

export interface ExtractionResult {
  privateIps: string[];
  publicIps: string[];
}

export interface IpDocument {
  ip: string;
}

export type RunStatus = "succeeded" | "failed";

export interface RunSummary {
  status: RunStatus;
  filePath: string;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  privateCount: number;
  publicCount: number;
  error?: string;
}
