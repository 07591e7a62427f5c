export type CandidateKind = "raster" | "image";

export type CandidatePayload =
  | { type: "inline"; dataUrl: string }
  | { type: "reference"; url: string };

export interface PageCandidate {
  fingerprint: string;
  payload: CandidatePayload;
  width: number;
  height: number;
  kind: CandidateKind;
}

/**
 * One `<canvas>` or `<img>` as reported by the in-page inspection script,
 * before any classification.
 */
export interface RawSurfaceElement {
  tag: "canvas" | "img";
  width: number;
  height: number;
  dataUrl?: string | null;
  src?: string | null;
  extractionError?: string | null;
}

export interface SavedArtifact {
  index: number;
  path: string;
  kind: CandidateKind;
  width: number;
  height: number;
  sha256: string;
  bytes: number;
}
