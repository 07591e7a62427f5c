import { CandidateKind } from "../types/pageCandidate";

const DATA_URL_PATTERN = /^data:([^;,]*)(;[^,]*)?,(.*)$/s;

export interface DecodedDataUrl {
  mediaType: string;
  body: Buffer;
}

export function decodeImageDataUrl(dataUrl: string): DecodedDataUrl {
  const match = DATA_URL_PATTERN.exec(dataUrl);
  if (!match) {
    throw new Error("Invalid data URL format");
  }
  const [, mediaType, params, data] = match;
  if (!/^image\//i.test(mediaType)) {
    throw new Error(`Not an image data URL: ${dataUrl.slice(0, 32)}`);
  }
  if (!params || !/;base64$/i.test(params)) {
    throw new Error(`Unsupported data URL encoding for ${mediaType}`);
  }
  const body = Buffer.from(data, "base64");
  if (!body.length) {
    throw new Error(`Empty image data for ${mediaType}`);
  }
  return { mediaType: mediaType.toLowerCase(), body };
}

export function extensionForMediaType(mediaType: string | null | undefined): string | null {
  if (!mediaType) return null;
  const base = mediaType.split(";")[0].trim().toLowerCase();
  if (base === "image/png") return ".png";
  if (base === "image/jpeg" || base === "image/jpg") return ".jpg";
  return null;
}

export function defaultExtensionFor(kind: CandidateKind): string {
  return kind === "image" ? ".jpg" : ".png";
}
