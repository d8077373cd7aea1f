// =============================================================================
// Media — Opaque image / audio values referenced by decoded data
// =============================================================================

import { z } from "zod";

import { ValidationError } from "../errors.js";

export type MediaKind = "image" | "audio";

export type MediaSource =
  | { readonly type: "url"; readonly url: string; readonly mediaType?: string }
  | { readonly type: "base64"; readonly data: string; readonly mediaType: string };

export const MediaJsonSchema = z.object({
  kind: z.enum(["image", "audio"]),
  source: z.discriminatedUnion("type", [
    z.object({ type: z.literal("url"), url: z.string().min(1), mediaType: z.string().optional() }),
    z.object({ type: z.literal("base64"), data: z.string(), mediaType: z.string().min(1) }),
  ]),
});

export type MediaJson = z.infer<typeof MediaJsonSchema>;

const DATA_URI = /^data:([^;,]+);base64,(.*)$/s;

/**
 * Immutable media reference. Two values built from equal constructor
 * arguments are {@link MediaValue.equals | equal}, and `toJSON` /
 * `fromJSON` round-trip.
 */
export class MediaValue {
  private constructor(
    readonly kind: MediaKind,
    readonly source: MediaSource,
  ) {
    Object.freeze(this);
  }

  static fromUrl(kind: MediaKind, url: string, mediaType?: string): MediaValue {
    const match = DATA_URI.exec(url);
    if (match) {
      return MediaValue.fromBase64(kind, match[2], match[1]);
    }
    const source: MediaSource = mediaType === undefined ? { type: "url", url } : { type: "url", url, mediaType };
    return new MediaValue(kind, Object.freeze(source));
  }

  static fromBase64(kind: MediaKind, data: string, mediaType: string): MediaValue {
    const source: MediaSource = { type: "base64", data, mediaType };
    return new MediaValue(kind, Object.freeze(source));
  }

  static fromJSON(json: unknown): MediaValue {
    const result = MediaJsonSchema.safeParse(json);
    if (!result.success) {
      throw new ValidationError(result.error.issues[0]?.message ?? "Invalid media value", "media");
    }
    const { kind, source } = result.data;
    return source.type === "url"
      ? MediaValue.fromUrl(kind, source.url, source.mediaType)
      : MediaValue.fromBase64(kind, source.data, source.mediaType);
  }

  equals(other: MediaValue): boolean {
    if (this.kind !== other.kind || this.source.type !== other.source.type) return false;
    if (this.source.type === "url" && other.source.type === "url") {
      return this.source.url === other.source.url && this.source.mediaType === other.source.mediaType;
    }
    if (this.source.type === "base64" && other.source.type === "base64") {
      return this.source.data === other.source.data && this.source.mediaType === other.source.mediaType;
    }
    return false;
  }

  toJSON(): MediaJson {
    const source = this.source.type === "url"
      ? this.source.mediaType === undefined
        ? { type: "url" as const, url: this.source.url }
        : { type: "url" as const, url: this.source.url, mediaType: this.source.mediaType }
      : { type: "base64" as const, data: this.source.data, mediaType: this.source.mediaType };
    return { kind: this.kind, source };
  }

  toString(): string {
    return this.source.type === "url"
      ? `${this.kind}(${this.source.url})`
      : `${this.kind}(${this.source.mediaType}, ${this.source.data.length} base64 chars)`;
  }
}
