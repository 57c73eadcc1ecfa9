/**
 * Value object representing supported animation sources.
 */
export type AnimationSource =
  | { type: 'gif'; path: string }
  | { type: 'png'; path: string }
  | { type: 'frameSequence'; frames: RgbaBitmap[]; delayMs?: number };

/** Row-major RGBA samples, four bytes per pixel. */
export interface RgbaBitmap {
  readonly width: number;
  readonly height: number;
  readonly data: Uint8ClampedArray;
}

export interface AnimationSourceMetadata {
  readonly width: number;
  readonly height: number;
  readonly frameCount: number;
  /** Inter-frame delay declared by the source, if any. */
  readonly declaredDelayMs: number | undefined;
  /** SHA-1 of the source content. */
  readonly fingerprint: string;
}

export interface DecodedAnimation {
  readonly metadata: AnimationSourceMetadata;
  readonly frames: Iterable<RgbaBitmap>;
}

export function describeSource(source: AnimationSource): string {
  switch (source.type) {
    case 'gif':
    case 'png':
      return source.path;
    case 'frameSequence':
      return `in-memory sequence of ${source.frames.length} frame(s)`;
    default: {
      const exhaustive: never = source;
      return String(exhaustive);
    }
  }
}
