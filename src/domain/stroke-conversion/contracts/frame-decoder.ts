import type { AnimationSource, DecodedAnimation } from '../value-objects/animation-source.js';

export interface FrameDecoder {
  decode(source: AnimationSource): Promise<DecodedAnimation>;
}
