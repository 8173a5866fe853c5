// packages/core/src/carrier/Carrier.ts

export interface Dimensions {
  width  : number;
  height : number;
}

/**
 * Ordered, indexable view over an image's color bytes (R, G, B per pixel,
 * pixel-major). Channels that carry no color (alpha) are not part of it.
 */
export interface ColorBytes {
  readonly length: number;
  get(index: number): number;
  set(index: number, value: number): void;
}

/** Read side of a carrier; all that decoding needs. */
export interface CarrierView {
  colorBytes(): ColorBytes;
  dimensions(): Dimensions;
}

/** A carrier that can produce an independent copy of itself to write into. */
export interface Carrier<Self extends CarrierView = CarrierView> extends CarrierView {
  clone(): Self;
}
