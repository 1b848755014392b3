declare module 'gif-encoder-2' {
  interface ByteArray {
    getData(): Buffer;
  }

  class GIFEncoder {
    constructor(
      width: number,
      height: number,
      algorithm?: 'neuquant' | 'octree',
      useOptimizer?: boolean,
      totalFrames?: number,
    );

    readonly out: ByteArray;

    start(): void;
    setDelay(milliseconds: number): void;
    setRepeat(repeat: number): void;
    setQuality(quality: number): void;
    addFrame(pixels: Uint8ClampedArray | Uint8Array): void;
    finish(): void;
  }

  export = GIFEncoder;
}
