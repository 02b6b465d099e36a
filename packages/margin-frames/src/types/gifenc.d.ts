declare module 'gifenc' {
    export type Palette = number[][];

    export interface WriteFrameOptions {
        palette?: Palette;
        /** Milliseconds */
        delay?: number;
        /** -1 plays once, 0 loops forever */
        repeat?: number;
        transparent?: boolean;
        transparentIndex?: number;
        first?: boolean;
        colorDepth?: number;
        dispose?: number;
    }

    export interface Encoder {
        writeFrame(index: Uint8Array, width: number, height: number, options?: WriteFrameOptions): void;
        finish(): void;
        bytes(): Uint8Array;
        bytesView(): Uint8Array;
        reset(): void;
    }

    export interface EncoderOptions {
        auto?: boolean;
        initialCapacity?: number;
    }

    export type PixelFormat = 'rgb565' | 'rgb444' | 'rgba4444';

    export interface QuantizeOptions {
        format?: PixelFormat;
        oneBitAlpha?: boolean | number;
        clearAlpha?: boolean;
        clearAlphaThreshold?: number;
        clearAlphaColor?: number;
    }

    export function GIFEncoder(options?: EncoderOptions): Encoder;

    export function quantize(
        rgba: Uint8Array | Uint8ClampedArray,
        maxColors: number,
        options?: QuantizeOptions
    ): Palette;

    export function applyPalette(
        rgba: Uint8Array | Uint8ClampedArray,
        palette: Palette,
        format?: PixelFormat
    ): Uint8Array;
}
