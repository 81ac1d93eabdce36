/**
 * Bilinear resampling of RGBA pixel buffers.
 */

/**
 * Resamples `source` (sourceWidth x sourceHeight, RGBA) to targetWidth x targetHeight.
 * Sample positions use pixel centres, so a same-size resample copies the input.
 */
export function resampleRgba(
  source: Uint8Array,
  sourceWidth: number,
  sourceHeight: number,
  targetWidth: number,
  targetHeight: number
): Uint8Array {
  if (sourceWidth === targetWidth && sourceHeight === targetHeight) {
    return new Uint8Array(source);
  }

  const target = new Uint8Array(targetWidth * targetHeight * 4);
  const ratioX = sourceWidth / targetWidth;
  const ratioY = sourceHeight / targetHeight;

  for (let ty = 0; ty < targetHeight; ty++) {
    const sy = clamp((ty + 0.5) * ratioY - 0.5, 0, sourceHeight - 1);
    const y0 = Math.floor(sy);
    const y1 = Math.min(y0 + 1, sourceHeight - 1);
    const fy = sy - y0;

    for (let tx = 0; tx < targetWidth; tx++) {
      const sx = clamp((tx + 0.5) * ratioX - 0.5, 0, sourceWidth - 1);
      const x0 = Math.floor(sx);
      const x1 = Math.min(x0 + 1, sourceWidth - 1);
      const fx = sx - x0;

      const i00 = (y0 * sourceWidth + x0) * 4;
      const i10 = (y0 * sourceWidth + x1) * 4;
      const i01 = (y1 * sourceWidth + x0) * 4;
      const i11 = (y1 * sourceWidth + x1) * 4;
      const out = (ty * targetWidth + tx) * 4;

      for (let channel = 0; channel < 4; channel++) {
        const top = source[i00 + channel] * (1 - fx) + source[i10 + channel] * fx;
        const bottom = source[i01 + channel] * (1 - fx) + source[i11 + channel] * fx;
        target[out + channel] = Math.round(top * (1 - fy) + bottom * fy);
      }
    }
  }

  return target;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}
