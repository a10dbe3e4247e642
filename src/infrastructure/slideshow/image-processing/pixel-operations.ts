const clampChannel = (value: number): number => Math.max(0, Math.min(255, Math.round(value)));

const luma = (r: number, g: number, b: number): number => 0.2989 * r + 0.587 * g + 0.114 * b;

/**
 * Moves every RGBA pixel toward (factor < 1) or away from (factor > 1) its luma.
 * Alpha is copied unchanged.
 */
export const applySaturation = (data: Uint8ClampedArray, factor: number): Uint8ClampedArray => {
  const result = new Uint8ClampedArray(data.length);

  for (let index = 0; index < data.length; index += 4) {
    const r = data[index] ?? 0;
    const g = data[index + 1] ?? 0;
    const b = data[index + 2] ?? 0;
    const a = data[index + 3] ?? 255;
    const gray = luma(r, g, b);
    result[index] = clampChannel(gray + factor * (r - gray));
    result[index + 1] = clampChannel(gray + factor * (g - gray));
    result[index + 2] = clampChannel(gray + factor * (b - gray));
    result[index + 3] = a;
  }

  return result;
};

export const applyGrayscale = (data: Uint8ClampedArray): Uint8ClampedArray => applySaturation(data, 0);
