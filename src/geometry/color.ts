export const BASE_COLOR_VALUE = 255;
const COLOR_STEP = 75;

/**
 * Red channel for a slice: starts at 255 and decays by 75/k for the k-th step,
 * so later slices change shade more slowly. Pure in the slice index.
 */
export function colorForIndex(sliceIndex: number): number {
  let value = BASE_COLOR_VALUE;
  for (let k = 1; k <= sliceIndex; k++) {
    value -= COLOR_STEP / k;
  }
  return value;
}

export function sliceFill(colorValue: number): string {
  const channel = Math.round(Math.min(255, Math.max(0, colorValue)));
  return `rgb(${channel}, 40, 40)`;
}
