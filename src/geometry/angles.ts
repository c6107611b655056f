// Shared angle walk: slices and labels both read these spans, so their
// bookkeeping cannot drift apart.

/** Degrees each slice after the first is pulled back to hide anti-aliasing seams */
export const SEAM_OVERLAP = 0.4;
/** Longest sweep a single arc command is asked to draw */
export const MAX_SWEEP = 359.99;

export type AngleSpan =
  | { seriesIndex: number; empty: true }
  | {
      seriesIndex: number;
      empty: false;
      sliceIndex: number;
      /** Bookkeeping boundary; label midpoints and the next slice use it */
      start: number;
      /** Where the wedge is actually drawn from */
      drawnStart: number;
      end: number;
      largeArc: 0 | 1;
    };

export type FilledSpan = Extract<AngleSpan, { empty: false }>;

export function isFilled(span: AngleSpan): span is FilledSpan {
  return !span.empty;
}

export function walkAngles(normalized: readonly number[], valuesTotal: number, startAngle: number): AngleSpan[] {
  const spans: AngleSpan[] = [];
  let current = startAngle;
  let sliceIndex = 0;

  normalized.forEach((value, seriesIndex) => {
    // No usable total (all zero, or overflowed): nothing gets a share of the circle
    if (value === 0 || !(valuesTotal > 0)) {
      spans.push({ seriesIndex, empty: true });
      return;
    }

    let end = current + (value / valuesTotal) * 360;
    const drawnStart = sliceIndex !== 0 ? Math.max(current - SEAM_OVERLAP, startAngle) : current;
    if (end - drawnStart >= MAX_SWEEP) {
      end = drawnStart + MAX_SWEEP;
    }
    const largeArc = end - current > 180 ? 1 : 0;

    spans.push({ seriesIndex, empty: false, sliceIndex, start: current, drawnStart, end, largeArc });
    sliceIndex += 1;
    current = end;
  });

  return spans;
}
