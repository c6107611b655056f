import type { Point, SliceDescriptor } from '../core/types.js';
import { type AngleSpan, isFilled } from './angles.js';
import { colorForIndex, sliceFill } from './color.js';
import { ringCommands, serializePath, wedgeCommands } from './path.js';
import { polarToCartesian } from './polar.js';

export interface SliceGeometry {
  center: Point;
  radius: number;
  /** Inner ring radius, already clamped to >= 0; ignored unless donut */
  innerRadius: number;
  donut: boolean;
}

export function buildSlices(spans: readonly AngleSpan[], geometry: SliceGeometry): SliceDescriptor[] {
  const { center, radius, innerRadius, donut } = geometry;

  return spans.filter(isFilled).map((span) => {
    const start = polarToCartesian(center, radius, span.drawnStart);
    const end = polarToCartesian(center, radius, span.end);
    const commands = donut
      ? ringCommands({
          center,
          radius,
          start,
          end,
          largeArc: span.largeArc,
          innerRadius,
          innerStart: polarToCartesian(center, innerRadius, span.drawnStart),
          innerEnd: polarToCartesian(center, innerRadius, span.end),
        })
      : wedgeCommands({ center, radius, start, end, largeArc: span.largeArc });
    const colorValue = colorForIndex(span.sliceIndex);

    return {
      index: span.sliceIndex,
      seriesIndex: span.seriesIndex,
      startAngle: span.start,
      endAngle: span.end,
      drawnStartAngle: span.drawnStart,
      largeArc: span.largeArc,
      commands,
      path: serializePath(commands),
      colorValue,
      fill: sliceFill(colorValue),
    };
  });
}
