import type { Point } from '../core/types.js';

// 0 degrees is 12 o'clock; angles grow clockwise (screen y points down)
export function polarToCartesian(center: Point, radius: number, angleDegrees: number): Point {
  const rad = ((angleDegrees - 90) * Math.PI) / 180;
  return {
    x: center.x + radius * Math.cos(rad),
    y: center.y + radius * Math.sin(rad),
  };
}
