import type { PathCommand, Point } from '../core/types.js';

export const PATH_DIGITS = 2;
const MAX_PATH_DIGITS = 8;

// Rounded to `digits` decimals (full precision for null); -0 prints as 0
export function formatCoord(n: number, digits: number | null = PATH_DIGITS): string {
  const v = digits === null ? n : Math.round(n * 10 ** digits) / 10 ** digits;
  return Object.is(v, -0) ? '0' : String(v);
}

function formatPoint(p: Point, digits: number | null): string {
  return `${formatCoord(p.x, digits)},${formatCoord(p.y, digits)}`;
}

// An arc whose printed endpoints coincide is dropped by SVG renderers
function collapsesArc(commands: readonly PathCommand[], digits: number): boolean {
  let current: Point | undefined;
  for (const cmd of commands) {
    if (cmd.type === 'Z') continue;
    if (
      cmd.type === 'A' &&
      current &&
      (current.x !== cmd.to.x || current.y !== cmd.to.y) &&
      formatPoint(current, digits) === formatPoint(cmd.to, digits)
    ) {
      return true;
    }
    current = cmd.to;
  }
  return false;
}

function pathDigits(commands: readonly PathCommand[]): number | null {
  for (let digits = PATH_DIGITS; digits <= MAX_PATH_DIGITS; digits++) {
    if (!collapsesArc(commands, digits)) return digits;
  }
  return null;
}

/**
 * Path string with two-decimal coordinates. Precision is raised for the whole
 * path when rounding would put an arc's end on its own start point.
 */
export function serializePath(commands: readonly PathCommand[]): string {
  const digits = pathDigits(commands);
  return commands
    .map((cmd) => {
      switch (cmd.type) {
        case 'M':
        case 'L':
          return `${cmd.type}${formatPoint(cmd.to, digits)}`;
        case 'A':
          return `A${formatCoord(cmd.rx, digits)},${formatCoord(cmd.ry, digits)},${cmd.rotation},${cmd.largeArc},${cmd.sweep},${formatPoint(cmd.to, digits)}`;
        case 'Z':
          return 'Z';
      }
    })
    .join('');
}

export interface WedgePoints {
  center: Point;
  radius: number;
  start: Point;
  end: Point;
  largeArc: 0 | 1;
}

export interface RingPoints extends WedgePoints {
  innerRadius: number;
  innerStart: Point;
  innerEnd: Point;
}

// Outer arc drawn end -> start (counter-clockwise), then back to the centre
export function wedgeCommands(p: WedgePoints): PathCommand[] {
  return [
    { type: 'M', to: p.end },
    { type: 'A', rx: p.radius, ry: p.radius, rotation: 0, largeArc: p.largeArc, sweep: 0, to: p.start },
    { type: 'L', to: p.center },
    { type: 'Z' },
  ];
}

// Outer arc end -> start, across to the inner ring, inner arc start -> end
export function ringCommands(p: RingPoints): PathCommand[] {
  return [
    { type: 'M', to: p.end },
    { type: 'A', rx: p.radius, ry: p.radius, rotation: 0, largeArc: p.largeArc, sweep: 0, to: p.start },
    { type: 'L', to: p.innerStart },
    { type: 'A', rx: p.innerRadius, ry: p.innerRadius, rotation: 0, largeArc: p.largeArc, sweep: 1, to: p.innerEnd },
    { type: 'Z' },
  ];
}
