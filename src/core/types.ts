// Source-level errors (pie text front end), positioned like editor diagnostics
export interface ValidationError {
  line: number;
  column: number;
  message: string;
  severity: 'error' | 'warning';
  code?: string;
  hint?: string;
  length?: number;
}

// Geometry-level signals; never positioned, never fatal
export interface Diagnostic {
  severity: 'warning';
  code: DiagnosticCode;
  message: string;
  hint?: string;
}

export type DiagnosticCode =
  | 'PIE-NEGATIVE-VALUE'
  | 'PIE-NON-FINITE-VALUE'
  | 'PIE-RATIO-CLAMPED'
  | 'PIE-TOTAL-IGNORED'
  | 'PIE-TOTAL-ZERO'
  | 'PIE-TOTAL-NON-FINITE'
  | 'PIE-RADIUS-NONPOSITIVE'
  | 'PIE-DONUT-CLAMPED'
  | 'PIE-LABEL-COUNT-MISMATCH';

export type DiagnosticSink = (diagnostic: Diagnostic) => void;

export interface Point {
  x: number;
  y: number;
}

export type LabelPosition = 'inside' | 'outside' | 'center';

export type LabelFormatter = (value: number) => string;

export type PathCommand =
  | { type: 'M'; to: Point }
  | { type: 'L'; to: Point }
  | { type: 'A'; rx: number; ry: number; rotation: number; largeArc: 0 | 1; sweep: 0 | 1; to: Point }
  | { type: 'Z' };

export interface SliceDescriptor {
  /** Position among drawn slices (zero entries skipped) */
  index: number;
  /** Position in the input series */
  seriesIndex: number;
  /** Bookkeeping start; also the next slice's boundary */
  startAngle: number;
  endAngle: number;
  /** Start actually drawn, pulled back slightly to hide seams */
  drawnStartAngle: number;
  largeArc: 0 | 1;
  commands: PathCommand[];
  path: string;
  colorValue: number;
  fill: string;
}

export type LabelAnchor =
  | { seriesIndex: number; suppressed: true }
  | { seriesIndex: number; suppressed: false; point: Point; angle: number };

export interface LabelEntry {
  anchor: LabelAnchor;
  /** null when nothing should be drawn for this entry */
  text: string | null;
}

export interface PieLayout {
  center: Point;
  radius: number;
  innerRadius: number;
  labelRadius: number;
  valuesTotal: number;
  normalized: number[];
  slices: SliceDescriptor[];
  anchors: LabelAnchor[];
  labels: LabelEntry[];
  diagnostics: Diagnostic[];
}
