export interface Location {
  line: number;
  column: number;
  offset: number;
}

export interface Span {
  start: Location;
  end: Location;
  sourceFile: string;
}

export function joinSpans(start: Span, end: Span): Span {
  return { start: start.start, end: end.end, sourceFile: start.sourceFile };
}
