/**
 * Position of a value in the source text it was loaded from. Lines and
 * columns are 1-based.
 */
export interface Location {
  readonly file: string;
  readonly line: number;
  readonly column: number;
}

export const EMPTY_LOCATION: Location = Object.freeze({
  file: "",
  line: 0,
  column: 0,
});

export function createLocation(
  file: string,
  line: number,
  column: number,
): Location {
  return { file, line, column };
}

export function formatLocation(location: Location): string {
  return `${location.file}:${location.line}:${location.column}`;
}
