import { createLocation, formatLocation, type Location } from "@bundlekit/dyn";

/**
 * Malformed structured text. Carries the position the parser stopped at.
 */
export class ParseError extends Error {
  readonly location: Location;

  constructor(
    file: string,
    line: number,
    column: number,
    readonly detail: string,
  ) {
    const location = createLocation(file, line, column);
    super(`${formatLocation(location)}: ${detail}`);
    this.name = "ParseError";
    this.location = location;
  }
}
