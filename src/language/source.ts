import { devAssert } from '../jsutils/devAssert';

interface Location {
  line: number;
  column: number;
}

/**
 * A representation of source input to the query language. The `name` and
 * `locationOffset` parameters are optional, but they are useful for clients
 * who store request documents in source files. For example, if the document
 * starts at line 40 of a file named `Foo.graphql`, it might be useful for
 * `name` to be `"Foo.graphql"` and location to be `{ line: 40, column: 1 }`.
 * The `line` and `column` properties in `locationOffset` are 1-indexed.
 */
export class Source {
  body: string;
  name: string;
  locationOffset: Location;

  constructor(
    body: string,
    name: string = 'Request',
    locationOffset: Location = { line: 1, column: 1 },
  ) {
    this.body = body;
    this.name = name;
    this.locationOffset = locationOffset;
    devAssert(
      this.locationOffset.line > 0,
      'line in locationOffset is 1-indexed and must be positive.',
    );
    devAssert(
      this.locationOffset.column > 0,
      'column in locationOffset is 1-indexed and must be positive.',
    );
  }

  get [Symbol.toStringTag]() {
    return 'Source';
  }
}

export function isSource(source: unknown): source is Source {
  return source instanceof Source;
}
