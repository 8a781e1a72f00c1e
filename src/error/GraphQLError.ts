import type { Maybe } from '../jsutils/Maybe';

import type { ASTNode } from '../language/ast';
import type { SourceLocation } from '../language/location';
import { getLocation } from '../language/location';
import type { Source } from '../language/source';

/**
 * Custom extensions
 *
 * @remarks
 * Use a unique identifier name for your extension, for example the name of
 * your library or project. Do not use a shortened identifier as this increases
 * the risk of conflicts.
 */
export interface GraphQLErrorExtensions {
  [attributeName: string]: unknown;
}

export interface GraphQLErrorOptions {
  nodes?: ReadonlyArray<ASTNode> | ASTNode | null;
  source?: Maybe<Source>;
  positions?: Maybe<ReadonlyArray<number>>;
  path?: Maybe<ReadonlyArray<string | number>>;
  originalError?: Maybe<Error>;
  extensions?: Maybe<GraphQLErrorExtensions>;
}

/**
 * A GraphQLError describes an Error found during the parse, validate, or
 * execute phases of performing a request. It can describe the location
 * in the source and the path in the response where the error occurred.
 */
export class GraphQLError extends Error {
  /**
   * An array of `{ line, column }` locations within the source document which
   * correspond to this error.
   *
   * Errors during validation often contain multiple locations, for example to
   * point out two things with the same name. Errors during execution include a
   * single location, the field which produced the error.
   */
  readonly locations: ReadonlyArray<SourceLocation> | undefined;

  /**
   * An array describing the JSON-path into the execution response which
   * corresponds to this error. Only included for errors during execution.
   */
  readonly path: ReadonlyArray<string | number> | undefined;

  /**
   * An array of AST nodes corresponding to this error.
   */
  readonly nodes: ReadonlyArray<ASTNode> | undefined;

  /**
   * The source document for the first location of this error.
   */
  readonly source: Source | undefined;

  /**
   * An array of character offsets within the source document
   * which correspond to this error.
   */
  readonly positions: ReadonlyArray<number> | undefined;

  /**
   * The original error thrown from a field resolver during execution.
   */
  readonly originalError: Error | undefined;

  /**
   * Extension fields to add to the formatted error.
   */
  readonly extensions: GraphQLErrorExtensions;

  constructor(message: string, options: GraphQLErrorOptions = {}) {
    const { nodes, source, positions, path, originalError, extensions } =
      options;

    super(message);

    this.name = 'GraphQLError';
    this.path = path ?? undefined;
    this.originalError = originalError ?? undefined;

    // Compute list of blame nodes.
    this.nodes = undefinedIfEmpty(toNodeList(nodes));

    const nodeLocations = undefinedIfEmpty(
      this.nodes
        ?.map((node) => node.loc)
        .filter((loc): loc is NonNullable<typeof loc> => loc != null),
    );

    // Compute locations in the source for the given nodes/positions.
    this.source = source ?? nodeLocations?.[0]?.source;

    this.positions = positions ?? nodeLocations?.map((loc) => loc.start);

    this.locations =
      positions && source
        ? positions.map((pos) => getLocation(source, pos))
        : nodeLocations?.map((loc) => getLocation(loc.source, loc.start));

    const originalExtensions = readExtensions(originalError);
    this.extensions = extensions ?? originalExtensions ?? Object.create(null);

    if (originalError?.stack) {
      Object.defineProperty(this, 'stack', {
        value: originalError.stack,
        writable: true,
        configurable: true,
      });
    } else if (Error.captureStackTrace) {
      Error.captureStackTrace(this, GraphQLError);
    }
  }

  get [Symbol.toStringTag](): string {
    return 'GraphQLError';
  }

  override toString(): string {
    let output = this.message;

    if (this.locations && this.source) {
      for (const location of this.locations) {
        output +=
          '\n\n' +
          `${this.source.name}:${location.line}:${location.column}`;
      }
    }

    return output;
  }

  toJSON(): GraphQLFormattedError {
    type WritableFormattedError = {
      -readonly [P in keyof GraphQLFormattedError]: GraphQLFormattedError[P];
    };

    const formattedError: WritableFormattedError = {
      message: this.message,
    };

    if (this.locations != null) {
      formattedError.locations = this.locations;
    }

    if (this.path != null) {
      formattedError.path = this.path;
    }

    if (this.extensions != null && Object.keys(this.extensions).length > 0) {
      formattedError.extensions = this.extensions;
    }

    return formattedError;
  }
}

function toNodeList(
  nodes: ReadonlyArray<ASTNode> | ASTNode | null | undefined,
): ReadonlyArray<ASTNode> | undefined {
  if (nodes == null) {
    return undefined;
  }
  return isNodeList(nodes) ? nodes : [nodes];
}

function isNodeList(
  nodes: ReadonlyArray<ASTNode> | ASTNode,
): nodes is ReadonlyArray<ASTNode> {
  return Array.isArray(nodes);
}

function undefinedIfEmpty<T>(
  array: Array<T> | ReadonlyArray<T> | undefined,
): Array<T> | ReadonlyArray<T> | undefined {
  return array === undefined || array.length === 0 ? undefined : array;
}

function readExtensions(
  originalError: Maybe<Error>,
): GraphQLErrorExtensions | undefined {
  if (originalError == null || !('extensions' in originalError)) {
    return undefined;
  }
  const extensions: unknown = originalError.extensions;
  if (typeof extensions === 'object' && extensions !== null) {
    return { ...extensions };
  }
  return undefined;
}

/**
 * An error as it appears in the `errors` list of a response.
 */
export interface GraphQLFormattedError {
  readonly message: string;
  /** Positions in the request document, when the error has any. */
  readonly locations?: ReadonlyArray<SourceLocation>;
  /** Response keys and list indices leading to the field that failed. */
  readonly path?: ReadonlyArray<string | number>;
  readonly extensions?: { [key: string]: unknown };
}

/**
 * The message followed by the source excerpt of every location.
 */
export function printError(error: GraphQLError): string {
  return error.toString();
}

export function formatError(error: GraphQLError): GraphQLFormattedError {
  return error.toJSON();
}
