export { GraphQLError, printError, formatError } from './GraphQLError';
export type {
  GraphQLErrorOptions,
  GraphQLFormattedError,
  GraphQLErrorExtensions,
} from './GraphQLError';

export { LexError, ParseError, isSyntaxError } from './syntaxError';
export { ValidationError } from './ValidationError';
export { locatedError } from './locatedError';
export { isGraphQLError } from './isGraphQLError';
