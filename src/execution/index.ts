export { pathToArray as responsePathAsArray } from '../jsutils/Path';

export {
  execute,
  executeSync,
  buildResponse,
  formatResult,
  defaultFieldResolver,
  defaultTypeResolver,
  EXECUTION_ABORTED,
} from './execute';

export type {
  ExecutionArgs,
  ExecutionResult,
  FormattedExecutionResult,
} from './execute';

export {
  getArgumentValues,
  getVariableValues,
  getDirectiveValues,
} from './values';

export { collectFields, collectSubfields } from './collectFields';
export type { FieldGroup, GroupedFieldSet } from './collectFields';

export { ErrorCollector } from './ErrorCollector';
