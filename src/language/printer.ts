import type { ASTNode } from './ast';
import { printBlockString } from './blockString';
import { Kind } from './kinds';
import { printString } from './printString';

/**
 * Converts an AST into a string, using one set of reasonable
 * formatting rules.
 */
export function print(ast: ASTNode): string {
  switch (ast.kind) {
    case Kind.NAME:
      return ast.value;
    case Kind.VARIABLE:
      return '$' + ast.name.value;

    // Document

    case Kind.DOCUMENT:
      return printAll(ast.definitions, '\n\n');
    case Kind.OPERATION_DEFINITION: {
      const varDefs = wrap('(', printAll(ast.variableDefinitions, ', '), ')');
      const prefix = join(
        [
          ast.operation,
          join([ast.name && print(ast.name), varDefs]),
          printAll(ast.directives, ' '),
        ],
        ' ',
      );
      // Anonymous queries with no directives or variable definitions can use
      // the query short form.
      return (prefix === 'query' ? '' : prefix + ' ') + print(ast.selectionSet);
    }
    case Kind.VARIABLE_DEFINITION:
      return (
        print(ast.variable) +
        ': ' +
        print(ast.type) +
        wrap(' = ', ast.defaultValue && print(ast.defaultValue)) +
        wrap(' ', printAll(ast.directives, ' '))
      );
    case Kind.SELECTION_SET:
      return block(ast.selections.map(print));
    case Kind.FIELD: {
      const prefix =
        wrap('', ast.alias && print(ast.alias), ': ') + print(ast.name);
      let argsLine =
        prefix + wrap('(', printAll(ast.arguments, ', '), ')');
      if (argsLine.length > MAX_LINE_LENGTH) {
        argsLine =
          prefix + wrap('(\n', indent(printAll(ast.arguments, '\n')), '\n)');
      }
      return join(
        [
          argsLine,
          printAll(ast.directives, ' '),
          ast.selectionSet && print(ast.selectionSet),
        ],
        ' ',
      );
    }
    case Kind.ARGUMENT:
      return print(ast.name) + ': ' + print(ast.value);

    // Fragments

    case Kind.FRAGMENT_SPREAD:
      return (
        '...' + print(ast.name) + wrap(' ', printAll(ast.directives, ' '))
      );
    case Kind.INLINE_FRAGMENT:
      return join(
        [
          '...',
          wrap('on ', ast.typeCondition && print(ast.typeCondition)),
          printAll(ast.directives, ' '),
          print(ast.selectionSet),
        ],
        ' ',
      );
    case Kind.FRAGMENT_DEFINITION:
      return (
        `fragment ${print(ast.name)} on ${print(ast.typeCondition)} ` +
        wrap('', printAll(ast.directives, ' '), ' ') +
        print(ast.selectionSet)
      );

    // Value

    case Kind.INT:
    case Kind.FLOAT:
    case Kind.ENUM:
      return ast.value;
    case Kind.STRING:
      return ast.block === true
        ? printBlockString(ast.value)
        : printString(ast.value);
    case Kind.BOOLEAN:
      return ast.value ? 'true' : 'false';
    case Kind.NULL:
      return 'null';
    case Kind.LIST:
      return '[' + printAll(ast.values, ', ') + ']';
    case Kind.OBJECT:
      return '{' + printAll(ast.fields, ', ') + '}';
    case Kind.OBJECT_FIELD:
      return print(ast.name) + ': ' + print(ast.value);

    // Directive

    case Kind.DIRECTIVE:
      return (
        '@' + print(ast.name) + wrap('(', printAll(ast.arguments, ', '), ')')
      );

    // Type

    case Kind.NAMED_TYPE:
      return print(ast.name);
    case Kind.LIST_TYPE:
      return '[' + print(ast.type) + ']';
    case Kind.NON_NULL_TYPE:
      return print(ast.type) + '!';
  }
}

const MAX_LINE_LENGTH = 80;

function printAll(
  nodes: ReadonlyArray<ASTNode> | undefined,
  separator: string,
): string {
  return join(nodes?.map(print), separator);
}

/**
 * Given maybeArray, print an empty string if it is null or empty, otherwise
 * print all items together separated by separator if provided
 */
function join(
  maybeArray: ReadonlyArray<string | undefined> | undefined,
  separator = '',
): string {
  return maybeArray?.filter((x) => x).join(separator) ?? '';
}

/**
 * Given array, print each item on its own line, wrapped in an indented `{ }` block.
 */
function block(array: ReadonlyArray<string>): string {
  return wrap('{\n', indent(join(array, '\n')), '\n}');
}

/**
 * If maybeString is not null or empty, then wrap with start and end, otherwise print an empty string.
 */
function wrap(
  start: string,
  maybeString: string | undefined,
  end: string = '',
): string {
  return maybeString != null && maybeString !== ''
    ? start + maybeString + end
    : '';
}

function indent(str: string): string {
  return wrap('  ', str.replace(/\n/g, '\n  '));
}
