import type { ASTNode } from './ast';
import { isNode, QueryDocumentKeys } from './ast';
import { Kind } from './kinds';

/**
 * Returned from a visit function to stop the whole traversal.
 */
export const BREAK: unique symbol = Symbol('BREAK');

/**
 * `false` skips the children of the node being entered; `BREAK` stops the
 * traversal; anything else continues.
 */
export type VisitResult = void | undefined | boolean | typeof BREAK;

/**
 * A visitor is provided to visit, it contains the collection of
 * relevant functions to be called during the visitor's traversal.
 */
export type ASTVisitFn<TVisitedNode extends ASTNode> = (
  /** The current node being visiting. */
  node: TVisitedNode,
  /** The AST node that owns the current node, if any. */
  parent: ASTNode | undefined,
  /**
   * All nodes visited before reaching the current node, from the root down to
   * (and including) `parent`.
   */
  ancestors: ReadonlyArray<ASTNode>,
) => VisitResult;

export interface EnterLeaveVisitor<TVisitedNode extends ASTNode> {
  readonly enter?: ASTVisitFn<TVisitedNode>;
  readonly leave?: ASTVisitFn<TVisitedNode>;
}

type KindVisitor = {
  readonly [NodeT in ASTNode as NodeT['kind']]?:
    | ASTVisitFn<NodeT>
    | EnterLeaveVisitor<NodeT>;
};

export type ASTVisitor = EnterLeaveVisitor<ASTNode> & KindVisitor;

/**
 * visit() will walk through an AST using a depth-first traversal, calling
 * the visitor's enter function at each node in the traversal, and calling the
 * leave function after visiting that node and all of its child nodes.
 *
 * By returning different values from the enter and leave functions, the
 * behavior of the visitor can be altered: returning `false` from enter skips
 * the node's children (and its leave call), returning `BREAK` stops the
 * traversal entirely.
 *
 * The AST is never modified.
 *
 * A visitor may define a generic `enter`/`leave` pair, or functions named
 * after the kind of node they handle:
 *
 * ```ts
 * visit(ast, {
 *   Field(node) {
 *     // enter the "Field" node
 *   },
 *   SelectionSet: {
 *     leave(node) {
 *       // leave the "SelectionSet" node
 *     },
 *   },
 * });
 * ```
 */
export function visit(root: ASTNode, visitor: ASTVisitor): void {
  visitNode(root, undefined, [], visitor);
}

function visitNode(
  node: ASTNode,
  parent: ASTNode | undefined,
  ancestors: Array<ASTNode>,
  visitor: ASTVisitor,
): boolean {
  const enterResult = callVisitFn(visitor, node, false, parent, ancestors);
  if (enterResult === BREAK) {
    return false;
  }
  if (enterResult === false) {
    return true;
  }

  ancestors.push(node);
  const keepGoing = visitChildren(node, ancestors, visitor);
  ancestors.pop();
  if (!keepGoing) {
    return false;
  }

  return callVisitFn(visitor, node, true, parent, ancestors) !== BREAK;
}

function visitChildren(
  node: ASTNode,
  ancestors: Array<ASTNode>,
  visitor: ASTVisitor,
): boolean {
  for (const child of getChildNodes(node)) {
    if (!visitNode(child, node, ancestors, visitor)) {
      return false;
    }
  }
  return true;
}

/**
 * Child nodes of `node` in the order a depth-first traversal meets them.
 *
 * @internal
 */
export function getChildNodes(node: ASTNode): Array<ASTNode> {
  const children: Array<ASTNode> = [];
  const keys: ReadonlyArray<string> = QueryDocumentKeys[node.kind];
  const fields: { [key: string]: unknown } = { ...node };
  for (const key of keys) {
    const value = fields[key];
    if (Array.isArray(value)) {
      for (const item of value) {
        if (isNode(item)) {
          children.push(item);
        }
      }
    } else if (isNode(value)) {
      children.push(value);
    }
  }
  return children;
}

/**
 * Creates a new visitor instance which delegates to many visitors to run in
 * parallel. Each visitor will be visited for each node before moving on.
 */
export function visitInParallel(
  visitors: ReadonlyArray<ASTVisitor>,
): ASTVisitor {
  const skipping = new Array<ASTNode | typeof BREAK | undefined>(
    visitors.length,
  ).fill(undefined);

  return {
    enter(node, parent, ancestors) {
      for (let i = 0; i < visitors.length; i++) {
        if (skipping[i] === undefined) {
          const result = callVisitFn(
            visitors[i],
            node,
            false,
            parent,
            ancestors,
          );
          if (result === false) {
            skipping[i] = node;
          } else if (result === BREAK) {
            skipping[i] = BREAK;
          }
        }
      }
    },
    leave(node, parent, ancestors) {
      for (let i = 0; i < visitors.length; i++) {
        if (skipping[i] === undefined) {
          const result = callVisitFn(
            visitors[i],
            node,
            true,
            parent,
            ancestors,
          );
          if (result === BREAK) {
            skipping[i] = BREAK;
          }
        } else if (skipping[i] === node) {
          skipping[i] = undefined;
        }
      }
    },
  };
}

/**
 * Calls the generic and the kind-specific visit function of `visitor` for
 * `node`, returning the first result that alters the traversal.
 *
 * @internal
 */
export function callVisitFn(
  visitor: ASTVisitor,
  node: ASTNode,
  isLeaving: boolean,
  parent: ASTNode | undefined,
  ancestors: ReadonlyArray<ASTNode>,
): VisitResult {
  const generic = isLeaving ? visitor.leave : visitor.enter;
  if (generic) {
    const result = generic.call(visitor, node, parent, ancestors);
    if (result === false || result === BREAK) {
      return result;
    }
  }
  return callKindVisitFn(visitor, node, isLeaving, parent, ancestors);
}

function callKindVisitFn(
  visitor: ASTVisitor,
  node: ASTNode,
  isLeaving: boolean,
  parent: ASTNode | undefined,
  ancestors: ReadonlyArray<ASTNode>,
): VisitResult {
  const args = [isLeaving, parent, ancestors] as const;
  switch (node.kind) {
    case Kind.NAME:
      return dispatch(visitor, visitor.Name, node, ...args);
    case Kind.DOCUMENT:
      return dispatch(visitor, visitor.Document, node, ...args);
    case Kind.OPERATION_DEFINITION:
      return dispatch(visitor, visitor.OperationDefinition, node, ...args);
    case Kind.VARIABLE_DEFINITION:
      return dispatch(visitor, visitor.VariableDefinition, node, ...args);
    case Kind.VARIABLE:
      return dispatch(visitor, visitor.Variable, node, ...args);
    case Kind.SELECTION_SET:
      return dispatch(visitor, visitor.SelectionSet, node, ...args);
    case Kind.FIELD:
      return dispatch(visitor, visitor.Field, node, ...args);
    case Kind.ARGUMENT:
      return dispatch(visitor, visitor.Argument, node, ...args);
    case Kind.FRAGMENT_SPREAD:
      return dispatch(visitor, visitor.FragmentSpread, node, ...args);
    case Kind.INLINE_FRAGMENT:
      return dispatch(visitor, visitor.InlineFragment, node, ...args);
    case Kind.FRAGMENT_DEFINITION:
      return dispatch(visitor, visitor.FragmentDefinition, node, ...args);
    case Kind.INT:
      return dispatch(visitor, visitor.IntValue, node, ...args);
    case Kind.FLOAT:
      return dispatch(visitor, visitor.FloatValue, node, ...args);
    case Kind.STRING:
      return dispatch(visitor, visitor.StringValue, node, ...args);
    case Kind.BOOLEAN:
      return dispatch(visitor, visitor.BooleanValue, node, ...args);
    case Kind.NULL:
      return dispatch(visitor, visitor.NullValue, node, ...args);
    case Kind.ENUM:
      return dispatch(visitor, visitor.EnumValue, node, ...args);
    case Kind.LIST:
      return dispatch(visitor, visitor.ListValue, node, ...args);
    case Kind.OBJECT:
      return dispatch(visitor, visitor.ObjectValue, node, ...args);
    case Kind.OBJECT_FIELD:
      return dispatch(visitor, visitor.ObjectField, node, ...args);
    case Kind.DIRECTIVE:
      return dispatch(visitor, visitor.Directive, node, ...args);
    case Kind.NAMED_TYPE:
      return dispatch(visitor, visitor.NamedType, node, ...args);
    case Kind.LIST_TYPE:
      return dispatch(visitor, visitor.ListType, node, ...args);
    case Kind.NON_NULL_TYPE:
      return dispatch(visitor, visitor.NonNullType, node, ...args);
  }
}

function dispatch<TVisitedNode extends ASTNode>(
  visitor: ASTVisitor,
  kindVisitor:
    | ASTVisitFn<TVisitedNode>
    | EnterLeaveVisitor<TVisitedNode>
    | undefined,
  node: TVisitedNode,
  isLeaving: boolean,
  parent: ASTNode | undefined,
  ancestors: ReadonlyArray<ASTNode>,
): VisitResult {
  if (kindVisitor === undefined) {
    return undefined;
  }
  if (typeof kindVisitor === 'function') {
    return isLeaving
      ? undefined
      : kindVisitor.call(visitor, node, parent, ancestors);
  }
  const fn = isLeaving ? kindVisitor.leave : kindVisitor.enter;
  return fn?.call(visitor, node, parent, ancestors);
}
