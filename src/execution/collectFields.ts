import type { ObjMap } from '../jsutils/ObjMap';

import type {
  FieldNode,
  FragmentDefinitionNode,
  FragmentSpreadNode,
  InlineFragmentNode,
  SelectionSetNode,
} from '../language/ast';
import { Kind } from '../language/kinds';

import type { GraphQLObjectType } from '../type/definition';
import { isAbstractType } from '../type/definition';
import {
  GraphQLIncludeDirective,
  GraphQLSkipDirective,
} from '../type/directives';
import type { GraphQLSchema } from '../type/schema';

import { typeFromAST } from '../utilities/typeFromAST';

import { getDirectiveValues } from './values';

/**
 * The field nodes that share one response key, in document order.
 */
export type FieldGroup = ReadonlyArray<FieldNode>;

/**
 * Response keys mapped to their field groups, in the order in which each key
 * first occurs in the selection set.
 */
export type GroupedFieldSet = ReadonlyMap<string, FieldGroup>;

/**
 * Groups the fields of `selectionSet` by response key, expanding fragments
 * whose type condition matches `runtimeType` and dropping selections
 * excluded by `@skip` or `@include`.
 *
 * @internal
 */
export function collectFields(
  schema: GraphQLSchema,
  fragments: ObjMap<FragmentDefinitionNode>,
  variableValues: { [variable: string]: unknown },
  runtimeType: GraphQLObjectType,
  selectionSet: SelectionSetNode,
): GroupedFieldSet {
  const fields = new Map<string, Array<FieldNode>>();
  collectFieldsImpl(
    schema,
    fragments,
    variableValues,
    runtimeType,
    selectionSet,
    fields,
    new Set(),
  );
  return fields;
}

/**
 * Merges the sub-selections of every node in a field group into one grouped
 * field set for the object type the field completed to.
 *
 * @internal
 */
export function collectSubfields(
  schema: GraphQLSchema,
  fragments: ObjMap<FragmentDefinitionNode>,
  variableValues: { [variable: string]: unknown },
  returnType: GraphQLObjectType,
  fieldGroup: FieldGroup,
): GroupedFieldSet {
  const subFieldNodes = new Map<string, Array<FieldNode>>();
  const visitedFragmentNames = new Set<string>();
  for (const node of fieldGroup) {
    if (node.selectionSet) {
      collectFieldsImpl(
        schema,
        fragments,
        variableValues,
        returnType,
        node.selectionSet,
        subFieldNodes,
        visitedFragmentNames,
      );
    }
  }
  return subFieldNodes;
}

function collectFieldsImpl(
  schema: GraphQLSchema,
  fragments: ObjMap<FragmentDefinitionNode>,
  variableValues: { [variable: string]: unknown },
  runtimeType: GraphQLObjectType,
  selectionSet: SelectionSetNode,
  fields: Map<string, Array<FieldNode>>,
  visitedFragmentNames: Set<string>,
): void {
  for (const selection of selectionSet.selections) {
    switch (selection.kind) {
      case Kind.FIELD: {
        if (!shouldIncludeNode(schema, variableValues, selection)) {
          continue;
        }
        const key = getFieldEntryKey(selection);
        const fieldList = fields.get(key);
        if (fieldList !== undefined) {
          fieldList.push(selection);
        } else {
          fields.set(key, [selection]);
        }
        break;
      }
      case Kind.INLINE_FRAGMENT: {
        if (
          !shouldIncludeNode(schema, variableValues, selection) ||
          !doesFragmentConditionMatch(schema, selection, runtimeType)
        ) {
          continue;
        }
        collectFieldsImpl(
          schema,
          fragments,
          variableValues,
          runtimeType,
          selection.selectionSet,
          fields,
          visitedFragmentNames,
        );
        break;
      }
      case Kind.FRAGMENT_SPREAD: {
        const fragName = selection.name.value;
        if (
          visitedFragmentNames.has(fragName) ||
          !shouldIncludeNode(schema, variableValues, selection)
        ) {
          continue;
        }
        visitedFragmentNames.add(fragName);
        const fragment = fragments[fragName];
        if (
          fragment === undefined ||
          !doesFragmentConditionMatch(schema, fragment, runtimeType)
        ) {
          continue;
        }
        collectFieldsImpl(
          schema,
          fragments,
          variableValues,
          runtimeType,
          fragment.selectionSet,
          fields,
          visitedFragmentNames,
        );
        break;
      }
    }
  }
}

/**
 * `@skip(if: true)` wins over `@include(if: true)`.
 *
 * @internal
 */
export function shouldIncludeNode(
  schema: GraphQLSchema,
  variableValues: { [variable: string]: unknown },
  node: FragmentSpreadNode | FieldNode | InlineFragmentNode,
): boolean {
  const skip = getDirectiveValues(
    schema,
    GraphQLSkipDirective,
    node,
    variableValues,
  );
  if (skip?.if === true) {
    return false;
  }

  const include = getDirectiveValues(
    schema,
    GraphQLIncludeDirective,
    node,
    variableValues,
  );
  if (include?.if === false) {
    return false;
  }
  return true;
}

function doesFragmentConditionMatch(
  schema: GraphQLSchema,
  fragment: FragmentDefinitionNode | InlineFragmentNode,
  type: GraphQLObjectType,
): boolean {
  const typeConditionNode = fragment.typeCondition;
  if (!typeConditionNode) {
    return true;
  }
  const conditionalTypeRef = typeFromAST(schema, typeConditionNode);
  if (conditionalTypeRef === undefined) {
    return false;
  }
  const conditionalType = schema.getNamedType(conditionalTypeRef);
  if (conditionalType === type) {
    return true;
  }
  if (isAbstractType(conditionalType)) {
    return schema.isSubType(conditionalType, type);
  }
  return false;
}

/** The alias when present, otherwise the field name. */
export function getFieldEntryKey(node: FieldNode): string {
  return node.alias ? node.alias.value : node.name.value;
}
