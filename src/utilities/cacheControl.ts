import type { Maybe } from '../jsutils/Maybe';
import type { ObjMap } from '../jsutils/ObjMap';

import type {
  DocumentNode,
  FragmentDefinitionNode,
  NamedTypeNode,
  SelectionSetNode,
} from '../language/ast';
import { Kind } from '../language/kinds';

import type {
  CacheControlHint,
  CacheControlScope,
  GraphQLCompositeType,
} from '../type/definition';
import { isCompositeType, isUnionType } from '../type/definition';
import type { GraphQLSchema } from '../type/schema';

import { shouldIncludeNode } from '../execution/collectFields';
import { getVariableValues } from '../execution/values';

import { getOperationAST } from './getOperationAST';
import { typeFromAST } from './typeFromAST';

/**
 * How long a response may be cached, and by whom.
 *
 * A `maxAge` of 0 means "no limit was declared". Merging two values keeps
 * the shorter declared age and makes the result private if either is.
 */
export class CacheControl {
  readonly maxAge: number;
  readonly scope: CacheControlScope;

  constructor(hint: CacheControlHint = {}) {
    this.maxAge = hint.maxAge ?? 0;
    this.scope = hint.scope ?? 'PUBLIC';
  }

  merge(other: CacheControlHint): CacheControl {
    const otherMaxAge = other.maxAge ?? 0;
    let maxAge: number;
    if (this.maxAge === 0) {
      maxAge = otherMaxAge;
    } else if (otherMaxAge === 0) {
      maxAge = this.maxAge;
    } else {
      maxAge = Math.min(this.maxAge, otherMaxAge);
    }
    return new CacheControl({
      maxAge,
      scope:
        this.scope === 'PUBLIC' && (other.scope ?? 'PUBLIC') === 'PUBLIC'
          ? 'PUBLIC'
          : 'PRIVATE',
    });
  }

  /**
   * The value of a `Cache-Control` response header, or undefined when no
   * max age applies.
   */
  toHeader(): string | undefined {
    if (this.maxAge <= 0) {
      return undefined;
    }
    return this.scope === 'PUBLIC'
      ? `max-age=${this.maxAge}`
      : `max-age=${this.maxAge}, private`;
  }
}

/**
 * Computes the cache policy of an operation from the hints declared on the
 * fields it selects and on the types those fields belong to. Fields skipped
 * by `@skip` or `@include` do not count.
 *
 * An operation that cannot be selected, or whose variables do not coerce,
 * yields the default policy (no max age).
 */
export function calculateCacheControl(
  schema: GraphQLSchema,
  document: DocumentNode,
  operationName?: Maybe<string>,
  variableValues?: Maybe<{ readonly [variable: string]: unknown }>,
): CacheControl {
  const operation = getOperationAST(document, operationName);
  if (!operation) {
    return new CacheControl();
  }
  const rootType = schema.getRootType(operation.operation);
  if (rootType == null) {
    return new CacheControl();
  }

  const coercedVariableValues = getVariableValues(
    schema,
    operation.variableDefinitions ?? [],
    variableValues ?? {},
  );
  if (coercedVariableValues.errors) {
    return new CacheControl();
  }

  const fragments: ObjMap<FragmentDefinitionNode> = Object.create(null);
  for (const definition of document.definitions) {
    if (definition.kind === Kind.FRAGMENT_DEFINITION) {
      fragments[definition.name.value] = definition;
    }
  }

  const walker = new CacheControlWalker(
    schema,
    fragments,
    coercedVariableValues.coerced,
  );
  walker.walk(operation.selectionSet, rootType);
  return walker.cacheControl;
}

class CacheControlWalker {
  cacheControl: CacheControl = new CacheControl();

  private readonly _visitedFragmentNames = new Set<string>();

  constructor(
    private readonly _schema: GraphQLSchema,
    private readonly _fragments: ObjMap<FragmentDefinitionNode>,
    private readonly _variableValues: { [variable: string]: unknown },
  ) {}

  walk(selectionSet: SelectionSetNode, parentType: GraphQLCompositeType): void {
    for (const selection of selectionSet.selections) {
      if (!shouldIncludeNode(this._schema, this._variableValues, selection)) {
        continue;
      }
      switch (selection.kind) {
        case Kind.FIELD: {
          const fieldDef = this._schema.getField(
            parentType,
            selection.name.value,
          );
          if (fieldDef === undefined) {
            continue;
          }
          if (!isUnionType(parentType) && parentType.cacheControl) {
            this.cacheControl = this.cacheControl.merge(
              parentType.cacheControl,
            );
          }
          if (fieldDef.cacheControl) {
            this.cacheControl = this.cacheControl.merge(fieldDef.cacheControl);
          }
          const fieldType = this._schema.getNamedType(fieldDef.type);
          if (selection.selectionSet && isCompositeType(fieldType)) {
            this.walk(selection.selectionSet, fieldType);
          }
          break;
        }
        case Kind.INLINE_FRAGMENT: {
          const conditionType = selection.typeCondition
            ? this._getCompositeType(selection.typeCondition)
            : parentType;
          if (conditionType !== undefined) {
            this.walk(selection.selectionSet, conditionType);
          }
          break;
        }
        case Kind.FRAGMENT_SPREAD: {
          const fragName = selection.name.value;
          if (this._visitedFragmentNames.has(fragName)) {
            continue;
          }
          this._visitedFragmentNames.add(fragName);
          const fragment = this._fragments[fragName];
          if (fragment === undefined) {
            continue;
          }
          const conditionType = this._getCompositeType(fragment.typeCondition);
          if (conditionType !== undefined) {
            this.walk(fragment.selectionSet, conditionType);
          }
          break;
        }
      }
    }
  }

  private _getCompositeType(
    typeCondition: NamedTypeNode,
  ): GraphQLCompositeType | undefined {
    const typeRef = typeFromAST(this._schema, typeCondition);
    const type =
      typeRef === undefined ? undefined : this._schema.getNamedType(typeRef);
    return isCompositeType(type) ? type : undefined;
  }
}
