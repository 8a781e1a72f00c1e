import type { Maybe } from '../jsutils/Maybe';

import type { ASTNode } from '../language/ast';
import { Kind } from '../language/kinds';
import type { ASTVisitor } from '../language/visitor';
import { callVisitFn } from '../language/visitor';

import type {
  GraphQLArgument,
  GraphQLCompositeType,
  GraphQLEnumValue,
  GraphQLField,
  TypeRef,
} from '../type/definition';
import {
  getNullableTypeRef,
  isCompositeType,
  isEnumType,
  isInputObjectType,
  isInputType,
  isOutputType,
  named,
} from '../type/definition';
import type { GraphQLDirective } from '../type/directives';
import type { GraphQLSchema } from '../type/schema';

import { typeFromAST } from './typeFromAST';

/**
 * TypeInfo is a utility class which, given a GraphQL schema, can keep track
 * of the current field and type definitions at any point in a GraphQL document
 * AST during a recursive descent by calling `enter(node)` and `leave(node)`.
 *
 * Output and input positions are tracked as `TypeRef`s; the composite parent
 * type is tracked as a resolved named type.
 */
export class TypeInfo {
  private _schema: GraphQLSchema;
  private _typeStack: Array<Maybe<TypeRef>>;
  private _parentTypeStack: Array<Maybe<GraphQLCompositeType>>;
  private _inputTypeStack: Array<Maybe<TypeRef>>;
  private _fieldDefStack: Array<Maybe<GraphQLField>>;
  private _defaultValueStack: Array<unknown>;
  private _directive: Maybe<GraphQLDirective>;
  private _argument: Maybe<GraphQLArgument>;
  private _enumValue: Maybe<GraphQLEnumValue>;

  constructor(schema: GraphQLSchema) {
    this._schema = schema;
    this._typeStack = [];
    this._parentTypeStack = [];
    this._inputTypeStack = [];
    this._fieldDefStack = [];
    this._defaultValueStack = [];
    this._directive = null;
    this._argument = null;
    this._enumValue = null;
  }

  get [Symbol.toStringTag]() {
    return 'TypeInfo';
  }

  getType(): Maybe<TypeRef> {
    return this._typeStack[this._typeStack.length - 1];
  }

  getParentType(): Maybe<GraphQLCompositeType> {
    return this._parentTypeStack[this._parentTypeStack.length - 1];
  }

  getInputType(): Maybe<TypeRef> {
    return this._inputTypeStack[this._inputTypeStack.length - 1];
  }

  getParentInputType(): Maybe<TypeRef> {
    return this._inputTypeStack[this._inputTypeStack.length - 2];
  }

  getFieldDef(): Maybe<GraphQLField> {
    return this._fieldDefStack[this._fieldDefStack.length - 1];
  }

  getDefaultValue(): unknown {
    return this._defaultValueStack[this._defaultValueStack.length - 1];
  }

  getDirective(): Maybe<GraphQLDirective> {
    return this._directive;
  }

  getArgument(): Maybe<GraphQLArgument> {
    return this._argument;
  }

  getEnumValue(): Maybe<GraphQLEnumValue> {
    return this._enumValue;
  }

  enter(node: ASTNode): void {
    const schema = this._schema;
    switch (node.kind) {
      case Kind.SELECTION_SET: {
        const type = this.getType();
        const namedType = type ? schema.getNamedType(type) : undefined;
        this._parentTypeStack.push(
          isCompositeType(namedType) ? namedType : undefined,
        );
        break;
      }
      case Kind.FIELD: {
        const parentType = this.getParentType();
        const fieldDef = parentType
          ? schema.getField(parentType, node.name.value)
          : undefined;
        this._fieldDefStack.push(fieldDef);
        this._typeStack.push(fieldDef?.type);
        break;
      }
      case Kind.DIRECTIVE:
        this._directive = schema.getDirective(node.name.value);
        break;
      case Kind.OPERATION_DEFINITION: {
        const rootType = schema.getRootType(node.operation);
        this._typeStack.push(rootType ? named(rootType.name) : undefined);
        break;
      }
      case Kind.INLINE_FRAGMENT:
      case Kind.FRAGMENT_DEFINITION: {
        const typeConditionAST = node.typeCondition;
        let outputType: Maybe<TypeRef>;
        if (typeConditionAST) {
          outputType = typeFromAST(schema, typeConditionAST);
        } else {
          const type = this.getType();
          const namedType = type ? schema.getNamedType(type) : undefined;
          outputType = namedType ? named(namedType.name) : undefined;
        }
        this._typeStack.push(
          outputType && isOutputType(schema.getNamedType(outputType))
            ? outputType
            : undefined,
        );
        break;
      }
      case Kind.VARIABLE_DEFINITION: {
        const inputType = typeFromAST(schema, node.type);
        this._inputTypeStack.push(
          inputType && isInputType(schema.getNamedType(inputType))
            ? inputType
            : undefined,
        );
        break;
      }
      case Kind.ARGUMENT: {
        const fieldOrDirective = this.getDirective() ?? this.getFieldDef();
        const argDef = fieldOrDirective?.args.find(
          (arg) => arg.name === node.name.value,
        );
        this._argument = argDef;
        this._defaultValueStack.push(argDef?.defaultValue);
        this._inputTypeStack.push(argDef?.type);
        break;
      }
      case Kind.LIST: {
        const listType = this.getInputType();
        const nullableType = listType
          ? getNullableTypeRef(listType)
          : undefined;
        const itemType =
          nullableType?.kind === 'ListTypeRef'
            ? nullableType.ofType
            : nullableType;
        // List positions don't have any default value.
        this._defaultValueStack.push(undefined);
        this._inputTypeStack.push(itemType);
        break;
      }
      case Kind.OBJECT_FIELD: {
        const inputType = this.getInputType();
        const objectType = inputType
          ? schema.getNamedType(inputType)
          : undefined;
        const inputField = isInputObjectType(objectType)
          ? objectType.getFields()[node.name.value]
          : undefined;
        this._defaultValueStack.push(inputField?.defaultValue);
        this._inputTypeStack.push(inputField?.type);
        break;
      }
      case Kind.ENUM: {
        const inputType = this.getInputType();
        const enumType = inputType ? schema.getNamedType(inputType) : undefined;
        this._enumValue = isEnumType(enumType)
          ? enumType.getValue(node.value)
          : null;
        break;
      }
      default:
      // Ignore other nodes
    }
  }

  leave(node: ASTNode): void {
    switch (node.kind) {
      case Kind.SELECTION_SET:
        this._parentTypeStack.pop();
        break;
      case Kind.FIELD:
        this._fieldDefStack.pop();
        this._typeStack.pop();
        break;
      case Kind.DIRECTIVE:
        this._directive = null;
        break;
      case Kind.OPERATION_DEFINITION:
      case Kind.INLINE_FRAGMENT:
      case Kind.FRAGMENT_DEFINITION:
        this._typeStack.pop();
        break;
      case Kind.VARIABLE_DEFINITION:
        this._inputTypeStack.pop();
        break;
      case Kind.ARGUMENT:
        this._argument = null;
        this._defaultValueStack.pop();
        this._inputTypeStack.pop();
        break;
      case Kind.LIST:
      case Kind.OBJECT_FIELD:
        this._defaultValueStack.pop();
        this._inputTypeStack.pop();
        break;
      case Kind.ENUM:
        this._enumValue = null;
        break;
      default:
      // Ignore other nodes
    }
  }
}

/**
 * Creates a new visitor instance which maintains a provided TypeInfo instance
 * along with visiting visitor.
 */
export function visitWithTypeInfo(
  typeInfo: TypeInfo,
  visitor: ASTVisitor,
): ASTVisitor {
  return {
    enter(node, parent, ancestors) {
      typeInfo.enter(node);
      const result = callVisitFn(visitor, node, false, parent, ancestors);
      if (result === false) {
        typeInfo.leave(node);
      }
      return result;
    },
    leave(node, parent, ancestors) {
      const result = callVisitFn(visitor, node, true, parent, ancestors);
      typeInfo.leave(node);
      return result;
    },
  };
}
