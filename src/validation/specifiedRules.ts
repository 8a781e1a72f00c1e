import { FieldsOnCorrectTypeRule } from './rules/FieldsOnCorrectTypeRule';
import { FragmentsOnCompositeTypesRule } from './rules/FragmentsOnCompositeTypesRule';
import { KnownArgumentNamesRule } from './rules/KnownArgumentNamesRule';
import { KnownDirectivesRule } from './rules/KnownDirectivesRule';
import { KnownFragmentNamesRule } from './rules/KnownFragmentNamesRule';
import { KnownTypeNamesRule } from './rules/KnownTypeNamesRule';
import { LoneAnonymousOperationRule } from './rules/LoneAnonymousOperationRule';
import { NoFragmentCyclesRule } from './rules/NoFragmentCyclesRule';
import { NoUndefinedVariablesRule } from './rules/NoUndefinedVariablesRule';
import { NoUnusedFragmentsRule } from './rules/NoUnusedFragmentsRule';
import { NoUnusedVariablesRule } from './rules/NoUnusedVariablesRule';
import { OverlappingFieldsCanBeMergedRule } from './rules/OverlappingFieldsCanBeMergedRule';
import { PossibleFragmentSpreadsRule } from './rules/PossibleFragmentSpreadsRule';
import { ProvidedRequiredArgumentsRule } from './rules/ProvidedRequiredArgumentsRule';
import { ScalarLeafsRule } from './rules/ScalarLeafsRule';
import { UniqueArgumentNamesRule } from './rules/UniqueArgumentNamesRule';
import { UniqueDirectivesPerLocationRule } from './rules/UniqueDirectivesPerLocationRule';
import { UniqueFragmentNamesRule } from './rules/UniqueFragmentNamesRule';
import { UniqueInputFieldNamesRule } from './rules/UniqueInputFieldNamesRule';
import { UniqueOperationNamesRule } from './rules/UniqueOperationNamesRule';
import { UniqueVariableNamesRule } from './rules/UniqueVariableNamesRule';
import { ValuesOfCorrectTypeRule } from './rules/ValuesOfCorrectTypeRule';
import { VariablesAreInputTypesRule } from './rules/VariablesAreInputTypesRule';
import { VariablesInAllowedPositionRule } from './rules/VariablesInAllowedPositionRule';
import type { ValidationRule } from './ValidationContext';

/**
 * This set includes every standard rule for executable documents.
 *
 * The order of the rules in this list has been adjusted to lead to the
 * most clear output when encountering multiple validation errors.
 */
export const specifiedRules: ReadonlyArray<ValidationRule> = Object.freeze([
  UniqueOperationNamesRule,
  LoneAnonymousOperationRule,
  KnownTypeNamesRule,
  FragmentsOnCompositeTypesRule,
  VariablesAreInputTypesRule,
  ScalarLeafsRule,
  FieldsOnCorrectTypeRule,
  UniqueFragmentNamesRule,
  KnownFragmentNamesRule,
  NoUnusedFragmentsRule,
  PossibleFragmentSpreadsRule,
  NoFragmentCyclesRule,
  UniqueVariableNamesRule,
  NoUndefinedVariablesRule,
  NoUnusedVariablesRule,
  KnownDirectivesRule,
  UniqueDirectivesPerLocationRule,
  KnownArgumentNamesRule,
  UniqueArgumentNamesRule,
  ValuesOfCorrectTypeRule,
  ProvidedRequiredArgumentsRule,
  VariablesInAllowedPositionRule,
  OverlappingFieldsCanBeMergedRule,
  UniqueInputFieldNamesRule,
]);
